import { answer, reasoning, type ChatEvent } from '../types/chat.js';

/** Maps one vendor's raw stream items onto canonical events. */
export interface ExtractionRule<Raw> {
  extract(raw: Raw): ChatEvent[];
  /** Called when the source runs dry without a terminal event. Defaults to `finish(completed)`. */
  end?(): ChatEvent[];
}

/**
 * Turns cumulative snapshots into appended deltas. A snapshot that does not
 * extend the previous one starts a new segment and is emitted whole; a stale
 * shorter repeat emits nothing.
 */
export class SnapshotDiff {
  private previous = '';

  next(snapshot: string): string {
    if (snapshot.startsWith(this.previous)) {
      const delta = snapshot.slice(this.previous.length);
      this.previous = snapshot;
      return delta;
    }
    if (this.previous.startsWith(snapshot)) return '';
    this.previous = snapshot;
    return snapshot;
  }

  /** Records text that arrived as a plain append. */
  append(delta: string): string {
    this.previous += delta;
    return delta;
  }

  get current(): string {
    return this.previous;
  }
}

/** Keyed `SnapshotDiff`s, for vendors that stream several cumulative fields at once. */
export class SnapshotDiffs {
  private readonly diffs = new Map<string, SnapshotDiff>();

  next(key: string, snapshot: string): string {
    let diff = this.diffs.get(key);
    if (!diff) {
      diff = new SnapshotDiff();
      this.diffs.set(key, diff);
    }
    return diff.next(snapshot);
  }
}

function partialMarkerSuffix(text: string, marker: string): number {
  const max = Math.min(text.length, marker.length - 1);
  for (let size = max; size > 0; size--) {
    if (marker.startsWith(text.slice(text.length - size))) return size;
  }
  return 0;
}

/**
 * Splits text carrying inline reasoning markers (`<think>...</think>` by
 * default) into reasoning and answer deltas. Markers may be cut across
 * chunks; the partial tail is held until the next push.
 */
export class InlineMarkerSplitter {
  private inside = false;
  private pending = '';

  constructor(
    private readonly open = '<think>',
    private readonly close = '</think>',
  ) {}

  push(text: string): ChatEvent[] {
    const events: ChatEvent[] = [];
    let buffer = this.pending + text;
    this.pending = '';

    while (buffer.length > 0) {
      const marker = this.inside ? this.close : this.open;
      const index = buffer.indexOf(marker);
      if (index !== -1) {
        this.emit(buffer.slice(0, index), events);
        buffer = buffer.slice(index + marker.length);
        this.inside = !this.inside;
        continue;
      }
      const keep = partialMarkerSuffix(buffer, marker);
      this.emit(buffer.slice(0, buffer.length - keep), events);
      this.pending = buffer.slice(buffer.length - keep);
      break;
    }
    return events;
  }

  flush(): ChatEvent[] {
    const events: ChatEvent[] = [];
    this.emit(this.pending, events);
    this.pending = '';
    return events;
  }

  private emit(text: string, events: ChatEvent[]): void {
    if (!text) return;
    events.push(this.inside ? reasoning(text) : answer(text));
  }
}
