export interface SseEvent {
  event?: string;
  id?: string;
  data: string;
}

/**
 * `events` dispatches on a blank line as the SSE standard says. `lines` treats
 * every `data:` line as its own event, which is what vendors that never send
 * the blank separator need.
 */
export type SseMode = 'events' | 'lines';

/** Incremental server-sent-events parser. Feed decoded text, collect events. */
export class SseParser {
  private buffer = '';
  private data: string[] = [];
  private event?: string;
  private id?: string;

  constructor(private readonly mode: SseMode = 'events') {}

  push(chunk: string): SseEvent[] {
    this.buffer += chunk;
    const events: SseEvent[] = [];
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      this.processLine(line, events);
      newline = this.buffer.indexOf('\n');
    }
    return events;
  }

  /** Processes whatever is left once the body has ended. */
  flush(): SseEvent[] {
    const events: SseEvent[] = [];
    if (this.buffer.length > 0) {
      this.processLine(this.buffer.replace(/\r$/, ''), events);
      this.buffer = '';
    }
    this.dispatch(events);
    return events;
  }

  private processLine(line: string, events: SseEvent[]): void {
    if (line === '') {
      this.dispatch(events);
      return;
    }
    if (line.startsWith(':')) return;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    switch (field) {
      case 'data':
        if (this.mode === 'lines') {
          events.push(this.build([value]));
        } else {
          this.data.push(value);
        }
        break;
      case 'event':
        this.event = value;
        break;
      case 'id':
        this.id = value;
        break;
      default:
        break;
    }
  }

  private dispatch(events: SseEvent[]): void {
    if (this.data.length > 0) {
      events.push(this.build(this.data));
    }
    this.data = [];
    this.event = undefined;
    this.id = undefined;
  }

  private build(data: string[]): SseEvent {
    const event: SseEvent = { data: data.join('\n') };
    if (this.event !== undefined) event.event = this.event;
    if (this.id !== undefined) event.id = this.id;
    return event;
  }
}
