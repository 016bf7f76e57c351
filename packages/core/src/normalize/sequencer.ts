import { isTerminal, type ChatEvent } from '../types/chat.js';

/**
 * Gatekeeper for the event contract: drops empty deltas and everything that
 * arrives after the first `finish` or `error`.
 */
export class EventSequencer {
  private terminated = false;

  accept(event: ChatEvent): ChatEvent | undefined {
    if (this.terminated) return undefined;
    if ((event.type === 'answer' || event.type === 'reasoning') && event.text.length === 0) {
      return undefined;
    }
    if (isTerminal(event)) this.terminated = true;
    return event;
  }

  get done(): boolean {
    return this.terminated;
  }
}

export async function* sequenced(
  source: AsyncIterable<ChatEvent>,
): AsyncGenerator<ChatEvent, void, undefined> {
  const sequencer = new EventSequencer();
  for await (const event of source) {
    const accepted = sequencer.accept(event);
    if (accepted) yield accepted;
    if (sequencer.done) return;
  }
}
