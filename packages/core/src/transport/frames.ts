import { GatewayError } from '../errors.js';

export const FrameFlag = {
  Data: 0x00,
  Compressed: 0x01,
  EndStream: 0x02,
} as const;

export type FrameFlagValue = (typeof FrameFlag)[keyof typeof FrameFlag];

export interface Frame {
  flags: FrameFlagValue;
  payload: Uint8Array;
}

const HEADER_BYTES = 5;
export const MAX_FRAME_BYTES = 16 * 1024 * 1024;

export function encodeFrame(payload: Uint8Array | string, flags: FrameFlagValue = FrameFlag.Data): Uint8Array {
  const body = typeof payload === 'string' ? new TextEncoder().encode(payload) : payload;
  const out = new Uint8Array(HEADER_BYTES + body.length);
  const view = new DataView(out.buffer);
  view.setUint8(0, flags);
  view.setUint32(1, body.length, false);
  out.set(body, HEADER_BYTES);
  return out;
}

export function encodeJsonFrame(value: unknown, flags: FrameFlagValue = FrameFlag.Data): Uint8Array {
  return encodeFrame(JSON.stringify(value), flags);
}

function toFlag(value: number): FrameFlagValue {
  switch (value) {
    case FrameFlag.Data:
      return FrameFlag.Data;
    case FrameFlag.EndStream:
      return FrameFlag.EndStream;
    case FrameFlag.Compressed:
      throw new GatewayError('MalformedUpstream', 'Compressed frames are not supported');
    default:
      throw new GatewayError('MalformedUpstream', `Unknown frame flag: 0x${value.toString(16).padStart(2, '0')}`);
  }
}

/**
 * Streaming decoder for length-prefixed envelopes. Chunks may split a frame
 * anywhere; incomplete bytes wait for the next `push`.
 */
export class FrameDecoder {
  private buffer = new Uint8Array(0);

  push(chunk: Uint8Array): Frame[] {
    this.append(chunk);
    const frames: Frame[] = [];
    while (this.buffer.length >= HEADER_BYTES) {
      const view = new DataView(this.buffer.buffer, this.buffer.byteOffset, this.buffer.byteLength);
      const flags = toFlag(view.getUint8(0));
      const length = view.getUint32(1, false);
      if (length > MAX_FRAME_BYTES) {
        throw new GatewayError('MalformedUpstream', `Frame of ${length} bytes exceeds limit`);
      }
      if (this.buffer.length < HEADER_BYTES + length) break;
      frames.push({ flags, payload: this.buffer.slice(HEADER_BYTES, HEADER_BYTES + length) });
      this.buffer = this.buffer.slice(HEADER_BYTES + length);
    }
    return frames;
  }

  /** Bytes held back waiting for the rest of a frame. */
  get pending(): number {
    return this.buffer.length;
  }

  private append(chunk: Uint8Array): void {
    if (this.buffer.length === 0) {
      this.buffer = chunk.slice();
      return;
    }
    const merged = new Uint8Array(this.buffer.length + chunk.length);
    merged.set(this.buffer, 0);
    merged.set(chunk, this.buffer.length);
    this.buffer = merged;
  }
}

export function decodeFramePayload(frame: Frame): unknown {
  const text = new TextDecoder().decode(frame.payload);
  if (text.length === 0) return {};
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new GatewayError('MalformedUpstream', 'Frame payload is not JSON', { cause: err });
  }
}
