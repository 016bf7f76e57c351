import { WebSocket, type RawData } from 'ws';
import { GatewayError, toGatewayError } from '../errors.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { FrameDecoder, type Frame } from './frames.js';

export interface WebSocketTransportOptions {
  handshakeTimeoutMs?: number;
  idleTimeoutMs?: number;
  /** Interval between protocol-level pings while the socket is open. */
  keepaliveMs?: number;
  logger?: Logger;
}

export interface WebSocketCall {
  url: string;
  headers?: Record<string, string>;
  /** Encoded frames written as binary messages once the socket is open. */
  outbound: readonly Uint8Array[];
  signal?: AbortSignal;
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

export class WebSocketTransport {
  private readonly handshakeTimeoutMs: number;
  private readonly idleTimeoutMs: number;
  private readonly keepaliveMs: number;
  private readonly logger: Logger;

  constructor(options: WebSocketTransportOptions = {}) {
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 15_000;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 60_000;
    this.keepaliveMs = options.keepaliveMs ?? 20_000;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Opens a socket, sends `outbound` and yields inbound frames until the peer
   * closes. Leaving the loop early closes the socket; an abort drops frames
   * that are buffered but not yet consumed.
   */
  async *frames(call: WebSocketCall): AsyncGenerator<Frame, void, undefined> {
    call.signal?.throwIfAborted();

    const queue = new AsyncQueue<Frame>();
    const decoder = new FrameDecoder();
    const socket = new WebSocket(call.url, {
      headers: call.headers,
      handshakeTimeout: this.handshakeTimeoutMs,
    });
    let keepalive: NodeJS.Timeout | undefined;

    socket.on('open', () => {
      this.logger.debug(`WebSocket open: ${call.url}`);
      for (const frame of call.outbound) socket.send(frame, { binary: true });
      keepalive = setInterval(() => socket.ping(), this.keepaliveMs);
    });

    socket.on('unexpected-response', (_request, response) => {
      const status = response.statusCode ?? 0;
      const message = `WebSocket upgrade rejected with ${status}: ${call.url}`;
      queue.fail(
        status === 401 || status === 403
          ? new GatewayError('AuthExpired', message, { status })
          : new GatewayError('UpstreamRejected', message, { status }),
      );
      socket.terminate();
    });

    socket.on('message', (data) => {
      try {
        for (const frame of decoder.push(toBytes(data))) queue.push(frame);
      } catch (err) {
        queue.fail(err);
        socket.terminate();
      }
    });

    socket.on('error', (err) => {
      queue.fail(toGatewayError(err));
    });

    socket.on('close', (code) => {
      this.logger.debug(`WebSocket closed (${code}): ${call.url}`);
      if (decoder.pending > 0) {
        queue.fail(new GatewayError('MalformedUpstream', `Socket closed inside a frame (${decoder.pending} bytes pending)`));
      }
      queue.end();
    });

    const onAbort = (): void => queue.abort();
    call.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      while (true) {
        const result = await this.nextWithin(queue, call.url);
        if (result.done) return;
        yield result.value;
      }
    } finally {
      clearInterval(keepalive);
      call.signal?.removeEventListener('abort', onAbort);
      if (socket.readyState === WebSocket.OPEN) {
        socket.close(1000);
      } else if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
      }
    }
  }

  private nextWithin(queue: AsyncQueue<Frame>, url: string): Promise<IteratorResult<Frame, undefined>> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new GatewayError('UpstreamTimeout', `No data from upstream for ${this.idleTimeoutMs}ms: ${url}`));
      }, this.idleTimeoutMs);
      queue.next().then(
        (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }
}
