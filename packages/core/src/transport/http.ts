import { GatewayError, toGatewayError } from '../errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { FrameDecoder, type Frame } from './frames.js';
import { SseParser, type SseEvent, type SseMode } from './sse.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  fetch?: FetchLike;
  /** Deadline for the response head (and the whole body for buffered calls). */
  requestTimeoutMs?: number;
  /** Longest silence tolerated between two body chunks of a stream. */
  idleTimeoutMs?: number;
  logger?: Logger;
}

export interface HttpCall {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  /** Strings and bytes are sent as-is; anything else is JSON-encoded. */
  body?: unknown;
  signal?: AbortSignal;
}

interface OpenedCall {
  response: Response;
  controller: AbortController;
  release: () => void;
}

const defaultFetch: FetchLike = (input, init) => fetch(input, init);

export class HttpTransport {
  private readonly fetchImpl: FetchLike;
  private readonly requestTimeoutMs: number;
  private readonly idleTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: HttpTransportOptions = {}) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 60_000;
    this.logger = options.logger ?? silentLogger;
  }

  async json(call: HttpCall): Promise<unknown> {
    const text = await this.text(call);
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new GatewayError('MalformedUpstream', `Upstream returned non-JSON body from ${call.url}`, { cause: err });
    }
  }

  async text(call: HttpCall): Promise<string> {
    const opened = await this.open(call, true);
    try {
      return await opened.response.text();
    } catch (err) {
      throw this.classify(err, call, opened.controller);
    } finally {
      opened.release();
    }
  }

  async *sse(call: HttpCall, mode: SseMode = 'events'): AsyncGenerator<SseEvent, void, undefined> {
    const parser = new SseParser(mode);
    const decoder = new TextDecoder();
    for await (const chunk of this.stream(call)) {
      yield* parser.push(decoder.decode(chunk, { stream: true }));
    }
    yield* parser.push(decoder.decode());
    yield* parser.flush();
  }

  async *frames(call: HttpCall): AsyncGenerator<Frame, void, undefined> {
    const decoder = new FrameDecoder();
    for await (const chunk of this.stream(call)) {
      yield* decoder.push(chunk);
    }
    if (decoder.pending > 0) {
      throw new GatewayError('MalformedUpstream', `Stream ended inside a frame (${decoder.pending} bytes pending)`);
    }
  }

  /**
   * Raw body chunks. Returning early (or throwing) cancels the response body,
   * which closes the upstream connection.
   */
  async *stream(call: HttpCall): AsyncGenerator<Uint8Array, void, undefined> {
    const opened = await this.open(call, false);
    const body = opened.response.body;
    if (!body) {
      opened.release();
      return;
    }
    const reader = body.getReader();
    try {
      while (true) {
        const result = await this.withIdleTimeout(reader.read(), call).catch((err: unknown) => {
          throw this.classify(err, call, opened.controller);
        });
        if (result.done) return;
        yield result.value;
      }
    } finally {
      opened.release();
      await reader.cancel().catch((err: unknown) => {
        this.logger.debug(`Body cancel failed for ${call.url}: ${String(err)}`);
      });
    }
  }

  private async open(call: HttpCall, holdTimer: boolean): Promise<OpenedCall> {
    call.signal?.throwIfAborted();

    const controller = new AbortController();
    const onAbort = (): void => controller.abort(call.signal?.reason);
    call.signal?.addEventListener('abort', onAbort, { once: true });

    const timer = setTimeout(() => {
      controller.abort(new GatewayError('UpstreamTimeout', `Upstream did not respond within ${this.requestTimeoutMs}ms: ${call.url}`));
    }, this.requestTimeoutMs);

    const release = (): void => {
      clearTimeout(timer);
      call.signal?.removeEventListener('abort', onAbort);
    };

    const method = call.method ?? (call.body === undefined ? 'GET' : 'POST');
    const url = withQuery(call.url, call.query);
    const headers: Record<string, string> = { ...call.headers };
    let body: string | Uint8Array | undefined;
    if (typeof call.body === 'string' || call.body instanceof Uint8Array) {
      body = call.body;
    } else if (call.body !== undefined) {
      body = JSON.stringify(call.body);
      if (!hasHeader(headers, 'content-type')) headers['Content-Type'] = 'application/json';
    }

    this.logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method, headers, body, signal: controller.signal });
    } catch (err) {
      release();
      throw this.classify(err, call, controller);
    }

    if (!holdTimer) clearTimeout(timer);

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      release();
      const message = `${response.status} from ${new URL(url).pathname}: ${vendorMessage(detail)}`;
      if (response.status === 401 || response.status === 403) {
        throw new GatewayError('AuthExpired', message, { status: response.status });
      }
      throw new GatewayError('UpstreamRejected', message, { status: response.status });
    }

    return { response, controller, release };
  }

  private withIdleTimeout<T>(pending: Promise<T>, call: HttpCall): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new GatewayError('UpstreamTimeout', `No data from upstream for ${this.idleTimeoutMs}ms: ${call.url}`));
      }, this.idleTimeoutMs);
      pending.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }

  /** Caller aborts pass through untouched so the provider can end quietly. */
  private classify(err: unknown, call: HttpCall, controller: AbortController): unknown {
    if (call.signal?.aborted) return err;
    const reason: unknown = controller.signal.reason;
    if (controller.signal.aborted && reason instanceof GatewayError) return reason;
    return toGatewayError(err);
  }
}

function withQuery(url: string, query: HttpCall['query']): string {
  if (!query) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === name);
}

/** Best-effort human message out of a vendor error body. */
export function vendorMessage(body: string): string {
  const trimmed = body.trim();
  if (!trimmed) return 'empty response';
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (typeof parsed === 'object' && parsed !== null) {
      for (const key of ['msg', 'message', 'errorMsg', 'error_msg', 'error']) {
        const value: unknown = Reflect.get(parsed, key);
        if (typeof value === 'string' && value) return value;
        if (typeof value === 'object' && value !== null) {
          const nested: unknown = Reflect.get(value, 'message');
          if (typeof nested === 'string' && nested) return nested;
        }
      }
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return trimmed.length > 300 ? `${trimmed.slice(0, 300)}...` : trimmed;
}
