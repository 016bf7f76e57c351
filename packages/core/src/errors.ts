export type GatewayErrorKind =
  | 'ChallengeUnsolvable'
  | 'AuthExpired'
  | 'UpstreamTimeout'
  | 'UpstreamTransportError'
  | 'UpstreamRejected'
  | 'MalformedUpstream'
  | 'UnknownModel';

export interface GatewayErrorOptions {
  status?: number;
  cause?: unknown;
}

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  /** Upstream HTTP status, when the failure came from a vendor response. */
  readonly status?: number;

  constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GatewayError';
    this.kind = kind;
    this.status = options.status;
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Network-level failures get one transparent retry; everything else is
 * surfaced as-is.
 */
export function isRetryable(kind: GatewayErrorKind): boolean {
  return kind === 'UpstreamTimeout' || kind === 'UpstreamTransportError';
}

export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;
  if (error instanceof SyntaxError) {
    return new GatewayError('MalformedUpstream', `Invalid upstream payload: ${error.message}`, { cause: error });
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return new GatewayError('UpstreamTimeout', error.message, { cause: error });
  }
  if (error instanceof Error) {
    return new GatewayError('UpstreamTransportError', error.message, { cause: error });
  }
  return new GatewayError('UpstreamTransportError', String(error));
}
