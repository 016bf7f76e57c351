import { createHash } from 'node:crypto';

export function md5(text: string): string {
  return createHash('md5').update(text, 'utf8').digest('hex');
}

/**
 * Percent-encodes every byte outside `A-Z a-z 0-9 - _ . ~`, which is stricter
 * than `encodeURIComponent` (that one leaves `! ' ( ) *` alone).
 */
export function strictEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

// ---------------------------------------------------------------------------
// Zhipu (chatglm.cn)
// ---------------------------------------------------------------------------

/**
 * Zhipu timestamp: the millisecond clock as a decimal string whose
 * second-to-last digit is replaced by (sum of all digits minus that digit) mod 10.
 */
export function zhipuTimestamp(nowMs: number): string {
  const t = String(Math.trunc(nowMs));
  const len = t.length;
  const digitsOf = Array.from(t, Number);
  const sum = digitsOf.reduce((acc, d) => acc + d, 0) - (digitsOf[len - 2] ?? 0);
  return `${t.slice(0, len - 2)}${sum % 10}${t.slice(len - 1)}`;
}

export interface ZhipuSignature {
  timestamp: string;
  nonce: string;
  sign: string;
}

/** Zhipu sign: `md5(timestamp + "-" + nonce + "-" + secret)`. */
export function zhipuSign(nowMs: number, nonce: string, secret: string): ZhipuSignature {
  const timestamp = zhipuTimestamp(nowMs);
  return { timestamp, nonce, sign: md5(`${timestamp}-${nonce}-${secret}`) };
}

export function zhipuSignHeaders(signature: ZhipuSignature): Record<string, string> {
  return {
    'X-Timestamp': signature.timestamp,
    'X-Nonce': signature.nonce,
    'X-Sign': signature.sign,
  };
}

// ---------------------------------------------------------------------------
// MiniMax (agent.minimaxi.com)
// ---------------------------------------------------------------------------

/** MiniMax `x-signature`: `md5(unixSeconds + secret + bodyJson)`. */
export function minimaxSignature(unixSeconds: number, secret: string, bodyJson: string): string {
  return md5(`${unixSeconds}${secret}${bodyJson}`);
}

/**
 * MiniMax `yy`: `md5(strictEncode(pathWithQuery) + "_" + body + md5(unixMs) + suffix)`.
 * `body` is the JSON request body for POST and the literal `{}` otherwise.
 */
export function minimaxYy(
  pathWithQuery: string,
  bodyJson: string,
  unixMs: number,
  method: string,
  suffix: string,
): string {
  const body = method.toUpperCase() === 'POST' ? bodyJson : '{}';
  return md5(`${strictEncode(pathWithQuery)}_${body}${md5(String(unixMs))}${suffix}`);
}

export interface MinimaxSignedHeaders {
  'x-timestamp': string;
  'x-signature': string;
  yy: string;
}

export function minimaxSignRequest(input: {
  unixSeconds: number;
  pathWithQuery: string;
  bodyJson: string;
  secret: string;
  yySuffix: string;
}): MinimaxSignedHeaders {
  return {
    'x-timestamp': String(input.unixSeconds),
    'x-signature': minimaxSignature(input.unixSeconds, input.secret, input.bodyJson),
    yy: minimaxYy(input.pathWithQuery, input.bodyJson, input.unixSeconds * 1000, 'POST', input.yySuffix),
  };
}
