export type JwtPayload = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads a JWT payload without verifying it. Anything that is not a JWT gives `undefined`. */
export function decodeJwtPayload(token: string): JwtPayload | undefined {
  const parts = token.split('.');
  if (parts.length !== 3 || !parts[1]) return undefined;
  try {
    const json = Buffer.from(parts[1], 'base64url').toString('utf8');
    const payload: unknown = JSON.parse(json);
    return isRecord(payload) ? payload : undefined;
  } catch {
    return undefined;
  }
}

export function jwtString(payload: JwtPayload | undefined, ...path: string[]): string | undefined {
  let current: unknown = payload;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  if (typeof current === 'string') return current;
  if (typeof current === 'number') return String(current);
  return undefined;
}

/** `exp` claim in epoch milliseconds. */
export function jwtExpiry(payload: JwtPayload | undefined): number | null {
  const exp = payload?.exp;
  return typeof exp === 'number' ? exp * 1000 : null;
}
