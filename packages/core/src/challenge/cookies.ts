export type CookieFragment = readonly [name: string, value: string];

/** Joins fragments into a `Cookie` header value; empty values are skipped. */
export function assembleCookie(fragments: readonly CookieFragment[]): string {
  return fragments
    .filter(([, value]) => value.length > 0)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

/**
 * Splits an operator token of the form `first-second` at the first dash.
 * A token without a dash yields an empty second half.
 */
export function splitTokenPair(token: string): [string, string] {
  const index = token.indexOf('-');
  if (index === -1) return [token.trim(), ''];
  return [token.slice(0, index).trim(), token.slice(index + 1).trim()];
}

/** Parses `a=1; b=2` into ordered fragments. Pieces without `=` are ignored. */
export function parseCookieString(value: string): CookieFragment[] {
  const fragments: CookieFragment[] = [];
  for (const part of value.split(';')) {
    const index = part.indexOf('=');
    if (index <= 0) continue;
    fragments.push([part.slice(0, index).trim(), part.slice(index + 1).trim()]);
  }
  return fragments;
}
