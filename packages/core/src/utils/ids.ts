import { randomBytes, randomInt, randomUUID } from 'node:crypto';

export function uuid(): string {
  return randomUUID();
}

export function hexId(): string {
  return randomUUID().replace(/-/g, '');
}

export function digits(length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) out += String(randomInt(10));
  return out;
}

export function completionId(): string {
  return `chatcmpl-${randomBytes(4).toString('hex')}`;
}

export function unixSeconds(now = Date.now()): number {
  return Math.floor(now / 1000);
}
