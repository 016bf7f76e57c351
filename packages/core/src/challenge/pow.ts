import { createHash } from 'node:crypto';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { z } from 'zod';
import { GatewayError } from '../errors.js';

export const POW_ALGORITHM = 'DeepSeekHashV1';

export interface PowChallenge {
  algorithm: string;
  challenge: string;
  salt: string;
  difficulty: number;
  expireAt: number;
  signature: string;
  targetPath: string;
}

export interface PowParams {
  /** Any digest name `node:crypto` accepts. */
  hash: string;
  maxAttempts: number;
}

const VendorChallengeSchema = z.object({
  algorithm: z.string(),
  challenge: z.string(),
  salt: z.string(),
  difficulty: z.number().int().nonnegative(),
  expire_at: z.number(),
  signature: z.string(),
  target_path: z.string(),
});

export function parsePowChallenge(value: unknown): PowChallenge {
  const parsed = VendorChallengeSchema.safeParse(value);
  if (!parsed.success) {
    throw new GatewayError('MalformedUpstream', `Unexpected PoW challenge shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  const c = parsed.data;
  return {
    algorithm: c.algorithm,
    challenge: c.challenge,
    salt: c.salt,
    difficulty: c.difficulty,
    expireAt: c.expire_at,
    signature: c.signature,
    targetPath: c.target_path,
  };
}

/** Hash input for one attempt: `challenge + salt + "_" + expireAt + "_" + nonce`. */
export function powCandidate(challenge: PowChallenge, nonce: number): string {
  return `${challenge.challenge}${challenge.salt}_${challenge.expireAt}_${nonce}`;
}

export function meetsDifficulty(digest: Uint8Array, difficulty: number): boolean {
  if (difficulty > digest.length * 8) return false;
  const fullBytes = Math.floor(difficulty / 8);
  for (let i = 0; i < fullBytes; i++) {
    if (digest[i] !== 0) return false;
  }
  const remainingBits = difficulty % 8;
  if (remainingBits === 0) return true;
  return ((digest[fullBytes] ?? 0) >> (8 - remainingBits)) === 0;
}

function assertSupported(challenge: PowChallenge): void {
  if (challenge.algorithm !== POW_ALGORITHM) {
    throw new GatewayError('ChallengeUnsolvable', `Unsupported PoW algorithm: ${challenge.algorithm}`);
  }
}

function attempt(challenge: PowChallenge, params: PowParams, nonce: number): boolean {
  const digest = createHash(params.hash).update(powCandidate(challenge, nonce), 'utf8').digest();
  return meetsDifficulty(digest, challenge.difficulty);
}

function unsolvable(challenge: PowChallenge, params: PowParams): GatewayError {
  return new GatewayError(
    'ChallengeUnsolvable',
    `No PoW answer within ${params.maxAttempts} attempts (difficulty ${challenge.difficulty})`,
  );
}

/** Returns the smallest nonce whose digest has `difficulty` leading zero bits. */
export function solvePow(challenge: PowChallenge, params: PowParams): number {
  assertSupported(challenge);
  for (let nonce = 0; nonce < params.maxAttempts; nonce++) {
    if (attempt(challenge, params, nonce)) return nonce;
  }
  throw unsolvable(challenge, params);
}

export interface CooperativeOptions {
  batchSize?: number;
  signal?: AbortSignal;
}

/**
 * Same search as `solvePow`, yielding to the event loop between batches so
 * other requests keep moving while the puzzle is solved.
 */
export async function solvePowCooperatively(
  challenge: PowChallenge,
  params: PowParams,
  options: CooperativeOptions = {},
): Promise<number> {
  assertSupported(challenge);
  const batchSize = options.batchSize ?? 5000;
  for (let nonce = 0; nonce < params.maxAttempts; nonce++) {
    if (attempt(challenge, params, nonce)) return nonce;
    if ((nonce + 1) % batchSize === 0) {
      options.signal?.throwIfAborted();
      await yieldToEventLoop();
    }
  }
  throw unsolvable(challenge, params);
}

/** Value of the `x-ds-pow-response` header. */
export function encodePowResponse(challenge: PowChallenge, answer: number): string {
  const body = {
    algorithm: challenge.algorithm,
    challenge: challenge.challenge,
    salt: challenge.salt,
    answer,
    signature: challenge.signature,
    target_path: challenge.targetPath,
  };
  return Buffer.from(JSON.stringify(body), 'utf8').toString('base64');
}
