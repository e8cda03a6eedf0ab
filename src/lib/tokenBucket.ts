import { BucketInvariantError } from './errors';

// Reported reset window. Refill is continuous; the window clients see is always one second.
export const RESET_AFTER_MS = 1000;

export type TokenBucketState = {
  capacity: number; // burst size
  refillRatePerSecond: number;
  tokens: number;
  lastRefillAt: number; // timestamp ms
};

export type ConsumeResult = {
  allowed: boolean;
  remaining: number;
  resetAfterMs: number;
};

export function createBucket(capacity: number, refillRatePerSecond: number, now: number): TokenBucketState {
  return { capacity, refillRatePerSecond, tokens: capacity, lastRefillAt: now };
}

function refill(state: TokenBucketState, now: number): void {
  const elapsedSeconds = Math.max(0, now - state.lastRefillAt) / 1000;
  state.tokens = Math.min(state.capacity, state.tokens + elapsedSeconds * state.refillRatePerSecond);
  // a clock that stepped backwards must not move the refill point back with it
  state.lastRefillAt = Math.max(state.lastRefillAt, now);
}

function assertBounds(state: TokenBucketState): void {
  if (!(state.tokens >= 0 && state.tokens <= state.capacity)) {
    throw new BucketInvariantError(state.tokens, state.capacity);
  }
}

export function tryConsume(state: TokenBucketState, now: number): ConsumeResult {
  refill(state, now);

  let allowed = false;
  if (state.tokens >= 1) {
    state.tokens -= 1;
    allowed = true;
  }
  assertBounds(state);

  return { allowed, remaining: Math.floor(state.tokens), resetAfterMs: RESET_AFTER_MS };
}

/** Whole tokens a bucket would hold at `now`, without consuming any. */
export function peekTokens(state: TokenBucketState, now: number): number {
  const elapsedSeconds = Math.max(0, now - state.lastRefillAt) / 1000;
  return Math.floor(Math.min(state.capacity, state.tokens + elapsedSeconds * state.refillRatePerSecond));
}

/**
 * Moves a live bucket onto a new rate or burst. Tokens accrued so far are
 * settled at the old rate first.
 */
export function reconfigureBucket(
  state: TokenBucketState,
  capacity: number,
  refillRatePerSecond: number,
  now: number,
): void {
  if (state.capacity === capacity && state.refillRatePerSecond === refillRatePerSecond) return;
  refill(state, now);
  state.capacity = capacity;
  state.refillRatePerSecond = refillRatePerSecond;
  state.tokens = Math.min(state.tokens, capacity);
  assertBounds(state);
}
