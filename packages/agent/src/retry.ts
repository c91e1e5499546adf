/**
 * Per-channel retry bookkeeping for the agent.
 * Every state created here has nextAttemptAt at or after now.
 */

import type { RetryState } from "@channel-recorder/core";

export const MAX_RETRY_ATTEMPTS = 8;
export const BASE_RETRY_DELAY_SECONDS = 10;
export const MAX_RETRY_DELAY_SECONDS = 300;

/** Cooldown after a capture process exits cleanly (stream ended) */
export const CLEAN_EXIT_COOLDOWN_SECONDS = 15;

/** Lower bound of the cooldown after a successful launch */
export const MIN_LAUNCH_COOLDOWN_SECONDS = 10;

/** 10s, 20s, 40s ... capped at 300s */
export function retryDelaySeconds(attempts: number): number {
  const exponent = Math.max(attempts - 1, 0);
  return Math.min(2 ** exponent * BASE_RETRY_DELAY_SECONDS, MAX_RETRY_DELAY_SECONDS);
}

function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/** Next state after a failure; attempts stop growing at 8 */
export function nextRetryState(current: RetryState | undefined, now: Date): RetryState {
  const attempts = Math.min((current?.attempts ?? 0) + 1, MAX_RETRY_ATTEMPTS);
  return { attempts, nextAttemptAt: addSeconds(now, retryDelaySeconds(attempts)) };
}

/** Reset attempts and hold the channel for seconds */
export function cooldownState(seconds: number, now: Date): RetryState {
  return { attempts: 0, nextAttemptAt: addSeconds(now, Math.max(0, seconds)) };
}

export function isRetryDue(state: RetryState | undefined, now: Date): boolean {
  return state === undefined || now.getTime() >= state.nextAttemptAt.getTime();
}
