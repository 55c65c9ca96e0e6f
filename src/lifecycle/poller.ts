/**
 * Bounded polling used to confirm that a start/stop/restart took effect.
 *
 * The first probe runs immediately; up to `retries` further probes follow,
 * `intervalMs` apart. Polling stops at the first match. Only the
 * confirmation is bounded, never the triggering command itself.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { RunningState } from "../backends/types.js";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms => delay(ms);

export interface RetryOptions {
  /** Probes after the first one. 0 means a single check. */
  retries: number;
  intervalMs: number;
  sleep?: Sleep;
}

export interface RetryOutcome<T> {
  matched: boolean;
  /** Last observed value. */
  value: T;
  attempts: number;
}

export async function retryUntil<T>(
  probe: () => Promise<T>,
  predicate: (value: T) => boolean,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const sleep = options.sleep ?? defaultSleep;
  let value = await probe();
  let attempts = 1;

  while (!predicate(value) && attempts <= options.retries) {
    await sleep(options.intervalMs);
    value = await probe();
    attempts++;
  }

  return { matched: predicate(value), value, attempts };
}

export type ConfirmationOutcome = "confirmed" | "timed-out" | "unknown";

export interface ConfirmStateOptions {
  maxAttempts?: number;
  intervalMs?: number;
  sleep?: Sleep;
}

export interface Confirmation {
  outcome: ConfirmationOutcome;
  attempts: number;
  /** Time spent waiting between probes. */
  waitedMs: number;
}

/**
 * Poll until `expected` is observed.
 * - confirmed: seen
 * - timed-out: exhausted while still seeing the opposite state
 * - unknown: exhausted while the state could not be determined
 */
export async function confirmState(
  expected: Exclude<RunningState, "unknown">,
  probe: () => Promise<RunningState>,
  options: ConfirmStateOptions = {},
): Promise<Confirmation> {
  const intervalMs = options.intervalMs ?? 100;
  const result = await retryUntil(probe, state => state === expected, {
    retries: options.maxAttempts ?? 10,
    intervalMs,
    ...(options.sleep && { sleep: options.sleep }),
  });

  const waitedMs = (result.attempts - 1) * intervalMs;
  if (result.matched) return { outcome: "confirmed", attempts: result.attempts, waitedMs };
  return { outcome: result.value === "unknown" ? "unknown" : "timed-out", attempts: result.attempts, waitedMs };
}
