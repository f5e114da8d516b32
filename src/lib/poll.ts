import { sleep as defaultSleep, type Sleep } from "./utils";

export type PollCheck<T> = { done: true; value: T } | { done: false };

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
  /** Wait one interval before the first check as well. */
  leadingDelay?: boolean;
  sleep?: Sleep;
}

export type PollOutcome<T> = { ok: true; value: T; attempts: number } | { ok: false; attempts: number };

export async function pollUntil<T>(
  check: (attempt: number) => Promise<PollCheck<T>>,
  options: PollOptions
): Promise<PollOutcome<T>> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    if (attempt > 1 || options.leadingDelay) {
      await sleep(options.intervalMs);
    }

    const result = await check(attempt);
    if (result.done) {
      return { ok: true, value: result.value, attempts: attempt };
    }
  }

  return { ok: false, attempts: maxAttempts };
}
