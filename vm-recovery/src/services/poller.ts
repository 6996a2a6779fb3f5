import type { Clock } from "../ports/clock.js";

export type ProbeResult<T> = { readonly done: true; readonly value: T } | { readonly done: false };

export type PollResult<T> =
  | { readonly status: "done"; readonly value: T; readonly elapsedMs: number }
  | { readonly status: "timeout"; readonly elapsedMs: number };

export interface PollOptions {
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly clock: Clock;
}

/**
 * Runs `probe` until it reports done or the budget is spent. Elapsed time is
 * the sum of the intervals slept, so a stubbed clock gives exact counts.
 */
export async function pollUntil<T>(
  probe: () => Promise<ProbeResult<T>>,
  options: PollOptions,
): Promise<PollResult<T>> {
  let elapsedMs = 0;

  for (;;) {
    const result = await probe();
    if (result.done) {
      return { status: "done", value: result.value, elapsedMs };
    }
    if (elapsedMs >= options.timeoutMs) {
      return { status: "timeout", elapsedMs };
    }
    await options.clock.sleep(options.intervalMs);
    elapsedMs += options.intervalMs;
  }
}

export function done<T>(value: T): ProbeResult<T> {
  return { done: true, value };
}

export const pending: ProbeResult<never> = { done: false };
