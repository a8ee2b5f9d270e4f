import { setTimeout as sleep } from "node:timers/promises";
import { PollTimeoutError } from "./errors.js";

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
}

/**
 * Calls `attempt` until it yields a value or `timeoutMs` elapses. It runs
 * at least once. Rejects with `PollTimeoutError` on timeout and with the
 * signal's reason when aborted.
 */
export async function pollUntil<T>(
  attempt: () => Promise<T | undefined>,
  what: string,
  options: PollOptions
): Promise<T> {
  const deadline = Date.now() + options.timeoutMs;
  for (;;) {
    options.signal?.throwIfAborted();
    const value = await attempt();
    if (value !== undefined) return value;
    const remaining = deadline - Date.now();
    if (remaining <= 0) throw new PollTimeoutError(what, options.timeoutMs);
    await sleep(Math.min(options.intervalMs, remaining), undefined, { signal: options.signal });
  }
}
