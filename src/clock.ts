import { setTimeout as delay } from "node:timers/promises";
import { CancelledError } from "./errors.js";

// Clock abstracts wall time and cooperative waits so back-off and pacing can
// run on a simulated clock in tests.
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) throw new CancelledError();
      throw err;
    }
  },
};

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
