import { setTimeout as delay } from "timers/promises";
import { CancelledError } from "../core/errors.js";

/** Time source for the orchestrator; every wait is a suspension point that honours cancellation. */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    try {
      await delay(Math.max(0, ms), undefined, { signal });
    } catch (err) {
      if (isAbortError(err)) throw new CancelledError();
      throw err;
    }
  }
};
