/**
 * Wall-clock implementation of {@link Clock}.
 */
import { setTimeout as delay } from "node:timers/promises";
import type { Clock } from "./types.js";

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number, signal?: AbortSignal): Promise<void> => {
    if (ms <= 0) return;
    await delay(ms, undefined, { signal });
  },
};

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}
