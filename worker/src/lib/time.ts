import type { Clock } from "./types.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Uniform pick in [minMs, maxMs]. `random` must return a value in [0, 1).
 */
export function uniformDelay(
  minMs: number,
  maxMs: number,
  random: () => number = Math.random
): number {
  if (maxMs <= minMs) return Math.max(0, minMs);
  return Math.max(0, minMs + random() * (maxMs - minMs));
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
