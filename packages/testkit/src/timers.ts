/**
 * Timing helpers for lock and concurrency tests
 */

import { performance } from "node:perf_hooks";

export interface Timed<T> {
  result: T;
  durationMs: number;
}

/**
 * Run `fn` and report how long it took to settle
 */
export async function timed<T>(fn: () => Promise<T>): Promise<Timed<T>> {
  const start = performance.now();
  const result = await fn();
  return { result, durationMs: performance.now() - start };
}

/**
 * Wait for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
