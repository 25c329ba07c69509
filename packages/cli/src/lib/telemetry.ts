/**
 * Per-command timing metrics
 *
 * With SLOTBANK_CLI_DEBUG=1 each command writes one line to stderr, e.g.
 *   metric cli.update file=/data/accounts.dat account=10 duration_ms=4 success=true
 */

import { performance } from "node:perf_hooks";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

/**
 * What a command touched; filled in by the command as it runs
 */
export interface CommandMetric {
  file?: string;
  account?: number;
}

/**
 * Render one metric line (no trailing newline)
 */
export function formatMetric(
  label: string,
  metric: CommandMetric,
  durationMs: number,
  success: boolean
): string {
  const parts = [`metric ${label}`];

  if (metric.file !== undefined) {
    // Keep the line splittable on spaces
    parts.push(`file=${encodeURI(metric.file)}`);
  }
  if (metric.account !== undefined) {
    parts.push(`account=${metric.account}`);
  }

  parts.push(`duration_ms=${Math.round(durationMs)}`, `success=${success}`);
  return parts.join(" ");
}

/**
 * Run a command body and emit its metric when verbose
 */
export async function withTiming<T>(
  label: string,
  fn: (metric: CommandMetric) => Promise<T>
): Promise<T> {
  const metric: CommandMetric = {};
  const start = performance.now();
  let success = false;

  try {
    const result = await fn(metric);
    success = true;
    return result;
  } finally {
    if (isVerbose()) {
      writeStderr(formatMetric(label, metric, performance.now() - start, success) + "\n");
    }
  }
}
