/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the data file path
 * Priority: CLI option > SLOTBANK_FILE env var > default "./accounts.dat"
 */
export function resolveDataFile(cliFile?: string): string {
  const file = cliFile ?? process.env.SLOTBANK_FILE ?? "./accounts.dat";
  return path.resolve(expandTilde(file));
}

/**
 * Whether writers should take the advisory lock
 * Priority: --lock flag > SLOTBANK_LOCK=1
 */
export function resolveLock(cliLock?: boolean): boolean {
  return cliLock ?? process.env.SLOTBANK_LOCK === "1";
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.SLOTBANK_CLI_DEBUG === "1";
}
