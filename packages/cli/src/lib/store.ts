/**
 * Account service adapter for CLI
 */

import { openAccounts } from "@slotbank/sdk";
import type { Account, Accounts } from "@slotbank/sdk";
import { resolveDataFile, resolveLock } from "./env.js";
import type { CommandMetric } from "./telemetry.js";

/**
 * Global options shared by every command
 */
export type GlobalOptions = {
  file?: string;
  lock?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Open the account service for the data file selected by options and environment
 */
export function openCliAccounts(opts: GlobalOptions, metric?: CommandMetric): Accounts {
  const file = resolveDataFile(opts.file);
  if (metric) {
    metric.file = file;
  }
  return openAccounts({ file, lock: resolveLock(opts.lock) });
}

/**
 * Drain listAll() into an array
 */
export async function collectAccounts(accounts: Accounts): Promise<Account[]> {
  const result: Account[] = [];
  for await (const account of accounts.listAll()) {
    result.push(account);
  }
  return result;
}
