/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openAccounts } from "@slotbank/sdk";
import type { Accounts, AccountsOptions } from "@slotbank/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "slotbank-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "slotbank-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a freshly initialized data file, cleaning up after
 * @param fn - Receives the account service and the data file path
 * @param options - Optional service options (file will be overridden)
 * @returns Result of fn
 */
export async function withTempAccounts<T>(
  fn: (accounts: Accounts, file: string) => Promise<T>,
  options?: Partial<AccountsOptions>
): Promise<T> {
  const dir = await createTempDir();
  try {
    const file = join(dir, "accounts.dat");
    const accounts = openAccounts({ ...options, file });
    await accounts.initialize();
    return await fn(accounts, file);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
