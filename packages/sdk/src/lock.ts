/**
 * Advisory file lock serializing writers of one data file
 * Uses exclusive file open to ensure only one writer at a time
 */

import * as fs from "node:fs/promises";
import { LockTimeoutError } from "./errors.js";
import { errorCode } from "./io.js";
import { logger } from "./observability/logs.js";

export interface FileLockOptions {
  /** Maximum time to wait for the lock (default: 5000ms) */
  timeoutMs?: number;
  /** Time between retry attempts (default: 25ms) */
  retryIntervalMs?: number;
}

/**
 * Lock file path for a data file
 */
export function lockPathFor(dataFile: string): string {
  return `${dataFile}.lock`;
}

export class FileLock {
  #lockPath: string;
  #timeoutMs: number;
  #retryIntervalMs: number;
  #fd?: fs.FileHandle;
  #acquired = false;

  constructor(lockPath: string, options: FileLockOptions = {}) {
    this.#lockPath = lockPath;
    this.#timeoutMs = options.timeoutMs ?? 5000;
    this.#retryIntervalMs = options.retryIntervalMs ?? 25;
  }

  get path(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock, retrying until the timeout elapses
   * @throws LockTimeoutError when another holder keeps the lock past the timeout
   */
  async acquire(): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();

    while (true) {
      try {
        // Fails if the lock file already exists
        this.#fd = await fs.open(this.#lockPath, "wx");
        this.#acquired = true;

        const lockInfo = {
          pid: process.pid,
          acquiredAt: new Date().toISOString(),
        };
        await this.#fd.writeFile(JSON.stringify(lockInfo, null, 2));
        await this.#fd.sync();

        return;
      } catch (err) {
        if (errorCode(err) !== "EEXIST") {
          await this.release();
          throw err;
        }

        if (Date.now() - startTime > this.#timeoutMs) {
          throw new LockTimeoutError(this.#lockPath, this.#timeoutMs, { cause: err });
        }

        await new Promise((resolve) => setTimeout(resolve, this.#retryIntervalMs));
      }
    }
  }

  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }

      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Already cleaned up
      if (errorCode(err) !== "ENOENT") {
        logger.error("lock.release_failed", {
          file: this.#lockPath,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    } finally {
      this.#acquired = false;
    }
  }

  isAcquired(): boolean {
    return this.#acquired;
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}
