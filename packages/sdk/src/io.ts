/**
 * Atomic file I/O operations for crash-safe whole-file writes
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { StoreIOError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Node error code of a thrown value, if any
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new StoreIOError(String(dirPath), "mkdir", {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new StoreIOError(dirPath, "mkdir", { cause: err });
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms without directory fsync report EINVAL, ENOTSUP or EBADF
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
      logger.debug("io.dir_fsync_failed", {
        file: dir,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Text (written as UTF-8) or raw bytes
 */
export async function atomicWrite(filePath: string, content: string | Uint8Array): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content);

    // Prefer datasync, fall back to sync where it is not supported
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.tmp_close_failed", { file: tmp, details: { error: String(closeErr) } });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      // Temp file may not exist yet
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.tmp_unlink_failed", { file: tmp, details: { error: String(unlinkErr) } });
      }
    });

    throw new StoreIOError(filePath, "write", { cause: err });
  }
}

/**
 * Size of a file in bytes
 * @returns null when the file does not exist
 */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const info = await fs.stat(filePath);
    return info.size;
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new StoreIOError(filePath, "stat", { cause: err });
  }
}

/**
 * Check whether a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  return (await fileSize(filePath)) !== null;
}
