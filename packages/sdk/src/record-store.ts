/**
 * Positional record store: a file-backed array of MAX_ACCOUNTS fixed-size slots
 *
 * Invariants:
 * - Slot `p` lives at byte offset `p * RECORD_SIZE`; the file never grows or shrinks
 * - Every slot read and write moves exactly RECORD_SIZE bytes
 * - Bounds are checked before any I/O
 * - `withOpen` closes the handle on every exit path
 */

import * as fs from "node:fs/promises";
import { performance } from "node:perf_hooks";
import { DATA_FILE_SIZE, MAX_ACCOUNTS, RECORD_SIZE, decodeSlot, encodeSlot } from "./codec.js";
import { ShortReadError, ShortWriteError, StoreClosedError, StoreIOError } from "./errors.js";
import { atomicWrite, errorCode, fileSize } from "./io.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { OpenMode, ScanEntry, Slot } from "./types.js";
import { validatePosition } from "./validation.js";

const OPEN_FLAGS: Record<OpenMode, string> = {
  read: "r",
  readWrite: "r+",
};

export class RecordStore {
  #file: string;
  #handle: fs.FileHandle | null = null;
  #mode: OpenMode | null = null;

  /**
   * @param file - Absolute data file path
   */
  constructor(file: string) {
    this.#file = file;
  }

  get file(): string {
    return this.#file;
  }

  get isOpen(): boolean {
    return this.#handle !== null;
  }

  get mode(): OpenMode | null {
    return this.#mode;
  }

  /**
   * Create (or truncate) the data file with MAX_ACCOUNTS empty slots
   *
   * The file is written whole through a temp file and rename, so readers see
   * either the old file or a complete new one.
   */
  async initialize(): Promise<void> {
    await atomicWrite(this.#file, Buffer.alloc(DATA_FILE_SIZE));
    logger.debug("store.initialized", {
      file: this.#file,
      details: { slots: MAX_ACCOUNTS, bytes: DATA_FILE_SIZE },
    });
  }

  async open(mode: OpenMode): Promise<void> {
    if (this.#handle) {
      throw new StoreIOError(this.#file, "open", {
        cause: new Error(`Record store already open (${this.#mode})`),
      });
    }

    try {
      this.#handle = await fs.open(this.#file, OPEN_FLAGS[mode]);
      this.#mode = mode;
    } catch (err) {
      const operation = errorCode(err) === "ENOENT" ? "open (file does not exist)" : "open";
      throw new StoreIOError(this.#file, operation, { cause: err });
    }

    logger.debug("store.open", { file: this.#file, details: { mode } });
  }

  /**
   * Release the handle (no-op when already closed)
   */
  async close(): Promise<void> {
    const handle = this.#handle;
    if (!handle) {
      return;
    }

    this.#handle = null;
    this.#mode = null;

    try {
      await handle.close();
    } catch (err) {
      throw new StoreIOError(this.#file, "close", { cause: err });
    }

    logger.debug("store.close", { file: this.#file });
  }

  /**
   * Run `fn` with the store open, closing it afterwards whatever happens
   */
  async withOpen<T>(mode: OpenMode, fn: (store: RecordStore) => Promise<T>): Promise<T> {
    await this.open(mode);
    let failed = false;
    try {
      return await fn(this);
    } catch (err) {
      failed = true;
      throw err;
    } finally {
      try {
        await this.close();
      } catch (closeErr) {
        // A close failure must not mask the operation's own error
        if (!failed) {
          // eslint-disable-next-line no-unsafe-finally
          throw closeErr;
        }
        logger.error("store.close_failed", {
          file: this.#file,
          message: closeErr instanceof Error ? closeErr.message : String(closeErr),
        });
      }
    }
  }

  #requireHandle(): fs.FileHandle {
    if (!this.#handle) {
      throw new StoreClosedError(this.#file);
    }
    return this.#handle;
  }

  /**
   * Read the slot at a zero-based position
   * @throws InvalidPositionError if position is outside [0, MAX_ACCOUNTS)
   * @throws ShortReadError if fewer than RECORD_SIZE bytes were available
   * @throws StoreIOError for other read failures
   */
  async readAt(position: number): Promise<Slot> {
    validatePosition(position);
    const handle = this.#requireHandle();
    const buffer = Buffer.alloc(RECORD_SIZE);
    const start = performance.now();

    let bytesRead: number;
    try {
      ({ bytesRead } = await handle.read(buffer, 0, RECORD_SIZE, position * RECORD_SIZE));
    } catch (err) {
      throw new StoreIOError(this.#file, "read", { cause: err });
    }

    metrics.recordRead(this.#file, performance.now() - start);

    if (bytesRead < RECORD_SIZE) {
      metrics.recordShortRead(this.#file);
      throw new ShortReadError(this.#file, position, bytesRead);
    }

    return decodeSlot(buffer);
  }

  /**
   * Overwrite the whole slot at a zero-based position
   * @throws InvalidPositionError if position is outside [0, MAX_ACCOUNTS)
   * @throws ShortWriteError if fewer than RECORD_SIZE bytes were written
   * @throws StoreIOError for other write failures (including a read-only handle)
   */
  async writeAt(position: number, slot: Slot): Promise<void> {
    validatePosition(position);
    const handle = this.#requireHandle();
    const buffer = encodeSlot(slot);
    const start = performance.now();

    let bytesWritten: number;
    try {
      ({ bytesWritten } = await handle.write(buffer, 0, RECORD_SIZE, position * RECORD_SIZE));
    } catch (err) {
      throw new StoreIOError(this.#file, "write", { cause: err });
    }

    metrics.recordWrite(this.#file, performance.now() - start);

    if (bytesWritten < RECORD_SIZE) {
      throw new ShortWriteError(this.#file, position, bytesWritten);
    }
  }

  /**
   * Read every slot in ascending position order
   *
   * Empty slots are yielded too. A short read yields the empty slot with
   * `shortRead: true`. Each call starts again from position 0.
   */
  async *scan(): AsyncGenerator<ScanEntry, void, undefined> {
    for (let position = 0; position < MAX_ACCOUNTS; position++) {
      let entry: ScanEntry;
      try {
        entry = { position, slot: await this.readAt(position), shortRead: false };
      } catch (err) {
        if (!(err instanceof ShortReadError)) {
          throw err;
        }
        logger.warn("store.short_read", {
          file: this.#file,
          position,
          details: { bytesRead: err.bytesRead },
        });
        entry = { position, slot: err.slot, shortRead: true };
      }
      yield entry;
    }
  }

  /**
   * Current size of the data file in bytes
   * @throws StoreIOError if the file does not exist
   */
  async size(): Promise<number> {
    const size = await fileSize(this.#file);
    if (size === null) {
      throw new StoreIOError(this.#file, "stat (file does not exist)");
    }
    return size;
  }
}
