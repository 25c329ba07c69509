/**
 * Error types for slot store operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Storage-boundary errors include the absolute data file path in the message
 */

import type { Slot } from "./types.js";

/**
 * Base class for all slot store errors
 */
export abstract class SlotStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a slot position falls outside [0, MAX_ACCOUNTS)
 */
export class InvalidPositionError extends SlotStoreError {
  readonly code = "E_POSITION";

  constructor(
    public readonly position: number,
    options?: ErrorOptions
  ) {
    super(`Invalid slot position: ${position}`, options);
  }
}

/**
 * Thrown when an account number falls outside [1, MAX_ACCOUNTS]
 */
export class InvalidAccountNumberError extends SlotStoreError {
  readonly code = "E_ACCOUNT_NUMBER";

  constructor(
    public readonly accountNumber: number,
    options?: ErrorOptions
  ) {
    super(`Invalid account number: ${accountNumber} (expected 1-100)`, options);
  }
}

/**
 * Thrown when the slot for an account number is empty
 */
export class AccountNotFoundError extends SlotStoreError {
  readonly code = "E_NOT_FOUND";

  constructor(
    public readonly accountNumber: number,
    options?: ErrorOptions
  ) {
    super(`Account not found: #${accountNumber}`, options);
  }
}

/**
 * Thrown when creating an account whose slot is already occupied
 */
export class AccountExistsError extends SlotStoreError {
  readonly code = "E_EXISTS";

  constructor(
    public readonly accountNumber: number,
    options?: ErrorOptions
  ) {
    super(`Account already exists: #${accountNumber}`, options);
  }
}

export class InvalidNameError extends SlotStoreError {
  readonly code = "E_NAME";

  constructor(
    public readonly field: "lastName" | "firstName",
    public readonly value: string,
    options?: ErrorOptions
  ) {
    super(
      `Invalid ${field} "${value}": names must be non-empty and contain only letters, spaces, hyphens, or apostrophes`,
      options
    );
  }
}

export class InvalidAmountError extends SlotStoreError {
  readonly code = "E_AMOUNT";

  constructor(
    public readonly value: number,
    options?: ErrorOptions
  ) {
    super(`Invalid amount: ${value} (must be a finite number)`, options);
  }
}

/**
 * Thrown when opening, reading, writing or closing the data file fails
 */
export class StoreIOError extends SlotStoreError {
  readonly code = "E_IO";

  constructor(filePath: string, operation: string, options?: ErrorOptions) {
    super(`Data file ${operation} failed: ${filePath}`, options);
  }
}

/**
 * Thrown when a slot read returns fewer than RECORD_SIZE bytes
 *
 * The slot is reported as empty; callers auditing integrity must not treat it
 * as a validly-empty slot.
 */
export class ShortReadError extends SlotStoreError {
  readonly code = "E_SHORT_READ";
  readonly slot: Slot = { state: "empty" };

  constructor(
    filePath: string,
    public readonly position: number,
    public readonly bytesRead: number,
    options?: ErrorOptions
  ) {
    super(`Short read at slot ${position} (${bytesRead} bytes): ${filePath}`, options);
  }
}

/**
 * Thrown when a slot write stores fewer than RECORD_SIZE bytes
 *
 * The slot is left partially written; no rollback is attempted.
 */
export class ShortWriteError extends SlotStoreError {
  readonly code = "E_SHORT_WRITE";

  constructor(
    filePath: string,
    public readonly position: number,
    public readonly bytesWritten: number,
    options?: ErrorOptions
  ) {
    super(`Short write at slot ${position} (${bytesWritten} bytes): ${filePath}`, options);
  }
}

/**
 * Thrown when aggregate statistics are requested with zero occupied slots
 */
export class NoAccountsError extends SlotStoreError {
  readonly code = "E_NO_ACCOUNTS";

  constructor(options?: ErrorOptions) {
    super("No accounts on file", options);
  }
}

/**
 * Thrown when slot I/O is attempted without an open handle
 */
export class StoreClosedError extends SlotStoreError {
  readonly code = "E_CLOSED";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Record store is not open: ${filePath}`, options);
  }
}

export class LockTimeoutError extends SlotStoreError {
  readonly code = "E_LOCK_TIMEOUT";

  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `This may indicate a stale lock from a crashed process - ` +
        `manually delete the lock file if safe.`,
      options
    );
  }
}
