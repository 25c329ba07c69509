/**
 * slotbank SDK
 *
 * Fixed-capacity account records in a single file, addressed by position
 */

// Re-export types
export type {
  Account,
  AccountRecord,
  Slot,
  OpenMode,
  ScanEntry,
  BoundedName,
  AccountMutation,
  AccountStatus,
  AccountSummary,
  StoreStats,
  MisplacedSlot,
  AuditReport,
  AccountsOptions,
  Accounts,
} from "./types.js";

// Re-export codec
export {
  MAX_ACCOUNTS,
  RECORD_SIZE,
  DATA_FILE_SIZE,
  LAST_NAME_MAX,
  FIRST_NAME_MAX,
  EMPTY_SLOT,
  emptySentinel,
  boundName,
  encodeRecord,
  decodeRecord,
  encodeSlot,
  decodeSlot,
  toSlot,
  fromSlot,
  isOccupied,
} from "./codec.js";

// Re-export validation
export {
  AccountNumberSchema,
  NameSchema,
  AmountSchema,
  isValidAccountNumber,
  isValidName,
  validateAccountNumber,
  validateName,
  validateAmount,
  validatePosition,
  positionOf,
} from "./validation.js";

// Re-export storage
export { RecordStore } from "./record-store.js";
export { FileLock, lockPathFor } from "./lock.js";
export type { FileLockOptions } from "./lock.js";
export { atomicWrite, ensureDirectory, fileSize, pathExists } from "./io.js";

// Re-export observability
export { logger, Logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics, MetricsCollector } from "./observability/metrics.js";
export type { SlotMetrics } from "./observability/metrics.js";

// Re-export errors
export {
  SlotStoreError,
  InvalidPositionError,
  InvalidAccountNumberError,
  AccountNotFoundError,
  AccountExistsError,
  InvalidNameError,
  InvalidAmountError,
  StoreIOError,
  ShortReadError,
  ShortWriteError,
  NoAccountsError,
  StoreClosedError,
  LockTimeoutError,
} from "./errors.js";

export { openAccounts, AccountService, accountStatus } from "./accounts.js";
