/**
 * Core types for the slot bank
 */

/**
 * A persisted account
 *
 * `accountNumber` is in [1, MAX_ACCOUNTS] and never changes after creation.
 */
export interface Account {
  accountNumber: number;
  /** At most 14 significant characters once stored */
  lastName: string;
  /** At most 9 significant characters once stored */
  firstName: string;
  /** May be negative (overdraft), zero, or positive */
  balance: number;
}

/**
 * Raw record fields as they appear on disk
 *
 * `accountNumber === 0` is the empty sentinel.
 */
export type AccountRecord = Account;

/**
 * Contents of one fixed-size slot
 */
export type Slot = { state: "empty" } | { state: "occupied"; account: Account };

/**
 * Handle access mode for the data file
 */
export type OpenMode = "read" | "readWrite";

/**
 * One entry yielded by a slot scan
 */
export interface ScanEntry {
  /** Zero-based slot position */
  position: number;
  slot: Slot;
  /** True when the slot read came back short; `slot` is then empty */
  shortRead: boolean;
}

/**
 * A name cut to its field width
 */
export interface BoundedName {
  /** Value as it will be stored */
  value: string;
  /** Value as it was given */
  original: string;
  truncated: boolean;
}

/**
 * Update applied by `AccountService.update`
 */
export type AccountMutation =
  | { kind: "balanceDelta"; delta: number }
  | { kind: "rename"; lastName: string; firstName: string }
  | { kind: "replace"; lastName: string; firstName: string; balance: number };

export type AccountStatus = "OVERDRAWN" | "ZERO" | "ACTIVE";

/**
 * Aggregate figures over all occupied slots
 */
export interface AccountSummary {
  count: number;
  totalBalance: number;
  overdrawnCount: number;
  averageBalance: number;
}

/**
 * Data file statistics
 */
export interface StoreStats {
  /** Absolute data file path */
  path: string;
  sizeBytes: number;
  expectedBytes: number;
  slots: number;
  occupied: number;
  empty: number;
}

/**
 * Slot whose occupant does not belong at its position
 */
export interface MisplacedSlot {
  position: number;
  accountNumber: number;
}

/**
 * Integrity report over the whole data file
 */
export interface AuditReport {
  ok: boolean;
  sizeBytes: number;
  expectedBytes: number;
  occupied: number;
  /** Positions whose read returned fewer than RECORD_SIZE bytes */
  shortReads: number[];
  misplaced: MisplacedSlot[];
}

/**
 * Options for opening the account service
 */
export interface AccountsOptions {
  /** Data file path (resolved to absolute) */
  file: string;
  /**
   * Serialize mutating operations through an advisory lock file
   * (`<file>.lock`). Off by default.
   */
  lock?: boolean;
  /** Maximum wait for the lock (default: 5000ms) */
  lockTimeoutMs?: number;
}

/**
 * Account service interface
 */
export interface Accounts {
  /** Absolute data file path */
  readonly file: string;

  /**
   * Create (or truncate) the data file with MAX_ACCOUNTS empty slots
   */
  initialize(): Promise<void>;

  /**
   * Create the data file only when it does not exist
   * @returns true when a new file was written
   */
  ensureInitialized(): Promise<boolean>;

  /**
   * Check whether an account number is occupied (false when out of range)
   */
  exists(accountNumber: number): Promise<boolean>;

  create(
    accountNumber: number,
    lastName: string,
    firstName: string,
    balance: number
  ): Promise<Account>;

  read(accountNumber: number): Promise<Account>;

  update(accountNumber: number, mutation: AccountMutation): Promise<Account>;

  delete(accountNumber: number): Promise<void>;

  /**
   * Occupied accounts in ascending account-number order
   */
  listAll(): AsyncGenerator<Account, void, undefined>;

  aggregate(): Promise<AccountSummary>;

  stats(): Promise<StoreStats>;

  audit(): Promise<AuditReport>;
}
