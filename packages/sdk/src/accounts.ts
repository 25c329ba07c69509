/**
 * Account service: domain operations over the positional record store
 */

import * as path from "node:path";
import {
  DATA_FILE_SIZE,
  EMPTY_SLOT,
  FIRST_NAME_MAX,
  LAST_NAME_MAX,
  MAX_ACCOUNTS,
  boundName,
  isOccupied,
} from "./codec.js";
import { AccountExistsError, AccountNotFoundError, NoAccountsError, StoreIOError } from "./errors.js";
import { fileSize, pathExists } from "./io.js";
import { FileLock, lockPathFor } from "./lock.js";
import { logger } from "./observability/logs.js";
import { RecordStore } from "./record-store.js";
import type {
  Account,
  AccountMutation,
  Accounts,
  AccountsOptions,
  AccountStatus,
  AccountSummary,
  AuditReport,
  MisplacedSlot,
  Slot,
  StoreStats,
} from "./types.js";
import {
  isValidAccountNumber,
  positionOf,
  validateAmount,
  validateName,
} from "./validation.js";

/**
 * Status label for a balance
 */
export function accountStatus(balance: number): AccountStatus {
  if (balance < 0) return "OVERDRAWN";
  if (balance === 0) return "ZERO";
  return "ACTIVE";
}

/**
 * Validate both names and cut them to their field widths
 */
function prepareNames(accountNumber: number, lastName: string, firstName: string) {
  validateName(lastName, "lastName");
  validateName(firstName, "firstName");

  const last = boundName(lastName, LAST_NAME_MAX);
  const first = boundName(firstName, FIRST_NAME_MAX);

  for (const name of [last, first]) {
    if (name.truncated) {
      logger.warn("name.truncated", {
        account: accountNumber,
        message: `"${name.original}" stored as "${name.value}"`,
      });
    }
  }

  return { lastName: last.value, firstName: first.value };
}

function occupiedAccount(slot: Slot, accountNumber: number): Account {
  if (slot.state === "empty") {
    throw new AccountNotFoundError(accountNumber);
  }
  return slot.account;
}

/**
 * Account service backed by a single data file
 *
 * Each public call opens the record store, performs its slot operations and
 * closes it again; no handle survives between calls. Calls on one instance run
 * one at a time in the order they were made. Without the `lock` option there is
 * no isolation from other processes writing the same file.
 *
 * @example
 * ```typescript
 * const accounts = openAccounts({ file: './accounts.dat' });
 * await accounts.ensureInitialized();
 *
 * await accounts.create(10, 'Williams', 'Bob', 3200);
 * await accounts.update(10, { kind: 'balanceDelta', delta: -200 });
 *
 * for await (const account of accounts.listAll()) {
 *   console.log(account.accountNumber, account.balance);
 * }
 * ```
 */
export class AccountService implements Accounts {
  readonly file: string;
  #store: RecordStore;
  #lock: FileLock | null;
  #tail: Promise<void> = Promise.resolve();

  constructor(options: AccountsOptions) {
    this.file = path.resolve(options.file);
    this.#store = new RecordStore(this.file);
    this.#lock = options.lock
      ? new FileLock(lockPathFor(this.file), { timeoutMs: options.lockTimeoutMs })
      : null;
  }

  /**
   * Queue `fn` behind every earlier call on this instance
   */
  #serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.#tail.then(() => fn());
    // The queue only tracks ordering; callers receive failures through `run`
    this.#tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Serialize a mutating call and hold the advisory lock while it runs
   */
  #mutate<T>(fn: () => Promise<T>): Promise<T> {
    return this.#serialize(() => (this.#lock ? this.#lock.withLock(fn) : fn()));
  }

  async initialize(): Promise<void> {
    await this.#mutate(() => this.#store.initialize());
    logger.debug("store.initialize", {
      file: this.file,
      message: `${MAX_ACCOUNTS} empty slots written`,
    });
  }

  /**
   * Create the data file only when it is missing; the check and the write run
   * under the lock
   */
  async ensureInitialized(): Promise<boolean> {
    const created = await this.#mutate(async () => {
      if (await pathExists(this.file)) {
        return false;
      }
      await this.#store.initialize();
      return true;
    });

    if (created) {
      logger.debug("store.initialize", { file: this.file, message: "data file created" });
    }
    return created;
  }

  async exists(accountNumber: number): Promise<boolean> {
    if (!isValidAccountNumber(accountNumber)) {
      return false;
    }
    const position = positionOf(accountNumber);

    return this.#serialize(() =>
      this.#store.withOpen("read", async (store) => {
        return isOccupied(await store.readAt(position));
      })
    );
  }

  /**
   * Create an account in its empty slot
   *
   * Sequence: validate number → check slot is empty → validate names → write → confirm.
   *
   * @throws InvalidAccountNumberError if accountNumber is outside [1, 100]
   * @throws InvalidAmountError if balance is not finite
   * @throws AccountExistsError if the slot is occupied
   * @throws InvalidNameError if either name fails the name rule
   * @throws StoreIOError | ShortWriteError if the write fails; the slot may then be partially written
   */
  async create(
    accountNumber: number,
    lastName: string,
    firstName: string,
    balance: number
  ): Promise<Account> {
    const position = positionOf(accountNumber);
    validateAmount(balance);

    const created = await this.#mutate(() =>
      this.#store.withOpen("readWrite", async (store) => {
        const current = await store.readAt(position);
        if (isOccupied(current)) {
          throw new AccountExistsError(accountNumber);
        }

        const names = prepareNames(accountNumber, lastName, firstName);
        await store.writeAt(position, {
          state: "occupied",
          account: { accountNumber, ...names, balance },
        });

        const confirmed = await store.readAt(position);
        if (confirmed.state === "empty") {
          throw new StoreIOError(this.file, "write confirmation");
        }
        return confirmed.account;
      })
    );

    logger.debug("account.created", { account: accountNumber, file: this.file });
    return created;
  }

  /**
   * @throws InvalidAccountNumberError if accountNumber is outside [1, 100]
   * @throws AccountNotFoundError if the slot is empty
   */
  async read(accountNumber: number): Promise<Account> {
    const position = positionOf(accountNumber);

    return this.#serialize(() =>
      this.#store.withOpen("read", async (store) =>
        occupiedAccount(await store.readAt(position), accountNumber)
      )
    );
  }

  /**
   * Read-modify-write of one account; the account number never changes
   *
   * An invalid name discards the whole update and leaves the slot untouched.
   *
   * @throws InvalidAccountNumberError if accountNumber is outside [1, 100]
   * @throws InvalidAmountError if a delta or balance is not finite
   * @throws AccountNotFoundError if the slot is empty
   * @throws InvalidNameError for rename/replace with an invalid name
   */
  async update(accountNumber: number, mutation: AccountMutation): Promise<Account> {
    const position = positionOf(accountNumber);
    if (mutation.kind === "balanceDelta") {
      validateAmount(mutation.delta);
    } else if (mutation.kind === "replace") {
      validateAmount(mutation.balance);
    }

    const updated = await this.#mutate(() =>
      this.#store.withOpen("readWrite", async (store) => {
        const current = occupiedAccount(await store.readAt(position), accountNumber);

        let next: Account;
        switch (mutation.kind) {
          case "balanceDelta":
            next = { ...current, balance: current.balance + mutation.delta };
            break;
          case "rename":
            next = {
              ...current,
              ...prepareNames(accountNumber, mutation.lastName, mutation.firstName),
            };
            break;
          case "replace":
            next = {
              ...current,
              ...prepareNames(accountNumber, mutation.lastName, mutation.firstName),
              balance: mutation.balance,
            };
            break;
        }

        // A finite delta can still overflow the stored balance
        validateAmount(next.balance);

        await store.writeAt(position, { state: "occupied", account: next });
        return occupiedAccount(await store.readAt(position), accountNumber);
      })
    );

    logger.debug("account.updated", {
      account: accountNumber,
      file: this.file,
      details: { kind: mutation.kind },
    });
    return updated;
  }

  /**
   * Return the slot to the empty sentinel (irreversible)
   * @throws InvalidAccountNumberError if accountNumber is outside [1, 100]
   * @throws AccountNotFoundError if the slot is already empty
   */
  async delete(accountNumber: number): Promise<void> {
    const position = positionOf(accountNumber);

    await this.#mutate(() =>
      this.#store.withOpen("readWrite", async (store) => {
        occupiedAccount(await store.readAt(position), accountNumber);
        await store.writeAt(position, EMPTY_SLOT);
      })
    );

    logger.debug("account.deleted", { account: accountNumber, file: this.file });
  }

  /**
   * Occupied accounts, ascending by account number
   *
   * Iteration reads through its own read-only handle, so other calls on this
   * service may be awaited inside the loop. The handle is released when the
   * loop finishes, breaks or throws.
   */
  async *listAll(): AsyncGenerator<Account, void, undefined> {
    const scanner = new RecordStore(this.file);
    await scanner.open("read");
    try {
      for await (const { slot } of scanner.scan()) {
        if (isOccupied(slot)) {
          yield slot.account;
        }
      }
    } finally {
      await scanner.close();
    }
  }

  /**
   * @throws NoAccountsError when no slot is occupied
   */
  async aggregate(): Promise<AccountSummary> {
    let count = 0;
    let totalBalance = 0;
    let overdrawnCount = 0;

    for await (const account of this.listAll()) {
      count++;
      totalBalance += account.balance;
      if (account.balance < 0) overdrawnCount++;
    }

    if (count === 0) {
      throw new NoAccountsError();
    }

    return { count, totalBalance, overdrawnCount, averageBalance: totalBalance / count };
  }

  async stats(): Promise<StoreStats> {
    return this.#serialize(() =>
      this.#store.withOpen("read", async (store) => {
        const sizeBytes = await store.size();
        let occupied = 0;
        for await (const { slot } of store.scan()) {
          if (isOccupied(slot)) occupied++;
        }
        return {
          path: this.file,
          sizeBytes,
          expectedBytes: DATA_FILE_SIZE,
          slots: MAX_ACCOUNTS,
          occupied,
          empty: MAX_ACCOUNTS - occupied,
        };
      })
    );
  }

  /**
   * Scan every slot and report short reads, misplaced occupants and size drift
   */
  async audit(): Promise<AuditReport> {
    return this.#serialize(() =>
      this.#store.withOpen("read", async (store) => {
        const sizeBytes = (await fileSize(this.file)) ?? 0;
        const shortReads: number[] = [];
        const misplaced: MisplacedSlot[] = [];
        let occupied = 0;

        for await (const { position, slot, shortRead } of store.scan()) {
          if (shortRead) {
            shortReads.push(position);
          } else if (isOccupied(slot)) {
            occupied++;
            if (slot.account.accountNumber !== position + 1) {
              misplaced.push({ position, accountNumber: slot.account.accountNumber });
            }
          }
        }

        const ok =
          shortReads.length === 0 && misplaced.length === 0 && sizeBytes === DATA_FILE_SIZE;
        if (!ok) {
          logger.warn("store.audit_failed", {
            file: this.file,
            details: { sizeBytes, shortReads: shortReads.length, misplaced: misplaced.length },
          });
        }

        return { ok, sizeBytes, expectedBytes: DATA_FILE_SIZE, occupied, shortReads, misplaced };
      })
    );
  }
}

/**
 * Open the account service for a data file
 *
 * Nothing touches the file until the first call.
 *
 * @param options.file - Data file path
 * @param options.lock - Serialize writers through `<file>.lock` (default: false)
 * @param options.lockTimeoutMs - Maximum wait for the lock (default: 5000)
 */
export function openAccounts(options: AccountsOptions): Accounts {
  return new AccountService(options);
}
