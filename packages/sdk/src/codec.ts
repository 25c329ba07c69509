/**
 * Fixed-width binary codec for account records
 *
 * Layout (little-endian, RECORD_SIZE = 40):
 *   0  uint32   account number (0 = empty sentinel)
 *   4  15 bytes last name, NUL padded
 *   19 10 bytes first name, NUL padded
 *   29 3 bytes  padding, always zero
 *   32 float64  balance
 *
 * Invariants:
 * - encode never fails; names longer than width - 1 are truncated
 * - decode never fails structurally; an all-zero block decodes to the empty slot
 */

import type { Account, AccountRecord, BoundedName, Slot } from "./types.js";

export const MAX_ACCOUNTS = 100;

export const ACCOUNT_NUMBER_OFFSET = 0;
export const LAST_NAME_OFFSET = 4;
export const LAST_NAME_WIDTH = 15;
export const FIRST_NAME_OFFSET = 19;
export const FIRST_NAME_WIDTH = 10;
export const BALANCE_OFFSET = 32;
export const RECORD_SIZE = 40;

/** Significant characters that fit in each name field */
export const LAST_NAME_MAX = LAST_NAME_WIDTH - 1;
export const FIRST_NAME_MAX = FIRST_NAME_WIDTH - 1;

export const DATA_FILE_SIZE = MAX_ACCOUNTS * RECORD_SIZE;

const TEXT_ENCODING = "latin1";

export const EMPTY_SLOT: Slot = { state: "empty" };

/**
 * The all-zero record that marks an unoccupied slot on disk
 */
export function emptySentinel(): AccountRecord {
  return { accountNumber: 0, lastName: "", firstName: "", balance: 0 };
}

/**
 * Cut a name to the number of significant characters its field holds
 */
export function boundName(value: string, maxLength: number): BoundedName {
  if (value.length <= maxLength) {
    return { value, original: value, truncated: false };
  }
  return { value: value.slice(0, maxLength), original: value, truncated: true };
}

function writeText(buf: Buffer, text: string, offset: number, width: number): void {
  const { value } = boundName(text, width - 1);
  // Remaining bytes stay zero from Buffer.alloc, so the field is always terminated
  buf.write(value, offset, width - 1, TEXT_ENCODING);
}

function readText(bytes: Buffer, offset: number, width: number): string {
  const field = bytes.subarray(offset, offset + width);
  const end = field.indexOf(0);
  return field.toString(TEXT_ENCODING, 0, end === -1 ? width : end);
}

/**
 * Encode one record into a RECORD_SIZE block
 */
export function encodeRecord(record: AccountRecord): Buffer {
  const buf = Buffer.alloc(RECORD_SIZE);
  buf.writeUInt32LE(record.accountNumber >>> 0, ACCOUNT_NUMBER_OFFSET);
  writeText(buf, record.lastName, LAST_NAME_OFFSET, LAST_NAME_WIDTH);
  writeText(buf, record.firstName, FIRST_NAME_OFFSET, FIRST_NAME_WIDTH);
  buf.writeDoubleLE(record.balance, BALANCE_OFFSET);
  return buf;
}

/**
 * Decode a RECORD_SIZE block into its raw record
 */
export function decodeRecord(bytes: Uint8Array): AccountRecord {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (buf.length < RECORD_SIZE) {
    return emptySentinel();
  }
  return {
    accountNumber: buf.readUInt32LE(ACCOUNT_NUMBER_OFFSET),
    lastName: readText(buf, LAST_NAME_OFFSET, LAST_NAME_WIDTH),
    firstName: readText(buf, FIRST_NAME_OFFSET, FIRST_NAME_WIDTH),
    balance: buf.readDoubleLE(BALANCE_OFFSET),
  };
}

export function toSlot(record: AccountRecord): Slot {
  if (record.accountNumber === 0) {
    return EMPTY_SLOT;
  }
  return { state: "occupied", account: { ...record } };
}

export function fromSlot(slot: Slot): AccountRecord {
  return slot.state === "occupied" ? { ...slot.account } : emptySentinel();
}

/**
 * Encode a slot; empty slots encode to RECORD_SIZE zero bytes
 */
export function encodeSlot(slot: Slot): Buffer {
  return encodeRecord(fromSlot(slot));
}

export function decodeSlot(bytes: Uint8Array): Slot {
  return toSlot(decodeRecord(bytes));
}

export function isOccupied(slot: Slot): slot is { state: "occupied"; account: Account } {
  return slot.state === "occupied";
}
