/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { MAX_ACCOUNTS, isValidAccountNumber } from "@slotbank/sdk";
import type { AccountMutation } from "@slotbank/sdk";
import { CliError } from "./errors.js";

const INTEGER_PATTERN = /^[-+]?\d+$/;
const DECIMAL_PATTERN = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse an integer argument
 */
export function parseInteger(value: string, name: string): number {
  const trimmed = value.trim();

  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be an integer`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parse an account number in [1, MAX_ACCOUNTS]
 */
export function parseAccountNumber(value: string): number {
  const parsed = parseInteger(value, "account number");

  if (!isValidAccountNumber(parsed)) {
    throw new InvalidArgumentError(`account number must be between 1 and ${MAX_ACCOUNTS}`);
  }

  return parsed;
}

/**
 * Parse a decimal amount (balances may be negative)
 */
export function parseAmount(value: string, name: string): number {
  const trimmed = value.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a number`);
  }

  return Number.parseFloat(trimmed);
}

export interface UpdateOptions {
  amount?: number;
  last?: string;
  first?: string;
  balance?: number;
}

/**
 * Pick the update mode from `update` command options
 *
 * - `--amount` alone: balance delta
 * - `--last` and `--first`: rename
 * - `--last`, `--first` and `--balance`: full replace
 */
export function parseMutation(options: UpdateOptions): AccountMutation {
  const { amount, last, first, balance } = options;
  const hasNames = last !== undefined || first !== undefined;

  if (amount !== undefined) {
    if (hasNames || balance !== undefined) {
      throw new CliError("--amount cannot be combined with --last, --first or --balance");
    }
    return { kind: "balanceDelta", delta: amount };
  }

  if (!hasNames) {
    throw new CliError("Specify --amount, or --last and --first (optionally with --balance)");
  }

  if (last === undefined || first === undefined) {
    throw new CliError("--last and --first must be given together");
  }

  if (balance !== undefined) {
    return { kind: "replace", lastName: last, firstName: first, balance };
  }
  return { kind: "rename", lastName: last, firstName: first };
}
