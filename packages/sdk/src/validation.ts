/**
 * Validation utilities for account operations
 *
 * All checks here run before the data file is touched.
 */

import { z } from "zod";
import { MAX_ACCOUNTS } from "./codec.js";
import {
  InvalidAccountNumberError,
  InvalidAmountError,
  InvalidNameError,
  InvalidPositionError,
} from "./errors.js";

/**
 * Letters, spaces, hyphens, apostrophes
 */
const VALID_NAME_PATTERN = /^[A-Za-z '-]+$/;

export const AccountNumberSchema = z.number().int().min(1).max(MAX_ACCOUNTS);

export const PositionSchema = z.number().int().min(0).max(MAX_ACCOUNTS - 1);

export const NameSchema = z
  .string()
  .min(1, "name must be non-empty")
  .regex(VALID_NAME_PATTERN, "name may only contain letters, spaces, hyphens, or apostrophes");

export const AmountSchema = z.number().finite();

/**
 * Check an account number without throwing
 */
export function isValidAccountNumber(accountNumber: number): boolean {
  return AccountNumberSchema.safeParse(accountNumber).success;
}

/**
 * @throws InvalidAccountNumberError if outside [1, MAX_ACCOUNTS]
 */
export function validateAccountNumber(accountNumber: number): void {
  const result = AccountNumberSchema.safeParse(accountNumber);
  if (!result.success) {
    throw new InvalidAccountNumberError(accountNumber, { cause: result.error });
  }
}

/**
 * @throws InvalidPositionError if outside [0, MAX_ACCOUNTS)
 */
export function validatePosition(position: number): void {
  const result = PositionSchema.safeParse(position);
  if (!result.success) {
    throw new InvalidPositionError(position, { cause: result.error });
  }
}

export function isValidName(name: string): boolean {
  return NameSchema.safeParse(name).success;
}

/**
 * Validate one name field
 * @param field - Which field is being checked (for error messages)
 * @throws InvalidNameError if empty or containing disallowed characters
 */
export function validateName(name: string, field: "lastName" | "firstName"): void {
  const result = NameSchema.safeParse(name);
  if (!result.success) {
    throw new InvalidNameError(field, name, { cause: result.error });
  }
}

/**
 * @throws InvalidAmountError for NaN or infinite values
 */
export function validateAmount(amount: number): void {
  const result = AmountSchema.safeParse(amount);
  if (!result.success) {
    throw new InvalidAmountError(amount, { cause: result.error });
  }
}

/**
 * Map an account number to its zero-based slot position
 */
export function positionOf(accountNumber: number): number {
  validateAccountNumber(accountNumber);
  return accountNumber - 1;
}
