/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import {
  AccountExistsError,
  AccountNotFoundError,
  InvalidNameError,
  NoAccountsError,
  StoreIOError,
} from "@slotbank/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("problems", { exitCode: 3 });
      expect(err.exitCode).toBe(3);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map AccountNotFoundError to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new AccountNotFoundError(11))).toBe(2);
    });

    it("should map other SDK errors to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new AccountExistsError(10))).toBe(1);
      expect(mapSdkErrorToExitCode(new InvalidNameError("lastName", "W1"))).toBe(1);
      expect(mapSdkErrorToExitCode(new StoreIOError("/tmp/a.dat", "read"))).toBe(1);
      expect(mapSdkErrorToExitCode(new NoAccountsError())).toBe(1);
    });

    it("should use the CliError exit code", () => {
      expect(mapSdkErrorToExitCode(new CliError("audit", { exitCode: 3 }))).toBe(3);
    });

    it("should map unknown values to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new Error("boom"))).toBe(1);
      expect(mapSdkErrorToExitCode("boom")).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should return the message", () => {
      expect(formatCliError(new AccountNotFoundError(11))).toBe("Account not found: #11");
    });

    it("should include the cause when verbose", () => {
      const err = new StoreIOError("/tmp/a.dat", "read", { cause: new Error("EIO") });
      expect(formatCliError(err, true)).toContain("Cause: Error: EIO");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(2500)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should stringify non-errors", () => {
      expect(formatCliError(42)).toBe("42");
    });
  });
});
