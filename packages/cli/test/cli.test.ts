/**
 * Integration tests for CLI commands
 *
 * The program runs in-process against a temp data file; output is captured
 * through a CliIO sink instead of the process streams.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createTempDir, removeDir, withTempDir } from "@slotbank/testkit";
import { run } from "./helpers.js";
import type { RunOptions } from "./helpers.js";

describe("CLI", () => {
  let dir: string;
  let file: string;
  let originalFile: string | undefined;

  /** Run against the temp data file */
  const cli = (args: string[], options?: RunOptions) => run(["--file", file, ...args], options);

  beforeEach(async () => {
    dir = await createTempDir();
    file = path.join(dir, "accounts.dat");
    originalFile = process.env.SLOTBANK_FILE;
    delete process.env.SLOTBANK_FILE;
  });

  afterEach(async () => {
    if (originalFile !== undefined) {
      process.env.SLOTBANK_FILE = originalFile;
    } else {
      delete process.env.SLOTBANK_FILE;
    }
    await removeDir(dir);
  });

  describe("init", () => {
    it("should create a 4000-byte data file", async () => {
      const result = await cli(["init"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(`Initialized 100 empty slots at ${file}\n`);
      const stat = await fs.stat(file);
      expect(stat.size).toBe(4000);
    });

    it("should refuse to wipe an existing file without --force", async () => {
      await cli(["init"]);
      await cli(["create", "10", "Williams", "Bob", "--balance", "3200"]);

      const refused = await cli(["init"]);
      expect(refused.exitCode).toBe(1);
      expect(refused.stderr).toBe(
        `Error: Data file already exists: ${file} (use --force to wipe it)\n`
      );
      expect((await cli(["exists", "10"])).stdout).toBe("true\n");

      const forced = await cli(["init", "--force"]);
      expect(forced.exitCode).toBe(0);
      expect((await cli(["exists", "10"])).stdout).toBe("false\n");
    });

    it("should use SLOTBANK_FILE when --file is not given", async () => {
      process.env.SLOTBANK_FILE = file;

      const result = await run(["init"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(`Initialized 100 empty slots at ${file}\n`);
    });
  });

  describe("create and get", () => {
    beforeEach(async () => {
      await cli(["init"]);
    });

    it("should create an account and show its details", async () => {
      const created = await cli(["create", "10", "Williams", "Bob", "--balance", "3200"]);
      expect(created.exitCode).toBe(0);
      expect(created.stdout.split("\n")[0]).toBe("Created account #10");

      const result = await cli(["get", "10"]);
      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(
        [
          "Account Number: 10",
          "Customer Name:  Williams, Bob",
          "Account Balance: $3200.00",
          "Status: ACTIVE",
          "",
        ].join("\n")
      );
    });

    it("should default the opening balance to zero", async () => {
      await cli(["create", "7", "Stone", "Amy"]);

      const result = await cli(["get", "7"]);
      expect(result.stdout).toContain("Account Balance: $0.00\n");
      expect(result.stdout).toContain("Status: ZERO BALANCE\n");
    });

    it("should show overdrawn accounts with the owed amount", async () => {
      await cli(["create", "4", "O'Brien", "Ann", "--balance", "-40"]);

      const result = await cli(["get", "4"]);
      expect(result.stdout).toContain("Account Balance: $-40.00\n");
      expect(result.stdout).toContain("Status: OVERDRAWN (40.00)\n");
    });

    it("should output JSON with --json", async () => {
      await cli(["create", "10", "Williams", "Bob", "--balance", "3200"]);

      const result = await cli(["get", "10", "--json"]);
      expect(JSON.parse(result.stdout)).toEqual({
        accountNumber: 10,
        lastName: "Williams",
        firstName: "Bob",
        balance: 3200,
      });
    });

    it("should store truncated names", async () => {
      const result = await cli(["create", "12", "Montgomery-Smithson", "Christopher", "--json"]);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual({
        accountNumber: 12,
        lastName: "Montgomery-Smi",
        firstName: "Christoph",
        balance: 0,
      });
    });

    it("should exit 2 for a missing account", async () => {
      const result = await cli(["get", "11"]);

      expect(result.exitCode).toBe(2);
      expect(result.stdout).toBe("");
      expect(result.stderr).toBe("Error: Account not found: #11\n");
    });

    it("should reject out-of-range account numbers as usage errors", async () => {
      const result = await cli(["get", "0"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("account number must be between 1 and 100");
    });

    it("should reject a second create for the same number", async () => {
      await cli(["create", "10", "Williams", "Bob"]);

      const result = await cli(["create", "10", "Other", "Person"]);
      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Account already exists: #10\n");
    });

    it("should reject invalid names", async () => {
      const result = await cli(["create", "10", "W1lliams", "Bob"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain('Invalid lastName "W1lliams"');
      expect((await cli(["exists", "10"])).stdout).toBe("false\n");
    });

    it("should reject a non-numeric balance", async () => {
      const result = await cli(["create", "10", "Williams", "Bob", "--balance", "lots"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("--balance must be a number");
    });

    it("should report a missing data file as an I/O error", async () => {
      await withTempDir(async (other) => {
        const missing = path.join(other, "missing.dat");

        const result = await run(["--file", missing, "get", "10"]);
        expect(result.exitCode).toBe(1);
        expect(result.stderr).toBe(
          `Error: Data file open (file does not exist) failed: ${missing}\n`
        );
      });
    });

    it("should suppress confirmations with --quiet", async () => {
      const result = await run(["--file", file, "--quiet", "create", "10", "Williams", "Bob"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("");
    });
  });

  describe("exists", () => {
    it("should print true or false", async () => {
      await cli(["init"]);
      await cli(["create", "10", "Williams", "Bob"]);

      expect((await cli(["exists", "10"])).stdout).toBe("true\n");
      expect((await cli(["exists", "11"])).stdout).toBe("false\n");
      expect((await cli(["exists", "101"])).stdout).toBe("false\n");
      expect((await cli(["exists", "0"])).exitCode).toBe(0);
    });
  });

  describe("update", () => {
    beforeEach(async () => {
      await cli(["init"]);
      await cli(["create", "10", "Williams", "Bob", "--balance", "1000"]);
    });

    it("should print a transaction summary for --amount", async () => {
      const result = await cli(["update", "10", "--amount", "-200"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(
        [
          "Transaction Summary:",
          "Previous Balance: $1000.00",
          "Transaction:      $-200.00",
          "New Balance:      $800.00",
          "",
        ].join("\n")
      );
    });

    it("should rename without touching the balance", async () => {
      const result = await cli(["update", "10", "--last", "Smith", "--first", "Jane", "--json"]);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual({
        accountNumber: 10,
        lastName: "Smith",
        firstName: "Jane",
        balance: 1000,
      });
    });

    it("should replace names and balance together", async () => {
      await cli(["update", "10", "--last", "Smith", "--first", "Jane", "--balance", "5"]);

      const result = await cli(["get", "10", "--json"]);
      expect(JSON.parse(result.stdout)).toEqual({
        accountNumber: 10,
        lastName: "Smith",
        firstName: "Jane",
        balance: 5,
      });
    });

    it("should reject --amount combined with names", async () => {
      const result = await cli(["update", "10", "--amount", "5", "--last", "Smith"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        "Error: --amount cannot be combined with --last, --first or --balance\n"
      );
    });

    it("should require an update mode", async () => {
      const result = await cli(["update", "10"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        "Error: Specify --amount, or --last and --first (optionally with --balance)\n"
      );
    });

    it("should exit 2 when the account is missing", async () => {
      const result = await cli(["update", "11", "--amount", "5"]);

      expect(result.exitCode).toBe(2);
      expect(result.stderr).toBe("Error: Account not found: #11\n");
    });
  });

  describe("rm", () => {
    beforeEach(async () => {
      await cli(["init"]);
      await cli(["create", "4", "O'Brien", "Ann", "--balance", "-40"]);
      await cli(["create", "55", "Zero", "Zed"]);
    });

    it("should require --force when not interactive", async () => {
      const result = await cli(["rm", "55"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        "Error: Use --force to confirm deletion in non-interactive mode\n"
      );
      expect((await cli(["exists", "55"])).stdout).toBe("true\n");
    });

    it("should warn about a non-zero balance and delete with --force", async () => {
      const result = await cli(["rm", "4", "--force"]);

      expect(result.exitCode).toBe(0);
      expect(result.stderr).toBe("Warning: account #4 has a balance of $-40.00\n");
      expect(result.stdout).toBe("Deleted account #4\n");
      expect((await cli(["exists", "4"])).stdout).toBe("false\n");
    });

    it("should abort when the user declines", async () => {
      const result = await cli(["rm", "55"], { interactive: true, answer: false });

      expect(result.exitCode).toBe(1);
      expect(result.prompts).toEqual(["Delete account #55? (y/N) "]);
      expect(result.stderr).toBe("Error: Aborted by user\n");
      expect((await cli(["exists", "55"])).stdout).toBe("true\n");
    });

    it("should delete when the user confirms", async () => {
      const result = await cli(["rm", "55"], { interactive: true, answer: true });

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toContain("Deleted account #55\n");
      expect((await cli(["exists", "55"])).stdout).toBe("false\n");
    });

    it("should exit 2 for an empty slot", async () => {
      const result = await cli(["rm", "30", "--force"]);

      expect(result.exitCode).toBe(2);
    });
  });

  describe("ls and report", () => {
    beforeEach(async () => {
      await cli(["init"]);
    });

    it("should say so when no account is on file", async () => {
      const result = await cli(["ls"]);

      expect(result.stdout).toBe("No accounts on file\n");
    });

    it("should list accounts in account-number order", async () => {
      await cli(["create", "55", "Zero", "Zed"]);
      await cli(["create", "10", "Williams", "Bob", "--balance", "3200"]);
      await cli(["create", "4", "O'Brien", "Ann", "--balance", "-40"]);

      const result = await cli(["ls"]);
      expect(result.stdout).toBe(
        [
          "Acct#  Last Name       First Name      Balance     Status",
          "=".repeat(55),
          "4      O'Brien         Ann              -40.00  OVERDRAWN",
          "10     Williams        Bob             3200.00     ACTIVE",
          "55     Zero            Zed                0.00       ZERO",
          "=".repeat(55),
          "",
        ].join("\n")
      );

      const json = await cli(["ls", "--json"]);
      const listed: Array<{ accountNumber: number }> = JSON.parse(json.stdout);
      expect(listed.map((a) => a.accountNumber)).toEqual([4, 10, 55]);
    });

    it("should print the report with totals", async () => {
      await cli(["create", "4", "O'Brien", "Ann", "--balance", "-40"]);
      await cli(["create", "10", "Williams", "Bob", "--balance", "3200"]);
      await cli(["create", "55", "Zero", "Zed"]);

      const expected = [
        "BANK ACCOUNT REPORT",
        "",
        "Acct#  Last Name       First Name      Balance     Status",
        "=".repeat(55),
        "4      O'Brien         Ann              -40.00  OVERDRAWN",
        "10     Williams        Bob             3200.00     ACTIVE",
        "55     Zero            Zed                0.00       ZERO",
        "=".repeat(55),
        "Total Accounts:  3",
        "Total Balance:   $3160.00",
        "Average Balance: $1053.33",
        "Overdrawn:       1 accounts",
        "",
      ].join("\n");

      const result = await cli(["report"]);
      expect(result.stdout).toBe(expected);

      const out = path.join(dir, "report.txt");
      const written = await cli(["report", "--out", out]);
      expect(written.stdout).toBe(`Report written to ${out}\n`);
      expect(await fs.readFile(out, "utf-8")).toBe(expected);
    });

    it("should print an empty report", async () => {
      const result = await cli(["report"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout.trimEnd().split("\n").at(-1)).toBe("No accounts on file");
    });
  });

  describe("stats and audit", () => {
    beforeEach(async () => {
      await cli(["init"]);
      await cli(["create", "10", "Williams", "Bob", "--balance", "3200"]);
    });

    it("should print stats as JSON", async () => {
      const result = await cli(["stats", "--json"]);

      expect(JSON.parse(result.stdout)).toEqual({
        path: file,
        sizeBytes: 4000,
        expectedBytes: 4000,
        slots: 100,
        occupied: 1,
        empty: 99,
      });
    });

    it("should pass the audit on a healthy file", async () => {
      const result = await cli(["audit"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(
        [
          "Size:        4000 bytes (expected 4000)",
          "Occupied:    1",
          "Short reads: none",
          "Misplaced:   none",
          "✓ Data file is consistent",
          "",
        ].join("\n")
      );
    });

    it("should exit 3 when the file is truncated", async () => {
      await fs.truncate(file, 3940);

      const result = await cli(["audit"]);
      expect(result.exitCode).toBe(3);
      expect(result.stdout).toBe(
        [
          "Size:        3940 bytes (expected 4000)",
          "Occupied:    1",
          "Short reads: 98, 99",
          "Misplaced:   none",
          "",
        ].join("\n")
      );
      expect(result.stderr).toBe("Error: Integrity problems found\n");
    });
  });

  describe("help and version", () => {
    it("should print help and exit 0", async () => {
      const result = await run(["--help"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toContain("Usage: slotbank");
    });

    it("should fail on an unknown command", async () => {
      const result = await run(["frobnicate"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("unknown command 'frobnicate'");
    });
  });
});
