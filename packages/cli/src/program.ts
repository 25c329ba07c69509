/**
 * slotbank CLI program: command definitions and exit code handling
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { MAX_ACCOUNTS, pathExists } from "@slotbank/sdk";
import { registerReportCommands } from "./commands/report.js";
import { parseAccountNumber, parseAmount, parseInteger, parseMutation } from "./lib/arg.js";
import type { UpdateOptions } from "./lib/arg.js";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import type { CliIO } from "./lib/io.js";
import { colorize, printJson, printLines, printWarning } from "./lib/render.js";
import { formatAccountDetails, formatAccountTable, formatMoney, formatTransaction } from "./lib/report.js";
import { collectAccounts, openCliAccounts } from "./lib/store.js";
import type { GlobalOptions } from "./lib/store.js";
import { isVerbose } from "./lib/env.js";
import { withTiming } from "./lib/telemetry.js";

function readVersion(): string {
  const parsed: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "0.0.0";
}

const parseBalance = (value: string) => parseAmount(value, "--balance");

/**
 * Build the command tree; output and prompts go through `io`
 */
export function createProgram(io: CliIO): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(colorize(str, "red", io.colors)),
    })
    .exitOverride();

  // Global options
  program
    .name("slotbank")
    .description(`slotbank - ${MAX_ACCOUNTS} fixed account slots in a single data file`)
    .version(readVersion())
    .option("--file <path>", "Data file (default: $SLOTBANK_FILE or ./accounts.dat)")
    .option("--lock", "Serialize writers through <file>.lock (also SLOTBANK_LOCK=1)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  // Init command
  program
    .command("init")
    .description(`Create the data file with ${MAX_ACCOUNTS} empty slots`)
    .option("--force", "Wipe an existing data file")
    .action(async (options: { force?: boolean }) => {
      await withTiming("cli.init", async (metric) => {
        const opts = program.opts<GlobalOptions>();
        const accounts = openCliAccounts(opts, metric);

        if (!options.force && (await pathExists(accounts.file))) {
          throw new CliError(
            `Data file already exists: ${accounts.file} (use --force to wipe it)`
          );
        }

        await accounts.initialize();

        if (!opts.quiet) {
          io.stdout(`Initialized ${MAX_ACCOUNTS} empty slots at ${accounts.file}\n`);
        }
      });
    });

  // Create command
  program
    .command("create")
    .description("Create an account in its empty slot")
    .argument("<acct>", `Account number (1-${MAX_ACCOUNTS})`, parseAccountNumber)
    .argument("<last>", "Last name (up to 14 characters are kept)")
    .argument("<first>", "First name (up to 9 characters are kept)")
    .option("--balance <amount>", "Opening balance", parseBalance)
    .option("--json", "Output as JSON")
    .addHelpText(
      "after",
      `
Examples:
  $ slotbank create 10 Williams Bob --balance 3200
  $ slotbank create 4 "O'Brien" Ann --balance -40`
    )
    .action(
      async (
        accountNumber: number,
        lastName: string,
        firstName: string,
        options: { balance?: number; json?: boolean }
      ) => {
        await withTiming("cli.create", async (metric) => {
          metric.account = accountNumber;
          const opts = program.opts<GlobalOptions>();
          const accounts = openCliAccounts(opts, metric);

          const account = await accounts.create(
            accountNumber,
            lastName,
            firstName,
            options.balance ?? 0
          );

          if (options.json) {
            printJson(io, account);
          } else if (!opts.quiet) {
            printLines(io, [`Created account #${account.accountNumber}`, ...formatAccountDetails(account)]);
          }
        });
      }
    );

  // Get command
  program
    .command("get")
    .description("Show one account")
    .argument("<acct>", "Account number", parseAccountNumber)
    .option("--json", "Output as JSON")
    .action(async (accountNumber: number, options: { json?: boolean }) => {
      await withTiming("cli.get", async (metric) => {
        metric.account = accountNumber;
        const opts = program.opts<GlobalOptions>();
        const account = await openCliAccounts(opts, metric).read(accountNumber);

        if (options.json) {
          printJson(io, account);
        } else {
          printLines(io, formatAccountDetails(account));
        }
      });
    });

  // Exists command
  program
    .command("exists")
    .description("Print true if the account is on file, false otherwise")
    .argument("<acct>", "Account number", (value: string) => parseInteger(value, "account number"))
    .action(async (accountNumber: number) => {
      await withTiming("cli.exists", async (metric) => {
        metric.account = accountNumber;
        const opts = program.opts<GlobalOptions>();
        const found = await openCliAccounts(opts, metric).exists(accountNumber);
        io.stdout(`${found}\n`);
      });
    });

  // Update command
  program
    .command("update")
    .description("Adjust the balance, rename, or replace an account")
    .argument("<acct>", "Account number", parseAccountNumber)
    .option("--amount <delta>", "Add delta to the balance (negative withdraws)", (value: string) =>
      parseAmount(value, "--amount")
    )
    .option("--last <name>", "New last name")
    .option("--first <name>", "New first name")
    .option("--balance <amount>", "New balance (with --last and --first)", parseBalance)
    .option("--json", "Output as JSON")
    .addHelpText(
      "after",
      `
Examples:
  $ slotbank update 10 --amount 250
  $ slotbank update 10 --amount -75.50
  $ slotbank update 10 --last Smith --first Jane
  $ slotbank update 10 --last Smith --first Jane --balance 0`
    )
    .action(async (accountNumber: number, options: UpdateOptions & { json?: boolean }) => {
      await withTiming("cli.update", async (metric) => {
        metric.account = accountNumber;
        const opts = program.opts<GlobalOptions>();
        const mutation = parseMutation(options);
        const accounts = openCliAccounts(opts, metric);

        const previous = mutation.kind === "balanceDelta" ? await accounts.read(accountNumber) : null;
        const account = await accounts.update(accountNumber, mutation);

        if (options.json) {
          printJson(io, account);
        } else if (opts.quiet) {
          return;
        } else if (previous && mutation.kind === "balanceDelta") {
          printLines(io, formatTransaction(previous.balance, mutation.delta, account.balance));
        } else {
          printLines(io, [`Updated account #${account.accountNumber}`, ...formatAccountDetails(account)]);
        }
      });
    });

  // Remove command
  program
    .command("rm")
    .description("Delete an account (irreversible)")
    .argument("<acct>", "Account number", parseAccountNumber)
    .option("--force", "Skip confirmation")
    .action(async (accountNumber: number, options: { force?: boolean }) => {
      await withTiming("cli.rm", async (metric) => {
        metric.account = accountNumber;
        const opts = program.opts<GlobalOptions>();
        const accounts = openCliAccounts(opts, metric);
        const account = await accounts.read(accountNumber);

        if (account.balance !== 0) {
          printWarning(
            io,
            `Warning: account #${accountNumber} has a balance of ${formatMoney(account.balance)}`
          );
        }

        if (!options.force) {
          if (!io.isInteractive()) {
            throw new CliError("Use --force to confirm deletion in non-interactive mode");
          }

          printLines(io, formatAccountDetails(account));
          const confirmed = await io.confirm(`Delete account #${accountNumber}? (y/N) `);
          if (!confirmed) {
            throw new CliError("Aborted by user");
          }
        }

        await accounts.delete(accountNumber);

        if (!opts.quiet) {
          io.stdout(`Deleted account #${accountNumber}\n`);
        }
      });
    });

  // List command
  program
    .command("ls")
    .description("List all accounts by account number")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.ls", async (metric) => {
        const opts = program.opts<GlobalOptions>();
        const list = await collectAccounts(openCliAccounts(opts, metric));

        if (options.json) {
          printJson(io, list);
        } else if (list.length === 0) {
          io.stdout("No accounts on file\n");
        } else {
          printLines(io, formatAccountTable(list));
        }
      });
    });

  registerReportCommands(program, io);

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix) and return the exit code
 */
export async function runCli(args: readonly string[], io: CliIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...args], { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already printed its own usage errors, help and version
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = program.opts<GlobalOptions>().verbose === true || isVerbose();
    io.stderr(colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.colors) + "\n");
    return mapSdkErrorToExitCode(err);
  }
}
