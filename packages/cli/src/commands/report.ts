/**
 * Reporting commands for CLI: report, stats, audit
 */

import { Command } from "commander";
import { NoAccountsError, atomicWrite } from "@slotbank/sdk";
import type { AccountSummary, Accounts } from "@slotbank/sdk";
import { CliError } from "../lib/errors.js";
import type { CliIO } from "../lib/io.js";
import { colorize, printJson, printLines } from "../lib/render.js";
import { formatAudit, formatReport, formatStats } from "../lib/report.js";
import { collectAccounts, openCliAccounts } from "../lib/store.js";
import type { GlobalOptions } from "../lib/store.js";
import { withTiming } from "../lib/telemetry.js";

async function summarize(accounts: Accounts): Promise<AccountSummary | null> {
  try {
    return await accounts.aggregate();
  } catch (err) {
    if (err instanceof NoAccountsError) {
      return null;
    }
    throw err;
  }
}

/**
 * Register report, stats and audit on the program
 */
export function registerReportCommands(program: Command, io: CliIO): void {
  program
    .command("report")
    .description("Print the account report with totals")
    .option("--out <path>", "Write the report to a file instead of stdout")
    .addHelpText(
      "after",
      `
Examples:
  $ slotbank report
  $ slotbank report --out ./report.txt`
    )
    .action(async (options: { out?: string }) => {
      await withTiming("cli.report", async (metric) => {
        const opts = program.opts<GlobalOptions>();
        const accounts = openCliAccounts(opts, metric);

        const list = await collectAccounts(accounts);
        const lines = formatReport(list, await summarize(accounts));

        if (options.out) {
          await atomicWrite(options.out, lines.join("\n") + "\n");
          if (!opts.quiet) {
            io.stdout(`Report written to ${options.out}\n`);
          }
          return;
        }

        printLines(io, lines);
      });
    });

  program
    .command("stats")
    .description("Show data file size and slot occupancy")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.stats", async (metric) => {
        const opts = program.opts<GlobalOptions>();
        const stats = await openCliAccounts(opts, metric).stats();

        if (options.json) {
          printJson(io, stats);
        } else {
          printLines(io, formatStats(stats));
        }
      });
    });

  program
    .command("audit")
    .description("Check the data file for short reads, misplaced records and size drift")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.audit", async (metric) => {
        const opts = program.opts<GlobalOptions>();
        const report = await openCliAccounts(opts, metric).audit();

        if (options.json) {
          printJson(io, report);
        } else {
          printLines(io, formatAudit(report));
        }

        if (!report.ok) {
          throw new CliError("Integrity problems found", { exitCode: 3 });
        }

        if (!opts.quiet && !options.json) {
          io.stdout(colorize("✓ Data file is consistent", "green", io.colors) + "\n");
        }
      });
    });
}
