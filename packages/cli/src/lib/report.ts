/**
 * Text formatting for accounts and reports
 */

import { accountStatus } from "@slotbank/sdk";
import type { Account, AccountSummary, AuditReport, StoreStats } from "@slotbank/sdk";

const RULE = "=".repeat(55);

/**
 * Format an amount as dollars with two decimals (e.g. "$-50.00")
 */
export function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

function formatStatus(balance: number): string {
  switch (accountStatus(balance)) {
    case "OVERDRAWN":
      return `OVERDRAWN (${Math.abs(balance).toFixed(2)})`;
    case "ZERO":
      return "ZERO BALANCE";
    case "ACTIVE":
      return "ACTIVE";
  }
}

/**
 * Detail block for a single account
 */
export function formatAccountDetails(account: Account): string[] {
  return [
    `Account Number: ${account.accountNumber}`,
    `Customer Name:  ${account.lastName}, ${account.firstName}`,
    `Account Balance: ${formatMoney(account.balance)}`,
    `Status: ${formatStatus(account.balance)}`,
  ];
}

/**
 * Before/after lines for a balance adjustment
 */
export function formatTransaction(previous: number, delta: number, next: number): string[] {
  return [
    "Transaction Summary:",
    `Previous Balance: ${formatMoney(previous)}`,
    `Transaction:      ${formatMoney(delta)}`,
    `New Balance:      ${formatMoney(next)}`,
  ];
}

function formatRow(
  acct: string,
  lastName: string,
  firstName: string,
  balance: string,
  status: string
): string {
  return [
    acct.padEnd(6),
    lastName.padEnd(15),
    firstName.padEnd(10),
    balance.padStart(12),
    status.padStart(10),
  ].join(" ");
}

/**
 * Fixed-width account table framed by rules
 */
export function formatAccountTable(accounts: readonly Account[]): string[] {
  const lines = [formatRow("Acct#", "Last Name", "First Name", "Balance", "Status"), RULE];

  for (const account of accounts) {
    lines.push(
      formatRow(
        String(account.accountNumber),
        account.lastName,
        account.firstName,
        account.balance.toFixed(2),
        accountStatus(account.balance)
      )
    );
  }

  lines.push(RULE);
  return lines;
}

/**
 * Full account report: title, table and totals
 *
 * `summary` is null when no account is on file.
 */
export function formatReport(accounts: readonly Account[], summary: AccountSummary | null): string[] {
  const lines = ["BANK ACCOUNT REPORT", "", ...formatAccountTable(accounts)];

  if (!summary) {
    lines.push("No accounts on file");
    return lines;
  }

  lines.push(
    `Total Accounts:  ${summary.count}`,
    `Total Balance:   ${formatMoney(summary.totalBalance)}`,
    `Average Balance: ${formatMoney(summary.averageBalance)}`,
    `Overdrawn:       ${summary.overdrawnCount} accounts`
  );
  return lines;
}

export function formatStats(stats: StoreStats): string[] {
  return [
    `Data file: ${stats.path}`,
    `Size:      ${stats.sizeBytes} bytes (expected ${stats.expectedBytes})`,
    `Slots:     ${stats.slots}`,
    `Occupied:  ${stats.occupied}`,
    `Empty:     ${stats.empty}`,
  ];
}

/**
 * Audit findings, one problem per line
 */
export function formatAudit(report: AuditReport): string[] {
  const lines = [
    `Size:        ${report.sizeBytes} bytes (expected ${report.expectedBytes})`,
    `Occupied:    ${report.occupied}`,
    `Short reads: ${report.shortReads.length === 0 ? "none" : report.shortReads.join(", ")}`,
  ];

  if (report.misplaced.length === 0) {
    lines.push("Misplaced:   none");
  } else {
    for (const { position, accountNumber } of report.misplaced) {
      lines.push(`Misplaced:   slot ${position} holds #${accountNumber}`);
    }
  }

  return lines;
}
