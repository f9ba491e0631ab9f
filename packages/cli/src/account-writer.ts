/**
 * @tally/cli — Account report encoding.
 *
 * Renders engine snapshots as CSV or JSON. Rows are sorted by client id
 * so the same log always produces the same bytes.
 */

import type { AccountSnapshot } from "@tally/types";

export const REPORT_FORMATS = ["csv", "json"] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

const CSV_HEADERS = ["client", "available", "held", "total", "locked"] as const;

function sortByClient(accounts: readonly AccountSnapshot[]): AccountSnapshot[] {
  return [...accounts].sort((a, b) => a.client - b.client);
}

/**
 * Convert accounts to CSV, header first, newline-terminated.
 */
export function formatAccountsCsv(accounts: readonly AccountSnapshot[]): string {
  const lines = [CSV_HEADERS.join(",")];

  for (const account of sortByClient(accounts)) {
    lines.push(
      [
        String(account.client),
        account.available,
        account.held,
        account.total,
        String(account.locked),
      ].join(","),
    );
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Convert accounts to a pretty-printed JSON array.
 */
export function formatAccountsJson(accounts: readonly AccountSnapshot[]): string {
  return `${JSON.stringify(sortByClient(accounts), null, 2)}\n`;
}

export function formatAccounts(
  accounts: readonly AccountSnapshot[],
  format: ReportFormat,
): string {
  switch (format) {
    case "csv":
      return formatAccountsCsv(accounts);
    case "json":
      return formatAccountsJson(accounts);
  }
}
