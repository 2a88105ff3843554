import type { PublicKey, SupportedPayments } from "@paykit/pubky";
import chalk from "chalk";

const SEPARATOR_WIDTH = 70;
const METHOD_COLUMN_WIDTH = 16;
const MAX_DATA_DISPLAY_LENGTH = 50;
const ELLIPSIS = "...";

function pad(text: string, width: number): string {
  return text.padEnd(width);
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - ELLIPSIS.length)}${ELLIPSIS}`;
}

export function formatPaymentList(
  pubkey: string,
  payments: SupportedPayments,
): string {
  if (payments.size === 0) {
    return chalk.dim(`No payment endpoints published by ${pubkey}.`);
  }

  const lines: string[] = [];
  lines.push(chalk.bold(`Payment endpoints for ${pubkey}`));
  lines.push(`  ${pad("Method", METHOD_COLUMN_WIDTH)}Data`);
  lines.push(`  ${"-".repeat(SEPARATOR_WIDTH)}`);

  for (const [method, data] of payments) {
    lines.push(
      `  ${pad(method, METHOD_COLUMN_WIDTH)}${truncate(data, MAX_DATA_DISPLAY_LENGTH)}`,
    );
  }

  lines.push("");
  lines.push(chalk.dim(`${payments.size} endpoint(s)`));
  return lines.join("\n");
}

// Printed untruncated.
export function formatEndpoint(
  pubkey: string,
  method: string,
  data: string | undefined,
): string {
  if (data === undefined) {
    return chalk.dim(`No "${method}" endpoint published by ${pubkey}.`);
  }
  return data;
}

// One bare key per line.
export function formatContacts(
  pubkey: string,
  contacts: readonly PublicKey[],
): string {
  if (contacts.length === 0) {
    return chalk.dim(`${pubkey} follows nobody.`);
  }
  return contacts.map((contact) => contact.toString()).join("\n");
}
