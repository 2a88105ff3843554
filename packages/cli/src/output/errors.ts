import {
  ConfigurationError,
  InvalidMethodIdError,
  InvalidPublicKeyError,
  PaykitError,
  TransportError,
} from "@paykit/pubky";
import chalk from "chalk";

import { formatJsonError } from "./json.js";

export interface ErrorHandlerOptions {
  readonly jsonMode: boolean;
}

const EXIT_CODES = {
  general: 1,
  configuration: 2,
  invalidInput: 3,
  transport: 5,
} as const;

function getExitCode(error: unknown): number {
  if (error instanceof ConfigurationError) return EXIT_CODES.configuration;
  if (
    error instanceof InvalidPublicKeyError ||
    error instanceof InvalidMethodIdError
  )
    return EXIT_CODES.invalidInput;
  if (error instanceof TransportError) return EXIT_CODES.transport;
  return EXIT_CODES.general;
}

function getErrorCode(error: unknown): string {
  if (error instanceof PaykitError) return error.code;
  return "unknown_error";
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function getSuggestion(error: unknown): string | undefined {
  if (error instanceof ConfigurationError) {
    return "Check your .env file or the PAYKIT_* environment variables.";
  }
  if (error instanceof InvalidPublicKeyError) {
    return "Public keys are 52 characters of z-base-32, as shown by `pubky://<key>`.";
  }
  if (error instanceof InvalidMethodIdError) {
    return "Use the method name alone, e.g. `lightning` or `onchain`.";
  }
  if (error instanceof TransportError) {
    return "The homeserver could not be reached or returned bad data. Try again, or set PAYKIT_TESTNET=true for a local testnet.";
  }
  return undefined;
}

function formatHumanError(error: unknown): string {
  const lines: string[] = [];
  lines.push(`${chalk.red.bold("Error: ")}${getErrorMessage(error)}`);

  const suggestion = getSuggestion(error);
  if (suggestion) {
    lines.push("");
    lines.push(`${chalk.dim("Hint: ")}${suggestion}`);
  }

  return lines.join("\n");
}

export function handleCliError(
  error: unknown,
  options: ErrorHandlerOptions,
): never {
  const exitCode = getExitCode(error);

  if (options.jsonMode) {
    process.stdout.write(
      `${formatJsonError(getErrorCode(error), getErrorMessage(error))}\n`,
    );
  } else {
    process.stderr.write(`${formatHumanError(error)}\n`);
  }

  process.exit(exitCode);
}
