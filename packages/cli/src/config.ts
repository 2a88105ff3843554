import "dotenv/config";

import {
  ConfigurationError,
  isLogLevel,
  LOG_LEVEL_NAMES,
  Paykit,
  type PaykitConfig,
} from "@paykit/pubky";

const BOOLEAN_VALUES: ReadonlyMap<string, boolean> = new Map([
  ["true", true],
  ["false", false],
  ["1", true],
  ["0", false],
]);

function invalidVariable(name: string, message: string): ConfigurationError {
  return new ConfigurationError(
    "invalid_config",
    `Invalid Paykit configuration:\n  - ${name}: ${message}`,
  );
}

function readVariable(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function parseLogLevel(name: string): PaykitConfig["logLevel"] {
  const value = readVariable(name);
  if (value === undefined) return undefined;
  if (isLogLevel(value)) return value;
  throw invalidVariable(
    name,
    `Expected one of ${LOG_LEVEL_NAMES.join(", ")}, got "${value}"`,
  );
}

function parseBoolean(name: string): boolean | undefined {
  const value = readVariable(name);
  if (value === undefined) return undefined;
  const parsed = BOOLEAN_VALUES.get(value.toLowerCase());
  if (parsed !== undefined) return parsed;
  throw invalidVariable(
    name,
    `Expected one of ${[...BOOLEAN_VALUES.keys()].join(", ")}, got "${value}"`,
  );
}

// Range and integer checks are left to config validation.
function parseNumber(name: string): number | undefined {
  const value = readVariable(name);
  return value === undefined ? undefined : Number(value);
}

/** @throws ConfigurationError when a `PAYKIT_*` variable holds an unusable value. */
export function createPaykitFromEnv(): Paykit {
  const config: PaykitConfig = {
    testnet: parseBoolean("PAYKIT_TESTNET"),
    logLevel: parseLogLevel("PAYKIT_LOG_LEVEL"),
    fetchConcurrency: parseNumber("PAYKIT_FETCH_CONCURRENCY"),
  };

  return new Paykit(config);
}
