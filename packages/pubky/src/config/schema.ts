import { LOG_LEVEL_NAMES, PublicKey } from "@paykit/core";
import { z } from "zod";
import { ConfigurationError } from "../errors/configuration-error";

const DEFAULT_FETCH_CONCURRENCY = 1;
const MAX_FETCH_CONCURRENCY = 32;

const publicKeyString = z
  .string()
  .refine(
    (value) => PublicKey.tryParse(value) !== undefined,
    "Must be a 52-character z-base-32 public key",
  );

export const PaykitConfigSchema = z.object({
  testnet: z.boolean().optional().default(false),
  logLevel: z.enum(LOG_LEVEL_NAMES).optional().default("warn"),
  /** Endpoint documents fetched at once while listing a payee's payments. */
  fetchConcurrency: z
    .number()
    .int()
    .positive()
    .max(MAX_FETCH_CONCURRENCY)
    .optional()
    .default(DEFAULT_FETCH_CONCURRENCY),
  /** Identity the SDK client is signed in as. Required for writes. */
  sessionPublicKey: publicKeyString.optional(),
});

function formatZodIssues(issues: ReadonlyArray<z.core.$ZodIssue>): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `  - ${path}: ${issue.message}`;
    })
    .join("\n");
}

export function validateConfig(
  input: unknown,
): z.output<typeof PaykitConfigSchema> {
  const result = PaykitConfigSchema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  throw new ConfigurationError(
    "invalid_config",
    `Invalid Paykit configuration:\n${formatZodIssues(result.error.issues)}`,
  );
}
