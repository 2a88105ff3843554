import { supportedPaymentsToRecord } from "@paykit/pubky";
import type { Command } from "commander";

import { createPaykitFromEnv } from "../config.js";
import { handleCliError } from "../output/errors.js";
import { formatPaymentList } from "../output/formatter.js";
import { formatJsonOutput } from "../output/json.js";

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .description("List every payment endpoint a public key has published")
    .argument("<pubkey>", "Payee public key (z-base-32)")
    .action(
      async (
        pubkey: string,
        _opts: Record<string, unknown>,
        command: Command,
      ) => {
        const globalOpts = command.parent?.opts<{ json: boolean }>();
        const jsonMode = globalOpts?.json ?? false;

        try {
          const paykit = createPaykitFromEnv();
          const start = Date.now();
          const payments = await paykit.getPaymentList(pubkey);
          const duration = Date.now() - start;

          if (jsonMode) {
            const output = formatJsonOutput({
              success: true,
              data: supportedPaymentsToRecord(payments),
              metadata: { pubkey, duration },
            });
            process.stdout.write(`${output}\n`);
          } else {
            process.stdout.write(`${formatPaymentList(pubkey, payments)}\n`);
          }
        } catch (error: unknown) {
          handleCliError(error, { jsonMode });
        }
      },
    );
}
