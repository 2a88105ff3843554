import type { Command } from "commander";

import { createPaykitFromEnv } from "../config.js";
import { handleCliError } from "../output/errors.js";
import { formatEndpoint } from "../output/formatter.js";
import { formatJsonOutput } from "../output/json.js";

export function registerGetCommand(program: Command): void {
  program
    .command("get")
    .description("Print the endpoint a public key published for one method")
    .argument("<pubkey>", "Payee public key (z-base-32)")
    .argument("<method>", "Payment method id, e.g. lightning")
    .action(
      async (
        pubkey: string,
        method: string,
        _opts: Record<string, unknown>,
        command: Command,
      ) => {
        const globalOpts = command.parent?.opts<{ json: boolean }>();
        const jsonMode = globalOpts?.json ?? false;

        try {
          const paykit = createPaykitFromEnv();
          const start = Date.now();
          const data = await paykit.getPaymentEndpoint(pubkey, method);
          const duration = Date.now() - start;

          if (jsonMode) {
            const output = formatJsonOutput({
              success: true,
              data: { method, data: data ?? null },
              metadata: { pubkey, duration },
            });
            process.stdout.write(`${output}\n`);
          } else {
            process.stdout.write(`${formatEndpoint(pubkey, method, data)}\n`);
          }
        } catch (error: unknown) {
          handleCliError(error, { jsonMode });
        }
      },
    );
}
