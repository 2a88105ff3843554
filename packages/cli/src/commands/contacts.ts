import type { Command } from "commander";

import { createPaykitFromEnv } from "../config.js";
import { handleCliError } from "../output/errors.js";
import { formatContacts } from "../output/formatter.js";
import { formatJsonOutput } from "../output/json.js";

export function registerContactsCommand(program: Command): void {
  program
    .command("contacts")
    .description("List the public keys a user follows")
    .argument("<pubkey>", "Public key (z-base-32)")
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
          const contacts = await paykit.getKnownContacts(pubkey);
          const duration = Date.now() - start;

          if (jsonMode) {
            const output = formatJsonOutput({
              success: true,
              data: contacts.map((contact) => contact.toString()),
              metadata: { pubkey, duration },
            });
            process.stdout.write(`${output}\n`);
          } else {
            process.stdout.write(`${formatContacts(pubkey, contacts)}\n`);
          }
        } catch (error: unknown) {
          handleCliError(error, { jsonMode });
        }
      },
    );
}
