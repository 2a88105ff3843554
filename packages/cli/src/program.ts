import { Command } from "commander";

import { registerContactsCommand } from "./commands/contacts.js";
import { registerGetCommand } from "./commands/get.js";
import { registerListCommand } from "./commands/list.js";

export const program = new Command();

program
  .name("paykit")
  .version("0.1.0")
  .description("Discover payment endpoints published on Pubky")
  .option("-j, --json", "Output as JSON envelope", false);

registerListCommand(program);
registerGetCommand(program);
registerContactsCommand(program);
