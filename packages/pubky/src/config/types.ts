import type { z } from "zod";
import type { PaykitConfigSchema } from "./schema";

/** Configuration object passed to `new Paykit()`. Validated at construction time. */
export type PaykitConfig = z.input<typeof PaykitConfigSchema>;

/** Validated and normalized configuration after Zod parsing. */
export type ValidatedConfig = z.output<typeof PaykitConfigSchema>;
