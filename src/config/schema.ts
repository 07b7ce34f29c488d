import { z } from "zod";
import { MODE_NAMES } from "../shell/dot-commands/mode.ts";

export const PromptSchema = z.object({
  main: z.string().optional(),
  continue: z.string().optional(),
});

export const ConfigFileSchema = z.object({
  mode: z.enum(MODE_NAMES).optional(),
  headers: z.boolean().optional(),
  separator: z.string().optional(),
  nullvalue: z.string().optional(),
  prompt: PromptSchema.optional(),
  bail: z.boolean().optional(),
  echo: z.boolean().optional(),
  stats: z.boolean().optional(),
  /** Busy timeout in milliseconds, applied to local databases. */
  timeout: z.number().int().nonnegative().optional(),
  history_size: z.number().int().positive().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
