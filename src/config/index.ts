import { readFileSync } from "fs";
import { ConfigFileSchema, type ConfigFile } from "./schema.ts";
import { findConfigFile } from "./paths.ts";
import { logger } from "../core/logger.ts";
import { errorMessage } from "../core/errors.ts";
import { applyMode } from "../shell/dot-commands/mode.ts";
import type { Session } from "../shell/session.ts";

export type { ConfigFile } from "./schema.ts";

/** Parse a configuration file's text. Throws on invalid JSON or settings. */
export function parseConfig(raw: string): ConfigFile {
  return ConfigFileSchema.parse(JSON.parse(raw));
}

/** The first configuration file found, or `null`. An invalid file is reported and skipped. */
export function loadConfigFile(verbose = false, path = findConfigFile()): ConfigFile | null {
  if (!path) return null;

  try {
    return parseConfig(readFileSync(path, "utf-8"));
  } catch (err) {
    logger.warn(`Failed to parse config file: ${path}`);
    logger.debug(errorMessage(err), verbose);
    return null;
  }
}

/** Copy the renderer and flag settings of `config` onto `session`. */
export function applyConfig(session: Session, config: ConfigFile | null): void {
  if (!config) return;
  if (config.mode) applyMode(session, config.mode);
  if (config.headers !== undefined) session.showHeader = config.headers;
  if (config.separator !== undefined) session.separator = config.separator;
  if (config.nullvalue !== undefined) session.nullValue = config.nullvalue;
  if (config.prompt?.main !== undefined) session.prompts.main = config.prompt.main;
  if (config.prompt?.continue !== undefined) session.prompts.continuation = config.prompt.continue;
  if (config.bail !== undefined) session.bail = config.bail;
  if (config.echo !== undefined) session.echo = config.echo;
  if (config.stats !== undefined) session.stats = config.stats;
}
