import type { Session } from "../session.ts";

/** Outcome of one dot command: carry on, count an error, or end the session. */
export type DotStatus = "ok" | "error" | "exit";

/** Result of feeding a script through the input assembler. */
export interface ScriptResult {
  errors: number;
  exit: boolean;
}

/** What a dot command can reach besides its arguments. */
export interface ShellContext {
  session: Session;
  /** Run the statements and commands of a script file in this session. */
  runScript(path: string): Promise<ScriptResult>;
}

interface DotCommandDef {
  name: string;
  /** Shortest abbreviation accepted. Defaults to 1. */
  minPrefix?: number;
  /** Accepted number of arguments after the command name. */
  args?: { min?: number; max?: number };
  /** Synopsis shown by `.help`, e.g. `.backup ?DB? FILE`. */
  usage: string;
  describe: string;
  /**
   * Throw {@link UserError} for anything the user can fix; the dispatcher
   * reports it and counts an error. Returning nothing means `ok`.
   */
  handler: (args: string[], ctx: ShellContext) => Promise<DotStatus | void>;
}

export interface DotCommand extends DotCommandDef {
  /** Whether `token` abbreviates this command and `argc` arguments are accepted. */
  matches(token: string, argc: number): boolean;
}

/**
 * Dot-command factory. A command matches a token that is a prefix of its
 * name at least `minPrefix` long, given an accepted argument count.
 *
 * @example
 * ```ts
 * export const echoCommand = defineDotCommand({
 *   name: "echo",
 *   args: { min: 1, max: 1 },
 *   usage: ".echo ON|OFF",
 *   describe: "Turn command echo on or off",
 *   handler: async ([flag], { session }) => {
 *     session.echo = booleanValue(flag);
 *   },
 * });
 * ```
 */
export function defineDotCommand(def: DotCommandDef): DotCommand {
  const minPrefix = def.minPrefix ?? 1;
  const min = def.args?.min ?? 0;
  const max = def.args?.max ?? Infinity;
  return {
    ...def,
    matches: (token, argc) =>
      token.length >= minPrefix &&
      def.name.startsWith(token) &&
      argc >= min &&
      argc <= max,
  };
}
