import { logger } from "../core/logger.ts";
import { isComplete } from "../engine/complete.ts";
import type { DotStatus, ScriptResult, ShellContext } from "./dot-commands/define-dot-command.ts";
import { runDotCommand } from "./dot-commands/index.ts";
import { shellExec } from "./exec.ts";
import { StreamLineSource, type LineSource } from "./line-reader.ts";
import {
  containsSemicolon,
  isAllWhitespace,
  isCommandTerminator,
  isCompleteStatement,
} from "./scanner.ts";
import type { Session } from "./session.ts";

const seconds = (micros: number) => (micros / 1e6).toFixed(6);

/** Run `work`, then report the CPU time it took when the session timer is on. */
async function timed(session: Session, work: () => Promise<void>): Promise<void> {
  if (!session.timer) return work();
  const start = process.cpuUsage();
  await work();
  const { user, system } = process.cpuUsage(start);
  logger.log(`CPU Time: user ${seconds(user)} sys ${seconds(system)}`);
}

/** A shell context whose `.read` feeds files back through {@link processInput}. */
export function createShellContext(session: Session): ShellContext {
  const ctx: ShellContext = {
    session,
    runScript: async (path) => {
      const source = StreamLineSource.fromFile(path);
      try {
        return await processInput(ctx, source);
      } finally {
        await source.close();
      }
    },
  };
  return ctx;
}

/**
 * Read lines from `source` until it runs dry, an exit is requested, or
 * (with bail on, when not typing interactively) the first error. Lines
 * starting with `.` run as dot commands; everything else collects into a
 * buffer that runs once it holds complete SQL.
 */
export async function processInput(ctx: ShellContext, source: LineSource): Promise<ScriptResult> {
  const { session } = ctx;
  const typing = source.interactive && session.interactive;
  let buffer: string | null = null;
  let startLine = 0;
  let lineNo = 0;
  let errors = 0;
  let exit = false;

  while (errors === 0 || !session.bail || typing) {
    const line = await source.readLine(buffer !== null && buffer.length > 0);
    if (line === null) break;
    if (session.seenInterrupt) {
      if (!source.interactive) break;
      session.seenInterrupt = false;
    }
    lineNo++;

    if (!buffer && isAllWhitespace(line)) continue;
    if (buffer === null && line.startsWith(".")) {
      if (session.echo) session.out.write(`${line}\n`);
      const status = await runDotCommand(line, ctx);
      if (status === "exit") {
        exit = true;
        break;
      }
      if (status === "error") errors++;
      continue;
    }

    const text: string = isCommandTerminator(line) && isCompleteStatement(buffer ?? "") ? ";" : line;
    let added: string;
    if (buffer === null) {
      if (text.trim().length === 0) continue;
      buffer = text;
      added = text;
      startLine = lineNo;
    } else {
      added = `\n${text}`;
      buffer += added;
    }

    if (containsSemicolon(added) && isComplete(buffer)) {
      session.cnt = 0;
      const sql = buffer;
      buffer = null;
      await timed(session, async () => {
        const result = await shellExec(session, sql);
        if (!result.ok) {
          const prefix = typing ? "" : `near line ${startLine}: `;
          logger.error(`${prefix}${result.message}`);
          errors++;
        }
      });
    } else if (isAllWhitespace(buffer)) {
      buffer = null;
    }
  }

  if (buffer !== null && !isAllWhitespace(buffer)) {
    logger.error(`incomplete SQL: ${buffer}`);
  }
  return { errors, exit };
}

/**
 * Run a single piece of command-line input: a dot command, or SQL run as
 * one batch. Errors are reported without a line number.
 */
export async function runCommandText(ctx: ShellContext, text: string): Promise<DotStatus> {
  if (text.startsWith(".")) return runDotCommand(text, ctx);
  const result = await shellExec(ctx.session, text);
  if (result.ok) return "ok";
  logger.error(result.message);
  return "error";
}
