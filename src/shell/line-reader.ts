import { closeSync, createReadStream, fstatSync, openSync } from "node:fs";
import * as readline from "node:readline";
import { UserError } from "../core/errors.ts";
import { logger } from "../core/logger.ts";
import { HISTORY_MAX, loadHistory, saveHistory } from "./history.ts";
import type { Session } from "./session.ts";

/** Where the input assembler gets its lines from. */
export interface LineSource {
  /** A person is typing: prompts are shown and errors carry no line number. */
  readonly interactive: boolean;
  /** Next line without its terminator, or `null` at end of input. */
  readLine(continuation: boolean): Promise<string | null>;
  close(): Promise<void>;
}

/** Lines of a stream (piped standard input or a script file), `\r\n` tolerant. */
export class StreamLineSource implements LineSource {
  readonly interactive = false;
  private rl: readline.Interface;
  private lines: AsyncIterator<string>;

  constructor(input: NodeJS.ReadableStream) {
    this.rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  /** Opened up front so a missing, unreadable or non-regular file fails here. */
  static fromFile(path: string): StreamLineSource {
    let fd: number;
    try {
      fd = openSync(path, "r");
    } catch {
      throw new UserError(`cannot open "${path}"`);
    }
    if (!fstatSync(fd).isFile()) {
      closeSync(fd);
      throw new UserError(`cannot open "${path}"`);
    }
    return new StreamLineSource(createReadStream(path, { fd }));
  }

  async readLine(): Promise<string | null> {
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  async close(): Promise<void> {
    this.rl.close();
  }
}

/**
 * The terminal: readline with the session's prompts and persistent history.
 * Ctrl-C interrupts the running statement, or discards the line being typed.
 */
export class TerminalLineSource implements LineSource {
  readonly interactive = true;
  private rl: readline.Interface;
  private history: string[];
  private queued: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(
    private session: Session,
    private historySize = HISTORY_MAX,
  ) {
    this.history = loadHistory();
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      terminal: true,
      history: this.history,
      historySize,
    });
    this.rl.on("line", (line) => this.deliver(line));
    this.rl.on("history", (history) => {
      this.history = history;
    });
    this.rl.on("SIGINT", () => this.interrupt());
    this.rl.on("close", () => {
      this.closed = true;
      this.deliver(null);
    });
  }

  private deliver(line: string | null): void {
    const waiting = this.waiting;
    this.waiting = null;
    if (waiting) waiting(line);
    else if (line !== null) this.queued.push(line);
  }

  private interrupt(): void {
    this.session.seenInterrupt = true;
    this.session.db?.interrupt();
    if (this.waiting) {
      this.rl.write(null, { ctrl: true, name: "u" });
      process.stdout.write("^C\n");
      this.rl.prompt();
    }
  }

  async readLine(continuation: boolean): Promise<string | null> {
    const queued = this.queued.shift();
    if (queued !== undefined) return queued;
    if (this.closed) return null;
    const { main, continuation: more } = this.session.prompts;
    this.rl.setPrompt(continuation ? more : main);
    this.rl.prompt();
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  async close(): Promise<void> {
    if (!this.closed) this.rl.close();
    logger.log();
    saveHistory(this.history, this.historySize);
  }
}
