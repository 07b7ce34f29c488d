import { spawn, type ChildProcess } from "node:child_process";
import { closeSync, openSync, writeSync } from "node:fs";
import { UserError, errorMessage } from "../core/errors.ts";
import { logger } from "../core/logger.ts";

/** Where rendered results, traces and log lines go. */
export interface OutputSink {
  /** Name shown by `.show`: a path, `stdout`, `stderr`, `off` or `|command`. */
  readonly name: string;
  write(text: string): void;
  close(): Promise<void>;
}

class StreamSink implements OutputSink {
  constructor(
    readonly name: string,
    private stream: NodeJS.WriteStream,
  ) {}

  write(text: string): void {
    this.stream.write(text);
  }

  async close(): Promise<void> {}
}

class FileSink implements OutputSink {
  private fd: number;

  constructor(readonly name: string) {
    try {
      this.fd = openSync(name, "w");
    } catch (err) {
      throw new UserError(`cannot write to "${name}": ${errorMessage(err)}`);
    }
  }

  write(text: string): void {
    writeSync(this.fd, text);
  }

  async close(): Promise<void> {
    closeSync(this.fd);
  }
}

/** Feeds a shell command's standard input; `close` waits for it to exit. */
class PipeSink implements OutputSink {
  readonly name: string;
  private child: ChildProcess;
  private exited: Promise<void>;

  constructor(command: string) {
    this.name = `|${command}`;
    this.child = spawn(command, { shell: true, stdio: ["pipe", "inherit", "inherit"] });
    this.child.stdin?.on("error", (err) => logger.error(`${this.name}: ${err.message}`));
    this.exited = new Promise((resolve) => {
      this.child.once("close", () => resolve());
      this.child.once("error", (err) => {
        logger.error(`cannot run "${command}": ${err.message}`);
        resolve();
      });
    });
  }

  write(text: string): void {
    this.child.stdin?.write(text);
  }

  async close(): Promise<void> {
    this.child.stdin?.end();
    await this.exited;
  }
}

class NullSink implements OutputSink {
  readonly name = "off";
  write(): void {}
  async close(): Promise<void> {}
}

export const stdoutSink: OutputSink = new StreamSink("stdout", process.stdout);
export const stderrSink: OutputSink = new StreamSink("stderr", process.stderr);

/**
 * Open the sink named by a `.output`, `.log` or `.trace` argument. Anything
 * other than `stdout`, `stderr`, `off` or `|command` is a file, truncated.
 */
export function openSink(target: string): OutputSink {
  if (target === "stdout") return stdoutSink;
  if (target === "stderr") return stderrSink;
  if (target === "off") return new NullSink();
  if (target.startsWith("|")) return new PipeSink(target.slice(1));
  return new FileSink(target);
}
