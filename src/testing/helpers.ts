import { SqliteEngine } from "../engine/sqlite.ts";
import type { LineSource } from "../shell/line-reader.ts";
import type { OutputSink } from "../shell/output.ts";
import { createSession, openDb, type Session } from "../shell/session.ts";

/** Output sink that keeps everything written to it. */
export class MemorySink implements OutputSink {
  readonly name = "memory";
  text = "";
  closed = false;

  write(text: string): void {
    this.text += text;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Return what was written so far and start over. */
  take(): string {
    const text = this.text;
    this.text = "";
    return text;
  }
}

export interface TestSession {
  session: Session;
  out: MemorySink;
}

/** Session on a fresh in-memory database, writing to a {@link MemorySink}. */
export async function createTestSession(setup?: string): Promise<TestSession> {
  const out = new MemorySink();
  const session = createSession({ connect: async () => new SqliteEngine(":memory:"), out });
  const db = await openDb(session);
  if (setup) await db.exec(setup);
  return { session, out };
}

/** Non-interactive lines of an in-memory script. */
export class TextLineSource implements LineSource {
  readonly interactive = false;
  private lines: string[];

  constructor(text: string) {
    this.lines = text.split(/\r?\n/);
    if (this.lines[this.lines.length - 1] === "") this.lines.pop();
  }

  async readLine(): Promise<string | null> {
    return this.lines.shift() ?? null;
  }

  async close(): Promise<void> {}
}
