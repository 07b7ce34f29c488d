import { describe, expect, test } from "vitest";
import { MemorySink, createTestSession } from "../testing/helpers.ts";
import { formatCounter, renderQuery, shellExec } from "./exec.ts";

// --- shellExec ---

describe("shellExec", () => {
  test("header and value of a single-column select", async () => {
    const { session, out } = await createTestSession();
    session.showHeader = true;
    expect(await shellExec(session, "SELECT 1;")).toEqual({ ok: true });
    expect(out.text).toBe("1\n1\n");
  });

  test("runs every statement in order", async () => {
    const { session, out } = await createTestSession();
    const sql = "CREATE TABLE t(a); INSERT INTO t VALUES(1),(2); SELECT a FROM t;";
    expect(await shellExec(session, sql)).toEqual({ ok: true });
    expect(out.text).toBe("1\n2\n");
  });

  test("reals print with a fractional digit", async () => {
    const { session, out } = await createTestSession();
    await shellExec(session, "SELECT 1.0, 0.5, 7;");
    expect(out.text).toBe("1.0|0.5|7\n");
  });

  test("the first error stops the remaining statements", async () => {
    const { session, out } = await createTestSession();
    const result = await shellExec(session, "SELECT 1; SELECT * FROM missing; SELECT 2;");
    expect(result).toEqual({ ok: false, code: "SQLITE_ERROR", message: "no such table: missing" });
    expect(out.text).toBe("1\n");
  });

  test("errors are written to the log sink", async () => {
    const { session } = await createTestSession();
    const log = new MemorySink();
    session.logOut = log;
    await shellExec(session, "SELECT * FROM missing;");
    expect(log.text).toBe("(SQLITE_ERROR) no such table: missing\n");
  });

  test("echo writes each statement before its rows", async () => {
    const { session, out } = await createTestSession();
    session.echo = true;
    await shellExec(session, "SELECT 1;  SELECT 2;");
    expect(out.text).toBe("SELECT 1;\n1\nSELECT 2;\n2\n");
  });

  test("null callback discards rows", async () => {
    const { session, out } = await createTestSession();
    expect(await shellExec(session, "SELECT 1;", null)).toEqual({ ok: true });
    expect(out.text).toBe("");
  });

  test("callback returning true stops the statement without error", async () => {
    const { session } = await createTestSession("CREATE TABLE t(a); INSERT INTO t VALUES(1),(2),(3);");
    const seen: (string | null)[] = [];
    const result = await shellExec(session, "SELECT a FROM t ORDER BY a;", (columns, row) => {
      expect(columns).toEqual(["a"]);
      seen.push(row[0]?.text ?? null);
      return seen.length === 2;
    });
    expect(result).toEqual({ ok: true });
    expect(seen).toEqual(["1", "2"]);
  });

  test("an interrupt stops the running statement only", async () => {
    const { session } = await createTestSession("CREATE TABLE t(a); INSERT INTO t VALUES(1),(2),(3);");
    const seen: (string | null)[] = [];
    const result = await shellExec(session, "SELECT a FROM t ORDER BY a;", (_, row) => {
      seen.push(row[0]?.text ?? null);
      session.db?.interrupt();
    });
    expect(result).toEqual({ ok: false, code: "SQLITE_INTERRUPT", message: "interrupted" });
    expect(seen).toEqual(["1"]);
    expect(await shellExec(session, "SELECT 1;", null)).toEqual({ ok: true });
  });

  test("statements without rows write nothing", async () => {
    const { session, out } = await createTestSession();
    await shellExec(session, "CREATE TABLE t(a);\n-- trailing comment\n");
    expect(out.text).toBe("");
  });

  test("stats print counters after each statement", async () => {
    const { session, out } = await createTestSession();
    session.stats = true;
    await shellExec(session, "SELECT 1;");
    const lines = out.text.split("\n");
    expect(lines[0]).toBe("1");
    expect(lines).toContain("Rows Returned:".padEnd(37) + "1");
  });
});

// --- renderQuery ---

test("renderQuery binds parameters", async () => {
  const { session, out } = await createTestSession("CREATE TABLE t(a); INSERT INTO t VALUES('x'),('y');");
  await renderQuery(session, "SELECT a FROM t WHERE a = ?", ["y"]);
  expect(out.text).toBe("y\n");
});

// --- formatCounter ---

describe("formatCounter", () => {
  test("label padded to a fixed column", () => {
    expect(formatCounter({ label: "Page Size", current: 4096, unit: "bytes" })).toBe(
      "Page Size:".padEnd(37) + "4096 bytes\n",
    );
  });

  test("high-water mark", () => {
    expect(formatCounter({ label: "Memory Used", current: 10n, highWater: 20n })).toBe(
      "Memory Used:".padEnd(37) + "10 (max 20)\n",
    );
  });
});
