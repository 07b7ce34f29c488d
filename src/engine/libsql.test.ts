import { createClient } from "@libsql/client";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { EngineError, UserError } from "../core/errors.ts";
import { shellExec } from "../shell/exec.ts";
import { createSession } from "../shell/session.ts";
import { MemorySink } from "../testing/helpers.ts";
import { LibsqlEngine } from "./libsql.ts";

let dir: string;
let engine: LibsqlEngine;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "sqlsh-libsql-"));
  const url = `file:${join(dir, "test.db")}`;
  engine = new LibsqlEngine(createClient({ url, intMode: "bigint" }), url);
});

afterEach(async () => {
  await engine.close();
  rmSync(dir, { recursive: true, force: true });
});

describe("LibsqlEngine", () => {
  test("values come back by storage class", async () => {
    const { columns, rows } = await engine.query("SELECT 1 AS i, 'x' AS t, 2.5 AS r, NULL AS n");
    expect(columns).toEqual(["i", "t", "r", "n"]);
    expect(rows).toEqual([[1n, "x", 2.5, null]]);
  });

  test("prepare splits off one statement and runs it on the first step", async () => {
    const { statement, tail } = await engine.prepare("SELECT 1 AS a; SELECT 2;");
    expect(tail).toBe(" SELECT 2;");
    expect(statement?.sql).toBe("SELECT 1 AS a;");
    expect(statement?.columns()).toEqual([]);
    expect(await statement?.step()).toEqual([1n]);
    expect(statement?.columns().map((c) => c.name)).toEqual(["a"]);
    expect(await statement?.step()).toBeUndefined();
  });

  test("nothing to prepare", async () => {
    expect(await engine.prepare("  -- comment\n")).toEqual({ statement: null, tail: "" });
  });

  test("engine failures become EngineError", async () => {
    await expect(engine.query("SELECT * FROM nope")).rejects.toBeInstanceOf(EngineError);
    await expect(engine.query("SELECT * FROM nope")).rejects.toThrow("no such table: nope");
  });

  test("insertAll writes every row", async () => {
    await engine.exec("CREATE TABLE t(a, b);");
    await engine.insertAll("INSERT INTO t VALUES(?, ?)", [
      [1n, "one"],
      [2n, "two"],
    ]);
    expect((await engine.query("SELECT a, b FROM t ORDER BY a")).rows).toEqual([
      [1n, "one"],
      [2n, "two"],
    ]);
  });

  test("trace sees each statement", async () => {
    const seen: string[] = [];
    engine.setTrace((sql) => seen.push(sql));
    await engine.query("SELECT 1");
    engine.setTrace(null);
    await engine.query("SELECT 2");
    expect(seen).toEqual(["SELECT 1"]);
  });

  test("local-only capabilities are refused", async () => {
    await expect(engine.backup()).rejects.toThrow(
      new UserError("Backup is not available for remote databases"),
    );
    await expect(engine.setBusyTimeout()).rejects.toBeInstanceOf(UserError);
    expect(await engine.vfsName()).toBeNull();
  });

  test("version", async () => {
    const { version } = await engine.version();
    expect(version).toMatch(/^3\.\d+\.\d+$/);
  });

  test("drives the shell pipeline", async () => {
    const out = new MemorySink();
    const session = createSession({ connect: async () => engine, out });
    session.showHeader = true;
    session.mode = "csv";
    session.separator = ",";
    expect(await shellExec(session, "SELECT 1 AS id, 'a,b' AS v;")).toEqual({ ok: true });
    expect(out.text).toBe('id,v\n1,"a,b"\n');
  });
});
