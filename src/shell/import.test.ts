import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { EngineError, UserError } from "../core/errors.ts";
import { createTestSession } from "../testing/helpers.ts";
import { importFile, readRecords, splitFields, unquoteField } from "./import.ts";
import type { Session } from "./session.ts";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "sqlsh-import-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function dataFile(content: string): string {
  const file = join(dir, "data.csv");
  writeFileSync(file, content);
  return file;
}

async function tableRows(session: Session, table: string) {
  return (await session.db?.query(`SELECT * FROM ${table}`))?.rows;
}

// --- record splitting ---

describe("readRecords", () => {
  test("one record per line, CRLF tolerated", () => {
    expect(readRecords("a\r\nb\n")).toEqual([
      { line: 1, text: "a" },
      { line: 2, text: "b" },
    ]);
  });

  test("quoted fields may span lines", () => {
    expect(readRecords('1,"line one\nline two"\n2,x\n')).toEqual([
      { line: 2, text: '1,"line one\nline two"' },
      { line: 3, text: "2,x" },
    ]);
  });

  test("an unterminated quote runs to the end of the file", () => {
    expect(readRecords('x,"open\n')).toEqual([{ line: 1, text: 'x,"open' }]);
  });
});

describe("splitFields", () => {
  test("ignores separators inside quotes", () => {
    expect(splitFields('a|"b|c"|d', "|")).toEqual(["a", '"b|c"', "d"]);
  });

  test("multi-character separators", () => {
    expect(splitFields("a::b::", "::")).toEqual(["a", "b", ""]);
  });
});

describe("unquoteField", () => {
  test("doubled quotes collapse", () => {
    expect(unquoteField('"say ""hi"""')).toBe('say "hi"');
  });

  test("unquoted fields are kept as they are", () => {
    expect(unquoteField('a"b')).toBe('a"b');
  });

  test("missing closing quote", () => {
    expect(unquoteField('"ab')).toBe("ab");
  });
});

// --- importFile ---

describe("importFile", () => {
  test("loads CSV records into the table", async () => {
    const { session } = await createTestSession("CREATE TABLE t(a, b);");
    session.separator = ",";
    const file = dataFile('1,"a,b"\n2,"say ""hi"""\n3,"two\nlines"\n');
    await importFile(session, { file, table: "t" });
    expect(await tableRows(session, "t")).toEqual([
      ["1", "a,b"],
      ["2", 'say "hi"'],
      ["3", "two\nlines"],
    ]);
  });

  test("column affinity applies to imported text", async () => {
    const { session } = await createTestSession("CREATE TABLE t(n INTEGER, s TEXT);");
    await importFile(session, { file: dataFile("7|seven\n"), table: "t" });
    expect(await tableRows(session, "t")).toEqual([[7n, "seven"]]);
  });

  test("a short record rejects the whole file", async () => {
    const { session } = await createTestSession("CREATE TABLE t(a, b);");
    session.separator = ",";
    const file = dataFile("1,2\n3\n4,5\n");
    await expect(importFile(session, { file, table: "t" })).rejects.toThrow(
      new UserError(`${file} line 2: expected 2 columns of data but found 1`),
    );
    expect(await tableRows(session, "t")).toEqual([]);
  });

  test("empty separator", async () => {
    const { session } = await createTestSession("CREATE TABLE t(a);");
    session.separator = "";
    await expect(importFile(session, { file: dataFile("1\n"), table: "t" })).rejects.toThrow(
      "non-null separator required for import",
    );
  });

  test("missing table", async () => {
    const { session } = await createTestSession();
    await expect(importFile(session, { file: dataFile("1\n"), table: "nope" })).rejects.toThrow(
      new EngineError("no such table: nope", "SQLITE_ERROR"),
    );
  });

  test("missing file", async () => {
    const { session } = await createTestSession("CREATE TABLE t(a);");
    const file = join(dir, "absent.csv");
    await expect(importFile(session, { file, table: "t" })).rejects.toThrow(`cannot open "${file}"`);
  });
});
