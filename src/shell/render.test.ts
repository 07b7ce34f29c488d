import { beforeEach, describe, expect, test } from "vitest";
import { SqliteEngine } from "../engine/sqlite.ts";
import type { SqlValue } from "../engine/types.ts";
import { MemorySink } from "../testing/helpers.ts";
import { cellOf, renderRow, textCell } from "./render.ts";
import { createSession, type Session } from "./session.ts";

let out: MemorySink;
let session: Session;

beforeEach(() => {
  out = new MemorySink();
  session = createSession({ connect: async () => new SqliteEngine(":memory:"), out });
});

function render(columns: string[], ...rows: SqlValue[][]): string {
  for (const row of rows) renderRow(session, columns, row.map(cellOf));
  return out.take();
}

// --- list / semi ---

describe("list mode", () => {
  test("joins values with the separator", () => {
    expect(render(["a", "b"], [1n, "x"], [2n, "y"])).toBe("1|x\n2|y\n");
  });

  test("header on the first row only", () => {
    session.showHeader = true;
    expect(render(["a", "b"], [1n, "x"], [2n, "y"])).toBe("a|b\n1|x\n2|y\n");
  });

  test("NULL prints as the null value", () => {
    session.nullValue = "NULL";
    expect(render(["a", "b"], [null, "y"])).toBe("NULL|y\n");
  });

  test("semi mode ends rows with a semicolon", () => {
    session.mode = "semi";
    expect(render(["sql"], ["CREATE TABLE t(a)"])).toBe("CREATE TABLE t(a);\n");
  });
});

// --- line ---

describe("line mode", () => {
  test("one name = value line per column, blank line between rows", () => {
    session.mode = "line";
    expect(render(["id", "name"], [1n, "x"], [2n, null])).toBe(
      "   id = 1\n name = x\n\n   id = 2\n name = \n",
    );
  });

  test("names wider than five set the width", () => {
    session.mode = "line";
    expect(render(["a", "longname"], [1n, 2n])).toBe("       a = 1\nlongname = 2\n");
  });

  test("names are measured in characters", () => {
    session.mode = "line";
    expect(render(["\u{1F600}", "b"], [1n, 2n])).toBe("    \u{1F600} = 1\n    b = 2\n");
  });
});

// --- column ---

describe("column mode", () => {
  beforeEach(() => {
    session.mode = "column";
  });

  test("automatic width is at least ten", () => {
    session.showHeader = true;
    const line = (a: string, b: string) => `${a.padEnd(10)}  ${b.padEnd(10)}\n`;
    expect(render(["a", "b"], [1n, "x"])).toBe(
      line("a", "b") + line("-".repeat(10), "-".repeat(10)) + line("1", "x"),
    );
  });

  test("automatic width grows to the header and first value", () => {
    expect(render(["a"], ["twelve chars"], ["a much longer value"])).toBe(
      "twelve chars\n" + "a much longe\n",
    );
  });

  test("explicit widths truncate, negative widths right-justify", () => {
    session.colWidth = [3, -5];
    expect(render(["a", "b"], ["abcdef", "x"])).toBe("abc" + "  " + "    x\n");
    expect(session.actualWidth).toEqual([3, -5]);
  });

  test("explain mode widens a column for a long value", () => {
    session.mode = "explain";
    session.colWidth = [4];
    expect(render(["opcode"], ["Init"], ["OpenRead"])).toBe("Init\nOpenRead\n");
  });
});

// --- html / tcl / csv ---

test("html mode escapes values and headers", () => {
  session.mode = "html";
  session.showHeader = true;
  expect(render(["a<b"], ["<b>"])).toBe(
    "<TR><TH>a&lt;b</TH>\n</TR>\n<TR><TD>&lt;b&gt;</TD>\n</TR>\n",
  );
});

describe("tcl mode", () => {
  beforeEach(() => {
    session.mode = "tcl";
  });

  test("C strings joined by the separator", () => {
    session.separator = " ";
    expect(render(["a", "b"], ["a b", null])).toBe('"a b" ""\n');
  });

  test("header row uses the same layout", () => {
    session.showHeader = true;
    expect(render(["a", "b"], ["x", "y"])).toBe('"a"|"b"\n"x"|"y"\n');
  });
});

describe("csv mode", () => {
  beforeEach(() => {
    session.mode = "csv";
    session.separator = ",";
  });

  test("quotes only values that need it", () => {
    expect(render(["id", "v"], [1n, "a,b"])).toBe('1,"a,b"\n');
  });

  test("NULL is never quoted", () => {
    session.nullValue = "N/A";
    expect(render(["id", "v"], [1n, null])).toBe("1,N/A\n");
  });

  test("header uses the same escaping", () => {
    session.showHeader = true;
    expect(render(["id", "a,b"], [1n, "x"])).toBe('id,"a,b"\n1,x\n');
  });
});

// --- insert ---

describe("insert mode", () => {
  beforeEach(() => {
    session.mode = "insert";
  });

  test("literals by storage class", () => {
    session.destTable = "t";
    expect(render(["a", "b", "c", "d", "e"], [null, 1n, 2.5, "O'Brien", new Uint8Array([0xab])])).toBe(
      "INSERT INTO t VALUES(NULL,1,2.5,'O''Brien',X'ab');\n",
    );
  });

  test("numeric-looking text is still quoted", () => {
    expect(render(["a"], ["42"])).toBe("INSERT INTO table VALUES('42');\n");
  });

  test("table names that are not identifiers are quoted", () => {
    session.destTable = "my table";
    expect(render(["a"], [1n])).toBe("INSERT INTO 'my table' VALUES(1);\n");
  });

  test("untyped shell cells are guessed from their text", () => {
    session.destTable = "t";
    renderRow(session, ["a", "b"], [textCell("12"), textCell("abc")]);
    expect(out.take()).toBe("INSERT INTO t VALUES(12,'abc');\n");
  });
});
