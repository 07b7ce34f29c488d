import { describe, expect, test } from "vitest";
import {
  cString,
  csvEscape,
  hexBlob,
  htmlEscape,
  isNumber,
  quoteTableName,
  sqlIdent,
  sqlQuote,
} from "./format.ts";

// --- csvEscape ---

describe("csvEscape", () => {
  test("plain string unchanged", () => {
    expect(csvEscape("hello")).toBe("hello");
  });

  test("wraps value holding the separator", () => {
    expect(csvEscape("a,b")).toBe('"a,b"');
  });

  test("honours a custom separator", () => {
    expect(csvEscape("a,b", ";")).toBe("a,b");
    expect(csvEscape("a;b", ";")).toBe('"a;b"');
  });

  test("doubles embedded double quotes", () => {
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
  });

  test("quotes single quotes, control and non-ASCII characters", () => {
    expect(csvEscape("O'Brien")).toBe(`"O'Brien"`);
    expect(csvEscape("line1\nline2")).toBe('"line1\nline2"');
    expect(csvEscape("café")).toBe('"café"');
  });

  test("empty string unchanged", () => {
    expect(csvEscape("")).toBe("");
  });
});

// --- htmlEscape ---

describe("htmlEscape", () => {
  test("escapes markup characters", () => {
    expect(htmlEscape(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;",
    );
  });
});

// --- cString ---

describe("cString", () => {
  test("wraps in double quotes", () => {
    expect(cString("abc")).toBe('"abc"');
  });

  test("escapes backslash, quote and whitespace controls", () => {
    expect(cString('a\\b"c\td\ne\rf')).toBe('"a\\\\b\\"c\\td\\ne\\rf"');
  });

  test("writes other bytes as octal escapes", () => {
    expect(cString("\x01")).toBe('"\\001"');
    expect(cString("é")).toBe('"\\303\\251"');
  });
});

// --- SQL quoting ---

describe("sqlQuote", () => {
  test("doubles single quotes", () => {
    expect(sqlQuote("O'Brien")).toBe("'O''Brien'");
  });
});

describe("sqlIdent", () => {
  test("doubles double quotes", () => {
    expect(sqlIdent('my "table"')).toBe('"my ""table"""');
  });
});

describe("quoteTableName", () => {
  test("plain identifiers stay bare", () => {
    expect(quoteTableName("users_2")).toBe("users_2");
  });

  test("anything else is single-quoted", () => {
    expect(quoteTableName("my table")).toBe("'my table'");
    expect(quoteTableName("2fast")).toBe("'2fast'");
  });
});

// --- hexBlob / isNumber ---

test("hexBlob writes an X'' literal", () => {
  expect(hexBlob(new Uint8Array([0x00, 0xab, 0x10]))).toBe("X'00ab10'");
});

describe("isNumber", () => {
  test("accepts integers, decimals and exponents", () => {
    expect(isNumber("42")).toBe(true);
    expect(isNumber("-3.5")).toBe(true);
    expect(isNumber("+1e10")).toBe(true);
    expect(isNumber("2.5E-3")).toBe(true);
  });

  test("rejects everything else", () => {
    expect(isNumber("")).toBe(false);
    expect(isNumber("1.")).toBe(false);
    expect(isNumber("abc")).toBe(false);
    expect(isNumber("1 2")).toBe(false);
  });
});
