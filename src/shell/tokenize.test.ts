import { afterEach, describe, expect, test, vi } from "vitest";
import {
  MAX_ARGS,
  atoi,
  booleanValue,
  integerValue,
  resolveBackslashes,
  tokenizeMetaLine,
} from "./tokenize.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

// --- tokenizeMetaLine ---

describe("tokenizeMetaLine", () => {
  test("splits on whitespace after the dot", () => {
    expect(tokenizeMetaLine(".mode   csv\t")).toEqual(["mode", "csv"]);
  });

  test("single quotes keep backslashes, double quotes resolve them", () => {
    expect(tokenizeMetaLine(`.print 'a\\tb' "c\\td"`)).toEqual(["print", "a\\tb", "c\td"]);
  });

  test("quoted tokens may hold spaces", () => {
    expect(tokenizeMetaLine(`.nullvalue 'no value'`)).toEqual(["nullvalue", "no value"]);
  });

  test("unterminated quote runs to the end of line", () => {
    expect(tokenizeMetaLine('.print "abc def')).toEqual(["print", "abc def"]);
  });

  test("bare tokens resolve escapes", () => {
    expect(tokenizeMetaLine(".separator \\t")).toEqual(["separator", "\t"]);
  });

  test(`keeps at most ${MAX_ARGS} tokens`, () => {
    const line = "." + Array.from({ length: 60 }, (_, i) => `t${i}`).join(" ");
    const tokens = tokenizeMetaLine(line);
    expect(tokens).toHaveLength(MAX_ARGS);
    expect(tokens[MAX_ARGS - 1]).toBe("t49");
  });
});

describe("resolveBackslashes", () => {
  test("octal escapes", () => {
    expect(resolveBackslashes("\\101\\7")).toBe("A\x07");
  });

  test("unknown escapes stand for the character", () => {
    expect(resolveBackslashes("\\x\\\\")).toBe("x\\");
  });

  test("trailing backslash is dropped", () => {
    expect(resolveBackslashes("a\\")).toBe("a");
  });
});

// --- argument values ---

describe("booleanValue", () => {
  test("numbers and words", () => {
    expect(booleanValue("1")).toBe(true);
    expect(booleanValue("0")).toBe(false);
    expect(booleanValue("ON")).toBe(true);
    expect(booleanValue("yes")).toBe(true);
    expect(booleanValue("off")).toBe(false);
    expect(booleanValue("No")).toBe(false);
  });

  test("anything else warns and is false", () => {
    const warn = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(booleanValue("maybe")).toBe(false);
    expect(warn).toHaveBeenCalledWith(expect.anything(), 'Not a boolean value: "maybe". Assuming "no".');
  });
});

test("atoi reads a leading integer", () => {
  expect(atoi("12abc")).toBe(12);
  expect(atoi("-5")).toBe(-5);
  expect(atoi("abc")).toBe(0);
});

describe("integerValue", () => {
  test("decimal and hex", () => {
    expect(integerValue("42")).toBe(42);
    expect(integerValue("0x10")).toBe(16);
    expect(integerValue("-7")).toBe(-7);
  });

  test("size suffixes", () => {
    expect(integerValue("64MiB")).toBe(64 * 1024 * 1024);
    expect(integerValue("10KB")).toBe(10000);
    expect(integerValue("-2k")).toBe(-2000);
  });

  test("no digits", () => {
    expect(integerValue("")).toBe(0);
    expect(integerValue("abc")).toBe(0);
  });
});
