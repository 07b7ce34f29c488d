import { describe, expect, test } from "vitest";
import {
  containsSemicolon,
  isAllWhitespace,
  isCommandTerminator,
  isCompleteStatement,
} from "./scanner.ts";

describe("isAllWhitespace", () => {
  test("whitespace and comments only", () => {
    expect(isAllWhitespace("")).toBe(true);
    expect(isAllWhitespace("  \t\n")).toBe(true);
    expect(isAllWhitespace("  -- hi\n /* x */ ")).toBe(true);
    expect(isAllWhitespace("-- runs to the end")).toBe(true);
  });

  test("anything else is content", () => {
    expect(isAllWhitespace("x")).toBe(false);
    expect(isAllWhitespace(" /* x */ y")).toBe(false);
  });

  test("an unterminated block comment is content", () => {
    expect(isAllWhitespace("/* open")).toBe(false);
  });
});

test("containsSemicolon", () => {
  expect(containsSemicolon("SELECT 1;")).toBe(true);
  expect(containsSemicolon("SELECT 1")).toBe(false);
});

describe("isCommandTerminator", () => {
  test("a lone slash or GO", () => {
    expect(isCommandTerminator("/")).toBe(true);
    expect(isCommandTerminator("go")).toBe(true);
    expect(isCommandTerminator("  GO  ")).toBe(true);
    expect(isCommandTerminator(" GO -- end")).toBe(true);
  });

  test("anything following is not allowed", () => {
    expect(isCommandTerminator("gone")).toBe(false);
    expect(isCommandTerminator("/x")).toBe(false);
    expect(isCommandTerminator("SELECT 1")).toBe(false);
  });
});

describe("isCompleteStatement", () => {
  test("empty buffer", () => {
    expect(isCompleteStatement("")).toBe(true);
  });

  test("complete once a semicolon is added", () => {
    expect(isCompleteStatement("SELECT 1")).toBe(true);
  });

  test("still inside a literal", () => {
    expect(isCompleteStatement("SELECT 'a")).toBe(false);
  });
});
