import { describe, expect, test } from "vitest";
import { isComplete, nextStatement } from "./complete.ts";

// --- isComplete ---

describe("isComplete", () => {
  test("statement ending in a semicolon", () => {
    expect(isComplete("SELECT 1;")).toBe(true);
    expect(isComplete("SELECT 1;  \n")).toBe(true);
  });

  test("no semicolon yet", () => {
    expect(isComplete("SELECT 1")).toBe(false);
    expect(isComplete("")).toBe(false);
  });

  test("semicolon inside a string or identifier does not count", () => {
    expect(isComplete("SELECT 'a;b'")).toBe(false);
    expect(isComplete("SELECT 'a;b")).toBe(false);
    expect(isComplete('SELECT "x;"')).toBe(false);
    expect(isComplete("SELECT [a;b]")).toBe(false);
  });

  test("semicolon inside a comment does not count", () => {
    expect(isComplete("SELECT 1 -- ;")).toBe(false);
    expect(isComplete("SELECT 1 /* ; */")).toBe(false);
    expect(isComplete("SELECT 1; -- done")).toBe(true);
  });

  test("trigger body needs END before the final semicolon", () => {
    const head = "CREATE TRIGGER t AFTER INSERT ON a BEGIN INSERT INTO b VALUES(1);";
    expect(isComplete(head)).toBe(false);
    expect(isComplete(`${head} END`)).toBe(false);
    expect(isComplete(`${head} END;`)).toBe(true);
  });

  test("temporary triggers too", () => {
    const sql = "CREATE TEMP TRIGGER t AFTER DELETE ON a BEGIN DELETE FROM b; END;";
    expect(isComplete(sql)).toBe(true);
    expect(isComplete(sql.slice(0, -5))).toBe(false);
  });

  test("CREATE TABLE is not a trigger", () => {
    expect(isComplete("CREATE TABLE t(x);")).toBe(true);
  });
});

// --- nextStatement ---

describe("nextStatement", () => {
  test("splits off the first statement", () => {
    expect(nextStatement("SELECT 1; SELECT 2;")).toEqual({
      statement: "SELECT 1;",
      tail: " SELECT 2;",
    });
  });

  test("skips empty statements and comments", () => {
    expect(nextStatement(" ; -- note\nSELECT 2;")).toEqual({
      statement: "-- note\nSELECT 2;",
      tail: "",
    });
  });

  test("last statement may lack a semicolon", () => {
    expect(nextStatement("SELECT 3")).toEqual({ statement: "SELECT 3", tail: "" });
  });

  test("nothing executable left", () => {
    expect(nextStatement("  ;\n-- only a comment\n")).toBeNull();
    expect(nextStatement("")).toBeNull();
  });

  test("keeps a trigger body together", () => {
    const trigger = "CREATE TRIGGER t AFTER INSERT ON a BEGIN SELECT 1; SELECT 2; END;";
    expect(nextStatement(`${trigger}SELECT 3;`)).toEqual({ statement: trigger, tail: "SELECT 3;" });
  });
});
