import { isComplete } from "../engine/complete.ts";

const SPACE = /\s/;

/**
 * True when `text` holds nothing but whitespace, `/* ... *\/` comments and
 * `-- ...` comments. An unterminated block comment counts as content.
 */
export function isAllWhitespace(text: string): boolean {
  let i = 0;
  while (i < text.length) {
    const ch = text[i] ?? "";
    if (SPACE.test(ch)) {
      i++;
    } else if (ch === "/" && text[i + 1] === "*") {
      const close = text.indexOf("*/", i + 2);
      if (close < 0) return false;
      i = close + 2;
    } else if (ch === "-" && text[i + 1] === "-") {
      const newline = text.indexOf("\n", i + 2);
      if (newline < 0) return true;
      i = newline + 1;
    } else {
      return false;
    }
  }
  return true;
}

export function containsSemicolon(text: string): boolean {
  return text.includes(";");
}

/**
 * A line holding only `/` or `go` (any case), optionally surrounded by
 * whitespace and followed by a comment, stands for a semicolon.
 */
export function isCommandTerminator(line: string): boolean {
  const body = line.trimStart();
  if (body.startsWith("/")) return isAllWhitespace(body.slice(1));
  if (body.slice(0, 2).toLowerCase() === "go") return isAllWhitespace(body.slice(2));
  return false;
}

/** Whether `buffer` would be complete once a semicolon is appended. */
export function isCompleteStatement(buffer: string): boolean {
  if (buffer.length === 0) return true;
  return isComplete(`${buffer};`);
}
