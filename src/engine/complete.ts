// Token classes of the statement-completeness automaton.
const SEMI = 0;
const WS = 1;
const OTHER = 2;
const EXPLAIN = 3;
const CREATE = 4;
const TEMP = 5;
const TRIGGER = 6;
const END = 7;

// States. INVALID is where scanning begins; START follows a complete statement.
const INVALID = 0;
const START = 1;

// TRANSITIONS[state][token]. States 4..7 track a CREATE TRIGGER body, whose
// inner semicolons do not end the statement until `END ;`.
const TRANSITIONS: readonly (readonly number[])[] = [
  /*               SEMI WS OTHER EXPLAIN CREATE TEMP TRIGGER END */
  /* 0 INVALID */ [1, 0, 2, 3, 4, 2, 2, 2],
  /* 1 START   */ [1, 1, 2, 3, 4, 2, 2, 2],
  /* 2 NORMAL  */ [1, 2, 2, 2, 2, 2, 2, 2],
  /* 3 EXPLAIN */ [1, 3, 3, 2, 4, 2, 2, 2],
  /* 4 CREATE  */ [1, 4, 2, 2, 2, 4, 5, 2],
  /* 5 TRIGGER */ [6, 5, 5, 5, 5, 5, 5, 5],
  /* 6 SEMI    */ [6, 6, 5, 5, 5, 5, 5, 7],
  /* 7 END     */ [1, 7, 5, 5, 5, 5, 5, 5],
];

const KEYWORDS: Record<string, number> = {
  create: CREATE,
  trigger: TRIGGER,
  temp: TEMP,
  temporary: TEMP,
  end: END,
  explain: EXPLAIN,
};

interface Token {
  kind: number;
  end: number;
}

function isIdChar(ch: string): boolean {
  return /[A-Za-z0-9_$]/.test(ch) || ch.charCodeAt(0) >= 0x80;
}

function transition(state: number, kind: number): number {
  return TRANSITIONS[state]?.[kind] ?? INVALID;
}

/**
 * Scan the token starting at `i`. Returns `null` for a string, quoted
 * identifier or block comment that is never closed.
 */
function scanToken(sql: string, i: number): Token | null {
  const ch = sql[i] ?? "";
  switch (ch) {
    case ";":
      return { kind: SEMI, end: i + 1 };
    case " ":
    case "\r":
    case "\t":
    case "\n":
    case "\f":
      return { kind: WS, end: i + 1 };
    case "/": {
      if (sql[i + 1] !== "*") return { kind: OTHER, end: i + 1 };
      const close = sql.indexOf("*/", i + 2);
      return close < 0 ? null : { kind: WS, end: close + 2 };
    }
    case "-": {
      if (sql[i + 1] !== "-") return { kind: OTHER, end: i + 1 };
      const newline = sql.indexOf("\n", i + 2);
      return { kind: WS, end: newline < 0 ? sql.length : newline + 1 };
    }
    case "[": {
      const close = sql.indexOf("]", i + 1);
      return close < 0 ? null : { kind: OTHER, end: close + 1 };
    }
    case "`":
    case '"':
    case "'": {
      const close = sql.indexOf(ch, i + 1);
      return close < 0 ? null : { kind: OTHER, end: close + 1 };
    }
    default: {
      if (!isIdChar(ch)) return { kind: OTHER, end: i + 1 };
      let end = i + 1;
      while (end < sql.length && isIdChar(sql[end] ?? "")) end++;
      const word = sql.slice(i, end).toLowerCase();
      return { kind: KEYWORDS[word] ?? OTHER, end };
    }
  }
}

/**
 * True when `sql` ends with a complete statement: a semicolon that is not
 * inside a literal, a comment or a trigger body.
 */
export function isComplete(sql: string): boolean {
  let state = INVALID;
  let i = 0;
  while (i < sql.length) {
    const token = scanToken(sql, i);
    if (!token) return false;
    state = transition(state, token.kind);
    i = token.end;
  }
  return state === START;
}

export interface SplitStatement {
  statement: string;
  tail: string;
}

/**
 * Split off the first statement of `sql`, including its terminating
 * semicolon. Statements holding only whitespace and comments are skipped;
 * `null` means nothing executable is left.
 */
export function nextStatement(sql: string): SplitStatement | null {
  let state = INVALID;
  let start = 0;
  let hasContent = false;
  let i = 0;

  while (i < sql.length) {
    const token = scanToken(sql, i);
    if (!token) break;
    const next = transition(state, token.kind);
    if (token.kind === SEMI && next === START) {
      if (hasContent) {
        return {
          statement: sql.slice(start, token.end).trimStart(),
          tail: sql.slice(token.end),
        };
      }
      start = token.end;
    } else if (token.kind !== WS) {
      hasContent = true;
    }
    state = next;
    i = token.end;
  }

  // Unterminated literal, or a final statement without a semicolon.
  if (i < sql.length) hasContent = true;
  if (!hasContent) return null;
  return { statement: sql.slice(start).trimStart(), tail: "" };
}
