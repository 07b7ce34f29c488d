import chalk from "chalk";
import Table from "cli-table3";

/**
 * Quote a value for CSV output when it holds the separator, a quote
 * character (`"` or `'`), a control character or any non-ASCII character.
 * Embedded double quotes are doubled.
 */
export function csvEscape(value: string, separator = ","): string {
  if (!csvNeedsQuote(value, separator)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

function csvNeedsQuote(value: string, separator: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const c = value.charCodeAt(i);
    if (c < 0x20 || c === 0x22 || c === 0x27 || c >= 0x7f) return true;
    if (separator.length > 0 && value.startsWith(separator, i)) return true;
  }
  return false;
}

const HTML_ENTITIES: Record<string, string> = {
  "<": "&lt;",
  "&": "&amp;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function htmlEscape(value: string): string {
  return value.replace(/[<&>"']/g, (ch) => HTML_ENTITIES[ch] ?? ch);
}

/**
 * Double-quoted C string literal. Backslash, quote, tab, newline and carriage
 * return get their escapes; other bytes outside printable ASCII are written
 * as three-digit octal escapes of their UTF-8 encoding.
 */
export function cString(value: string): string {
  let out = '"';
  for (const byte of Buffer.from(value, "utf-8")) {
    if (byte === 0x5c) out += "\\\\";
    else if (byte === 0x22) out += '\\"';
    else if (byte === 0x09) out += "\\t";
    else if (byte === 0x0a) out += "\\n";
    else if (byte === 0x0d) out += "\\r";
    else if (byte < 0x20 || byte >= 0x7f) out += "\\" + byte.toString(8).padStart(3, "0");
    else out += String.fromCharCode(byte);
  }
  return out + '"';
}

/** SQL string literal with embedded single quotes doubled. */
export function sqlQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** SQL identifier in double quotes with embedded double quotes doubled. */
export function sqlIdent(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function hexBlob(bytes: Uint8Array): string {
  return `X'${Buffer.from(bytes).toString("hex")}'`;
}

/** Optional sign, digits, optional fraction, optional exponent. */
export function isNumber(text: string): boolean {
  return /^[+-]?\d+(\.\d+)?([eE][+-]?\d+)?$/.test(text);
}

/**
 * Table name as written after `INSERT INTO` in insert mode: verbatim when it
 * is a plain identifier, otherwise single-quoted.
 */
export function quoteTableName(name: string): string {
  if (/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) return name;
  return sqlQuote(name);
}

/** Borderless aligned columns with bold headers. */
export function formatTable(headers: string[], rows: string[][]): string {
  // cli-table3 applies its own ANSI colors to headers and borders.
  // Disable those when NO_COLOR is set (chalk already handles itself).
  const noColorStyle = chalk.level === 0 ? { head: [], border: [] } : {};

  const table = new Table({
    head: headers.map((h) => chalk.bold(h)),
    chars: {
      top: "",
      "top-mid": "",
      "top-left": "",
      "top-right": "",
      bottom: "",
      "bottom-mid": "",
      "bottom-left": "",
      "bottom-right": "",
      left: "",
      "left-mid": "",
      mid: "",
      "mid-mid": "",
      right: "",
      "right-mid": "",
      middle: "  ",
    },
    style: { "padding-left": 1, "padding-right": 0, ...noColorStyle },
  });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}
