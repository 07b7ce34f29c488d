import { logger } from "../core/logger.ts";

/** Most tokens read from one dot-command line. */
export const MAX_ARGS = 50;

const OCTAL = /[0-7]/;

/**
 * Expand `\n`, `\t`, `\r` and one-to-three digit octal escapes; any other
 * escaped character stands for itself. A trailing lone backslash is dropped.
 */
export function resolveBackslashes(text: string): string {
  let out = "";
  for (let i = 0; i < text.length; i++) {
    let ch = text[i] ?? "";
    if (ch === "\\") {
      ch = text[++i] ?? "";
      if (ch === "n") ch = "\n";
      else if (ch === "t") ch = "\t";
      else if (ch === "r") ch = "\r";
      else if (OCTAL.test(ch)) {
        let code = Number(ch);
        for (let n = 0; n < 2 && OCTAL.test(text[i + 1] ?? ""); n++) {
          code = code * 8 + Number(text[++i]);
        }
        ch = String.fromCharCode(code & 0xff);
      }
    }
    out += ch;
  }
  return out;
}

/**
 * Split a dot-command line (leading `.` included) into its tokens.
 * Single-quoted tokens are kept verbatim, double-quoted and bare tokens have
 * backslash escapes resolved; an unterminated quote runs to the end of line.
 */
export function tokenizeMetaLine(line: string): string[] {
  const args: string[] = [];
  let i = 1;
  while (i < line.length && args.length < MAX_ARGS) {
    while (i < line.length && /\s/.test(line[i] ?? "")) i++;
    if (i >= line.length) break;

    const delim = line[i];
    if (delim === "'" || delim === '"') {
      const start = ++i;
      while (i < line.length && line[i] !== delim) i++;
      const token = line.slice(start, i);
      if (i < line.length) i++;
      args.push(delim === '"' ? resolveBackslashes(token) : token);
    } else {
      const start = i;
      while (i < line.length && !/\s/.test(line[i] ?? "")) i++;
      args.push(resolveBackslashes(line.slice(start, i)));
    }
  }
  return args;
}

/**
 * Interpret a flag argument: a digit string is true when non-zero, `on` and
 * `yes` are true, `off` and `no` false. Anything else warns and is false.
 */
export function booleanValue(arg: string): boolean {
  if (/^\d+$/.test(arg)) return Number.parseInt(arg, 10) !== 0;
  const word = arg.toLowerCase();
  if (word === "on" || word === "yes") return true;
  if (word === "off" || word === "no") return false;
  logger.warn(`Not a boolean value: "${arg}". Assuming "no".`);
  return false;
}

/** Leading integer of `arg`, 0 when there is none. */
export function atoi(arg: string): number {
  const value = Number.parseInt(arg, 10);
  return Number.isNaN(value) ? 0 : value;
}

const SIZE_SUFFIXES: ReadonlyArray<[string, number]> = [
  ["KiB", 1024],
  ["MiB", 1024 * 1024],
  ["GiB", 1024 * 1024 * 1024],
  ["KB", 1000],
  ["MB", 1000 * 1000],
  ["GB", 1000 * 1000 * 1000],
  ["K", 1000],
  ["M", 1000 * 1000],
  ["G", 1000 * 1000 * 1000],
];

/**
 * Integer with an optional sign, decimal or `0x` hex digits, and an optional
 * size suffix (KiB, MiB, GiB, KB, MB, GB, K, M, G; any case).
 */
export function integerValue(arg: string): number {
  const match = /^([+-]?)(0x[0-9a-f]+|\d*)(.*)$/i.exec(arg);
  if (!match) return 0;
  const [, sign = "", digits = "", suffix = ""] = match;
  let value = digits === "" ? 0 : Number(digits);
  const unit = SIZE_SUFFIXES.find(([name]) => name.toLowerCase() === suffix.toLowerCase());
  if (unit) value *= unit[1];
  return sign === "-" ? -value : value;
}
