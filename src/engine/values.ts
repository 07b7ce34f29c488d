import { EngineError } from "../core/errors.ts";
import type { SqlValue, StorageClass } from "./types.ts";

export function storageClass(value: SqlValue): StorageClass {
  if (value === null) return "null";
  if (typeof value === "bigint") return "integer";
  if (typeof value === "number") return "real";
  if (typeof value === "string") return "text";
  return "blob";
}

/**
 * Text of a REAL the way SQLite prints it: fifteen significant digits,
 * trailing zeros dropped but at least one fractional digit kept, and a
 * two-digit exponent outside 1e-4..1e15 (`3.0`, `0.1`, `1.0e+20`).
 */
export function formatReal(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (!Number.isFinite(value)) return value > 0 ? "Inf" : "-Inf";
  if (value === 0) return "0.0";

  const exponent = Math.floor(Math.log10(Math.abs(value)));
  const exponential = exponent < -4 || exponent >= 15;
  const text = exponential ? value.toExponential(14) : value.toPrecision(15);
  const [digits = "", power] = text.split("e");

  let mantissa = digits.includes(".") ? digits.replace(/0+$/, "") : digits;
  if (mantissa.endsWith(".")) mantissa += "0";
  if (!mantissa.includes(".")) mantissa += ".0";
  if (power === undefined) return mantissa;

  const sign = power.startsWith("-") ? "-" : "+";
  return `${mantissa}e${sign}${power.replace(/^[+-]/, "").padStart(2, "0")}`;
}

/** Text form of a value, `null` for SQL NULL. Blobs decode as UTF-8. */
export function valueText(value: SqlValue): string | null {
  if (value === null) return null;
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number") return formatReal(value);
  if (typeof value === "string") return value;
  return Buffer.from(value).toString("utf-8");
}

/** Normalise a raw driver value. Drivers hand blobs over as Buffer or ArrayBuffer. */
export function toSqlValue(raw: unknown): SqlValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "bigint" || typeof raw === "number" || typeof raw === "string") {
    return raw;
  }
  if (raw instanceof Uint8Array) return raw;
  if (raw instanceof ArrayBuffer) return new Uint8Array(raw);
  throw new EngineError(`unsupported value type: ${typeof raw}`, "SQLITE_MISMATCH");
}
