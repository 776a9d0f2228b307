import { DateTime } from "luxon";
import { billingConfig } from "@/lib/config/billing";

const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_RE = /^[+-]?\d+$/;

// Tried in order after ISO/SQL/RFC2822/HTTP.
const LOOSE_FORMATS = [
  "M/d/yyyy H:mm:ss",
  "M/d/yyyy H:mm",
  "M/d/yyyy h:mm a",
  "M/d/yyyy",
  "d MMM yyyy",
  "d MMM yyyy H:mm",
  "MMM d, yyyy",
  "MMM d, yyyy H:mm",
];

/**
 * Parses a decimal number, falling back to `def` for null, blank or garbage
 * input. Never throws. `def` may be null to mean "not specified".
 */
export function safeFloat(value: unknown): number;
export function safeFloat<D extends number | null>(value: unknown, def: D): number | D;
export function safeFloat(value: unknown, def: number | null = 0): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : def;
  if (typeof value !== "string") return def;
  const s = value.trim();
  if (!DECIMAL_RE.test(s)) return def;
  const n = Number(s);
  return Number.isFinite(n) ? n : def;
}

/**
 * Integer counterpart of `safeFloat`: "12.3" and 7.5 are rejected rather than
 * truncated.
 */
export function safeInt(value: unknown): number;
export function safeInt<D extends number | null>(value: unknown, def: D): number | D;
export function safeInt(value: unknown, def: number | null = 0): number | null {
  if (typeof value === "number") return Number.isInteger(value) ? value : def;
  if (typeof value !== "string") return def;
  const s = value.trim();
  if (!INTEGER_RE.test(s)) return def;
  const n = Number.parseInt(s, 10);
  return Number.isSafeInteger(n) ? n : def;
}

function parseDateTime(text: string, zone: string): DateTime | null {
  const s = text.trim();
  if (!s) return null;

  const isoish = s.includes("T") ? s : s.replace(" ", "T");
  const candidates = [
    () => DateTime.fromISO(isoish, { zone }),
    () => DateTime.fromSQL(s, { zone }),
    () => DateTime.fromRFC2822(s, { zone }),
    () => DateTime.fromHTTP(s, { zone }),
    ...LOOSE_FORMATS.map((fmt) => () => DateTime.fromFormat(s, fmt, { zone })),
  ];
  for (const attempt of candidates) {
    const dt = attempt();
    if (dt.isValid) return dt;
  }
  return null;
}

/**
 * Free-form date/time text to a Date. Naive text is wall-clock time in
 * `zone`. Returns null for blank or unparseable input.
 */
export function parseDate(text: string | null | undefined, opts?: { zone?: string }): Date | null {
  if (text == null) return null;
  const dt = parseDateTime(String(text), opts?.zone ?? billingConfig.timezone);
  return dt ? dt.toJSDate() : null;
}

/** Coerces a reading's timestamp into a zoned DateTime, or null. */
export function toDateTime(value: Date | string, zone: string): DateTime | null {
  if (value instanceof Date) {
    const dt = DateTime.fromJSDate(value, { zone });
    return dt.isValid ? dt : null;
  }
  return parseDateTime(value, zone);
}
