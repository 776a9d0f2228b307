import type { DateTime } from "luxon";
import type { TimeOfDay } from "./types";

const HHMM_RE = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

export function timeOfDay(hour: number, minute = 0, second = 0): TimeOfDay {
  return { hour, minute, second };
}

export function isValidTimeOfDay(t: TimeOfDay): boolean {
  return (
    Number.isInteger(t.hour) && t.hour >= 0 && t.hour <= 23 &&
    Number.isInteger(t.minute) && t.minute >= 0 && t.minute <= 59 &&
    Number.isInteger(t.second) && t.second >= 0 && t.second <= 59
  );
}

export function isTimeOfDay(v: unknown): v is TimeOfDay {
  if (typeof v !== "object" || v === null) return false;
  return (
    "hour" in v && typeof v.hour === "number" &&
    "minute" in v && typeof v.minute === "number" &&
    "second" in v && typeof v.second === "number"
  );
}

/** True when the text has the shape of a bare clock time ("7:00", "22:00:30"). */
export function looksLikeClockTime(text: string): boolean {
  return HHMM_RE.test(text.trim());
}

/**
 * "H:mm", "HH:mm" or "HH:mm:ss" to a TimeOfDay; null when malformed or out of
 * range.
 */
export function parseTimeOfDay(text: string): TimeOfDay | null {
  const m = text.trim().match(HHMM_RE);
  if (!m?.[1] || !m?.[2]) return null;
  const t = timeOfDay(Number(m[1]), Number(m[2]), m[3] ? Number(m[3]) : 0);
  return isValidTimeOfDay(t) ? t : null;
}

export function msOfDay(t: TimeOfDay): number {
  return ((t.hour * 60 + t.minute) * 60 + t.second) * 1000;
}

export function dateTimeMsOfDay(dt: DateTime): number {
  return ((dt.hour * 60 + dt.minute) * 60 + dt.second) * 1000 + dt.millisecond;
}

/**
 * Inclusive window test on milliseconds since midnight. start > end wraps
 * midnight (22:00-07:00 holds 23:30 and 01:00).
 */
export function inDailyWindow(ms: number, start: TimeOfDay, end: TimeOfDay): boolean {
  const a = msOfDay(start);
  const b = msOfDay(end);
  if (a <= b) return ms >= a && ms <= b;
  return ms >= a || ms <= b;
}

export function formatTimeOfDay(t: TimeOfDay): string {
  const hh = String(t.hour).padStart(2, "0");
  const mm = String(t.minute).padStart(2, "0");
  return t.second ? `${hh}:${mm}:${String(t.second).padStart(2, "0")}` : `${hh}:${mm}`;
}
