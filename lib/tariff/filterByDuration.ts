import { DateTime } from "luxon";
import { billingConfig } from "@/lib/config/billing";
import { toDateTime } from "./coerce";
import {
  dateTimeMsOfDay,
  inDailyWindow,
  isTimeOfDay,
  isValidTimeOfDay,
  looksLikeClockTime,
  parseTimeOfDay,
} from "./timeOfDay";
import type { EngineOptions, TimeOfDay, UsageRecord } from "./types";

export type DurationBound = Date | string | TimeOfDay | null | undefined;

type Bound =
  | { kind: "open" }
  | { kind: "clock"; time: TimeOfDay }
  | { kind: "instant"; at: DateTime; dateOnly: boolean };

function describe(v: DurationBound, zone: string): string {
  const shown = typeof v === "string" ? JSON.stringify(v) : String(v);
  return `${shown} (zone ${zone})`;
}

function atMidnight(at: DateTime): boolean {
  return at.equals(at.startOf("day"));
}

function resolveBound(v: DurationBound, zone: string): Bound {
  if (v == null) return { kind: "open" };

  if (v instanceof Date) {
    const at = DateTime.fromJSDate(v, { zone });
    if (!at.isValid) throw new TypeError(`filterByDuration: ${describe(v, zone)} is not a usable date`);
    return { kind: "instant", at, dateOnly: false };
  }

  if (isTimeOfDay(v)) {
    if (!isValidTimeOfDay(v)) throw new TypeError("filterByDuration: time of day out of range");
    return { kind: "clock", time: v };
  }

  if (looksLikeClockTime(v)) {
    const time = parseTimeOfDay(v);
    if (!time) throw new TypeError(`filterByDuration: ${describe(v, zone)} is not a valid time of day`);
    return { kind: "clock", time };
  }

  const at = toDateTime(v, zone);
  if (!at) throw new TypeError(`filterByDuration: cannot interpret ${describe(v, zone)} as a date or time`);
  // Text with no clock part, such as "2025-01-01" or "1/5/2025".
  return { kind: "instant", at, dateOnly: !v.includes(":") && atMidnight(at) };
}

// A date-only end, or a pair of midnights, covers the whole of the end day.
function wholeDayEnd(lo: Bound, hi: { at: DateTime; dateOnly: boolean }): boolean {
  if (hi.dateOnly) return true;
  return lo.kind === "instant" && atMidnight(lo.at) && atMidnight(hi.at);
}

/**
 * Readings whose timestamp lies in [start, end], both inclusive.
 *
 * Two bare times select a daily window (wrapping midnight when start > end);
 * anything else is an absolute range where null leaves that side open. The
 * end reaches 23:59:59.999 of its day only for a date-only end bound or when
 * both bounds fall on midnight.
 * Throws TypeError for bounds that are neither, or for a mix of the two.
 */
export function filterByDuration<R extends UsageRecord>(
  series: readonly R[],
  start: DurationBound,
  end: DurationBound,
  opts?: EngineOptions,
): R[] {
  const zone = opts?.zone ?? billingConfig.timezone;
  const lo = resolveBound(start, zone);
  const hi = resolveBound(end, zone);

  if (lo.kind === "clock" || hi.kind === "clock") {
    if (lo.kind !== "clock" || hi.kind !== "clock") {
      throw new TypeError("filterByDuration: cannot mix a time of day with a date bound");
    }
    const { time: from } = lo;
    const { time: to } = hi;
    return series.filter((r) => {
      const dt = toDateTime(r.timestamp, zone);
      return dt != null && inDailyWindow(dateTimeMsOfDay(dt), from, to);
    });
  }

  const fromMs = lo.kind === "instant" ? lo.at.toMillis() : -Infinity;
  let toMs = Infinity;
  if (hi.kind === "instant") toMs = (wholeDayEnd(lo, hi) ? hi.at.endOf("day") : hi.at).toMillis();

  return series.filter((r) => {
    const dt = toDateTime(r.timestamp, zone);
    if (!dt) return false;
    const t = dt.toMillis();
    return t >= fromMs && t <= toMs;
  });
}
