/**
 * Usage totals per hour or per day for a trend chart.
 * - Granularity follows the data: hourly when readings are less than a day
 *   apart, daily otherwise.
 * - Labels are wall-clock in the billing zone, so they sort as text.
 */
import { DateTime } from "luxon";
import { billingConfig } from "@/lib/config/billing";
import { toDateTime } from "@/lib/tariff/coerce";
import { type DurationBound, filterByDuration } from "@/lib/tariff/filterByDuration";
import type { UsageSeries } from "@/lib/tariff/types";

export type TrendGranularity = "hour" | "day";

export type TrendPoint = { label: string; kwh: number };

export type UsageTrendResult =
  | { ok: true; granularity: TrendGranularity; points: TrendPoint[] }
  | { ok: false; reason: "NO_DATA" | "NO_DATA_IN_RANGE" };

const DAY_MS = 24 * 3600_000;

function pickGranularity(times: DateTime[]): TrendGranularity {
  const ms = Array.from(new Set(times.map((t) => t.toMillis()))).sort((a, b) => a - b);
  let minGap = Infinity;
  for (let i = 1; i < ms.length; i++) {
    const prev = ms[i - 1];
    const cur = ms[i];
    if (prev !== undefined && cur !== undefined) minGap = Math.min(minGap, cur - prev);
  }
  return minGap < DAY_MS ? "hour" : "day";
}

export function buildUsageTrend(
  series: UsageSeries,
  range?: { start?: DurationBound; end?: DurationBound; zone?: string },
): UsageTrendResult {
  if (series.length === 0) return { ok: false, reason: "NO_DATA" };

  const zone = range?.zone ?? billingConfig.timezone;
  const inRange = filterByDuration(series, range?.start, range?.end, { zone });

  const readings: Array<{ at: DateTime; kwh: number }> = [];
  for (const r of inRange) {
    const at = toDateTime(r.timestamp, zone);
    if (at) readings.push({ at, kwh: r.kwh });
  }
  if (readings.length === 0) return { ok: false, reason: "NO_DATA_IN_RANGE" };

  const granularity = pickGranularity(readings.map((r) => r.at));
  const fmt = granularity === "hour" ? "yyyy-MM-dd HH:00" : "yyyy-MM-dd";

  const byLabel = new Map<string, number>();
  for (const { at, kwh } of readings) {
    const label = at.toFormat(fmt);
    byLabel.set(label, (byLabel.get(label) ?? 0) + kwh);
  }

  const points = Array.from(byLabel, ([label, kwh]) => ({ label, kwh })).sort((a, b) =>
    a.label.localeCompare(b.label),
  );
  return { ok: true, granularity, points };
}
