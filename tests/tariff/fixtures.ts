import { parseDate } from "@/lib/tariff/coerce";
import type { UsageRecord } from "@/lib/tariff/types";

export const ZONE = "UTC";

/** Reading at naive wall-clock text in ZONE. */
export function reading(text: string, kwh: number): UsageRecord {
  const timestamp = parseDate(text, { zone: ZONE });
  if (!timestamp) throw new Error(`bad fixture timestamp: ${text}`);
  return { timestamp, kwh };
}

export function smallSeries(): UsageRecord[] {
  return [
    reading("2025-01-01 00:00:00", 1.0),
    reading("2025-01-01 06:00:00", 2.0),
    reading("2025-01-01 18:30:00", 3.0),
    reading("2025-01-02 20:00:00", 4.0),
  ];
}

export function sumBreakdown(breakdown: Readonly<Record<string, number>>): number {
  let total = 0;
  for (const v of Object.values(breakdown)) total += v;
  return total;
}
