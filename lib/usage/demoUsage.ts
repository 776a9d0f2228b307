import demoRows from "./demoUsage.json";
import { parseDate } from "@/lib/tariff/coerce";
import type { UsageRecord } from "@/lib/tariff/types";

/** Nine readings across one day, for trying the comparison without a file. */
export function loadDemoUsage(opts?: { zone?: string }): UsageRecord[] {
  const out: UsageRecord[] = [];
  for (const row of demoRows) {
    const timestamp = parseDate(row.timestamp, opts);
    if (!timestamp) throw new Error(`demoUsage.json has an unparseable timestamp: ${row.timestamp}`);
    out.push({ timestamp, kwh: row.kwh });
  }
  return out;
}
