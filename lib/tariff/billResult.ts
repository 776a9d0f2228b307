import { billingConfig } from "@/lib/config/billing";
import { toDateTime } from "./coerce";
import { type BillResult, FIXED_FEE_LABEL, type TariffScheme, type UsageRecord } from "./types";

/**
 * Builds the frozen result shared by all three schemes. `charges` keeps its
 * insertion order; "Fixed Fee" is always appended last and totalBill is summed
 * from the finished breakdown. A charge labelled "Fixed Fee" is kept as
 * "Fixed Fee (energy)" so the fee cannot overwrite it.
 */
export function makeBillResult(
  scheme: TariffScheme,
  totalKWh: number,
  charges: Array<[label: string, amount: number]>,
  fixedFee: number,
): BillResult {
  const breakdown: Record<string, number> = {};
  for (const [raw, amount] of charges) {
    let label = raw;
    if (label === FIXED_FEE_LABEL) {
      label = `${FIXED_FEE_LABEL} (energy)`;
      console.warn("[bill] charge label collides with the fixed fee; renamed", { scheme, label });
    }
    breakdown[label] = (breakdown[label] ?? 0) + amount;
  }
  breakdown[FIXED_FEE_LABEL] = fixedFee;

  let totalBill = 0;
  for (const v of Object.values(breakdown)) totalBill += v;

  return Object.freeze({
    scheme,
    totalKWh,
    breakdown: Object.freeze(breakdown),
    totalBill,
  });
}

export function sumKwh(series: ReadonlyArray<{ kwh: number }>): number {
  let total = 0;
  for (const r of series) total += r.kwh;
  return total;
}

/** Readings whose timestamp parses in `zone`; the rest are never billed. */
export function billableReadings<R extends UsageRecord>(
  series: readonly R[],
  zone: string = billingConfig.timezone,
): R[] {
  const kept = series.filter((r) => toDateTime(r.timestamp, zone) != null);
  if (kept.length < series.length && billingConfig.verbose) {
    console.log("[bill] skipped readings with unparseable timestamps", { count: series.length - kept.length });
  }
  return kept;
}
