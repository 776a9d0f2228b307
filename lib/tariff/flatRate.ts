import { billableReadings, makeBillResult, sumKwh } from "./billResult";
import type { BillResult, EngineOptions, UsageSeries } from "./types";

/**
 * One "Energy" line at a single rate. Readings whose timestamp does not parse
 * are not billed; with no billable reading the breakdown is the fee alone.
 */
export function flatRateTariff(
  series: UsageSeries,
  flatRate: number,
  fixedFee: number,
  opts?: EngineOptions,
): BillResult {
  const readings = billableReadings(series, opts?.zone);
  const totalKWh = sumKwh(readings);
  const charges: Array<[string, number]> = readings.length > 0 ? [["Energy", totalKWh * flatRate]] : [];
  return makeBillResult("Flat", totalKWh, charges, fixedFee);
}
