import { billingConfig } from "@/lib/config/billing";
import { makeBillResult } from "./billResult";
import { toDateTime } from "./coerce";
import { dateTimeMsOfDay, inDailyWindow } from "./timeOfDay";
import type { BillResult, EngineOptions, TouBand, UsageSeries } from "./types";

/**
 * Index of the band a time of day falls in: the first range band in
 * declaration order whose window holds it, else the last default band.
 * -1 when nothing matches and no default band is declared.
 */
export function classifyBand(bands: readonly TouBand[], msOfDay: number): number {
  let fallback = -1;
  for (let i = 0; i < bands.length; i++) {
    const b = bands[i];
    if (!b) continue;
    if (b.kind === "default") {
      fallback = i;
      continue;
    }
    if (inDailyWindow(msOfDay, b.start, b.end)) return i;
  }
  return fallback;
}

/**
 * Time-of-use bill. Each reading is priced at the rate of its band; bands that
 * received no reading are left out of the breakdown. Readings whose timestamp
 * does not parse are not billed and not counted.
 */
export function touTariff(
  series: UsageSeries,
  bands: readonly TouBand[],
  fixedFee: number,
  opts?: EngineOptions,
): BillResult {
  const zone = opts?.zone ?? billingConfig.timezone;
  const costByBand = new Map<number, number>();
  let totalKWh = 0;
  let unmatchedKwh = 0;
  let skipped = 0;

  for (const r of series) {
    const dt = toDateTime(r.timestamp, zone);
    if (!dt) {
      skipped++;
      continue;
    }
    totalKWh += r.kwh;

    const idx = classifyBand(bands, dateTimeMsOfDay(dt));
    const band = bands[idx];
    if (!band) {
      unmatchedKwh += r.kwh;
      continue;
    }
    costByBand.set(idx, (costByBand.get(idx) ?? 0) + r.kwh * band.rate);
  }

  if (unmatchedKwh !== 0) {
    console.warn("[tou] readings outside every band and no default band declared; not billed", {
      kwh: unmatchedKwh,
    });
  }
  if (skipped > 0 && billingConfig.verbose) {
    console.log("[tou] skipped readings with unparseable timestamps", { count: skipped });
  }

  const charges: Array<[string, number]> = [];
  bands.forEach((b, i) => {
    const cost = costByBand.get(i);
    if (cost !== undefined) charges.push([b.name, cost]);
  });

  return makeBillResult("TOU", totalKWh, charges, fixedFee);
}
