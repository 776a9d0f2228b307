import { billableReadings, makeBillResult, sumKwh } from "./billResult";
import type { BillResult, EngineOptions, UsageSeries } from "./types";

export function tierLabel(index: number): string {
  return `Tier ${index + 1}`;
}

/**
 * Progressive tiers over total usage.
 *
 * tierLimits are cumulative upper bounds; a null limit takes all remaining
 * usage and ends the walk. When every limit is finite and usage is left over,
 * a trailing extra rate (tierRates.length === tierLimits.length + 1) bills the
 * rest as one more tier. Mismatched inputs are billed best-effort. Readings
 * whose timestamp does not parse are left out of the total.
 */
export function tieredTariff(
  series: UsageSeries,
  tierLimits: ReadonlyArray<number | null>,
  tierRates: readonly number[],
  fixedFee: number,
  opts?: EngineOptions,
): BillResult {
  const totalKWh = sumKwh(billableReadings(series, opts?.zone));
  const charges: Array<[string, number]> = [];

  let remaining = totalKWh;
  let previousLimit = 0;
  let absorbed = false;

  for (let i = 0; i < tierLimits.length; i++) {
    if (remaining <= 0) break;

    let rate = tierRates[i];
    if (rate === undefined) {
      console.warn("[tiered] no rate for tier; billing it at 0", { tier: tierLabel(i) });
      rate = 0;
    }

    const limit = tierLimits[i];
    if (limit == null) {
      charges.push([tierLabel(i), remaining * rate]);
      remaining = 0;
      absorbed = true;
      break;
    }

    const tierWidth = Math.max(0, Math.min(remaining, limit - previousLimit));
    charges.push([tierLabel(i), tierWidth * rate]);
    remaining -= tierWidth;
    previousLimit = limit;
  }

  const extraRate = tierRates.length === tierLimits.length + 1 ? tierRates[tierLimits.length] : undefined;
  if (!absorbed && remaining > 0 && extraRate !== undefined) {
    charges.push([tierLabel(tierLimits.length), remaining * extraRate]);
  }

  return makeBillResult("Tiered", totalKWh, charges, fixedFee);
}
