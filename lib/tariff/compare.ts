import { flatRateTariff } from "./flatRate";
import { tieredTariff } from "./tiered";
import { touTariff } from "./tou";
import type { BillResult, EngineOptions, TariffConfig, TariffScheme, UsageSeries } from "./types";

export function computeBill(series: UsageSeries, config: TariffConfig, opts?: EngineOptions): BillResult {
  switch (config.scheme) {
    case "Flat":
      return flatRateTariff(series, config.flatRate, config.fixedFee, opts);
    case "TOU":
      return touTariff(series, config.bands, config.fixedFee, opts);
    case "Tiered":
      return tieredTariff(series, config.tierLimits, config.tierRates, config.fixedFee, opts);
  }
}

export type TariffComparison = {
  bills: BillResult[];
  cheapest: TariffScheme | null;
  /** Positive when the scheme would cost less than the current one. */
  savingsVsCurrent: Partial<Record<TariffScheme, number>>;
};

/**
 * Bills the same usage under each config. Bills keep the order of `configs`;
 * ties for cheapest go to the earlier config.
 */
export function compareTariffs(
  series: UsageSeries,
  configs: readonly TariffConfig[],
  opts?: EngineOptions & { current?: TariffScheme },
): TariffComparison {
  const bills = configs.map((c) => computeBill(series, c, opts));

  let cheapest: BillResult | null = null;
  for (const b of bills) {
    if (!cheapest || b.totalBill < cheapest.totalBill) cheapest = b;
  }

  const savingsVsCurrent: TariffComparison["savingsVsCurrent"] = {};
  const currentScheme = opts?.current;
  const current = currentScheme ? bills.find((b) => b.scheme === currentScheme) : undefined;
  if (current) {
    for (const b of bills) savingsVsCurrent[b.scheme] = current.totalBill - b.totalBill;
  }

  return { bills, cheapest: cheapest?.scheme ?? null, savingsVsCurrent };
}
