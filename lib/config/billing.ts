/**
 * Environment-driven defaults for the bill comparison engine.
 *
 * Read once at import time (`billingConfig`); tests and scripts that need a
 * different environment call `readBillingConfig(env)` directly.
 */

export type Env = Record<string, string | undefined>;

export type BillingConfig = {
  /** IANA zone used to read naive timestamps and to take time of day. */
  timezone: string;
  verbose: boolean;
  flat: { rate: number; fee: number };
  tou: {
    peakStart: string;
    peakEnd: string;
    offPeakStart: string;
    offPeakEnd: string;
    peakRate: number;
    offPeakRate: number;
    shoulderRate: number;
    fee: number;
  };
  tiered: { limits: Array<number | null>; rates: number[]; fee: number };
};

export function flagBoolSync(value: string | undefined, defaultVal = false): boolean {
  if (value == null) return defaultVal;
  const v = value.trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function envNum(value: string | undefined, def: number): number {
  const s = String(value ?? "").trim();
  if (!s) return def;
  const n = Number(s);
  return Number.isFinite(n) ? n : def;
}

function envList(value: string | undefined, def: string): string[] {
  return String(value ?? def).split(",").map((s) => s.trim());
}

export function readBillingConfig(env: Env = process.env): BillingConfig {
  const limits = envList(env.BILLING_TIER_LIMITS, "500,1000,").map((s) => {
    if (!s) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  });
  const rates = envList(env.BILLING_TIER_RATES, "0.15,0.2,0.3")
    .filter((s) => s.length > 0)
    .map((s) => envNum(s, 0));

  return {
    timezone: env.BILLING_TIMEZONE?.trim() || "UTC",
    verbose: flagBoolSync(env.BILLING_VERBOSE, false),
    flat: {
      rate: envNum(env.BILLING_FLAT_RATE, 0.25),
      fee: envNum(env.BILLING_FLAT_FEE, 10),
    },
    tou: {
      peakStart: "17:00",
      peakEnd: "21:00",
      offPeakStart: "22:00",
      offPeakEnd: "07:00",
      peakRate: envNum(env.BILLING_TOU_PEAK_RATE, 0.4),
      offPeakRate: envNum(env.BILLING_TOU_OFFPEAK_RATE, 0.15),
      shoulderRate: envNum(env.BILLING_TOU_SHOULDER_RATE, 0.25),
      fee: envNum(env.BILLING_TOU_FEE, 10),
    },
    tiered: {
      limits,
      rates,
      fee: envNum(env.BILLING_TIER_FEE, 10),
    },
  };
}

export const billingConfig: BillingConfig = readBillingConfig();
