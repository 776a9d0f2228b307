// Text fields from an input form → typed tariff configs.
// Blank or garbage numbers fall back to the configured defaults; only clock
// times are reported back, since a wrong window silently misprices a bill.

import { type BillingConfig, billingConfig } from "@/lib/config/billing";
import { safeFloat, safeInt } from "./coerce";
import { parseTimeOfDay, timeOfDay } from "./timeOfDay";
import type { FlatTariffConfig, TieredTariffConfig, TimeOfDay, TouTariffConfig } from "./types";

export type FormValue = string | number | null | undefined;

export type TouFormField = "peakStart" | "peakEnd" | "offPeakStart" | "offPeakEnd";

export type TouForm = Partial<Record<TouFormField | "peakRate" | "offPeakRate" | "shoulderRate" | "fee", FormValue>>;

export type TouFormResult =
  | { ok: true; config: TouTariffConfig }
  | { ok: false; reason: "INVALID_TIME"; field: TouFormField };

function isBlank(v: FormValue): boolean {
  return v == null || String(v).trim() === "";
}

/** A whole hour (17, "17") or "H:mm"; null when neither. */
export function hourFieldToTime(v: FormValue): TimeOfDay | null {
  if (v == null) return null;
  const hour = safeInt(v, null);
  if (hour != null) return hour >= 0 && hour <= 23 ? timeOfDay(hour) : null;
  return parseTimeOfDay(String(v));
}

export function flatConfigFromForm(
  form: { rate?: FormValue; fee?: FormValue },
  defaults: BillingConfig = billingConfig,
): FlatTariffConfig {
  return {
    scheme: "Flat",
    flatRate: safeFloat(form.rate, defaults.flat.rate),
    fixedFee: safeFloat(form.fee, defaults.flat.fee),
  };
}

export function touConfigFromForm(form: TouForm, defaults: BillingConfig = billingConfig): TouFormResult {
  const d = defaults.tou;
  const readTime = (raw: FormValue, fallback: string) => hourFieldToTime(isBlank(raw) ? fallback : raw);
  const invalid = (field: TouFormField): TouFormResult => ({ ok: false, reason: "INVALID_TIME", field });

  const peakStart = readTime(form.peakStart, d.peakStart);
  if (!peakStart) return invalid("peakStart");
  const peakEnd = readTime(form.peakEnd, d.peakEnd);
  if (!peakEnd) return invalid("peakEnd");
  const offPeakStart = readTime(form.offPeakStart, d.offPeakStart);
  if (!offPeakStart) return invalid("offPeakStart");
  const offPeakEnd = readTime(form.offPeakEnd, d.offPeakEnd);
  if (!offPeakEnd) return invalid("offPeakEnd");

  return {
    ok: true,
    config: {
      scheme: "TOU",
      bands: [
        { kind: "range", name: "Peak", start: peakStart, end: peakEnd, rate: safeFloat(form.peakRate, d.peakRate) },
        {
          kind: "range",
          name: "Off-Peak",
          start: offPeakStart,
          end: offPeakEnd,
          rate: safeFloat(form.offPeakRate, d.offPeakRate),
        },
        { kind: "default", name: "Shoulder", rate: safeFloat(form.shoulderRate, d.shoulderRate) },
      ],
      fixedFee: safeFloat(form.fee, d.fee),
    },
  };
}

export function tieredConfigFromForm(
  form: { limits: readonly FormValue[]; rates: readonly FormValue[]; fee?: FormValue },
  defaults: BillingConfig = billingConfig,
): TieredTariffConfig {
  const rates = [...form.rates];
  while (rates.length > 0 && isBlank(rates[rates.length - 1])) rates.pop();

  return {
    scheme: "Tiered",
    tierLimits: form.limits.map((l) => safeFloat(l, null)),
    tierRates: rates.map((r) => safeFloat(r, 0)),
    fixedFee: safeFloat(form.fee, defaults.tiered.fee),
  };
}

export function defaultTieredConfig(defaults: BillingConfig = billingConfig): TieredTariffConfig {
  return {
    scheme: "Tiered",
    tierLimits: [...defaults.tiered.limits],
    tierRates: [...defaults.tiered.rates],
    fixedFee: defaults.tiered.fee,
  };
}

/** Range inputs from a form: blank means "no bound". */
export function parseRangeBound(text: FormValue): string | null {
  if (isBlank(text)) return null;
  return String(text).trim();
}
