export type UsageRecord = {
  /** Date, or date/time text that `parseDate` understands */
  timestamp: Date | string;
  /** kWh in this reading */
  kwh: number;
};

export type UsageSeries = readonly UsageRecord[];

export type TimeOfDay = {
  hour: number; // 0-23
  minute: number; // 0-59
  second: number; // 0-59
};

export type RangeBand = {
  kind: "range";
  name: string;
  /** Inclusive. When start > end the band wraps midnight. */
  start: TimeOfDay;
  end: TimeOfDay;
  rate: number;
};

export type DefaultBand = {
  kind: "default";
  name: string;
  rate: number;
};

export type TouBand = RangeBand | DefaultBand;

export type TariffScheme = "Flat" | "TOU" | "Tiered";

export type FlatTariffConfig = {
  scheme: "Flat";
  flatRate: number;
  fixedFee: number;
};

export type TouTariffConfig = {
  scheme: "TOU";
  /** Evaluated in declaration order; first matching range band wins. */
  bands: TouBand[];
  fixedFee: number;
};

export type TieredTariffConfig = {
  scheme: "Tiered";
  /** Cumulative upper bound per tier; null = unbounded. */
  tierLimits: Array<number | null>;
  /** One rate per tier, plus an optional trailing overflow rate. */
  tierRates: number[];
  fixedFee: number;
};

export type TariffConfig = FlatTariffConfig | TouTariffConfig | TieredTariffConfig;

export const FIXED_FEE_LABEL = "Fixed Fee";

export type BillResult = Readonly<{
  scheme: TariffScheme;
  totalKWh: number;
  /** Energy cost per band/tier plus "Fixed Fee"; sums to totalBill. */
  breakdown: Readonly<Record<string, number>>;
  totalBill: number;
}>;

export type EngineOptions = {
  /** IANA zone for naive timestamps and time-of-day; defaults to BILLING_TIMEZONE. */
  zone?: string;
};
