import { afterEach, describe, it, expect, vi } from "vitest";

import { timeOfDay } from "@/lib/tariff/timeOfDay";
import { classifyBand, touTariff } from "@/lib/tariff/tou";
import type { TouBand, UsageRecord } from "@/lib/tariff/types";
import { ZONE, reading, smallSeries, sumBreakdown } from "./fixtures";

const opts = { zone: ZONE };

const basicBands: TouBand[] = [
  { kind: "range", name: "Peak", start: timeOfDay(18), end: timeOfDay(23), rate: 0.5 },
  { kind: "range", name: "Off-Peak", start: timeOfDay(0), end: timeOfDay(7), rate: 0.1 },
  { kind: "default", name: "Shoulder", rate: 0.2 },
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe("touTariff", () => {
  it("prices each reading at the rate of its band", () => {
    const res = touTariff(smallSeries(), basicBands, 2.0, opts);
    expect(res.scheme).toBe("TOU");
    expect(res.totalKWh).toBeCloseTo(10.0, 9);
    expect(res.breakdown["Off-Peak"]).toBeCloseTo(0.3, 9);
    expect(res.breakdown["Peak"]).toBeCloseTo(3.5, 9);
    expect(res.breakdown["Fixed Fee"]).toBe(2.0);
    expect(res.totalBill).toBeCloseTo(5.8, 9);
  });

  it("keeps a band named like the fixed fee apart from the fee", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const bands: TouBand[] = [{ kind: "default", name: "Fixed Fee", rate: 1 }];
    const res = touTariff([reading("2025-01-01 12:00", 10)], bands, 2, opts);
    expect(Object.keys(res.breakdown)).toEqual(["Fixed Fee (energy)", "Fixed Fee"]);
    expect(res.breakdown).toEqual({ "Fixed Fee (energy)": 10, "Fixed Fee": 2 });
    expect(res.totalBill).toBe(12);
    expect(warn).toHaveBeenCalledWith("[bill] charge label collides with the fixed fee; renamed", {
      scheme: "TOU",
      label: "Fixed Fee (energy)",
    });
  });

  it("omits bands without usage and keeps declaration order", () => {
    const res = touTariff(smallSeries(), basicBands, 2.0, opts);
    expect(Object.keys(res.breakdown)).toEqual(["Peak", "Off-Peak", "Fixed Fee"]);
    expect(res.totalBill).toBe(sumBreakdown(res.breakdown));
  });

  it("matches a wrap-around band on both sides of midnight", () => {
    const series = [reading("2025-01-01 23:30", 1.0), reading("2025-01-02 01:00", 2.0), reading("2025-01-02 12:00", 3.0)];
    const bands: TouBand[] = [
      { kind: "range", name: "Off-Peak", start: timeOfDay(22), end: timeOfDay(7), rate: 0.1 },
      { kind: "range", name: "Peak", start: timeOfDay(7), end: timeOfDay(19), rate: 0.4 },
      { kind: "default", name: "Shoulder", rate: 0.25 },
    ];
    const res = touTariff(series, bands, 1.0, opts);
    expect(res.breakdown["Off-Peak"]).toBeCloseTo(0.3, 9);
    expect(res.breakdown["Peak"]).toBeCloseTo(1.2, 9);
    expect(res.breakdown["Fixed Fee"]).toBe(1.0);
    expect(res.totalBill).toBeCloseTo(2.5, 9);
  });

  it("coerces timestamp text before taking the time of day", () => {
    const series: UsageRecord[] = [
      { timestamp: "2025-01-01 18:00:00", kwh: 1.0 },
      { timestamp: "2025-01-01 02:00:00", kwh: 2.0 },
    ];
    const bands: TouBand[] = [
      { kind: "range", name: "Peak", start: timeOfDay(17), end: timeOfDay(19), rate: 1.0 },
      { kind: "default", name: "Shoulder", rate: 0.1 },
    ];
    const res = touTariff(series, bands, 0.0, opts);
    expect(res.breakdown["Peak"]).toBeCloseTo(1.0, 9);
    expect(res.breakdown["Shoulder"]).toBeCloseTo(0.2, 9);
  });

  it("leaves readings with unparseable timestamps out of the bill", () => {
    const series: UsageRecord[] = [...smallSeries(), { timestamp: "not a time", kwh: 50 }];
    const res = touTariff(series, basicBands, 2.0, opts);
    expect(res.totalKWh).toBeCloseTo(10.0, 9);
    expect(res.totalBill).toBeCloseTo(5.8, 9);
  });

  it("resolves overlapping bands by declaration order", () => {
    const bands: TouBand[] = [
      { kind: "range", name: "Morning", start: timeOfDay(6), end: timeOfDay(12), rate: 1 },
      { kind: "range", name: "Midday", start: timeOfDay(10), end: timeOfDay(14), rate: 2 },
    ];
    const res = touTariff([reading("2025-01-01 11:00", 1)], bands, 0, opts);
    expect(res.breakdown).toEqual({ Morning: 1, "Fixed Fee": 0 });
  });

  it("uses the last default band when several are declared", () => {
    const bands: TouBand[] = [
      { kind: "default", name: "First", rate: 1 },
      { kind: "default", name: "Second", rate: 2 },
    ];
    const res = touTariff([reading("2025-01-01 12:00", 1)], bands, 0, opts);
    expect(res.breakdown).toEqual({ Second: 2, "Fixed Fee": 0 });
  });

  it("treats band ends as inclusive to the exact time", () => {
    const series = [reading("2025-01-01 23:00:00", 1), reading("2025-01-01 23:00:30", 1)];
    const res = touTariff(series, basicBands, 0, opts);
    expect(res.breakdown["Peak"]).toBeCloseTo(0.5, 9);
    expect(res.breakdown["Shoulder"]).toBeCloseTo(0.2, 9);
  });

  it("does not bill readings outside every band when there is no default", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const bands: TouBand[] = [{ kind: "range", name: "Peak", start: timeOfDay(18), end: timeOfDay(23), rate: 0.5 }];
    const res = touTariff(smallSeries(), bands, 1, opts);
    expect(res.totalKWh).toBeCloseTo(10.0, 9);
    expect(res.breakdown).toEqual({ Peak: 3.5, "Fixed Fee": 1 });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("takes the time of day in the requested zone", () => {
    const series = [{ timestamp: new Date("2025-01-15T23:30:00Z"), kwh: 2 }];
    const bands: TouBand[] = [
      { kind: "range", name: "Peak", start: timeOfDay(17), end: timeOfDay(21), rate: 0.4 },
      { kind: "default", name: "Shoulder", rate: 0.25 },
    ];
    const res = touTariff(series, bands, 0, { zone: "America/Chicago" });
    expect(res.breakdown["Peak"]).toBeCloseTo(0.8, 9);
    expect(res.breakdown["Shoulder"]).toBeUndefined();
  });

  it("returns only the fixed fee for an empty series", () => {
    const res = touTariff([], basicBands, 4.5, opts);
    expect(res.totalKWh).toBe(0);
    expect(res.breakdown).toEqual({ "Fixed Fee": 4.5 });
    expect(res.totalBill).toBe(4.5);
  });
});

describe("classifyBand", () => {
  it("returns the matching index, the default index, or -1", () => {
    const h = (hour: number) => hour * 3600_000;
    expect(classifyBand(basicBands, h(19))).toBe(0);
    expect(classifyBand(basicBands, h(3))).toBe(1);
    expect(classifyBand(basicBands, h(12))).toBe(2);
    expect(classifyBand(basicBands.slice(0, 2), h(12))).toBe(-1);
  });
});
