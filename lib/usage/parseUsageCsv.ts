// lib/usage/parseUsageCsv.ts
// Reads an uploaded usage CSV into a UsageSeries the tariff engine accepts.
// Rows with a timestamp that does not parse, or a kWh that is not a number,
// are dropped here so nothing unparsed reaches the engine.

import * as Papa from "papaparse";
import { billingConfig } from "@/lib/config/billing";
import { parseDate, safeFloat } from "@/lib/tariff/coerce";
import type { UsageRecord } from "@/lib/tariff/types";

const CANON_COLUMNS = ["timestamp", "kwh"] as const;
type CanonColumn = (typeof CANON_COLUMNS)[number];

const COLUMN_ALIASES: Record<CanonColumn, string[]> = {
  timestamp: ["timestamp", "datetime", "date time", "time", "date"],
  kwh: ["kwh", "usage (kwh)", "usage", "consumption kwh"],
};

export type ParseUsageCsvResult =
  | { ok: true; series: UsageRecord[]; droppedRows: number }
  | { ok: false; reason: "MISSING_COLUMNS"; missing: CanonColumn[] };

function mapHeaders(headers: readonly string[]): Partial<Record<CanonColumn, string>> {
  const out: Partial<Record<CanonColumn, string>> = {};
  const lower = headers.map((h) => h.trim().toLowerCase());
  for (const canon of CANON_COLUMNS) {
    for (const alias of COLUMN_ALIASES[canon]) {
      const j = lower.indexOf(alias);
      const header = headers[j];
      if (j >= 0 && header !== undefined) {
        out[canon] = header;
        break;
      }
    }
  }
  return out;
}

export function parseUsageCsv(csvText: string, opts?: { zone?: string }): ParseUsageCsvResult {
  const zone = opts?.zone ?? billingConfig.timezone;
  if (!csvText.trim()) return { ok: true, series: [], droppedRows: 0 };

  const { data, errors, meta } = Papa.parse<Record<string, string | undefined>>(csvText, {
    header: true,
    skipEmptyLines: true,
  });
  if (errors.length) {
    console.warn("[usage-csv] parse warnings (best-effort mapping continues)", errors.slice(0, 3));
  }

  const cols = mapHeaders(meta.fields ?? []);
  const missing = CANON_COLUMNS.filter((c) => !cols[c]);
  const tsCol = cols.timestamp;
  const kwhCol = cols.kwh;
  if (!tsCol || !kwhCol) return { ok: false, reason: "MISSING_COLUMNS", missing };

  const series: UsageRecord[] = [];
  let droppedRows = 0;
  for (const row of data) {
    const timestamp = parseDate(row[tsCol], { zone });
    const kwh = safeFloat(row[kwhCol], null);
    if (!timestamp || kwh == null) {
      droppedRows++;
      continue;
    }
    series.push({ timestamp, kwh });
  }

  if (droppedRows > 0) {
    console.warn("[usage-csv] dropped rows with unparseable timestamp or kWh", { droppedRows, kept: series.length });
  }
  return { ok: true, series, droppedRows };
}
