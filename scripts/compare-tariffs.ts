import * as dotenv from 'dotenv';
dotenv.config({ path: '.env.local', override: false });
dotenv.config({ path: '.env', override: false });

import { existsSync, readFileSync } from 'fs';
import { readBillingConfig } from '../lib/config/billing';
import { compareTariffs } from '../lib/tariff/compare';
import { filterByDuration } from '../lib/tariff/filterByDuration';
import { defaultTieredConfig, flatConfigFromForm, parseRangeBound, touConfigFromForm } from '../lib/tariff/formConfig';
import { formatTimeOfDay } from '../lib/tariff/timeOfDay';
import type { TariffConfig, TariffScheme, UsageRecord } from '../lib/tariff/types';
import { loadDemoUsage } from '../lib/usage/demoUsage';
import { parseUsageCsv } from '../lib/usage/parseUsageCsv';

function usage() {
  console.log(`
Usage:
  npx tsx scripts/compare-tariffs.ts --file /path/to/usage.csv [--start 2025-01-01] [--end 2025-01-31] [--current TOU]
  npx tsx scripts/compare-tariffs.ts --demo [--start 22:00 --end 07:00]

Bills the usage under the default flat, time-of-use and tiered tariffs (see BILLING_* in .env)
and prints each breakdown. --current names the scheme you pay today (Flat, TOU or Tiered).
 --start/--end take dates, date-times, or two clock times for a daily window.
`);
}

function getArg(flag: string): string | null {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] ?? null : null;
}

const SCHEMES: readonly TariffScheme[] = ['Flat', 'TOU', 'Tiered'];

function readCurrentScheme(): TariffScheme | undefined {
  const raw = getArg('--current');
  if (raw == null) return undefined;
  const scheme = SCHEMES.find((s) => s.toLowerCase() === raw.toLowerCase());
  if (!scheme) throw new Error(`Unknown --current scheme: ${raw}`);
  return scheme;
}

function loadSeries(zone: string): UsageRecord[] | null {
  if (process.argv.includes('--demo')) return loadDemoUsage({ zone });

  const filePath = getArg('--file');
  if (!filePath) return null;
  if (!existsSync(filePath)) throw new Error(`File not found: ${filePath}`);

  const parsed = parseUsageCsv(readFileSync(filePath, 'utf8'), { zone });
  if (!parsed.ok) throw new Error(`Missing required column(s): ${parsed.missing.join(', ')}`);
  console.log(`Loaded ${parsed.series.length} readings (${parsed.droppedRows} dropped) from ${filePath}`);
  return parsed.series;
}

function main() {
  const config = readBillingConfig();
  const zone = config.timezone;
  const series = loadSeries(zone);
  if (!series) {
    usage();
    process.exit(2);
  }

  const selected = filterByDuration(series, parseRangeBound(getArg('--start')), parseRangeBound(getArg('--end')), { zone });
  if (selected.length === 0) {
    console.warn('No readings in the selected range.');
    process.exit(1);
  }

  const tou = touConfigFromForm({}, config);
  if (!tou.ok) throw new Error(`Invalid default TOU window: ${tou.reason} (${tou.field})`);
  for (const band of tou.config.bands) {
    const window = band.kind === 'range' ? `${formatTimeOfDay(band.start)}-${formatTimeOfDay(band.end)}` : 'default';
    console.log(`TOU band ${band.name}: ${window} @ ${band.rate}/kWh`);
  }

  const configs: TariffConfig[] = [flatConfigFromForm({}, config), tou.config, defaultTieredConfig(config)];
  const current = readCurrentScheme();
  const { bills, cheapest, savingsVsCurrent } = compareTariffs(selected, configs, { zone, current });

  for (const bill of bills) {
    console.log(`\n${bill.scheme}: ${bill.totalKWh.toFixed(3)} kWh, total ${bill.totalBill.toFixed(2)}`);
    console.table(Object.entries(bill.breakdown).map(([label, amount]) => ({ label, amount: Number(amount.toFixed(4)) })));
  }
  console.log(`\nCheapest: ${cheapest ?? 'n/a'}`);
  if (current) {
    for (const bill of bills) {
      const saving = savingsVsCurrent[bill.scheme];
      if (saving !== undefined) console.log(`  vs ${current}: ${bill.scheme} saves ${saving.toFixed(2)}`);
    }
  }
}

try {
  main();
} catch (e) {
  console.error('ERROR', e instanceof Error ? e.message : e);
  process.exit(1);
}
