import type { BillResult } from "./types";

export type BreakdownSlice = { label: string; amount: number; share: number };

/**
 * Positive breakdown entries with their share of the positive total, for pie
 * and bar charts. Tolerates partial results coming back from a UI layer.
 */
export function breakdownSlices(bill: Partial<BillResult> | null | undefined): BreakdownSlice[] {
  const entries = Object.entries(bill?.breakdown ?? {}).filter(([, amount]) => amount > 0);
  const total = entries.reduce((acc, [, amount]) => acc + amount, 0);
  if (total <= 0) return [];
  return entries.map(([label, amount]) => ({ label, amount, share: amount / total }));
}
