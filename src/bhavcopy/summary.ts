import { roundTo } from "./normalize";
import { NormalizedRow } from "./types/domain";

export interface BhavcopySummary {
  stockCount: number;
  totalStocks: number;
  avgChange: number;
  avgDelivery: number;
  totalVolume: number;
  totalTurnoverCr: number;
  /** Share of the full set that survived the filters, in percent */
  filterEfficiencyPct: number;
}

export function summarize(
  all: readonly NormalizedRow[],
  filtered: readonly NormalizedRow[]
): BhavcopySummary {
  const count = filtered.length;
  const sumChange = sumOf(filtered, row => row.pctChange);
  const sumDelivery = sumOf(filtered, row => row.pctDelivery);
  return {
    stockCount: count,
    totalStocks: all.length,
    avgChange: count > 0 ? roundTo(sumChange / count, 2) : 0,
    avgDelivery: count > 0 ? roundTo(sumDelivery / count, 2) : 0,
    totalVolume: sumOf(filtered, row => row.volume),
    totalTurnoverCr: roundTo(sumOf(filtered, row => row.turnoverCr), 2),
    filterEfficiencyPct:
      all.length > 0 ? roundTo((count / all.length) * 100, 2) : 0,
  };
}

/** Min/max % change of a row set; both 0 when empty. */
export function changeRange(rows: readonly NormalizedRow[]): {
  min: number;
  max: number;
} {
  if (rows.length === 0) return { min: 0, max: 0 };
  let min = Infinity;
  let max = -Infinity;
  for (const row of rows) {
    if (row.pctChange < min) min = row.pctChange;
    if (row.pctChange > max) max = row.pctChange;
  }
  return { min, max };
}

function sumOf(
  rows: readonly NormalizedRow[],
  pick: (row: NormalizedRow) => number
): number {
  let total = 0;
  for (const row of rows) total += pick(row);
  return total;
}
