/**
 * Raw bhavcopy records -> display-ready rows.
 *
 * Two stages, in this order:
 * 1. `deriveRow` computes every column, letting invalid arithmetic (zero
 *    previous close, non-numeric cells) produce NaN or +/-Infinity.
 * 2. `fillInvalidNumerics` replaces every non-finite numeric cell with 0.
 * Bounds (non-negative integers, delivery in [0, 100]) are enforced last.
 */
import { format, isValid, parse } from "date-fns";
import {
  canonicalSymbol,
  NormalizedRow,
  RawCell,
  RawRecord,
  SymbolNameMap,
} from "./types/domain";

export const NA_FALLBACK = 0;

export interface NormalizeOptions {
  /** yyyy-MM-dd used when DATE1 is missing or unparseable */
  fallbackDate?: string;
}

export function normalize(
  records: readonly RawRecord[],
  nameMap: SymbolNameMap,
  options: NormalizeOptions = {}
): NormalizedRow[] {
  return records.map(record =>
    enforceBounds(fillInvalidNumerics(deriveRow(record, nameMap, options)))
  );
}

export function deriveRow(
  record: RawRecord,
  nameMap: SymbolNameMap,
  options: NormalizeOptions = {}
): NormalizedRow {
  const symbol = canonicalSymbol(record.SYMBOL);
  const prevClose = toNumber(record.PREV_CLOSE);
  const close = toNumber(record.CLOSE_PRICE);
  return {
    symbol,
    companyName: nameMap.get(symbol) ?? symbol,
    tradeDate: parseTradeDate(record.DATE1) ?? options.fallbackDate ?? "",
    prevClose: roundTo(prevClose, 2),
    close: roundTo(close, 2),
    pctChange: roundTo(((close - prevClose) / prevClose) * 100, 2),
    volume: Math.trunc(toNumber(record.TTL_TRD_QNTY)),
    deliveredQty: Math.trunc(toNumber(record.DELIV_QTY)),
    pctDelivery: roundTo(toNumber(record.DELIV_PER), 2),
    turnoverCr: roundTo(toNumber(record.TURNOVER_LACS) / 100, 2),
  };
}

/**
 * The single "missing or invalid numeric becomes 0" rule. NaN, +Infinity
 * and -Infinity are all replaced.
 */
export function fillInvalidNumerics(row: NormalizedRow): NormalizedRow {
  return {
    ...row,
    prevClose: finiteOr(row.prevClose),
    close: finiteOr(row.close),
    pctChange: finiteOr(row.pctChange),
    volume: finiteOr(row.volume),
    deliveredQty: finiteOr(row.deliveredQty),
    pctDelivery: finiteOr(row.pctDelivery),
    turnoverCr: finiteOr(row.turnoverCr),
  };
}

function enforceBounds(row: NormalizedRow): NormalizedRow {
  return {
    ...row,
    volume: Math.max(0, row.volume),
    deliveredQty: Math.max(0, row.deliveredQty),
    pctDelivery: Math.min(100, Math.max(0, row.pctDelivery)),
  };
}

function finiteOr(value: number, fallback: number = NA_FALLBACK): number {
  return Number.isFinite(value) ? value : fallback;
}

/** Numeric coercion; anything non-numeric becomes NaN for the fill pass. */
export function toNumber(value: RawCell): number {
  if (typeof value === "number") return value;
  if (typeof value === "string") {
    const trimmed = value.trim().replace(/,/g, "");
    if (trimmed === "") return NaN;
    return Number(trimmed);
  }
  return NaN;
}

/** Half-to-even ("banker's") rounding: 0.125 -> 0.12, -0.375 -> -0.38. */
export function roundTo(value: number, precision: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = Math.pow(10, precision);
  const scaled = value * factor;
  const rounded =
    Math.abs(scaled % 1) === 0.5 ? 2 * Math.round(scaled / 2) : Math.round(scaled);
  // "+ 0" folds -0 into 0
  return rounded / factor + 0;
}

function parseTradeDate(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const parsed = parse(value.trim(), "dd-MMM-yyyy", new Date());
  return isValid(parsed) ? format(parsed, "yyyy-MM-dd") : undefined;
}
