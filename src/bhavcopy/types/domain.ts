/**
 * Domain types for the bhavcopy pipeline.
 *
 * Raw records keep the provider's wire names; everything downstream of the
 * normalizer uses camelCase rows.
 */

/** A cell as it arrives from the feed: numeric, text such as "-", or absent. */
export type RawCell = number | string | null | undefined;

export interface RawRecord {
  SYMBOL: string;
  /** dd-Mon-yyyy, e.g. "03-Jan-2024" */
  DATE1?: string;
  SERIES?: string;
  PREV_CLOSE?: RawCell;
  CLOSE_PRICE?: RawCell;
  TTL_TRD_QNTY?: RawCell;
  DELIV_QTY?: RawCell;
  DELIV_PER?: RawCell;
  /** Turnover in lacs */
  TURNOVER_LACS?: RawCell;
}

export interface NormalizedRow {
  symbol: string;
  companyName: string;
  /** yyyy-MM-dd */
  tradeDate: string;
  prevClose: number;
  close: number;
  pctChange: number;
  volume: number;
  deliveredQty: number;
  pctDelivery: number;
  /** Turnover in crores */
  turnoverCr: number;
}

export type NumericColumn = {
  [K in keyof NormalizedRow]: NormalizedRow[K] extends number ? K : never;
}[keyof NormalizedRow];

export const INDEX_NAMES = [
  "NIFTY50",
  "NIFTY100",
  "NIFTY200",
  "NIFTY500",
] as const;

export type IndexName = (typeof INDEX_NAMES)[number];

export const ALL_STOCKS = "ALL";

export type IndexChoice = IndexName | typeof ALL_STOCKS;

export type SymbolNameMap = ReadonlyMap<string, string>;

export interface FilterCriteria {
  minChange?: number;
  maxChange?: number;
  minDelivery?: number;
  maxDelivery?: number;
  minVolume?: number;
  minTurnover?: number;
  index?: IndexChoice;
  search?: string;
}

export const SORT_COLUMNS = [
  "symbol",
  "companyName",
  "close",
  "pctChange",
  "volume",
  "deliveredQty",
  "pctDelivery",
  "turnoverCr",
] as const;

export type SortColumn = (typeof SORT_COLUMNS)[number];

export type SortDirection = "asc" | "desc";

export interface SortSpec {
  column: SortColumn;
  direction: SortDirection;
}

export const DEFAULT_SORT: SortSpec = { column: "pctChange", direction: "desc" };

export const PAGE_SIZES = [25, 50, 100, 200] as const;

export type PageSize = (typeof PAGE_SIZES)[number];

export type ExportKind = "filtered" | "complete" | "top";

export function isIndexName(value: string): value is IndexName {
  return INDEX_NAMES.some(name => name === value);
}

export function canonicalSymbol(value: unknown): string {
  return String(value ?? "")
    .trim()
    .toUpperCase();
}
