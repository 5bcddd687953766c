/**
 * CSV exports. All three subsets share the on-screen column policy and are
 * independent of the current page.
 */
import { toCsv } from "./csv";
import { sortRows } from "./sort_paginate";
import { ExportKind, NormalizedRow, NumericColumn } from "./types/domain";

interface DisplayColumn {
  header: string;
  value: (row: NormalizedRow) => string | number;
}

const fixed2 = (value: number): string => value.toFixed(2);

export const DISPLAY_COLUMNS: readonly DisplayColumn[] = [
  { header: "Date", value: row => toDisplayDate(row.tradeDate) },
  { header: "Symbol", value: row => row.symbol },
  { header: "Company Name", value: row => row.companyName },
  { header: "Prev Close", value: row => fixed2(row.prevClose) },
  { header: "Close Price", value: row => fixed2(row.close) },
  { header: "% Change", value: row => fixed2(row.pctChange) },
  { header: "Volume", value: row => row.volume },
  { header: "Delivered Qty", value: row => row.deliveredQty },
  { header: "% Delivery", value: row => fixed2(row.pctDelivery) },
  { header: "Turnover (₹ Cr)", value: row => fixed2(row.turnoverCr) },
];

const FILE_KIND: Record<ExportKind, string> = {
  filtered: "bhavcopy_filtered",
  complete: "bhavcopy_complete",
  top: "top_performers",
};

export interface ExportFile {
  kind: ExportKind;
  fileName: string;
  content: string;
  rowCount: number;
}

export function rowsToCsv(rows: readonly NormalizedRow[]): string {
  return toCsv(
    DISPLAY_COLUMNS.map(col => col.header),
    rows.map(row => DISPLAY_COLUMNS.map(col => col.value(row)))
  );
}

/** The current filter result, in its last-applied sort order. */
export function exportFiltered(filteredRows: readonly NormalizedRow[]): NormalizedRow[] {
  return [...filteredRows];
}

/** The unfiltered normalized set. */
export function exportFull(normalizedRows: readonly NormalizedRow[]): NormalizedRow[] {
  return [...normalizedRows];
}

/**
 * The `n` rows with the largest `column`, ties kept in original order.
 */
export function exportTopN(
  normalizedRows: readonly NormalizedRow[],
  n: number,
  column: NumericColumn = "pctChange"
): NormalizedRow[] {
  const count = Math.max(0, Math.trunc(n));
  return sortRows(normalizedRows, { column, direction: "desc" }).slice(0, count);
}

/** `<prefix>_<kind>_<yyyyMMdd>.csv` */
export function exportFileName(
  prefix: string,
  kind: ExportKind,
  tradeDate: string /* yyyy-MM-dd */
): string {
  return `${prefix}_${FILE_KIND[kind]}_${tradeDate.replace(/-/g, "")}.csv`;
}

export interface ExportSources {
  normalized: readonly NormalizedRow[];
  /** filtered and sorted */
  filtered: readonly NormalizedRow[];
}

export interface ExportSettings {
  prefix: string;
  topN: number;
  tradeDate: string;
}

export function buildExportFile(
  kind: ExportKind,
  sources: ExportSources,
  settings: ExportSettings
): ExportFile {
  const rows = selectExportRows(kind, sources, settings.topN);
  return {
    kind,
    fileName: exportFileName(settings.prefix, kind, settings.tradeDate),
    content: rowsToCsv(rows),
    rowCount: rows.length,
  };
}

export function selectExportRows(
  kind: ExportKind,
  sources: ExportSources,
  topN: number
): NormalizedRow[] {
  switch (kind) {
    case "filtered":
      return exportFiltered(sources.filtered);
    case "complete":
      return exportFull(sources.normalized);
    case "top":
      return exportTopN(sources.normalized, topN);
  }
}

function toDisplayDate(isoDate: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(isoDate);
  if (!match) return isoDate;
  return `${match[3]}-${match[2]}-${match[1]}`;
}
