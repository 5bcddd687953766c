/**
 * Business logic: one bhavcopy query end to end.
 *
 * fetch raw -> normalize -> filter -> sort -> paginate, plus summary,
 * notices and export metadata. Pure with respect to its inputs and the
 * injected dependencies; every failure is converted into a view status.
 */
import { format, parseISO } from "date-fns";
import { getLogger } from "@src/util/logger";
import { BhavcopyConfig } from "./config";
import {
  buildExportFile,
  ExportFile,
  exportFileName,
  selectExportRows,
} from "./export";
import { filterRows, IndexFilterOutcome } from "./filter";
import {
  DateSuggestion,
  getMarketNotice,
  MarketNotice,
  NO_DATA_REASONS,
  suggestAlternativeDate,
  todayInIst,
} from "./market_calendar";
import { normalize } from "./normalize";
import { BhavcopyExportQuery, BhavcopyQuery } from "./query_schema";
import { clampPage, paginate, sortRows } from "./sort_paginate";
import { BhavcopySummary, changeRange, summarize } from "./summary";
import { BhavcopyProvider, ReferenceDataSource } from "./types/contracts";
import {
  ALL_STOCKS,
  ExportKind,
  FilterCriteria,
  IndexName,
  NormalizedRow,
  SortSpec,
} from "./types/domain";

export interface BhavcopyDependencies {
  provider: BhavcopyProvider;
  referenceData: ReferenceDataSource;
  config: Pick<BhavcopyConfig, "exportPrefix" | "topN" | "defaultPageSize">;
  now?: () => Date;
}

export interface Pagination {
  page: number;
  pageSize: number;
  totalPages: number;
  totalRows: number;
  startRow: number;
  endRow: number;
}

export interface ExportDescriptor {
  kind: ExportKind;
  fileName: string;
  rowCount: number;
}

export interface BhavcopyOkView {
  status: "ok";
  tradeDate: string;
  fetchedCount: number;
  rows: NormalizedRow[];
  pagination: Pagination;
  sort: SortSpec;
  criteria: FilterCriteria;
  changeRange: { min: number; max: number };
  summary: BhavcopySummary;
  indexFilter: IndexFilterOutcome;
  notices: MarketNotice[];
  exports: ExportDescriptor[];
}

export interface BhavcopyNoDataView {
  status: "no_data";
  tradeDate: string;
  reasons: readonly string[];
  suggestion?: DateSuggestion;
  notices: MarketNotice[];
}

export interface BhavcopyErrorView {
  status: "error";
  tradeDate: string;
  message: string;
}

export type BhavcopyView = BhavcopyOkView | BhavcopyNoDataView | BhavcopyErrorView;

interface Dataset {
  normalized: NormalizedRow[];
  /** filtered, then sorted */
  filtered: NormalizedRow[];
  indexFilter: IndexFilterOutcome;
}

type DatasetResult =
  | { status: "ok"; dataset: Dataset; fetchedCount: number }
  | BhavcopyNoDataView
  | BhavcopyErrorView;

const EXPORT_KINDS: readonly ExportKind[] = ["filtered", "complete", "top"];

export async function buildBhavcopyView(
  query: BhavcopyQuery,
  deps: BhavcopyDependencies
): Promise<BhavcopyView> {
  const logger = getLogger("bhavcopy/build_view");
  const now = (deps.now ?? (() => new Date()))();
  const result = await loadDataset(query, deps, now);
  if (result.status !== "ok") return result;

  const { dataset, fetchedCount } = result;
  const pageSize = query.pageSize ?? deps.config.defaultPageSize;
  const totalPages = Math.ceil(dataset.filtered.length / pageSize);
  const page = paginate(
    dataset.filtered,
    pageSize,
    clampPage(query.page, totalPages)
  );

  const exports = EXPORT_KINDS.map(kind => ({
    kind,
    fileName: exportFileName(deps.config.exportPrefix, kind, query.tradeDate),
    rowCount: selectExportRows(kind, dataset, deps.config.topN).length,
  }));

  const notices: MarketNotice[] = [];
  const marketNotice = getMarketNotice(query.tradeDate, now);
  if (marketNotice) notices.push(marketNotice);
  if (dataset.indexFilter.warning) {
    notices.push({ level: "warning", message: dataset.indexFilter.warning });
  }

  logger.debug(
    {
      tradeDate: query.tradeDate,
      fetched: fetchedCount,
      filtered: dataset.filtered.length,
      page: page.page,
      totalPages: page.totalPages,
    },
    "bhavcopy view built"
  );

  return {
    status: "ok",
    tradeDate: query.tradeDate,
    fetchedCount,
    rows: page.rows,
    pagination: {
      page: page.page,
      pageSize,
      totalPages: page.totalPages,
      totalRows: dataset.filtered.length,
      startRow: page.startRow,
      endRow: page.endRow,
    },
    sort: query.sort,
    criteria: query.criteria,
    changeRange: changeRange(dataset.normalized),
    summary: summarize(dataset.normalized, dataset.filtered),
    indexFilter: dataset.indexFilter,
    notices,
    exports,
  };
}

export type BhavcopyExportResult =
  | { status: "ok"; file: ExportFile }
  | BhavcopyNoDataView
  | BhavcopyErrorView;

export async function buildBhavcopyExport(
  query: BhavcopyExportQuery,
  deps: BhavcopyDependencies
): Promise<BhavcopyExportResult> {
  const now = (deps.now ?? (() => new Date()))();
  const result = await loadDataset(query, deps, now);
  if (result.status !== "ok") return result;
  const file = buildExportFile(query.kind, result.dataset, {
    prefix: deps.config.exportPrefix,
    topN: deps.config.topN,
    tradeDate: query.tradeDate,
  });
  return { status: "ok", file };
}

async function loadDataset(
  query: BhavcopyQuery,
  deps: BhavcopyDependencies,
  now: Date
): Promise<DatasetResult> {
  const logger = getLogger("bhavcopy/build_view");
  const { tradeDate } = query;
  try {
    const providerDate = format(parseISO(tradeDate), "dd-MM-yyyy");
    const raw = await deps.provider.fetchBhavcopy(providerDate);
    if (raw.length === 0) {
      logger.info({ tradeDate }, "no bhavcopy for date");
      const notice = getMarketNotice(tradeDate, now);
      return {
        status: "no_data",
        tradeDate,
        reasons: NO_DATA_REASONS,
        suggestion: suggestAlternativeDate(tradeDate, todayInIst(now)),
        notices: notice ? [notice] : [],
      };
    }

    const index = query.criteria.index ?? ALL_STOCKS;
    const [nameMap, members] = await Promise.all([
      deps.referenceData.getSymbolNameMap(),
      index === ALL_STOCKS
        ? Promise.resolve(undefined)
        : deps.referenceData.getIndexMembers(index),
    ]);

    const normalized = normalize(raw, nameMap, { fallbackDate: tradeDate });
    const lookup = (name: IndexName) => (name === index ? members : undefined);
    const { rows, indexFilter } = filterRows(normalized, query.criteria, lookup);
    const filtered = sortRows(rows, query.sort);

    return {
      status: "ok",
      dataset: { normalized, filtered, indexFilter },
      fetchedCount: raw.length,
    };
  } catch (err) {
    logger.error({ tradeDate, err }, "bhavcopy pipeline failed");
    return {
      status: "error",
      tradeDate,
      message: err instanceof Error ? err.message : String(err),
    };
  }
}
