import { NormalizedRow, RawRecord } from "../types/domain";

export function makeRow(overrides: Partial<NormalizedRow> = {}): NormalizedRow {
  return {
    symbol: "ALPHA",
    companyName: "ALPHA",
    tradeDate: "2024-01-03",
    prevClose: 100,
    close: 100,
    pctChange: 0,
    volume: 0,
    deliveredQty: 0,
    pctDelivery: 0,
    turnoverCr: 0,
    ...overrides,
  };
}

export function makeRaw(overrides: Partial<RawRecord> = {}): RawRecord {
  return {
    SYMBOL: "ALPHA",
    PREV_CLOSE: 100,
    CLOSE_PRICE: 100,
    TTL_TRD_QNTY: 0,
    DELIV_QTY: 0,
    DELIV_PER: 0,
    TURNOVER_LACS: 0,
    ...overrides,
  };
}

/** Four records covering a gain, a loss, a zero previous close and "-" cells. */
export const SAMPLE_RAW: RawRecord[] = [
  makeRaw({
    SYMBOL: "ALPHA",
    PREV_CLOSE: 100,
    CLOSE_PRICE: 110,
    TTL_TRD_QNTY: 1000,
    DELIV_QTY: 400,
    DELIV_PER: 40,
    TURNOVER_LACS: 500,
  }),
  makeRaw({
    SYMBOL: "BETA",
    PREV_CLOSE: 200,
    CLOSE_PRICE: 190,
    TTL_TRD_QNTY: 3000,
    DELIV_QTY: "-",
    DELIV_PER: "-",
    TURNOVER_LACS: 1500,
  }),
  makeRaw({
    SYMBOL: "GAMMA",
    PREV_CLOSE: 0,
    CLOSE_PRICE: 50,
    TTL_TRD_QNTY: 200,
    DELIV_QTY: 100,
    DELIV_PER: 50,
    TURNOVER_LACS: 10,
  }),
  makeRaw({
    SYMBOL: "DELTA",
    PREV_CLOSE: 50,
    CLOSE_PRICE: 51,
    TTL_TRD_QNTY: 5000,
    DELIV_QTY: 4000,
    DELIV_PER: 80,
    TURNOVER_LACS: 255,
  }),
];

export const SAMPLE_NAMES: ReadonlyMap<string, string> = new Map([
  ["ALPHA", "Alpha Industries Ltd"],
  ["BETA", "Beta Motors Ltd"],
]);
