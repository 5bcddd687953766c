import {
  deriveRow,
  fillInvalidNumerics,
  normalize,
  roundTo,
  toNumber,
} from "../normalize";
import { makeRaw, makeRow, SAMPLE_NAMES, SAMPLE_RAW } from "./fixtures";

describe("normalize", () => {
  it("derives change, delivery and turnover in crores", () => {
    const [row] = normalize(
      [
        {
          SYMBOL: "ABC",
          PREV_CLOSE: 100,
          CLOSE_PRICE: 110,
          TTL_TRD_QNTY: 1000,
          DELIV_QTY: 400,
          DELIV_PER: 40,
          TURNOVER_LACS: 500,
        },
      ],
      new Map()
    );

    expect(row).toEqual({
      symbol: "ABC",
      companyName: "ABC",
      tradeDate: "",
      prevClose: 100,
      close: 110,
      pctChange: 10,
      volume: 1000,
      deliveredQty: 400,
      pctDelivery: 40,
      turnoverCr: 5,
    });
  });

  it("matches the rounded change formula whenever prev close is positive", () => {
    const pairs: Array<[number, number, number]> = [
      [250, 245.5, -1.8],
      [3, 3.07, 2.33],
      [1234.56, 1300.01, 5.3],
      [19.95, 19.95, 0],
      [0.35, 0.05, -85.71],
    ];
    const rows = normalize(
      pairs.map(([prev, close], i) =>
        makeRaw({ SYMBOL: `S${i}`, PREV_CLOSE: prev, CLOSE_PRICE: close })
      ),
      new Map()
    );

    expect(rows.map(row => row.pctChange)).toEqual(
      pairs.map(([, , expected]) => expected)
    );
  });

  it("rounds exact halves to the even neighbour", () => {
    const rows = normalize(
      [
        makeRaw({
          SYMBOL: "UP",
          PREV_CLOSE: 200,
          CLOSE_PRICE: 200.25,
          TURNOVER_LACS: 12.5,
        }),
        makeRaw({ SYMBOL: "DN", PREV_CLOSE: 200, CLOSE_PRICE: 199.25 }),
      ],
      new Map()
    );

    expect(rows.map(row => [row.symbol, row.pctChange, row.turnoverCr])).toEqual([
      ["UP", 0.12, 0.12],
      ["DN", -0.38, 0],
    ]);
  });

  it("falls back to 0 for +Infinity, -Infinity and NaN change on zero prev close", () => {
    const rows = normalize(
      [
        makeRaw({ SYMBOL: "UP", PREV_CLOSE: 0, CLOSE_PRICE: 10 }),
        makeRaw({ SYMBOL: "DOWN", PREV_CLOSE: 0, CLOSE_PRICE: -10 }),
        makeRaw({ SYMBOL: "FLAT", PREV_CLOSE: 0, CLOSE_PRICE: 0 }),
      ],
      new Map()
    );

    expect(rows.map(row => row.pctChange)).toEqual([0, 0, 0]);
    expect(rows.every(row => Number.isFinite(row.pctChange))).toBe(true);
  });

  it("substitutes 0 for non-numeric delivery cells", () => {
    const [row] = normalize(
      [makeRaw({ DELIV_QTY: "-", DELIV_PER: "-", TTL_TRD_QNTY: 3000 })],
      new Map()
    );

    expect(row.deliveredQty).toBe(0);
    expect(row.pctDelivery).toBe(0);
    expect(row.volume).toBe(3000);
  });

  it("substitutes 0 for absent numeric cells", () => {
    const [row] = normalize([{ SYMBOL: "BARE" }], new Map());

    expect(row).toMatchObject({
      prevClose: 0,
      close: 0,
      pctChange: 0,
      volume: 0,
      deliveredQty: 0,
      pctDelivery: 0,
      turnoverCr: 0,
    });
  });

  it("canonicalizes symbols before resolving company names", () => {
    const rows = normalize(
      [makeRaw({ SYMBOL: "  alpha " }), makeRaw({ SYMBOL: "zeta" })],
      SAMPLE_NAMES
    );

    expect(rows[0].symbol).toBe("ALPHA");
    expect(rows[0].companyName).toBe("Alpha Industries Ltd");
    expect(rows[1].symbol).toBe("ZETA");
    expect(rows[1].companyName).toBe("ZETA");
  });

  it("parses DATE1 and uses the fallback date when it is missing", () => {
    const rows = normalize(
      [makeRaw({ DATE1: "03-Jan-2024" }), makeRaw({ DATE1: "garbage" }), makeRaw()],
      new Map(),
      { fallbackDate: "2024-01-04" }
    );

    expect(rows.map(row => row.tradeDate)).toEqual([
      "2024-01-03",
      "2024-01-04",
      "2024-01-04",
    ]);
  });

  it("rounds prices and turnover to two places and reads text numbers", () => {
    const [row] = normalize(
      [
        makeRaw({
          PREV_CLOSE: "1,234.567",
          CLOSE_PRICE: "1240.123",
          TURNOVER_LACS: 123.456,
          DELIV_PER: "33.333",
        }),
      ],
      new Map()
    );

    expect(row.prevClose).toBe(1234.57);
    expect(row.close).toBe(1240.12);
    expect(row.turnoverCr).toBe(1.23);
    expect(row.pctDelivery).toBe(33.33);
  });

  it("keeps delivery percentage within 0..100 and quantities non-negative", () => {
    const [row] = normalize(
      [makeRaw({ DELIV_PER: 120, DELIV_QTY: -5, TTL_TRD_QNTY: 10.9 })],
      new Map()
    );

    expect(row.pctDelivery).toBe(100);
    expect(row.deliveredQty).toBe(0);
    expect(row.volume).toBe(10);
  });

  it("preserves length and order", () => {
    const rows = normalize(SAMPLE_RAW, SAMPLE_NAMES);

    expect(rows).toHaveLength(SAMPLE_RAW.length);
    expect(rows.map(row => row.symbol)).toEqual([
      "ALPHA",
      "BETA",
      "GAMMA",
      "DELTA",
    ]);
    expect(normalize([], SAMPLE_NAMES)).toEqual([]);
  });

  it("leaves non-finite values to the fill pass", () => {
    const derived = deriveRow(
      makeRaw({ PREV_CLOSE: 0, CLOSE_PRICE: 10, DELIV_PER: "-" }),
      new Map()
    );

    expect(derived.pctChange).toBe(Infinity);
    expect(Number.isNaN(derived.pctDelivery)).toBe(true);
  });
});

describe("fillInvalidNumerics", () => {
  it("replaces every non-finite numeric cell and keeps the rest", () => {
    const filled = fillInvalidNumerics(
      makeRow({
        prevClose: NaN,
        close: 12.5,
        pctChange: -Infinity,
        volume: Infinity,
        deliveredQty: 7,
        pctDelivery: NaN,
        turnoverCr: 1.5,
      })
    );

    expect(filled).toEqual(
      makeRow({
        prevClose: 0,
        close: 12.5,
        pctChange: 0,
        volume: 0,
        deliveredQty: 7,
        pctDelivery: 0,
        turnoverCr: 1.5,
      })
    );
  });
});

describe("roundTo", () => {
  it("rounds half to even and everything else to nearest", () => {
    expect(roundTo(0.125, 2)).toBe(0.12);
    expect(roundTo(-0.375, 2)).toBe(-0.38);
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(3.5, 0)).toBe(4);
    expect(roundTo(-2.5, 0)).toBe(-2);
    expect(roundTo(2.55, 2)).toBe(2.55);
    expect(roundTo(1.23456, 2)).toBe(1.23);
  });

  it("folds negative zero and passes non-finite values through", () => {
    expect(Object.is(roundTo(-0.001, 2), 0)).toBe(true);
    expect(roundTo(Infinity, 2)).toBe(Infinity);
    expect(roundTo(NaN, 2)).toBeNaN();
  });
});

describe("toNumber", () => {
  it("coerces numbers and numeric text, everything else to NaN", () => {
    expect(toNumber(42)).toBe(42);
    expect(toNumber(" 1,000.5 ")).toBe(1000.5);
    expect(toNumber("-")).toBeNaN();
    expect(toNumber("")).toBeNaN();
    expect(toNumber(null)).toBeNaN();
    expect(toNumber(undefined)).toBeNaN();
  });
});
