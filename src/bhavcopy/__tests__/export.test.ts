import {
  buildExportFile,
  exportFileName,
  exportFiltered,
  exportFull,
  exportTopN,
  rowsToCsv,
} from "../export";
import { makeRow } from "./fixtures";

const HEADER =
  "Date,Symbol,Company Name,Prev Close,Close Price,% Change,Volume,Delivered Qty,% Delivery,Turnover (₹ Cr)";

describe("exportTopN", () => {
  const rows = [
    makeRow({ symbol: "A", pctChange: 1.5, volume: 300 }),
    makeRow({ symbol: "B", pctChange: 7, volume: 100 }),
    makeRow({ symbol: "C", pctChange: 3, volume: 200 }),
    makeRow({ symbol: "D", pctChange: 7, volume: 50 }),
    makeRow({ symbol: "E", pctChange: -4, volume: 400 }),
  ];

  it("returns the n largest by change, ties in original order", () => {
    const top = exportTopN(rows, 3);
    expect(top.map(row => row.symbol)).toEqual(["B", "D", "C"]);
  });

  it("returns min(n, rows) rows that dominate every excluded row", () => {
    for (const n of [0, 1, 2, 4, 5, 100]) {
      const top = exportTopN(rows, n, "volume");
      expect(top).toHaveLength(Math.min(n, rows.length));
      const excluded = rows.filter(row => !top.includes(row));
      for (const kept of top) {
        for (const other of excluded) {
          expect(kept.volume).toBeGreaterThanOrEqual(other.volume);
        }
      }
    }
  });

  it("ranks by the requested column", () => {
    expect(exportTopN(rows, 2, "volume").map(row => row.symbol)).toEqual([
      "E",
      "A",
    ]);
  });
});

describe("exportFiltered / exportFull", () => {
  it("copy their inputs in order", () => {
    const rows = [makeRow({ symbol: "Z" }), makeRow({ symbol: "Y" })];
    const filtered = exportFiltered(rows);
    const full = exportFull(rows);

    expect(filtered).toEqual(rows);
    expect(filtered).not.toBe(rows);
    expect(full).toEqual(rows);
    expect(full).not.toBe(rows);
  });
});

describe("rowsToCsv", () => {
  it("writes the display header and formatted rows", () => {
    const csv = rowsToCsv([
      makeRow({
        tradeDate: "2024-01-03",
        symbol: "ABC",
        companyName: "Alpha, Beta Ltd",
        prevClose: 100,
        close: 110,
        pctChange: 10,
        volume: 1000,
        deliveredQty: 400,
        pctDelivery: 40,
        turnoverCr: 5,
      }),
      makeRow({
        tradeDate: "2024-01-03",
        symbol: "XYZ",
        companyName: "Xyz \"Quoted\" Ltd",
        prevClose: 20.5,
        close: 20.25,
        pctChange: -1.22,
        volume: 0,
        deliveredQty: 0,
        pctDelivery: 0,
        turnoverCr: 0.07,
      }),
    ]);

    expect(csv.split("\n")).toEqual([
      HEADER,
      '03-01-2024,ABC,"Alpha, Beta Ltd",100.00,110.00,10.00,1000,400,40.00,5.00',
      '03-01-2024,XYZ,"Xyz ""Quoted"" Ltd",20.50,20.25,-1.22,0,0,0.00,0.07',
    ]);
  });

  it("writes only the header for an empty set", () => {
    expect(rowsToCsv([])).toBe(HEADER);
  });
});

describe("exportFileName", () => {
  it("follows <prefix>_<kind>_<yyyyMMdd>.csv", () => {
    expect(exportFileName("nse", "filtered", "2024-01-03")).toBe(
      "nse_bhavcopy_filtered_20240103.csv"
    );
    expect(exportFileName("nse", "complete", "2024-01-03")).toBe(
      "nse_bhavcopy_complete_20240103.csv"
    );
    expect(exportFileName("nse", "top", "2024-01-03")).toBe(
      "nse_top_performers_20240103.csv"
    );
  });
});

describe("buildExportFile", () => {
  it("draws each kind from its own source", () => {
    const normalized = [
      makeRow({ symbol: "A", pctChange: 1 }),
      makeRow({ symbol: "B", pctChange: 9 }),
      makeRow({ symbol: "C", pctChange: 4 }),
    ];
    const filtered = [normalized[2]];
    const settings = { prefix: "nse", topN: 2, tradeDate: "2024-01-03" };

    const top = buildExportFile("top", { normalized, filtered }, settings);
    expect(top.rowCount).toBe(2);
    expect(top.fileName).toBe("nse_top_performers_20240103.csv");
    expect(top.content.split("\n").map(line => line.split(",")[1])).toEqual([
      "Symbol",
      "B",
      "C",
    ]);

    const only = buildExportFile("filtered", { normalized, filtered }, settings);
    expect(only.rowCount).toBe(1);
    expect(only.kind).toBe("filtered");

    const all = buildExportFile("complete", { normalized, filtered }, settings);
    expect(all.rowCount).toBe(3);
  });
});
