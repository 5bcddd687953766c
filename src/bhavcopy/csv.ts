import Papa from "papaparse";

export type CsvRow = Record<string, string | undefined>;

export type CsvResult = { columns: string[]; rows: CsvRow[] };

/**
 * Parse CSV text with a header row. Headers and cells are trimmed (NSE
 * files pad both with spaces); cells stay strings so symbols such as
 * "TRUE" or "500" are not retyped.
 */
export function parseCsv(text: string): CsvResult {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: "greedy",
    transformHeader: header => header.trim(),
    transform: value => value.trim(),
  });
  const rows = parsed.data.filter(row => row && typeof row === "object");
  const columns = parsed.meta.fields ?? Object.keys(rows[0] ?? {});
  return { columns, rows };
}

/** Serialize a header plus rows, comma-delimited with "\n" line endings. */
export function toCsv(
  headers: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<string | number>>
): string {
  return Papa.unparse(
    { fields: [...headers], data: rows.map(row => [...row]) },
    { newline: "\n" }
  );
}

/**
 * Symbol column lookup: exact case-insensitive "symbol" first, then any
 * header containing "symbol".
 */
export function resolveSymbolColumn(columns: readonly string[]): string | undefined {
  return (
    columns.find(col => col.trim().toLowerCase() === "symbol") ??
    columns.find(col => col.toLowerCase().includes("symbol"))
  );
}

/** First header containing every fragment, compared case-insensitively. */
export function resolveColumnContaining(
  columns: readonly string[],
  fragments: readonly string[]
): string | undefined {
  return columns.find(col => {
    const low = col.toLowerCase();
    return fragments.every(fragment => low.includes(fragment.toLowerCase()));
  });
}

export function cellToString(value: unknown): string {
  if (value == null) return "";
  return String(value).trim();
}
