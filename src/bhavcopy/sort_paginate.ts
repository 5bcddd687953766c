import { NormalizedRow, SortSpec } from "./types/domain";

/**
 * Stable sort: rows with equal keys keep their input order in either
 * direction. Strings compare by UTF-16 code unit, not locale.
 */
export function sortRows(
  rows: readonly NormalizedRow[],
  spec: SortSpec
): NormalizedRow[] {
  const sign = spec.direction === "asc" ? 1 : -1;
  return [...rows].sort(
    (a, b) => sign * compareValues(a[spec.column], b[spec.column])
  );
}

function compareValues(a: string | number, b: string | number): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export interface Page<T> {
  rows: T[];
  /** 1-indexed page that was sliced; inputs below 1 or fractional are normalized */
  page: number;
  totalPages: number;
  /** 1-based inclusive bounds of the slice; both 0 for an empty page */
  startRow: number;
  endRow: number;
}

/**
 * Slice one 1-indexed page. Callers clamp `page` to [1, totalPages]; a page
 * past the end yields an empty slice rather than an error.
 */
export function paginate<T>(
  rows: readonly T[],
  pageSize: number,
  page: number
): Page<T> {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }
  const totalPages = Math.ceil(rows.length / pageSize);
  const current = Math.max(1, Math.trunc(page));
  const start = (current - 1) * pageSize;
  const slice = rows.slice(start, start + pageSize);
  return {
    rows: slice,
    page: current,
    totalPages,
    startRow: slice.length > 0 ? start + 1 : 0,
    endRow: slice.length > 0 ? start + slice.length : 0,
  };
}

export function clampPage(page: number, totalPages: number): number {
  return Math.min(Math.max(1, Math.trunc(page)), Math.max(1, totalPages));
}
