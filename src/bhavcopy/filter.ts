import {
  ALL_STOCKS,
  FilterCriteria,
  IndexChoice,
  IndexName,
  NormalizedRow,
} from "./types/domain";

/** Resolved membership for an index; undefined or empty means unavailable. */
export type MembershipLookup = (
  indexName: IndexName
) => ReadonlySet<string> | undefined;

export interface IndexFilterOutcome {
  index: IndexChoice;
  applied: boolean;
  warning?: string;
}

export interface FilterResult {
  rows: NormalizedRow[];
  indexFilter: IndexFilterOutcome;
}

/**
 * AND of every configured clause; order-preserving. An index whose
 * membership is unavailable is skipped (not "match nothing") and reported
 * through `indexFilter.warning`.
 */
export function filterRows(
  rows: readonly NormalizedRow[],
  criteria: FilterCriteria,
  membershipLookup: MembershipLookup
): FilterResult {
  const index = criteria.index ?? ALL_STOCKS;
  let members: ReadonlySet<string> | undefined;
  let indexFilter: IndexFilterOutcome = { index, applied: false };

  if (index !== ALL_STOCKS) {
    const resolved = membershipLookup(index);
    if (resolved && resolved.size > 0) {
      members = resolved;
      indexFilter = { index, applied: true };
    } else {
      indexFilter = {
        index,
        applied: false,
        warning: `Could not fetch ${index} constituent list. Showing all stocks.`,
      };
    }
  }

  const search = (criteria.search ?? "").trim().toLowerCase();

  const filtered = rows.filter(row => {
    if (!withinRange(row.pctChange, criteria.minChange, criteria.maxChange)) {
      return false;
    }
    if (!withinRange(row.pctDelivery, criteria.minDelivery, criteria.maxDelivery)) {
      return false;
    }
    if (criteria.minVolume != null && row.volume < criteria.minVolume) {
      return false;
    }
    if (criteria.minTurnover != null && row.turnoverCr < criteria.minTurnover) {
      return false;
    }
    if (search && !matchesSearch(row, search)) {
      return false;
    }
    if (members && !members.has(row.symbol)) {
      return false;
    }
    return true;
  });

  return { rows: filtered, indexFilter };
}

function withinRange(value: number, min?: number, max?: number): boolean {
  if (min != null && value < min) return false;
  if (max != null && value > max) return false;
  return true;
}

function matchesSearch(row: NormalizedRow, needle: string): boolean {
  return (
    row.symbol.toLowerCase().includes(needle) ||
    row.companyName.toLowerCase().includes(needle)
  );
}
