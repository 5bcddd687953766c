import type { IndexName, RawRecord, SymbolNameMap } from "./domain";

/**
 * Source of the raw per-symbol record set for one trading date.
 * Resolves to an empty array when nothing was published for the date.
 */
export interface BhavcopyProvider {
  fetchBhavcopy(tradeDate: string /* dd-MM-yyyy */): Promise<RawRecord[]>;
}

/**
 * Cached reference data. Never rejects: an empty set/map means unavailable.
 */
export interface ReferenceDataSource {
  getIndexMembers(indexName: IndexName): Promise<ReadonlySet<string>>;
  getSymbolNameMap(): Promise<SymbolNameMap>;
}
