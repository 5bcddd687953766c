/**
 * Index constituents and the symbol -> company name master, fetched from the
 * NSE archive as CSV and cached for a fixed TTL.
 *
 * Never throws to callers: any network, HTTP or parse failure, or a CSV
 * without the expected columns, resolves to an empty set/map. Empty means
 * "unavailable" and is not cached.
 */
import { getLogger } from "@src/util/logger";
import { BhavcopyConfig } from "../config";
import {
  cellToString,
  parseCsv,
  resolveColumnContaining,
  resolveSymbolColumn,
} from "../csv";
import { fetchText, FetchTextFn } from "../infrastructure/http_client";
import { ReferenceDataSource } from "../types/contracts";
import {
  canonicalSymbol,
  IndexName,
  isIndexName,
  SymbolNameMap,
} from "../types/domain";
import { TtlCache } from "./ttl_cache";

export const INDEX_FILES: Record<IndexName, string> = {
  NIFTY50: "ind_nifty50list.csv",
  NIFTY100: "ind_nifty100list.csv",
  NIFTY200: "ind_nifty200list.csv",
  NIFTY500: "ind_nifty500list.csv",
};

export const EQUITY_MASTER_PATH = "/content/equities/EQUITY_L.csv";

const NAME_MAP_KEY = "symbol-name-map";

export class ReferenceDataUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReferenceDataUnavailableError";
  }
}

export type ReferenceDataConfig = Pick<
  BhavcopyConfig,
  | "indexBaseUrl"
  | "userAgent"
  | "referenceTtlMs"
  | "indexTimeoutMs"
  | "nameMapTimeoutMs"
>;

export interface ReferenceDataOptions {
  config: ReferenceDataConfig;
  indexCache?: TtlCache<ReadonlySet<string>>;
  nameCache?: TtlCache<SymbolNameMap>;
  fetchText?: FetchTextFn;
}

export class ReferenceData implements ReferenceDataSource {
  private readonly config: ReferenceDataConfig;
  private readonly indexCache: TtlCache<ReadonlySet<string>>;
  private readonly nameCache: TtlCache<SymbolNameMap>;
  private readonly fetchText: FetchTextFn;
  private readonly logger = getLogger("bhavcopy/reference_data");

  constructor(options: ReferenceDataOptions) {
    this.config = options.config;
    this.indexCache = options.indexCache ?? new TtlCache<ReadonlySet<string>>();
    this.nameCache = options.nameCache ?? new TtlCache<SymbolNameMap>();
    this.fetchText = options.fetchText ?? fetchText;
  }

  async getIndexMembers(indexName: IndexName): Promise<ReadonlySet<string>> {
    const key = canonicalSymbol(indexName);
    if (!isIndexName(key)) return new Set();
    const url = `${this.config.indexBaseUrl}/content/indices/${INDEX_FILES[key]}`;
    try {
      return await this.indexCache.getOrRefresh(
        key,
        this.config.referenceTtlMs,
        async () => {
          const text = await this.fetchText(url, {
            timeoutMs: this.config.indexTimeoutMs,
            headers: { "User-Agent": this.config.userAgent },
          });
          const members = parseIndexMembers(text);
          this.logger.debug(
            { index: key, count: members.size },
            "index constituents refreshed"
          );
          return members;
        }
      );
    } catch (err) {
      this.logger.warn({ index: key, url, err }, "index constituents unavailable");
      return new Set();
    }
  }

  async getSymbolNameMap(): Promise<SymbolNameMap> {
    const url = `${this.config.indexBaseUrl}${EQUITY_MASTER_PATH}`;
    try {
      return await this.nameCache.getOrRefresh(
        NAME_MAP_KEY,
        this.config.referenceTtlMs,
        async () => {
          const text = await this.fetchText(url, {
            timeoutMs: this.config.nameMapTimeoutMs,
            headers: { "User-Agent": this.config.userAgent },
          });
          const names = parseSymbolNameMap(text);
          this.logger.debug({ count: names.size }, "symbol name map refreshed");
          return names;
        }
      );
    } catch (err) {
      this.logger.warn({ url, err }, "symbol name map unavailable");
      return new Map();
    }
  }
}

/**
 * Canonical symbols from a constituents CSV.
 * @throws ReferenceDataUnavailableError when no symbol column or no symbols exist
 */
export function parseIndexMembers(text: string): ReadonlySet<string> {
  const { columns, rows } = parseCsv(text);
  const symbolCol = resolveSymbolColumn(columns);
  if (!symbolCol) {
    throw new ReferenceDataUnavailableError("no symbol column in index CSV");
  }
  const members = new Set<string>();
  for (const row of rows) {
    const symbol = canonicalSymbol(cellToString(row[symbolCol]));
    if (symbol) members.add(symbol);
  }
  if (members.size === 0) {
    throw new ReferenceDataUnavailableError("index CSV has no symbols");
  }
  return members;
}

/**
 * SYMBOL -> NAME OF COMPANY from the equity master CSV.
 * @throws ReferenceDataUnavailableError when either column cannot be resolved
 */
export function parseSymbolNameMap(text: string): SymbolNameMap {
  const { columns, rows } = parseCsv(text);
  const symbolCol = resolveSymbolColumn(columns);
  const nameCol = resolveColumnContaining(columns, ["name", "company"]);
  if (!symbolCol || !nameCol) {
    throw new ReferenceDataUnavailableError(
      "symbol or company name column missing in equity master"
    );
  }
  const names = new Map<string, string>();
  for (const row of rows) {
    const symbol = canonicalSymbol(cellToString(row[symbolCol]));
    const name = cellToString(row[nameCol]);
    if (!symbol || !name) continue;
    names.set(symbol, name);
  }
  if (names.size === 0) {
    throw new ReferenceDataUnavailableError("equity master has no rows");
  }
  return names;
}
