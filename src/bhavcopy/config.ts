import { getNumber, getString } from "../util/env";
import { PAGE_SIZES, PageSize } from "./types/domain";

export interface BhavcopyConfig {
  archiveBaseUrl: string;
  indexBaseUrl: string;
  userAgent: string;
  referenceTtlMs: number;
  indexTimeoutMs: number;
  nameMapTimeoutMs: number;
  providerTimeoutMs: number;
  exportPrefix: string;
  topN: number;
  defaultPageSize: PageSize;
}

const HOUR_MS = 60 * 60 * 1000;

export function loadBhavcopyConfig(): BhavcopyConfig {
  const archiveBaseUrl = trimSlash(
    getString("BHAVCOPY_ARCHIVE_BASE_URL", "https://nsearchives.nseindia.com")
  );
  const indexBaseUrl = trimSlash(
    getString("BHAVCOPY_INDEX_BASE_URL", "https://archives.nseindia.com")
  );
  const userAgent = getString("BHAVCOPY_USER_AGENT", "Mozilla/5.0");
  const referenceTtlMs = getNumber("BHAVCOPY_REFERENCE_TTL_HOURS", 24) * HOUR_MS;
  const indexTimeoutMs = getNumber("BHAVCOPY_INDEX_TIMEOUT_MS", 20_000);
  const nameMapTimeoutMs = getNumber("BHAVCOPY_NAME_MAP_TIMEOUT_MS", 30_000);
  const providerTimeoutMs = getNumber("BHAVCOPY_PROVIDER_TIMEOUT_MS", 30_000);
  const exportPrefix = getString("BHAVCOPY_EXPORT_PREFIX", "nse");
  const topN = Math.max(1, Math.trunc(getNumber("BHAVCOPY_TOP_N", 100)));
  const defaultPageSize = toPageSize(getNumber("BHAVCOPY_DEFAULT_PAGE_SIZE", 50));
  return {
    archiveBaseUrl,
    indexBaseUrl,
    userAgent,
    referenceTtlMs,
    indexTimeoutMs,
    nameMapTimeoutMs,
    providerTimeoutMs,
    exportPrefix,
    topN,
    defaultPageSize,
  };
}

function toPageSize(value: number): PageSize {
  const match = PAGE_SIZES.find(size => size === value);
  return match ?? 50;
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
