/**
 * Raw bhavcopy-with-delivery from the NSE archive.
 *
 * File: <archiveBaseUrl>/products/content/sec_bhavdata_full_<ddMMyyyy>.csv
 * A 404 or an empty body means nothing was published for the date.
 */
import { z } from "zod";
import { getLogger } from "@src/util/logger";
import { BhavcopyConfig } from "../config";
import { parseCsv } from "../csv";
import { BhavcopyProvider } from "../types/contracts";
import { RawRecord } from "../types/domain";
import { fetchText, FetchTextFn, HttpError } from "./http_client";

const cell = z.string().optional();

export const rawRecordSchema = z.object({
  SYMBOL: z.string().trim().min(1),
  DATE1: z.string().optional(),
  SERIES: z.string().optional(),
  PREV_CLOSE: cell,
  CLOSE_PRICE: cell,
  TTL_TRD_QNTY: cell,
  DELIV_QTY: cell,
  DELIV_PER: cell,
  TURNOVER_LACS: cell,
});

export type NseArchiveConfig = Pick<
  BhavcopyConfig,
  "archiveBaseUrl" | "userAgent" | "providerTimeoutMs"
>;

export interface NseArchiveBhavcopyProviderOptions {
  config: NseArchiveConfig;
  fetchText?: FetchTextFn;
}

export class NseArchiveBhavcopyProvider implements BhavcopyProvider {
  private readonly config: NseArchiveConfig;
  private readonly fetchText: FetchTextFn;
  private readonly logger = getLogger("bhavcopy/nse_archive_provider");

  constructor(options: NseArchiveBhavcopyProviderOptions) {
    this.config = options.config;
    this.fetchText = options.fetchText ?? fetchText;
  }

  async fetchBhavcopy(tradeDate: string): Promise<RawRecord[]> {
    const url = this.buildUrl(tradeDate);
    let text: string;
    try {
      text = await this.fetchText(url, {
        timeoutMs: this.config.providerTimeoutMs,
        headers: { "User-Agent": this.config.userAgent },
      });
    } catch (err) {
      if (err instanceof HttpError && err.status === 404) {
        this.logger.info({ tradeDate, url }, "bhavcopy not published");
        return [];
      }
      throw err;
    }

    if (text.trim() === "") return [];
    const records = parseBhavcopyCsv(text);
    if (records.skipped > 0) {
      this.logger.warn(
        { tradeDate, skipped: records.skipped },
        "bhavcopy rows without a symbol skipped"
      );
    }
    this.logger.debug(
      { tradeDate, count: records.rows.length },
      "bhavcopy fetched"
    );
    return records.rows;
  }

  buildUrl(tradeDate: string): string {
    const compact = tradeDate.replace(/-/g, "");
    if (!/^\d{8}$/.test(compact)) {
      throw new Error(`tradeDate must be dd-MM-yyyy, got "${tradeDate}"`);
    }
    return `${this.config.archiveBaseUrl}/products/content/sec_bhavdata_full_${compact}.csv`;
  }
}

export function parseBhavcopyCsv(text: string): {
  rows: RawRecord[];
  skipped: number;
} {
  const { rows } = parseCsv(text);
  const records: RawRecord[] = [];
  let skipped = 0;
  for (const row of rows) {
    const parsed = rawRecordSchema.safeParse(row);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      skipped += 1;
    }
  }
  return { rows: records, skipped };
}
