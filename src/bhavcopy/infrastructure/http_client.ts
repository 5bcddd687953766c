/**
 * Minimal text fetcher over the global fetch with an abort-based timeout.
 */

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpError";
  }
}

export interface FetchTextOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

export type FetchTextFn = (url: string, options: FetchTextOptions) => Promise<string>;

export async function fetchText(
  url: string,
  options: FetchTextOptions
): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  try {
    const res = await fetch(url, {
      headers: {
        Accept: "text/csv,text/plain,*/*",
        ...options.headers,
      },
      signal: controller.signal,
    });
    if (!res.ok) {
      throw new HttpError(res.status, url);
    }
    return await res.text();
  } finally {
    clearTimeout(timer);
  }
}
