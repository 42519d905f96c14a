import axios, { type AxiosInstance } from "axios";
import { FetchError } from "./errors";
import { HostRateLimiter } from "./features/host-rate-limiter";
import { logger as defaultLogger, type Logger } from "./helpers/log.helper";
import type { FetchResult } from "./types";
import { nowIso } from "./utils";

export const DEFAULT_USER_AGENT = "phd-harvest/0.1 (+https://example.org/phd-harvest)";

export function createHttp(userAgent = DEFAULT_USER_AGENT, timeoutMs = 10_000): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": userAgent,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
    },
    timeout: timeoutMs,
    responseType: "text",
    // statuses are judged below so every failure becomes a FetchError
    validateStatus: () => true,
    maxRedirects: 5,
  });
}

export type PoliteFetcherOptions = {
  limiter: HostRateLimiter;
  http?: AxiosInstance;
  logger?: Logger;
};

/**
 * HTTP GET behind the shared per-host rate limiter. Does not retry: the caller
 * owns the retry policy.
 */
export class PoliteFetcher {
  private readonly limiter: HostRateLimiter;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor({ limiter, http = createHttp(), logger = defaultLogger }: PoliteFetcherOptions) {
    this.limiter = limiter;
    this.http = http;
    this.logger = logger;
  }

  async fetch(url: string): Promise<FetchResult> {
    let target: URL;
    try {
      target = new URL(url);
    } catch (err) {
      throw new FetchError(url, "malformed URL", { cause: err });
    }
    if (target.protocol !== "http:" && target.protocol !== "https:") {
      throw new FetchError(url, `unsupported protocol ${target.protocol}`);
    }

    await this.limiter.acquire(target.host);
    this.logger.debug(`GET ${url}`);

    let status: number;
    let data: unknown;
    try {
      const res = await this.http.get<unknown>(url, { responseType: "text" });
      status = res.status;
      data = res.data;
    } catch (err) {
      const reason = axios.isAxiosError(err)
        ? err.code === "ECONNABORTED" || err.code === "ETIMEDOUT"
          ? "timed out"
          : err.code ?? err.message
        : "request failed";
      throw new FetchError(url, reason, { cause: err });
    }

    if (status < 200 || status >= 300) {
      throw new FetchError(url, `HTTP ${status}`, { status });
    }

    return {
      url,
      html: typeof data === "string" ? data : String(data ?? ""),
      status,
      fetchedAt: nowIso(),
    };
  }
}
