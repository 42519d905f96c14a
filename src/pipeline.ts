import pLimit from "p-limit";
import { FetchError } from "./errors";
import type { ExtractOptions, FieldExtractor } from "./extract";
import { withRetry, type BackoffOptions } from "./features/exponential-backoff";
import { logger as defaultLogger, type Logger } from "./helpers/log.helper";
import type { PoliteFetcher } from "./http";
import { extractLinks } from "./links";
import { MIN_BLOB_LENGTH, normalize } from "./parse";
import type { QueryGenerator } from "./queries";
import type { ResultStore } from "./save";
import { FINDAPHD, type SiteProfile } from "./site";
import type { ExtractedRecord, FetchResult, LinkState, ProjectLink, RunReport, SearchQuery } from "./types";
import { errorMessage } from "./utils";

const TRANSITIONS: Record<LinkState, readonly LinkState[]> = {
  Discovered: ["Fetching"],
  Fetching: ["Normalizing", "Skipped"],
  Normalizing: ["Extracting", "Skipped"],
  Extracting: ["Stored", "Failed"],
  Stored: [],
  Skipped: [],
  Failed: [],
};

export type PipelineDeps = {
  queries: QueryGenerator;
  fetcher: PoliteFetcher;
  extractor: Pick<FieldExtractor, "extract">;
  store: ResultStore;
  site?: SiteProfile;
  logger?: Logger;
};

export type PipelineOptions = {
  /** Links carried through their lifecycle at once. */
  concurrency?: number;
  /** Model calls in flight at once, across all links. */
  modelConcurrency?: number;
  fetchRetries?: number;
  backoff?: BackoffOptions;
  maxProjects?: number;
  flushEvery?: number;
  minBlobLength?: number;
};

export type RunOptions = {
  /** Once aborted, no further link is started; the store is still flushed. */
  signal?: AbortSignal;
};

/** 5xx, 408, 429 and transport failures are worth another try; other 4xx are not. */
export function isRetryableFetch(err: unknown): boolean {
  if (!(err instanceof FetchError)) return false;
  if (err.status === undefined) return true;
  return err.status >= 500 || err.status === 408 || err.status === 429;
}

class RunState {
  readonly states = new Map<string, LinkState>();
  readonly failedLinks: { url: string; reason: string }[] = [];
  parseFailures = 0;

  constructor(private readonly logger: Logger) {}

  discover(url: string) {
    this.states.set(url, "Discovered");
  }

  move(url: string, to: LinkState) {
    const from = this.states.get(url);
    if (!from || !TRANSITIONS[from].includes(to)) {
      throw new Error(`illegal link transition ${from ?? "(none)"} -> ${to} for ${url}`);
    }
    this.states.set(url, to);
    this.logger.debug(`${url}: ${from} -> ${to}`);
  }

  count(state: LinkState): number {
    let n = 0;
    for (const s of this.states.values()) if (s === state) n++;
    return n;
  }
}

export class Pipeline {
  private readonly queries: QueryGenerator;
  private readonly fetcher: PoliteFetcher;
  private readonly extractor: Pick<FieldExtractor, "extract">;
  private readonly store: ResultStore;
  private readonly site: SiteProfile;
  private readonly logger: Logger;
  private readonly options: Required<Omit<PipelineOptions, "maxProjects" | "backoff">> &
    Pick<PipelineOptions, "maxProjects" | "backoff">;

  constructor(deps: PipelineDeps, options: PipelineOptions = {}) {
    this.queries = deps.queries;
    this.fetcher = deps.fetcher;
    this.extractor = deps.extractor;
    this.store = deps.store;
    this.site = deps.site ?? FINDAPHD;
    this.logger = deps.logger ?? defaultLogger;
    this.options = {
      concurrency: options.concurrency ?? 4,
      modelConcurrency: options.modelConcurrency ?? 2,
      fetchRetries: options.fetchRetries ?? 3,
      backoff: options.backoff,
      maxProjects: options.maxProjects,
      flushEvery: options.flushEvery ?? 5,
      minBlobLength: options.minBlobLength ?? MIN_BLOB_LENGTH,
    };
  }

  async run(goal: string, { signal }: RunOptions = {}): Promise<RunReport> {
    this.logger.info("=".repeat(60));
    this.logger.info(`Starting PhD harvest for: ${goal}`);

    await this.store.load();
    const queries = await this.queries.generate(goal, signal);
    const discovered = await this.discover(queries, signal);

    const run = new RunState(this.logger);
    for (const link of discovered) run.discover(link.url);

    const { maxProjects, concurrency, modelConcurrency } = this.options;
    const selected = maxProjects !== undefined ? discovered.slice(0, maxProjects) : discovered;
    if (selected.length < discovered.length) {
      this.logger.info(`Processing the first ${selected.length} of ${discovered.length} links (max projects)`);
    }

    const linkPool = pLimit(concurrency);
    const modelPool = pLimit(modelConcurrency);
    const abort: { error?: unknown } = {};
    let storedSinceFlush = 0;

    await Promise.allSettled(
      selected.map((link) =>
        linkPool(async () => {
          if (signal?.aborted || "error" in abort) return;
          try {
            const stored = await this.processLink(link, goal, run, modelPool);
            if (stored && ++storedSinceFlush >= this.options.flushEvery) {
              storedSinceFlush = 0;
              await this.store.flush();
            }
          } catch (err) {
            if (!("error" in abort)) abort.error = err;
            throw err;
          }
        })
      )
    );

    // partial progress is written even when the run is cut short
    await this.store.flush();
    if ("error" in abort) throw abort.error;

    const report: RunReport = {
      goal,
      queries,
      discovered: discovered.length,
      stored: run.count("Stored"),
      skipped: run.count("Skipped"),
      failed: run.count("Failed"),
      parseFailures: run.parseFailures,
      pending: run.count("Discovered"),
      cancelled: signal?.aborted ?? false,
      failedLinks: run.failedLinks,
      outputPath: this.store.path,
      links: Object.fromEntries(run.states),
    };

    this.logger.info("=".repeat(60));
    this.logger.info(
      `Stored ${report.stored}, skipped ${report.skipped}, failed ${report.failed}` +
        (report.pending > 0 ? `, not started ${report.pending}` : "") +
        ` (table now has ${this.store.size} rows in ${this.store.path})`
    );
    if (report.parseFailures > 0) {
      this.logger.warn(`${report.parseFailures} rows could not be parsed and were stored as unknown`);
    }
    for (const f of report.failedLinks) this.logger.warn(`Failed: ${f.url}: ${f.reason}`);
    if (report.cancelled) this.logger.warn("Run was cancelled; partial results were saved");

    return report;
  }

  /** Listing pages, one query at a time. First query to find a link owns it. */
  async discover(queries: SearchQuery[], signal?: AbortSignal): Promise<ProjectLink[]> {
    const links = new Map<string, ProjectLink>();

    for (const [i, query] of queries.entries()) {
      if (signal?.aborted) break;
      this.logger.info(`[Query ${i + 1}/${queries.length}] Processing: ${query.url}`);

      let page: FetchResult;
      try {
        page = await this.fetchWithRetry(query.url, signal);
      } catch (err) {
        if (!(err instanceof FetchError)) throw err;
        this.logger.error(`Error fetching ${query.url}: ${err.message}`);
        continue;
      }

      const found = extractLinks(page.html, page.url, query, this.site);
      if (found.length === 0) {
        this.logger.warn(`No project links found for query ${i + 1}`);
        continue;
      }
      let fresh = 0;
      for (const link of found) {
        if (links.has(link.url)) continue;
        links.set(link.url, link);
        fresh++;
      }
      this.logger.info(`Found ${found.length} project links (${fresh} new)`);
    }

    return [...links.values()];
  }

  /** True when the link ended as a stored row. */
  private async processLink(
    link: ProjectLink,
    goal: string,
    run: RunState,
    modelPool: ReturnType<typeof pLimit>
  ): Promise<boolean> {
    run.move(link.url, "Fetching");
    let page: FetchResult;
    try {
      page = await this.fetchWithRetry(link.url);
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      run.move(link.url, "Skipped");
      this.logger.warn(`Skipped ${link.url}: ${err.message}`);
      return false;
    }

    run.move(link.url, "Normalizing");
    const blob = normalize(page.html, link.url, page.fetchedAt, this.options.minBlobLength);
    if (!blob) {
      run.move(link.url, "Skipped");
      this.logger.warn(`Skipped ${link.url}: no usable text on page`);
      return false;
    }

    run.move(link.url, "Extracting");
    const extractOptions: ExtractOptions = { goal };
    let record: ExtractedRecord;
    try {
      record = await modelPool(() => this.extractor.extract(blob, extractOptions));
    } catch (err) {
      run.move(link.url, "Failed");
      run.failedLinks.push({ url: link.url, reason: errorMessage(err) });
      this.logger.error(`Failed to extract ${link.url}: ${errorMessage(err)}`);
      return false;
    }

    const existing = this.store.has(link.url);
    const added = this.store.append(record);
    if (!added) {
      this.logger.debug(`${link.url} already stored in this run`);
    }
    if (record.parseFailed) run.parseFailures++;
    run.move(link.url, "Stored");
    this.logger.info(`${added && existing ? "Updated" : "Stored"}: ${record.title} (${record.university})`);
    return true;
  }

  private fetchWithRetry(url: string, signal?: AbortSignal): Promise<FetchResult> {
    return withRetry(() => this.fetcher.fetch(url), {
      retries: this.options.fetchRetries,
      shouldRetry: isRetryableFetch,
      signal,
      ...this.options.backoff,
      onRetry: (err, attempt, delayMs) =>
        this.logger.warn(`Retry ${attempt}/${this.options.fetchRetries} for ${url} in ${delayMs}ms: ${errorMessage(err)}`),
    });
  }
}
