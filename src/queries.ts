import { GenerationError } from "./errors";
import { logger as defaultLogger, type Logger } from "./helpers/log.helper";
import type { LanguageModel } from "./llm";
import { FINDAPHD, isOnSite, type SiteProfile } from "./site";
import type { SearchQuery } from "./types";
import { errorMessage, stripCodeFences } from "./utils";

/** Extra say over which generated URLs are used. Return false to drop one. */
export type QueryPolicy = (url: URL, goal: string) => boolean;

export type QueryGeneratorOptions = {
  model: LanguageModel;
  site?: SiteProfile;
  maxQueries?: number;
  policy?: QueryPolicy;
  timeoutMs?: number;
  logger?: Logger;
};

export function buildQueryPrompt(goal: string, site: SiteProfile, maxQueries: number): string {
  return `You are a PhD search query generator for ${site.name}.

Given the user's request, generate up to ${maxQueries} specific, relevant search query URLs for ${site.name} based on keywords.

User request: ${goal}

Every URL must start with ${site.searchUrl} (a country or subject path segment may follow) and use only these query parameters: ${site.queryParams.join(", ")}.

Return ONLY a JSON list of URLs (strings) in this format:
${JSON.stringify(site.exampleQueries, null, 2)}

Make sure URLs are properly formatted with URL encoding for spaces (+) and special characters.`;
}

/** JSON array of strings if the model obeyed, otherwise every URL-looking token in the text. */
export function parseQueryCandidates(text: string): string[] {
  const body = stripCodeFences(text);
  try {
    const parsed: unknown = JSON.parse(body);
    if (Array.isArray(parsed)) {
      return parsed.filter((v): v is string => typeof v === "string").map((s) => s.trim());
    }
  } catch {
    // fall through to the URL scan below
  }
  // sentence punctuation after a URL in prose is not part of it
  return (body.match(/https?:\/\/[^\s"'<>,\]]+/g) ?? []).map((u) => u.replace(/[.)]+$/, ""));
}

export function checkQueryUrl(candidate: string, site: SiteProfile): URL | string {
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    return "not an absolute URL";
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") return `unsupported protocol ${url.protocol}`;
  if (!isOnSite(url, site)) return `host ${url.hostname} is not ${site.host}`;
  const keys = [...url.searchParams.keys()];
  if (!keys.some((k) => site.queryParams.includes(k))) {
    return `no recognized query parameter (${site.queryParams.join(", ")})`;
  }
  url.hash = "";
  return url;
}

export class QueryGenerator {
  private readonly model: LanguageModel;
  private readonly site: SiteProfile;
  private readonly maxQueries: number;
  private readonly policy?: QueryPolicy;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;

  constructor({ model, site = FINDAPHD, maxQueries = 4, policy, timeoutMs, logger = defaultLogger }: QueryGeneratorOptions) {
    this.model = model;
    this.site = site;
    this.maxQueries = maxQueries;
    this.policy = policy;
    this.timeoutMs = timeoutMs;
    this.logger = logger;
  }

  async generate(goal: string, signal?: AbortSignal): Promise<SearchQuery[]> {
    const trimmed = goal.trim();
    if (!trimmed) throw new GenerationError(goal, "goal is empty");

    this.logger.info(`Generating search queries for: ${trimmed}`);

    let response: string;
    try {
      response = await this.model.complete(buildQueryPrompt(trimmed, this.site, this.maxQueries), {
        signal,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      throw new GenerationError(trimmed, errorMessage(err), { cause: err });
    }
    this.logger.debug(`LLM response for queries: ${response}`);

    const queries: SearchQuery[] = [];
    const seen = new Set<string>();

    for (const candidate of parseQueryCandidates(response)) {
      const checked = checkQueryUrl(candidate, this.site);
      if (typeof checked === "string") {
        this.logger.warn(`Discarding query URL ${candidate}: ${checked}`);
        continue;
      }
      if (this.policy && !this.policy(checked, trimmed)) {
        this.logger.warn(`Discarding query URL ${candidate}: rejected by query policy`);
        continue;
      }
      const url = checked.toString();
      if (seen.has(url)) continue;
      seen.add(url);
      queries.push({ url, goal: trimmed });
      if (queries.length >= this.maxQueries) break;
    }

    if (queries.length === 0) {
      throw new GenerationError(trimmed, "model returned no usable search URLs");
    }

    this.logger.info(`Generated ${queries.length} search queries`);
    return queries;
  }
}
