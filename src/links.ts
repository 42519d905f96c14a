import { load } from "cheerio";
import { FINDAPHD, isOnSite, type SiteProfile } from "./site";
import type { ProjectLink, SearchQuery } from "./types";

const NON_NAVIGABLE = /^(javascript|mailto|tel|data):/i;

/** Absolute form used as the dedup key: no fragment, lower-cased host. */
export function normalizeUrl(href: string, base?: string): URL | null {
  let url: URL;
  try {
    url = new URL(href, base);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  url.hash = "";
  url.hostname = url.hostname.toLowerCase();
  return url;
}

export function isDetailUrl(url: URL, site: SiteProfile = FINDAPHD): boolean {
  return isOnSite(url, site) && site.detailPathPattern.test(url.pathname);
}

/**
 * Detail-page links on a listing page, in order of first appearance. An empty
 * result is a normal outcome for a query with no hits.
 */
export function extractLinks(
  html: string,
  baseUrl: string,
  query: SearchQuery,
  site: SiteProfile = FINDAPHD
): ProjectLink[] {
  const $ = load(html);
  const found = new Map<string, ProjectLink>();

  $("a[href]").each((_, a) => {
    const href = $(a).attr("href")?.trim();
    if (!href || href.startsWith("#") || NON_NAVIGABLE.test(href)) return;

    const url = normalizeUrl(href, baseUrl);
    if (!url || !isDetailUrl(url, site)) return;

    const key = url.toString();
    if (!found.has(key)) found.set(key, { url: key, query });
  });

  return [...found.values()];
}
