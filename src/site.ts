/** What the pipeline needs to know about the search-driven site it reads. */
export type SiteProfile = {
  name: string;
  host: string;
  /** Listing pages live under this URL; queries are built on top of it. */
  searchUrl: string;
  /** Query-string keys the site's search understands. */
  queryParams: readonly string[];
  /** Matched against the pathname of a resolved anchor target. */
  detailPathPattern: RegExp;
  exampleQueries: readonly string[];
};

export const FINDAPHD: SiteProfile = {
  name: "FindAPhD",
  host: "www.findaphd.com",
  searchUrl: "https://www.findaphd.com/phds/",
  queryParams: ["Keywords", "g0w900"],
  detailPathPattern: /^\/phds\/project\/[^/]+\/?$/,
  exampleQueries: [
    "https://www.findaphd.com/phds/united-kingdom/?g0w900&Keywords=llm+optimisation",
    "https://www.findaphd.com/phds/united-kingdom/?g0w900&Keywords=machine+learning",
  ],
};

export function isOnSite(url: URL, site: SiteProfile): boolean {
  return url.hostname.toLowerCase() === site.host.toLowerCase();
}
