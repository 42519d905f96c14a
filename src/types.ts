export const UNKNOWN = "unknown";

export type SearchQuery = Readonly<{
  url: string;
  goal: string;
}>;

export type ProjectLink = Readonly<{
  url: string;
  query: SearchQuery;
}>;

export type ContentBlob = Readonly<{
  url: string;
  text: string;
  fetchedAt: string; // ISO
}>;

export const SCHEMA_FIELDS = ["title", "university", "supervisor", "funding", "alignment", "other"] as const;

export type ExtractedRecord = Readonly<{
  sourceUrl: string;
  title: string;
  university: string;
  supervisor: string;
  funding: string;
  alignment: string;
  other: Readonly<Record<string, string>>;
  extractedAt: string; // ISO
  /** Both extraction attempts produced unparseable output. */
  parseFailed: boolean;
}>;

export type FetchResult = {
  url: string;
  html: string;
  status: number;
  fetchedAt: string;
};

export type LinkState =
  | "Discovered"
  | "Fetching"
  | "Normalizing"
  | "Extracting"
  | "Stored"
  | "Skipped"
  | "Failed";

export type RunReport = {
  goal: string;
  queries: SearchQuery[];
  discovered: number;
  stored: number;
  skipped: number;
  failed: number;
  parseFailures: number;
  /** Links never dispatched because the run was cancelled or capped. */
  pending: number;
  cancelled: boolean;
  failedLinks: { url: string; reason: string }[];
  outputPath: string;
  links: Record<string, LinkState>;
};
