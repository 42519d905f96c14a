import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import Papa from "papaparse";
import pLimit from "p-limit";
import { StoreError } from "./errors";
import { logger as defaultLogger, type Logger } from "./helpers/log.helper";
import { UNKNOWN, type ExtractedRecord } from "./types";
import { errorMessage } from "./utils";

export const CSV_HEADER = [
  "source_url",
  "title",
  "university",
  "supervisor",
  "funding",
  "alignment",
  "other",
  "extracted_at",
] as const;

type CsvColumn = (typeof CSV_HEADER)[number];
type CsvRow = Record<CsvColumn, string>;

export type StoreMode = "MERGE" | "REPLACE";

export type ResultStoreOptions = {
  path: string;
  mode?: StoreMode;
  logger?: Logger;
};

export function toCsvRow(r: ExtractedRecord): CsvRow {
  return {
    source_url: r.sourceUrl,
    title: r.title,
    university: r.university,
    supervisor: r.supervisor,
    funding: r.funding,
    alignment: r.alignment,
    other: Object.keys(r.other).length > 0 ? JSON.stringify(r.other) : UNKNOWN,
    extracted_at: r.extractedAt,
  };
}

function parseOther(cell: string): Record<string, string> {
  if (!cell || cell === UNKNOWN) return {};
  try {
    const parsed: unknown = JSON.parse(cell);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      const out: Record<string, string> = {};
      for (const [k, v] of Object.entries(parsed)) out[k] = String(v);
      return out;
    }
  } catch {
    // hand-edited cell: keep the text rather than dropping it
  }
  return { note: cell };
}

/** Undoes the quote papaparse puts in front of cells a spreadsheet would run as formulas. */
function unescapeFormula(cell: string): string {
  return /^'[=+\-@\t\r]/.test(cell) ? cell.slice(1) : cell;
}

export function fromCsvRow(row: Partial<Record<string, string>>): ExtractedRecord | null {
  const sourceUrl = row.source_url?.trim();
  if (!sourceUrl) return null;
  const cell = (k: CsvColumn) => unescapeFormula(row[k]?.trim() ?? "") || UNKNOWN;
  return {
    sourceUrl,
    title: cell("title"),
    university: cell("university"),
    supervisor: cell("supervisor"),
    funding: cell("funding"),
    alignment: cell("alignment"),
    other: parseOther(row.other ?? ""),
    extractedAt: row.extracted_at?.trim() ?? "",
    parseFailed: false,
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * The output table. Unique on source URL: a URL appended twice in one run is
 * stored once, a URL loaded from an earlier run is replaced by this run's
 * record. All disk writes go through one serialized flush.
 */
export class ResultStore {
  readonly path: string;
  private readonly mode: StoreMode;
  private readonly logger: Logger;
  private readonly rows = new Map<string, ExtractedRecord>();
  private readonly persisted = new Set<string>();
  private readonly seenThisRun = new Set<string>();
  private readonly writeLock = pLimit(1);
  private flushes = 0;
  private loaded = false;

  constructor({ path, mode = "MERGE", logger = defaultLogger }: ResultStoreOptions) {
    this.path = path;
    this.mode = mode;
    this.logger = logger;
  }

  async load(): Promise<number> {
    if (this.loaded) return this.rows.size;
    this.loaded = true;

    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return 0;
      throw new StoreError(this.path, `cannot read existing results: ${errorMessage(err)}`, { cause: err });
    }

    if (this.mode === "REPLACE") {
      const old = this.path.replace(/\.csv$/i, "") + ".old.csv";
      this.logger.info(`Found existing file ${this.path}, renaming to ${old}`);
      try {
        await rename(this.path, old);
      } catch (err) {
        throw new StoreError(this.path, `cannot move aside existing results: ${errorMessage(err)}`, { cause: err });
      }
      return 0;
    }

    if (text.trim() === "") return 0;
    const parsed = Papa.parse<Record<string, string>>(text, { header: true, skipEmptyLines: true });
    if (parsed.errors.length > 0) {
      const first = parsed.errors[0];
      throw new StoreError(this.path, `malformed CSV at row ${first.row ?? "?"}: ${first.message}`);
    }
    const fields = parsed.meta.fields ?? [];
    if (fields.join(",") !== CSV_HEADER.join(",")) {
      throw new StoreError(
        this.path,
        `unexpected header "${fields.join(",")}" (expected "${CSV_HEADER.join(",")}"); refusing to overwrite it`
      );
    }
    for (const [i, row] of parsed.data.entries()) {
      const record = fromCsvRow(row);
      if (!record) throw new StoreError(this.path, `row ${i + 1} has no source_url; refusing to overwrite it`);
      this.rows.set(record.sourceUrl, record);
      this.persisted.add(record.sourceUrl);
    }
    this.logger.info(`Loaded ${this.rows.size} existing rows from ${this.path}`);
    return this.rows.size;
  }

  /** False when the URL was already stored during this run. */
  append(record: ExtractedRecord): boolean {
    if (this.seenThisRun.has(record.sourceUrl)) return false;
    this.seenThisRun.add(record.sourceUrl);
    this.rows.set(record.sourceUrl, record);
    return true;
  }

  /** Whether the table holds a row for the URL, from this run or the loaded file. */
  has(url: string): boolean {
    return this.rows.has(url);
  }

  /** Whether the URL came from the file loaded at start-up. */
  wasPersisted(url: string): boolean {
    return this.persisted.has(url);
  }

  get size(): number {
    return this.rows.size;
  }

  records(): ExtractedRecord[] {
    return [...this.rows.values()];
  }

  /** Writes the whole table to a temp file and renames it over the target. */
  flush(): Promise<void> {
    return this.writeLock(() => this.writeAll());
  }

  private async writeAll(): Promise<void> {
    const csv = Papa.unparse(
      {
        fields: [...CSV_HEADER],
        data: this.records().map((r) => {
          const row = toCsvRow(r);
          return CSV_HEADER.map((column) => row[column]);
        }),
      },
      { quotes: true, newline: "\n", escapeFormulae: true }
    );
    const tmp = `${this.path}.${process.pid}.${++this.flushes}.tmp`;

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmp, csv + "\n", "utf-8");
      await rename(tmp, this.path);
    } catch (err) {
      await rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.warn(`Could not remove ${tmp}: ${errorMessage(cleanupErr)}`);
      });
      throw new StoreError(this.path, `write failed: ${errorMessage(err)}`, { cause: err });
    }
    this.logger.debug(`Flushed ${this.rows.size} rows to ${this.path}`);
  }
}
