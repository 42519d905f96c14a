import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StoreError } from "./errors";
import { unknownRecord } from "./extract";
import { silentLogger } from "./helpers/log.helper";
import { ResultStore, toCsvRow } from "./save";
import type { ExtractedRecord } from "./types";

const HEADER = '"source_url","title","university","supervisor","funding","alignment","other","extracted_at"';

function record(n: number, patch: Partial<ExtractedRecord> = {}): ExtractedRecord {
  return {
    sourceUrl: `https://www.findaphd.com/phds/project/p${n}/?p${n}`,
    title: `Project ${n}`,
    university: "University of Testland",
    supervisor: "Dr Example",
    funding: "Funded, open to international students",
    alignment: "7/10",
    other: { subject_area: "Machine Learning" },
    extractedAt: "2026-04-01T10:00:00.000Z",
    parseFailed: false,
    ...patch,
  };
}

let dir: string;
let path: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "phd-harvest-"));
  path = join(dir, "out", "phd_listings.csv");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function store(mode: "MERGE" | "REPLACE" = "MERGE") {
  return new ResultStore({ path, mode, logger: silentLogger });
}

describe("ResultStore", () => {
  it("stores a source URL at most once per run", () => {
    const s = store();

    expect(s.append(record(1))).toBe(true);
    expect(s.append(record(1, { title: "Second copy" }))).toBe(false);

    expect(s.size).toBe(1);
    expect(s.records()[0].title).toBe("Project 1");
  });

  it("writes the fixed header and reloads what it wrote", async () => {
    const first = store();
    first.append(record(1));
    first.append(record(2, { other: {} }));
    await first.flush();

    const text = await readFile(path, "utf-8");
    expect(text.split("\n")[0]).toBe(HEADER);
    expect(text.trimEnd().split("\n")).toHaveLength(3);

    const second = store();
    expect(await second.load()).toBe(2);
    expect(second.records()).toEqual([record(1), record(2, { other: {} })]);
  });

  it("replaces a row from an earlier run in place instead of duplicating it", async () => {
    const first = store();
    first.append(record(1));
    first.append(record(2));
    await first.flush();

    const rerun = store();
    await rerun.load();
    expect(rerun.wasPersisted(record(1).sourceUrl)).toBe(true);
    expect(rerun.has(record(2).sourceUrl)).toBe(true);
    expect(rerun.has(record(3).sourceUrl)).toBe(false);
    expect(rerun.append(record(1, { title: "Project 1 (updated)" }))).toBe(true);
    expect(rerun.append(record(1, { title: "ignored" }))).toBe(false);
    await rerun.flush();

    const reloaded = store();
    await reloaded.load();
    expect(reloaded.records().map((r) => r.title)).toEqual(["Project 1 (updated)", "Project 2"]);
  });

  it("moves the old file aside in REPLACE mode", async () => {
    const first = store();
    first.append(record(1));
    await first.flush();

    const fresh = store("REPLACE");
    expect(await fresh.load()).toBe(0);
    fresh.append(record(3));
    await fresh.flush();

    const files = await readdir(join(dir, "out"));
    expect(files.sort()).toEqual(["phd_listings.csv", "phd_listings.old.csv"]);
    const reloaded = store();
    await reloaded.load();
    expect(reloaded.records().map((r) => r.title)).toEqual(["Project 3"]);
  });

  it("leaves no temp files behind and serializes concurrent flushes", async () => {
    const s = store();
    for (let i = 1; i <= 5; i++) s.append(record(i));

    await Promise.all([s.flush(), s.flush(), s.flush()]);

    expect(await readdir(join(dir, "out"))).toEqual(["phd_listings.csv"]);
    const reloaded = store();
    expect(await reloaded.load()).toBe(5);
  });

  it("starts empty when there is no earlier file", async () => {
    expect(await store().load()).toBe(0);
  });

  it("refuses to load a file with a different header and leaves it untouched", async () => {
    const foreign = "url,title,university\nhttps://example.org/a,A,Uni A\nhttps://example.org/b,B,Uni B\n";
    await mkdir(join(dir, "out"), { recursive: true });
    await writeFile(path, foreign);

    const s = store();
    const err = await s.load().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreError);
    expect(err).toMatchObject({ path });
    expect(String(err)).toContain('unexpected header "url,title,university"');
    expect(await readFile(path, "utf-8")).toBe(foreign);
  });

  it("refuses to load a row without a source URL", async () => {
    const text = `${HEADER}\n"","Orphan","Uni","Dr X","unknown","unknown","unknown","2026-04-01T10:00:00.000Z"\n`;
    await mkdir(join(dir, "out"), { recursive: true });
    await writeFile(path, text);

    await expect(store().load()).rejects.toThrow(`result store ${path}: row 1 has no source_url; refusing to overwrite it`);
    expect(await readFile(path, "utf-8")).toBe(text);
  });

  it("treats an empty existing file as an empty table", async () => {
    await mkdir(join(dir, "out"), { recursive: true });
    await writeFile(path, "");

    expect(await store().load()).toBe(0);
  });

  it("keeps scraped text from running as a spreadsheet formula", async () => {
    const first = store();
    first.append(record(1, { title: "=HYPERLINK(\"x\")", supervisor: "@someone" }));
    await first.flush();

    const dataLine = (await readFile(path, "utf-8")).split("\n")[1];
    expect(dataLine).toContain(`"'=HYPERLINK(""x"")"`);
    expect(dataLine).toContain(`"'@someone"`);

    const reloaded = store();
    await reloaded.load();
    expect(reloaded.records()[0]).toMatchObject({ title: "=HYPERLINK(\"x\")", supervisor: "@someone" });
  });

  it("raises StoreError when the sink cannot be written", async () => {
    await writeFile(join(dir, "blocker"), "a file, not a directory");
    const s = new ResultStore({ path: join(dir, "blocker", "out.csv"), logger: silentLogger });
    s.append(record(1));

    await expect(s.flush()).rejects.toBeInstanceOf(StoreError);
  });
});

describe("toCsvRow", () => {
  it("writes the sentinel for an empty other mapping", () => {
    const row = toCsvRow(unknownRecord("https://www.findaphd.com/phds/project/x/?p1"));

    expect(row).toMatchObject({
      source_url: "https://www.findaphd.com/phds/project/x/?p1",
      title: "unknown",
      university: "unknown",
      other: "unknown",
    });
  });

  it("serializes other as JSON", () => {
    expect(toCsvRow(record(1)).other).toBe('{"subject_area":"Machine Learning"}');
  });
});
