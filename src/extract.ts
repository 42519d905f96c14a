import { z } from "zod";
import { ParseError } from "./errors";
import { logger as defaultLogger, type Logger } from "./helpers/log.helper";
import type { LanguageModel } from "./llm";
import { SCHEMA_FIELDS, UNKNOWN, type ContentBlob, type ExtractedRecord } from "./types";
import { collapseWhitespace, errorMessage, nowIso, stripCodeFences, trimTo } from "./utils";

const Scalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const ModelRecord = z
  .object({
    title: Scalar,
    university: Scalar,
    supervisor: Scalar,
    funding: Scalar,
    alignment: Scalar,
    other: z.union([z.record(Scalar), z.null()]),
  })
  .passthrough();

type ModelRecord = z.infer<typeof ModelRecord>;

export type ExtractedFields = Pick<
  ExtractedRecord,
  "title" | "university" | "supervisor" | "funding" | "alignment" | "other"
>;

/** Decides the stored `alignment` value. Defaults to what the model wrote. */
export type AlignmentPolicy = (fields: ExtractedFields, blob: ContentBlob) => string;

export type FieldExtractorOptions = {
  model: LanguageModel;
  maxInputChars?: number;
  alignment?: AlignmentPolicy;
  timeoutMs?: number;
  logger?: Logger;
};

export const SCHEMA_EXAMPLE = `{
  "title": "Project title",
  "university": "University name",
  "supervisor": "Supervisor name(s)",
  "funding": "Funding information, including whether international students are eligible",
  "alignment": "How well the project matches the applicant's interests, with a 0-10 score",
  "other": { "subject_area": "Main subject area", "key_skills": "Key skills mentioned or required" }
}`;

export function buildExtractionPrompt(text: string, goal?: string): string {
  const interests = goal ? `\nApplicant's interests: ${goal}\n` : "";
  return `Extract structured information from this PhD project description.
${interests}
Project text:
${text}

Return ONLY a JSON object with exactly these keys (use null for missing info; put any further attributes as strings inside "other"):
${SCHEMA_EXAMPLE}`;
}

export function buildCorrectionPrompt(text: string, malformed: string, problem: string, goal?: string): string {
  return `${buildExtractionPrompt(text, goal)}

Your previous answer could not be used (${problem}):
${malformed}

Answer again with ONLY the JSON object, no prose and no code fences.`;
}

function toField(v: z.infer<typeof Scalar> | undefined): string {
  if (v === null || v === undefined) return UNKNOWN;
  const s = collapseWhitespace(String(v));
  return s.length > 0 ? s : UNKNOWN;
}

function toOther(parsed: ModelRecord): Record<string, string> {
  const other: Record<string, string> = {};
  for (const [k, v] of Object.entries(parsed.other ?? {})) {
    const s = toField(v);
    if (s !== UNKNOWN) other[k] = s;
  }
  // keys the model invented beside the schema are kept, not lost
  const known = new Set<string>(SCHEMA_FIELDS);
  for (const [k, v] of Object.entries(parsed)) {
    if (known.has(k) || k in other) continue;
    const extra = Scalar.safeParse(v);
    if (extra.success && toField(extra.data) !== UNKNOWN) other[k] = toField(extra.data);
  }
  return other;
}

/** Parses one model answer into the six schema fields or throws ParseError. */
export function parseExtraction(raw: string): ExtractedFields {
  const body = stripCodeFences(raw);
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new ParseError(`model output is not JSON: ${errorMessage(err)}`, raw, { cause: err });
  }

  const result = ModelRecord.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ParseError(`model output does not match the schema: ${issues.join("; ")}`, raw);
  }

  const parsed = result.data;
  return {
    title: toField(parsed.title),
    university: toField(parsed.university),
    supervisor: toField(parsed.supervisor),
    funding: toField(parsed.funding),
    alignment: toField(parsed.alignment),
    other: toOther(parsed),
  };
}

export function unknownRecord(sourceUrl: string): ExtractedRecord {
  return {
    sourceUrl,
    title: UNKNOWN,
    university: UNKNOWN,
    supervisor: UNKNOWN,
    funding: UNKNOWN,
    alignment: UNKNOWN,
    other: {},
    extractedAt: nowIso(),
    parseFailed: true,
  };
}

export type ExtractOptions = {
  /** The user's goal, so the model can judge alignment against it. */
  goal?: string;
  signal?: AbortSignal;
};

export class FieldExtractor {
  private readonly model: LanguageModel;
  private readonly maxInputChars: number;
  private readonly alignment?: AlignmentPolicy;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;

  constructor({ model, maxInputChars = 4000, alignment, timeoutMs, logger = defaultLogger }: FieldExtractorOptions) {
    this.model = model;
    this.maxInputChars = maxInputChars;
    this.alignment = alignment;
    this.timeoutMs = timeoutMs;
    this.logger = logger;
  }

  /**
   * One blob per model call. Malformed output gets exactly one corrective
   * call; if that fails too the row is kept with every field unknown and
   * `parseFailed` set. Errors from the model call itself propagate.
   */
  async extract(blob: ContentBlob, { goal, signal }: ExtractOptions = {}): Promise<ExtractedRecord> {
    const text = blob.text.slice(0, this.maxInputChars);
    const options = { signal, timeoutMs: this.timeoutMs };

    const prompts = [buildExtractionPrompt(text, goal)];
    let lastError: ParseError | undefined;

    for (let attempt = 0; attempt < 2; attempt++) {
      const raw = await this.model.complete(prompts[attempt], options);
      this.logger.debug(`LLM response for extraction: ${trimTo(raw, 200) ?? ""}`);
      try {
        const fields = parseExtraction(raw);
        return {
          sourceUrl: blob.url,
          ...fields,
          alignment: this.alignment ? toField(this.alignment(fields, blob)) : fields.alignment,
          extractedAt: nowIso(),
          parseFailed: false,
        };
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        lastError = err;
        this.logger.warn(`Unusable extraction for ${blob.url} (attempt ${attempt + 1}): ${err.message}`);
        prompts.push(buildCorrectionPrompt(text, trimTo(raw, 2000) ?? "", err.message, goal));
      }
    }

    this.logger.error(`Giving up on ${blob.url}: ${lastError?.message ?? "unparseable output"}`);
    return unknownRecord(blob.url);
  }
}
