import { existsSync, readFileSync } from "node:fs";
import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_USER_AGENT } from "./http";
import { errorMessage } from "./utils";

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

export const ConfigSchema = z.object({
  apiKey: z.string().min(1, "api_key is required"),
  apiBase: z.string().url("api_base must be a URL").optional(),
  modelName: z.string().min(1, "model_name is required"),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  politenessDelayMs: nonNegativeInt.default(1000),
  fetchTimeoutMs: positiveInt.default(10_000),
  modelTimeoutMs: positiveInt.default(60_000),
  concurrency: positiveInt.default(4),
  modelConcurrency: positiveInt.default(2),
  maxProjects: positiveInt.optional(),
  outputPath: z.string().min(1).default("data/out/phd_listings.csv"),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Keys accepted in config.json, in the file's snake_case spelling. */
const FILE_KEYS: Record<string, keyof Config> = {
  api_key: "apiKey",
  api_base: "apiBase",
  model_name: "modelName",
  user_agent: "userAgent",
  politeness_delay_ms: "politenessDelayMs",
  fetch_timeout_ms: "fetchTimeoutMs",
  model_timeout_ms: "modelTimeoutMs",
  concurrency: "concurrency",
  model_concurrency: "modelConcurrency",
  max_projects: "maxProjects",
  output_path: "outputPath",
  log_level: "logLevel",
};

const ENV_KEYS: Record<string, keyof Config> = {
  OPENAI_API_KEY: "apiKey",
  OPENAI_BASE_URL: "apiBase",
  MODEL_NAME: "modelName",
  USER_AGENT: "userAgent",
  POLITENESS_DELAY_MS: "politenessDelayMs",
  FETCH_TIMEOUT_MS: "fetchTimeoutMs",
  MODEL_TIMEOUT_MS: "modelTimeoutMs",
  FETCH_CONCURRENCY: "concurrency",
  MODEL_CONCURRENCY: "modelConcurrency",
  MAX_PROJECTS: "maxProjects",
  OUTPUT_PATH: "outputPath",
  LOG_LEVEL: "logLevel",
};

export type LoadConfigOptions = {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<Config>;
  /** Read `.env` into process.env first. Off when `env` is passed explicitly. */
  useDotenv?: boolean;
};

function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(path, [`cannot parse JSON: ${errorMessage(err)}`]);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(path, ["expected a JSON object"]);
  }

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(parsed)) {
    const key = FILE_KEYS[k];
    if (key && v !== null && v !== "") out[key] = v;
  }
  return out;
}

/**
 * Precedence, lowest first: defaults, config file, environment, overrides.
 */
export function loadConfig({
  configPath = "config.json",
  env,
  overrides = {},
  useDotenv = env === undefined,
}: LoadConfigOptions = {}): Config {
  if (useDotenv) dotenv.config();
  const source = env ?? process.env;

  const fromEnv: Record<string, unknown> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const v = source[name];
    if (v !== undefined && v !== "") fromEnv[key] = key === "logLevel" ? v.toLowerCase() : v;
  }

  const definedOverrides = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  const merged = { ...readConfigFile(configPath), ...fromEnv, ...definedOverrides };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(existsSync(configPath) ? `${configPath} / environment` : "environment", issues);
  }
  return result.data;
}
