import type { Config } from "./config";
import { ConfigError } from "./errors";
import { FieldExtractor } from "./extract";
import { HostRateLimiter } from "./features/host-rate-limiter";
import type { Logger } from "./helpers/log.helper";
import { createHttp, PoliteFetcher } from "./http";
import { OpenAIChatModel } from "./llm";
import { Pipeline } from "./pipeline";
import { QueryGenerator } from "./queries";
import { ResultStore } from "./save";

export type CliArgs = {
  goal?: string;
  out?: string;
  delayMs?: number;
  maxProjects?: number;
  concurrency?: number;
  replace: boolean;
  configPath: string;
};

export const USAGE = `Usage: phd-harvest [--goal <text>] [--out <file.csv>] [--delay <ms>] [--max <n>]
                   [--concurrency <n>] [--replace] [--config <config.json>] [goal words...]`;

function readNumber(flag: string, raw: string | undefined): number {
  const n = Number(raw);
  if (raw === undefined || !Number.isFinite(n)) throw new ConfigError("command line", [`${flag} expects a number`]);
  return n;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { replace: false, configPath: "config.json" };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    switch (a) {
      case "--goal":
        args.goal = argv[++i];
        break;
      case "--out":
        args.out = argv[++i];
        break;
      case "--delay":
        args.delayMs = readNumber(a, argv[++i]);
        break;
      case "--max":
        args.maxProjects = readNumber(a, argv[++i]);
        break;
      case "--concurrency":
        args.concurrency = readNumber(a, argv[++i]);
        break;
      case "--replace":
        args.replace = true;
        break;
      case "--config":
        args.configPath = argv[++i] ?? args.configPath;
        break;
      default:
        if (a.startsWith("--")) throw new ConfigError("command line", [`unknown option ${a}`]);
        words.push(a);
    }
  }

  if (!args.goal && words.length > 0) args.goal = words.join(" ");
  return args;
}

export function buildPipeline(config: Config, logger: Logger, replace = false): Pipeline {
  const model = new OpenAIChatModel({
    apiKey: config.apiKey,
    baseURL: config.apiBase,
    model: config.modelName,
    timeoutMs: config.modelTimeoutMs,
  });
  const fetcher = new PoliteFetcher({
    limiter: new HostRateLimiter(config.politenessDelayMs),
    http: createHttp(config.userAgent, config.fetchTimeoutMs),
    logger,
  });

  return new Pipeline(
    {
      queries: new QueryGenerator({ model, timeoutMs: config.modelTimeoutMs, logger }),
      fetcher,
      extractor: new FieldExtractor({ model, timeoutMs: config.modelTimeoutMs, logger }),
      store: new ResultStore({ path: config.outputPath, mode: replace ? "REPLACE" : "MERGE", logger }),
      logger,
    },
    {
      concurrency: config.concurrency,
      modelConcurrency: config.modelConcurrency,
      maxProjects: config.maxProjects,
    }
  );
}
