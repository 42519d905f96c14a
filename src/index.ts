#!/usr/bin/env tsx
import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { buildPipeline, parseArgs, USAGE } from "./cli";
import { loadConfig } from "./config";
import { ConfigError, PipelineError } from "./errors";
import { createLogger } from "./helpers/log.helper";
import type { RunReport } from "./types";
import { errorMessage } from "./utils";

async function askGoal(): Promise<string> {
  const rl = createInterface({ input, output });
  const ans = await rl.question("Describe the PhD you are looking for: ");
  rl.close();
  return ans.trim();
}

function printSummary(report: RunReport) {
  console.log(`\nDone${report.cancelled ? " (interrupted)" : ""}
Stored : ${report.stored}
Skipped: ${report.skipped}
Failed : ${report.failed}
CSV    : ${report.outputPath}\n`);
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig({
    configPath: args.configPath,
    overrides: {
      outputPath: args.out,
      politenessDelayMs: args.delayMs,
      maxProjects: args.maxProjects,
      concurrency: args.concurrency,
    },
  });
  const logger = createLogger({ level: config.logLevel });
  logger.info(`Using model ${config.modelName}${config.apiBase ? ` at ${config.apiBase}` : ""}`);

  const goal = args.goal?.trim() || (await askGoal());
  if (!goal) {
    console.error(USAGE);
    return 1;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    if (controller.signal.aborted) process.exit(130);
    logger.warn("Interrupted: finishing in-flight pages, then saving (Ctrl+C again to quit now)");
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);

  try {
    const report = await buildPipeline(config, logger, args.replace).run(goal, { signal: controller.signal });
    printSummary(report);
    return 0;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(`Error: ${e instanceof PipelineError ? e.message : errorMessage(e)}`);
    if (e instanceof ConfigError) console.error(USAGE);
    process.exit(1);
  });
