import { describe, expect, it } from "vitest";
import { createLogger, isLogLevel } from "./log.helper";

describe("createLogger", () => {
  it("drops messages below the configured level", () => {
    const seen: string[] = [];
    const logger = createLogger({ level: "warn", write: (_line, level) => seen.push(level) });

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(seen).toEqual(["warn", "error"]);
  });

  it("ends each line with the message", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "debug", write: (line) => lines.push(line) });

    logger.info("Found 2 project links");

    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith(" Found 2 project links")).toBe(true);
  });

  it("says nothing when silent", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "silent", write: (line) => lines.push(line) });

    logger.error("boom");

    expect(lines).toEqual([]);
  });
});

describe("isLogLevel", () => {
  it("recognizes level names only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
