import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PAINT: Record<Exclude<LogLevel, "silent">, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LoggerOptions = {
  level?: LogLevel;
  write?: (line: string, level: Exclude<LogLevel, "silent">) => void;
};

export function isLogLevel(v: string): v is LogLevel {
  return Object.hasOwn(ORDER, v);
}

const defaultWrite = (line: string, level: Exclude<LogLevel, "silent">) => {
  if (level === "error" || level === "warn") console.error(line);
  else console.log(line);
};

export function createLogger({ level = "info", write = defaultWrite }: LoggerOptions = {}): Logger {
  const emit = (at: Exclude<LogLevel, "silent">) => (message: string) => {
    if (ORDER[at] < ORDER[level]) return;
    const tag = PAINT[at](at.toUpperCase().padEnd(5));
    write(`${chalk.gray(new Date().toISOString())} ${tag} ${message}`, at);
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });

const envLevel = process.env.LOG_LEVEL?.toLowerCase();

export const logger: Logger = createLogger({
  level: envLevel && isLogLevel(envLevel) ? envLevel : "info",
});
