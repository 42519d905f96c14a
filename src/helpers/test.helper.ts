import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import type { CompleteOptions, LanguageModel } from "../llm";
import { createLogger, type Logger } from "./log.helper";

export type StubResponse = { status?: number; body?: string; delayMs?: number } | string | Error;

export type StubHttp = {
  http: AxiosInstance;
  /** URL, start time (Date.now) and lower-cased headers of every request, in arrival order. */
  requests: { url: string; at: number; headers: Record<string, string> }[];
};

/**
 * An axios instance answering from `routes` in process. Unknown URLs get a 404.
 * A function route sees how many times that URL was requested before. A reply
 * slower than the instance timeout fails the way axios reports a timeout.
 */
export function stubHttp(
  routes: Record<string, StubResponse | ((attempt: number) => StubResponse)>,
  base?: AxiosInstance
): StubHttp {
  const requests: StubHttp["requests"] = [];
  const counts = new Map<string, number>();

  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const url = config.url ?? "";
    const headers: Record<string, string> = {};
    for (const [k, v] of Object.entries(config.headers.toJSON())) {
      if (typeof v === "string") headers[k.toLowerCase()] = v;
    }
    requests.push({ url, at: Date.now(), headers });

    const attempt = counts.get(url) ?? 0;
    counts.set(url, attempt + 1);
    const route = routes[url];
    const answer = typeof route === "function" ? route(attempt) : route ?? { status: 404, body: "not found" };

    if (answer instanceof Error) {
      throw new AxiosError(answer.message, "ECONNREFUSED", config);
    }
    const reply: Exclude<StubResponse, string | Error> = typeof answer === "string" ? { body: answer } : answer;
    const { status = 200, body = "", delayMs = 0 } = reply;
    const timeout = config.timeout ?? 0;
    if (timeout > 0 && delayMs > timeout) {
      await new Promise((r) => setTimeout(r, timeout));
      throw new AxiosError(`timeout of ${timeout}ms exceeded`, AxiosError.ECONNABORTED, config);
    }
    if (delayMs > 0) await new Promise((r) => setTimeout(r, delayMs));
    return { data: body, status, statusText: String(status), headers: {}, config };
  };

  const http = base ?? axios.create({ headers: { "User-Agent": "test-agent" } });
  http.defaults.adapter = adapter;
  http.defaults.validateStatus = () => true;
  return { http, requests };
}

export type ModelReply = string | Error;

/** A LanguageModel whose answers are decided by the test. */
export class ScriptedModel implements LanguageModel {
  readonly prompts: string[] = [];

  constructor(private readonly reply: (prompt: string, call: number) => ModelReply | Promise<ModelReply>) {}

  static sequence(...replies: ModelReply[]): ScriptedModel {
    return new ScriptedModel((_, call) => replies[Math.min(call, replies.length) - 1] ?? "");
  }

  async complete(prompt: string, _options?: CompleteOptions): Promise<string> {
    this.prompts.push(prompt);
    const answer = await this.reply(prompt, this.prompts.length);
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

export function memoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({
    level: "debug",
    write: (line) => {
      lines.push(line);
    },
  });
  return Object.assign(logger, { lines });
}

export function page(body: string, title = "Test page"): string {
  return `<!doctype html><html><head><title>${title}</title></head><body>${body}</body></html>`;
}
