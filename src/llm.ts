import OpenAI from "openai";
import { ModelError } from "./errors";

export type CompleteOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

/** Opaque text-in, text-out model call. Prompt building and parsing stay with the callers. */
export interface LanguageModel {
  complete(prompt: string, options?: CompleteOptions): Promise<string>;
}

export type OpenAIChatModelOptions = {
  apiKey: string;
  baseURL?: string;
  model: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  client?: OpenAI;
};

export class OpenAIChatModel implements LanguageModel {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  constructor({
    apiKey,
    baseURL,
    model,
    maxTokens = 1024,
    temperature = 0.2,
    timeoutMs = 60_000,
    client,
  }: OpenAIChatModelOptions) {
    this.client = client ?? new OpenAI({ apiKey, baseURL, maxRetries: 1 });
    this.model = model;
    this.maxTokens = maxTokens;
    this.temperature = temperature;
    this.timeoutMs = timeoutMs;
  }

  async complete(prompt: string, { signal, timeoutMs = this.timeoutMs }: CompleteOptions = {}): Promise<string> {
    try {
      const r = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          max_tokens: this.maxTokens,
          temperature: this.temperature,
        },
        { signal, timeout: timeoutMs }
      );
      return r.choices[0]?.message?.content?.trim() ?? "";
    } catch (err) {
      throw new ModelError(`model ${this.model} call failed`, { cause: err });
    }
  }
}
