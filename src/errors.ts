export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends PipelineError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, reason: string, options?: { status?: number; cause?: unknown }) {
    super(`GET ${url} failed: ${reason}`, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

/** Malformed markup or model output. `raw` keeps what could not be parsed. */
export class ParseError extends PipelineError {
  readonly raw: string;

  constructor(message: string, raw: string, options?: { cause?: unknown }) {
    super(message, options);
    this.raw = raw;
  }
}

export class GenerationError extends PipelineError {
  readonly goal: string;

  constructor(goal: string, reason: string, options?: { cause?: unknown }) {
    super(`could not generate search queries for "${goal}": ${reason}`, options);
    this.goal = goal;
  }
}

export class StoreError extends PipelineError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`result store ${path}: ${reason}`, options);
    this.path = path;
  }
}

export class ModelError extends PipelineError {}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`invalid configuration in ${source}: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
