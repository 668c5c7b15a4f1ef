import type { StageName } from './types/report.js';

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ExtractionError extends PipelineError {
  readonly url: string;
  readonly statusCode: number | null;

  constructor(url: string, message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, options);
    this.url = url;
    this.statusCode = options?.statusCode ?? null;
  }
}

export class ConnectionError extends PipelineError {
  readonly target: string;

  constructor(target: string, options?: { cause?: unknown }) {
    super(`Could not connect to ${target}`, options);
    this.target = target;
  }
}

export class StatementError extends PipelineError {
  /** First characters of the failing SQL */
  readonly statement: string;

  constructor(message: string, statement: string, options?: { cause?: unknown }) {
    super(message, options);
    this.statement = statement.slice(0, 200);
  }
}

export class ScriptError extends PipelineError {
  readonly script: string;

  constructor(script: string, options?: { cause?: unknown }) {
    super(`SQL script ${script} failed: ${describeError(options?.cause)}`, options);
    this.script = script;
  }
}

export class StageError extends PipelineError {
  readonly stage: StageName;

  constructor(stage: StageName, cause: unknown) {
    super(`Stage '${stage}' failed: ${describeError(cause)}`, { cause });
    this.stage = stage;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return 'unknown error';
  return String(err);
}
