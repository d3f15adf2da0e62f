import type { RunTransition, StageName } from "./types";

export type PipelineErrorKind =
  | "classification_error"
  | "parse_error"
  | "upstream_dependency_error"
  | "validation_error";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  abstract readonly httpStatus: number;

  /** Orchestrator state history up to the failure, when raised inside a run. */
  trace: RunTransition[] = [];

  /** Message safe to hand to API callers. */
  publicMessage(): string {
    return this.message;
  }
}

export class ClassificationError extends PipelineError {
  readonly kind = "classification_error";

  readonly httpStatus = 422;

  readonly raw: string;

  constructor(raw: string, message = "Unable to classify the request as a restaurant or grocery search.") {
    super(message);
    this.name = "ClassificationError";
    this.raw = raw;
  }
}

export class ParseError extends PipelineError {
  readonly kind = "parse_error";

  readonly httpStatus = 502;

  readonly stage: StageName;

  readonly raw: string;

  readonly issues: string[];

  constructor(stage: StageName, raw: string, issues: string[]) {
    super(`The ${stage} stage returned a malformed response: ${issues.join("; ")}`);
    this.name = "ParseError";
    this.stage = stage;
    this.raw = raw;
    this.issues = issues;
  }

  publicMessage(): string {
    return `The ${this.stage} stage returned a response that could not be read.`;
  }
}

export class UpstreamDependencyError extends PipelineError {
  readonly kind = "upstream_dependency_error";

  readonly httpStatus = 503;

  readonly stage: StageName;

  readonly timedOut: boolean;

  constructor(stage: StageName, cause: unknown, timedOut = false) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${stage} stage upstream call failed: ${detail}`, { cause });
    this.name = "UpstreamDependencyError";
    this.stage = stage;
    this.timedOut = timedOut;
  }

  publicMessage(): string {
    return "Service unavailable. Please try again later.";
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

export class RequestValidationError extends PipelineError {
  readonly kind = "validation_error";

  readonly httpStatus = 400;

  readonly fields: FieldIssue[];

  constructor(fields: FieldIssue[], message = "Request body is invalid.") {
    super(message);
    this.name = "RequestValidationError";
    this.fields = fields;
  }
}

export class ConfigError extends Error {
  readonly missing: string[];

  constructor(missing: string[], problems: string[] = []) {
    const parts = [];
    if (missing.length > 0) {
      parts.push(`missing ${missing.join(", ")}`);
    }
    parts.push(...problems);
    super(`Invalid configuration: ${parts.join("; ")}`);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

export class StageTimeoutError extends Error {
  constructor(stage: StageName, timeoutMs: number) {
    super(`${stage} stage timed out after ${timeoutMs}ms`);
    this.name = "StageTimeoutError";
  }
}
