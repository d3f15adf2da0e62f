import type { ZodType, ZodTypeDef } from "zod";
import { ParseError, StageTimeoutError, UpstreamDependencyError } from "../errors";
import { extractJsonObject } from "../utils";
import type { StageName } from "../types";
import type { CompletionRequest, ModelClient } from "./client";

export type StageOutcome<T> =
  | { kind: "success"; payload: T; raw: string }
  | { kind: "parse_failure"; raw: string; issues: string[] }
  | { kind: "provider_error"; cause: unknown };

export type ParseResult<T> = { ok: true; value: T } | { ok: false; issues: string[] };

export type ResponseParser<T> = (raw: string) => ParseResult<T>;

export async function invokeStage<T>(
  client: ModelClient,
  request: CompletionRequest,
  parse: ResponseParser<T>
): Promise<StageOutcome<T>> {
  let raw: string;
  try {
    raw = await client.complete(request);
  } catch (cause) {
    return { kind: "provider_error", cause };
  }

  const parsed = parse(raw);
  if (!parsed.ok) {
    return { kind: "parse_failure", raw, issues: parsed.issues };
  }
  return { kind: "success", payload: parsed.value, raw };
}

export function jsonParser<T>(schema: ZodType<T, ZodTypeDef, unknown>): ResponseParser<T> {
  return (raw) => parseJsonPayload(raw, schema);
}

export function parseJsonPayload<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>): ParseResult<T> {
  const candidate = extractJsonObject(raw);
  if (candidate === null) {
    return { ok: false, issues: ["response did not contain a JSON object"] };
  }

  const result = schema.safeParse(candidate);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    };
  }
  return { ok: true, value: result.data };
}

export function unwrapOutcome<T>(stage: StageName, outcome: StageOutcome<T>): T {
  switch (outcome.kind) {
    case "success":
      return outcome.payload;
    case "parse_failure":
      throw new ParseError(stage, outcome.raw, outcome.issues);
    case "provider_error":
      throw new UpstreamDependencyError(stage, outcome.cause, outcome.cause instanceof StageTimeoutError);
  }
}
