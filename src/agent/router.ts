import { ClassificationError } from "../errors";
import { buildRouterPrompt } from "../llm/prompt";
import { invokeStage, unwrapOutcome, type ParseResult } from "../llm/outcome";
import type { ModelClient } from "../llm/client";
import { logger } from "../utils/logger";
import { TRACKS, type PipelineRequest, type Track } from "../types";

function isTrack(value: string): value is Track {
  return (TRACKS as readonly string[]).includes(value);
}

/**
 * Reads a track label out of free model text. Exactly one distinct label must
 * appear; anything else is reported as issues rather than guessed.
 */
export function parseTrack(raw: string): ParseResult<Track> {
  const words: string[] = raw.toUpperCase().match(/[A-Z]+/g) ?? [];
  const labels = new Set(words.filter(isTrack));

  if (labels.size === 1) {
    const [track] = Array.from(labels);
    return { ok: true, value: track };
  }
  if (labels.size === 0) {
    return { ok: false, issues: [`no track label in "${raw.trim()}"`] };
  }
  return { ok: false, issues: [`ambiguous track labels: ${Array.from(labels).join(", ")}`] };
}

export async function routeIntent(
  model: ModelClient,
  request: PipelineRequest,
  signal?: AbortSignal
): Promise<Track> {
  const { system, prompt } = buildRouterPrompt(request);
  const outcome = await invokeStage(model, { stage: "router", system, prompt, format: "text", signal }, parseTrack);

  if (outcome.kind === "parse_failure") {
    logger.router.warn("Router output unusable", { raw: outcome.raw, issues: outcome.issues });
    throw new ClassificationError(outcome.raw);
  }

  const track = unwrapOutcome("router", outcome);
  logger.router.info("Request classified", { track });
  return track;
}
