import { z } from "zod";
import { UpstreamDependencyError } from "../errors";
import { buildSearchQuery, buildVetterPrompt } from "../llm/prompt";
import { invokeStage, jsonParser, unwrapOutcome } from "../llm/outcome";
import { normalizeText } from "../utils";
import { logger } from "../utils/logger";
import US_STATES from "../data/us-states.json";
import type { Candidate, PipelineDependencies, PipelineRequest, SearchHit, Track } from "../types";

const VettedCandidateSchema = z.object({
  name: z.string().trim().min(1),
  evidence: z.string().trim().default(""),
  source: z.string().trim().default(""),
  location: z.string().trim().default("")
});

const VetterResponseSchema = z.object({
  candidates: z.array(VettedCandidateSchema)
});

type VettedCandidate = z.infer<typeof VettedCandidateSchema>;

const STATE_CODES = new Map<string, string>(Object.entries(US_STATES));
const STATE_NAMES = new Map<string, string>(Object.entries(US_STATES).map(([name, code]) => [code, name]));

export type VetterResult =
  | { kind: "candidates"; candidates: Candidate[]; pool: number }
  | { kind: "empty"; note: string; pool: number };

/** The locality is the part of a location before the first comma ("Chicago, IL" → "chicago"). */
export function geofenceLocality(requestedLocation: string): string {
  const [head = ""] = requestedLocation.split(",");
  const locality = normalizeText(head);
  return locality.length > 0 ? locality : normalizeText(requestedLocation);
}

/**
 * A candidate is inside the fence when one comma-separated part of its location
 * is exactly the requested locality. When the request also names a region
 * ("Portland, OR"), a later part must start with that region, under either its
 * state name or its postal code.
 */
export function isWithinGeofence(candidateLocation: string, requestedLocation: string): boolean {
  const locality = geofenceLocality(requestedLocation);
  const parts = splitLocation(candidateLocation);
  if (locality.length === 0 || parts.length === 0) {
    return false;
  }

  const [, regionPart = ""] = splitLocation(requestedLocation);
  const regions = regionAliases(regionPart);

  return parts.some(
    (part, index) =>
      part === locality &&
      (regions.length === 0 || parts.slice(index + 1).some((later) => regions.some((region) => startsWithWords(later, region))))
  );
}

function splitLocation(location: string): string[] {
  return location
    .split(",")
    .map(normalizeText)
    .filter((part) => part.length > 0);
}

function regionAliases(region: string): string[] {
  if (region.length === 0) {
    return [];
  }
  const code = STATE_CODES.get(region);
  const name = STATE_NAMES.get(region);
  return [region, ...(code ? [code] : []), ...(name ? [name] : [])];
}

function startsWithWords(part: string, prefix: string): boolean {
  return part === prefix || part.startsWith(`${prefix} `);
}

export async function vetCandidates(
  deps: PipelineDependencies,
  track: Track,
  request: PipelineRequest,
  signal?: AbortSignal
): Promise<VetterResult> {
  const log = logger.vetter;
  const { model, search, settings } = deps;

  let hits: SearchHit[];
  try {
    hits = await search.search({
      query: buildSearchQuery(track, request),
      location: request.location,
      limit: settings.searchPoolSize,
      signal
    });
  } catch (error) {
    throw new UpstreamDependencyError("vetter", error);
  }

  if (hits.length === 0) {
    log.info("Search grounding returned no hits", { track, location: request.location });
    return { kind: "empty", note: `No search results were found for "${request.mission}" in ${request.location}.`, pool: 0 };
  }

  const { system, prompt } = buildVetterPrompt(track, request, hits, settings.vetterTarget);
  const outcome = await invokeStage(
    model,
    { stage: "vetter", system, prompt, format: "json", signal },
    jsonParser(VetterResponseSchema)
  );
  const { candidates: vetted } = unwrapOutcome("vetter", outcome);

  const candidates = selectCandidates(vetted, hits, request.location, settings.vetterTarget);
  log.info("Vetting complete", {
    track,
    pool: hits.length,
    proposed: vetted.length,
    kept: candidates.length
  });

  if (candidates.length === 0) {
    return {
      kind: "empty",
      note: `No options in ${request.location} met the ${request.dietaryProfile.restrictions.join(", ")} profile.`,
      pool: hits.length
    };
  }
  return { kind: "candidates", candidates, pool: hits.length };
}

/**
 * Takes each location from the address of the matching search hit, falling
 * back to the model's location when no hit matches. Drops anything
 * outside the geofence, collapses duplicate names and cuts to the target size.
 */
export function selectCandidates(
  vetted: VettedCandidate[],
  hits: SearchHit[],
  requestedLocation: string,
  target: number
): Candidate[] {
  const seen = new Set<string>();
  const selected: Candidate[] = [];

  for (const entry of vetted) {
    const key = normalizeText(entry.name);
    if (seen.has(key)) {
      continue;
    }

    const location = findHitAddress(entry, hits) ?? entry.location;
    if (!isWithinGeofence(location, requestedLocation)) {
      logger.vetter.debug("Excluded outside geofence", { name: entry.name, location });
      continue;
    }

    seen.add(key);
    selected.push({
      name: entry.name,
      evidence: entry.evidence,
      source: entry.source,
      location,
      flagged: false
    });

    if (selected.length >= target) {
      break;
    }
  }

  return selected;
}

function findHitAddress(entry: VettedCandidate, hits: SearchHit[]): string | undefined {
  const name = normalizeText(entry.name);
  const match = hits.find(
    (hit) => (entry.source.length > 0 && hit.link === entry.source) || normalizeText(hit.title) === name
  );
  return match?.address;
}
