import type { Candidate, DietaryProfile, PipelineRequest, SearchHit, Track } from "../types";
import { TRACKS } from "../types";

export interface RenderedPrompt {
  system: string;
  prompt: string;
}

const SEVERITY_GUIDANCE: Record<DietaryProfile["severity"], string> = {
  preference: "a preference; minor cross-contact is acceptable",
  intolerance: "an intolerance; avoid the ingredient, shared equipment is a concern",
  allergy: "an allergy; reject any option without explicit evidence of safe handling",
  anaphylactic: "a life-threatening allergy; only options with dedicated preparation or certification qualify"
};

export function describeProfile(profile: DietaryProfile): string {
  return `${profile.restrictions.join(", ")} (${SEVERITY_GUIDANCE[profile.severity]})`;
}

export function buildRouterPrompt(request: PipelineRequest): RenderedPrompt {
  return {
    system: [
      "You classify food search requests.",
      `Answer with exactly one word: ${TRACKS.join(" or ")}.`,
      "RESTAURANT means the user wants a place to eat prepared food. GROCERY means the user wants a packaged product or ingredient to buy."
    ].join(" "),
    prompt: [`Query: ${request.mission}`, `Location: ${request.location}`].join("\n")
  };
}

const VETTER_ROLES: Record<Track, string> = {
  RESTAURANT: [
    "You are a dietary safety officer vetting restaurants.",
    "Use only the search results provided as evidence. Check menus, allergen statements and reviews against the dietary profile."
  ].join(" "),
  GROCERY: [
    "You are a product analyst vetting grocery items.",
    "Use only the search results provided as evidence. Check ingredient labels and certifications against the dietary profile, and name a store in the location where the item is sold."
  ].join(" ")
};

export function buildSearchQuery(track: Track, request: PipelineRequest): string {
  const restrictions = request.dietaryProfile.restrictions.join(" ");
  if (track === "RESTAURANT") {
    return `${restrictions} ${request.mission} restaurant near ${request.location}`;
  }
  return `${restrictions} ${request.mission} brand ingredients where to buy ${request.location}`;
}

export function buildVetterPrompt(
  track: Track,
  request: PipelineRequest,
  hits: SearchHit[],
  target: number
): RenderedPrompt {
  const evidence = hits.map((hit) =>
    [
      `[${hit.position}] ${hit.title}`,
      hit.address ? `    address: ${hit.address}` : null,
      `    snippet: ${hit.snippet}`,
      `    link: ${hit.link}`
    ]
      .filter((line): line is string => line !== null)
      .join("\n")
  );

  return {
    system: VETTER_ROLES[track],
    prompt: [
      `Mission: ${request.mission}`,
      `Location: ${request.location}`,
      `Dietary profile: ${describeProfile(request.dietaryProfile)}`,
      "",
      "Search results:",
      ...evidence,
      "",
      `Select at most ${target} options, best evidence first.`,
      `Only include options located in ${request.location}. Exclude anything elsewhere.`,
      "Exclude options whose evidence conflicts with the dietary profile.",
      "Respond with a single JSON object using the schema:",
      "{",
      '  "candidates": [',
      '    { "name": "string", "evidence": "1-2 sentences quoting the search result", "source": "link from the search results", "location": "street address or neighbourhood, city" }',
      "  ]",
      "}",
      'Return { "candidates": [] } when nothing qualifies.'
    ].join("\n")
  };
}

export function buildAuditorPrompt(request: PipelineRequest, candidates: Candidate[]): RenderedPrompt {
  const report = candidates.map(({ name, evidence, source, location }) => ({ name, evidence, source, location }));
  return {
    system: [
      "You audit dietary safety reports.",
      "Judge how strongly the evidence supports each option being safe for the profile. Do not add options."
    ].join(" "),
    prompt: [
      `Dietary profile: ${describeProfile(request.dietaryProfile)}`,
      `Location: ${request.location}`,
      "",
      "Vetting report:",
      JSON.stringify(report, null, 2),
      "",
      "Respond with a single JSON object using the schema:",
      "{",
      '  "score": 0,',
      '  "annotations": [',
      '    { "name": "option name exactly as given", "status": "verified | insufficient_evidence | unsafe", "note": "one sentence" }',
      "  ]",
      "}",
      "score is the overall safety confidence from 0 to 100; higher means stronger evidence.",
      "Provide one annotation per option, in the same order."
    ].join("\n")
  };
}
