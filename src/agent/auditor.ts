import { z } from "zod";
import { buildAuditorPrompt } from "../llm/prompt";
import { invokeStage, jsonParser, unwrapOutcome } from "../llm/outcome";
import { clamp, normalizeText } from "../utils";
import { logger } from "../utils/logger";
import type {
  AnnotationStatus,
  AuditAnnotation,
  AuditReport,
  Candidate,
  PipelineDependencies,
  PipelineRequest,
  Verdict
} from "../types";

const ScoreSchema = z.preprocess((value) => {
  if (typeof value === "string") {
    const match = /-?\d+(?:\.\d+)?/.exec(value);
    return match ? Number.parseFloat(match[0]) : value;
  }
  return value;
}, z.number().finite());

const AnnotationSchema = z.object({
  name: z.string().trim().default(""),
  status: z
    .string()
    .trim()
    .toLowerCase()
    .transform((value) => value.replace(/[\s-]+/g, "_"))
    .pipe(z.enum(["verified", "insufficient_evidence", "unsafe"]))
    .catch("insufficient_evidence"),
  note: z.string().trim().default("")
});

const AuditorResponseSchema = z.object({
  score: ScoreSchema,
  annotations: z.array(AnnotationSchema).default([])
});

type ModelAnnotation = z.infer<typeof AnnotationSchema>;

export interface VerdictThresholds {
  greenThreshold: number;
  redThreshold: number;
}

export interface AuditResult {
  report: AuditReport;
  candidates: Candidate[];
}

const FLAGGED_STATUSES: ReadonlySet<AnnotationStatus> = new Set(["insufficient_evidence", "unsafe"]);

export function deriveVerdict(score: number, { greenThreshold, redThreshold }: VerdictThresholds): Verdict {
  if (score >= greenThreshold) return "green";
  if (score >= redThreshold) return "yellow";
  return "red";
}

export async function auditCandidates(
  deps: PipelineDependencies,
  request: PipelineRequest,
  candidates: Candidate[],
  signal?: AbortSignal
): Promise<AuditResult> {
  const { model, settings } = deps;
  const { system, prompt } = buildAuditorPrompt(request, candidates);
  const outcome = await invokeStage(
    model,
    { stage: "auditor", system, prompt, format: "json", signal },
    jsonParser(AuditorResponseSchema)
  );
  const response = unwrapOutcome("auditor", outcome);

  const score = Math.round(clamp(response.score, 0, 100));
  const annotations = alignAnnotations(candidates, response.annotations);
  const verdict = deriveVerdict(score, settings);

  logger.auditor.info("Audit complete", {
    score,
    verdict,
    flagged: annotations.filter((annotation) => FLAGGED_STATUSES.has(annotation.status)).length
  });

  return reviseCandidates(candidates, { score, verdict, annotations });
}

/**
 * Produces exactly one annotation per candidate, in candidate order. Matches
 * by normalized name first, then by position when the annotation at that
 * position is unclaimed and does not name another option.
 * Annotations left unclaimed are dropped.
 */
export function alignAnnotations(candidates: Candidate[], received: ModelAnnotation[]): AuditAnnotation[] {
  const claimed = new Set<number>();
  const candidateKeys = new Set(candidates.map((candidate) => normalizeText(candidate.name)));
  const byName = candidates.map((candidate) => {
    const key = normalizeText(candidate.name);
    const index = received.findIndex((entry, i) => !claimed.has(i) && normalizeText(entry.name) === key);
    if (index !== -1) {
      claimed.add(index);
    }
    return index;
  });

  return candidates.map((candidate, position): AuditAnnotation => {
    let index = byName[position];
    if (index === -1) {
      const fallback = received[position];
      const namesOther = fallback !== undefined && candidateKeys.has(normalizeText(fallback.name));
      if (fallback !== undefined && !namesOther && !claimed.has(position)) {
        claimed.add(position);
        index = position;
      }
    }

    const entry = index === -1 ? undefined : received[index];
    if (!entry) {
      return {
        candidate: candidate.name,
        status: "unreviewed",
        note: "The auditor returned no assessment for this option."
      };
    }
    return { candidate: candidate.name, status: entry.status, note: entry.note };
  });
}

/** Flags weakly evidenced entries and moves them behind the rest, keeping relative order. */
export function reviseCandidates(candidates: Candidate[], report: AuditReport): AuditResult {
  const annotated = candidates.map((candidate, index) => ({
    candidate: { ...candidate, flagged: FLAGGED_STATUSES.has(report.annotations[index].status) },
    annotation: report.annotations[index]
  }));

  const ordered = [
    ...annotated.filter((entry) => !entry.candidate.flagged),
    ...annotated.filter((entry) => entry.candidate.flagged)
  ];

  return {
    candidates: ordered.map((entry) => entry.candidate),
    report: { ...report, annotations: ordered.map((entry) => entry.annotation) }
  };
}
