import type { SearchProvider } from "./agent/tools";
import type { ModelClient } from "./llm/client";

export const TRACKS = ["RESTAURANT", "GROCERY"] as const;

export type Track = (typeof TRACKS)[number];

export const SEVERITIES = ["preference", "intolerance", "allergy", "anaphylactic"] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface DietaryProfile {
  readonly restrictions: readonly string[];
  readonly severity: Severity;
}

export interface PipelineRequest {
  readonly location: string;
  readonly dietaryProfile: DietaryProfile;
  readonly mission: string;
}

export interface SearchHit {
  position: number;
  title: string;
  snippet: string;
  link: string;
  address?: string;
}

export interface Candidate {
  name: string;
  evidence: string;
  source: string;
  location: string;
  flagged: boolean;
}

export type AnnotationStatus = "verified" | "insufficient_evidence" | "unsafe" | "unreviewed";

export interface AuditAnnotation {
  candidate: string;
  status: AnnotationStatus;
  note: string;
}

export type Verdict = "green" | "yellow" | "red";

export interface AuditReport {
  score: number;
  verdict: Verdict;
  annotations: AuditAnnotation[];
}

export interface EmptyAudit {
  score: null;
  verdict: null;
  annotations: [];
}

export type StageName = "router" | "vetter" | "auditor";

export type RunState = "ROUTING" | "VETTING" | "AUDITING" | "DONE" | "FAILED";

export interface RunTransition {
  from: RunState;
  to: RunState;
  at: string;
  elapsedMs: number;
}

export interface ResponsePayload {
  status: "ok" | "empty";
  track: Track;
  candidates: Candidate[];
  audit: AuditReport | EmptyAudit;
  note?: string;
  trace: RunTransition[];
}

export interface PipelineSettings {
  stageTimeoutMs: number;
  vetterTarget: number;
  searchPoolSize: number;
  greenThreshold: number;
  redThreshold: number;
}

export interface PipelineDependencies {
  model: ModelClient;
  search: SearchProvider;
  settings: PipelineSettings;
}
