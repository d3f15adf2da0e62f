import { auditCandidates } from "./agent/auditor";
import { routeIntent } from "./agent/router";
import { vetCandidates } from "./agent/vetter";
import { PipelineError, StageTimeoutError, UpstreamDependencyError } from "./errors";
import { logger } from "./utils/logger";
import type {
  PipelineDependencies,
  PipelineRequest,
  ResponsePayload,
  RunState,
  RunTransition,
  StageName
} from "./types";

const ALLOWED_TRANSITIONS: Record<RunState, readonly RunState[]> = {
  ROUTING: ["VETTING", "FAILED"],
  VETTING: ["AUDITING", "DONE", "FAILED"],
  AUDITING: ["DONE", "FAILED"],
  DONE: [],
  FAILED: []
};

export interface PipelineRun {
  state: RunState;
  startedAt: number;
  enteredAt: number;
  trace: RunTransition[];
}

export function createPipelineRun(now: number = Date.now()): PipelineRun {
  return { state: "ROUTING", startedAt: now, enteredAt: now, trace: [] };
}

export function canTransition(from: RunState, to: RunState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function transitionRun(run: PipelineRun, to: RunState, now: number = Date.now()): PipelineRun {
  if (!canTransition(run.state, to)) {
    throw new Error(`Illegal pipeline transition ${run.state} -> ${to}`);
  }
  return {
    ...run,
    state: to,
    enteredAt: now,
    trace: [
      ...run.trace,
      { from: run.state, to, at: new Date(now).toISOString(), elapsedMs: now - run.enteredAt }
    ]
  };
}

/**
 * Runs one stage with an abort signal and a hard deadline. A stage that
 * outlives the deadline surfaces as an upstream failure even if it ignores
 * the signal.
 */
export async function runWithTimeout<T>(
  stage: StageName,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new StageTimeoutError(stage, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } catch (error) {
    if (error instanceof StageTimeoutError) {
      throw new UpstreamDependencyError(stage, error, true);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

const STAGE_BY_STATE: Partial<Record<RunState, StageName>> = {
  ROUTING: "router",
  VETTING: "vetter",
  AUDITING: "auditor"
};

export async function runPipeline(deps: PipelineDependencies, request: PipelineRequest): Promise<ResponsePayload> {
  const log = logger.orchestrator;
  const { stageTimeoutMs } = deps.settings;
  let run = createPipelineRun();

  try {
    const track = await runWithTimeout("router", stageTimeoutMs, (signal) => routeIntent(deps.model, request, signal));
    run = transitionRun(run, "VETTING");

    const vetted = await runWithTimeout("vetter", stageTimeoutMs, (signal) =>
      vetCandidates(deps, track, request, signal)
    );

    if (vetted.kind === "empty") {
      run = transitionRun(run, "DONE");
      log.info("Pipeline finished without candidates", { track, pool: vetted.pool });
      return {
        status: "empty",
        track,
        candidates: [],
        audit: { score: null, verdict: null, annotations: [] },
        note: vetted.note,
        trace: run.trace
      };
    }

    run = transitionRun(run, "AUDITING");
    const audited = await runWithTimeout("auditor", stageTimeoutMs, (signal) =>
      auditCandidates(deps, request, vetted.candidates, signal)
    );
    run = transitionRun(run, "DONE");

    log.info("Pipeline finished", {
      track,
      candidates: audited.candidates.length,
      score: audited.report.score,
      verdict: audited.report.verdict,
      totalMs: Date.now() - run.startedAt
    });

    return {
      status: "ok",
      track,
      candidates: audited.candidates,
      audit: audited.report,
      trace: run.trace
    };
  } catch (error) {
    const failedIn = run.state;
    run = transitionRun(run, "FAILED");
    log.error("Pipeline failed", {
      state: failedIn,
      stage: STAGE_BY_STATE[failedIn],
      error: error instanceof Error ? error.message : String(error)
    });
    if (error instanceof PipelineError) {
      error.trace = run.trace;
    }
    throw error;
  }
}
