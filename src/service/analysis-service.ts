import { mergeSegmentAnalysis } from "../aggregate/aggregator.js";
import { countFragmentEntities } from "../aggregate/entities.js";
import type { IndexStore } from "../aggregate/index-store.js";
import type { EntityNormalizer } from "../aggregate/normalize.js";
import type { AtomStore } from "../atoms/store.js";
import { AnalysisConflictError, CancelledError, MergeFailure, errorMessage, isRunFatalError } from "../errors.js";
import type { SegmentTableStore } from "../segments/state.js";
import type { AggregatedIndex, Atom, SegmentAnalysis, SegmentRecord, WorkerStatus } from "../types.js";
import { logger } from "../utils/logger.js";
import { computeProgress, type ServiceProgress } from "./progress.js";
import { acquireRunLock, releaseRunLock, withRunLock } from "./run-lock.js";

export const ATOMIZATION_INCOMPLETE = "Atomization not complete";

/** The analyzer surface the driver needs. */
export interface SegmentAnalyzerLike {
  analyze(segment: SegmentRecord, atoms: readonly Atom[], signal?: AbortSignal): Promise<SegmentAnalysis>;
}

export interface AnalysisServiceDeps {
  projectId: string;
  projectDir: string;
  atoms: AtomStore;
  segments: SegmentTableStore;
  index: IndexStore;
  analyzer: SegmentAnalyzerLike;
  normalizer: EntityNormalizer;
}

export interface RunSummary {
  status: WorkerStatus;
  analyzed: string[];
  failed: string[];
  notAtomized: string[];
  error: string | null;
}

type SegmentResult =
  | { kind: "analyzed"; index: AggregatedIndex }
  | { kind: "failed"; message: string }
  | { kind: "cancelled" };

interface RunContext {
  atoms: Atom[];
  index: AggregatedIndex;
  signal: AbortSignal;
  summary: RunSummary;
}

/**
 * Resets segment analysis state; `"all"` also removes the aggregated index
 * files. Refused while any process holds the project's run lock.
 */
export async function resetProjectState(
  stores: { projectDir: string; segments: SegmentTableStore; index: IndexStore },
  target: string,
): Promise<string[]> {
  return withRunLock(stores.projectDir, async () => {
    const changed = await stores.segments.reset(target);
    if (target === "all") {
      await stores.index.clear();
    }
    return changed;
  });
}

/**
 * Owns the analysis run for one project. A single worker processes segments
 * one at a time; the index is persisted before a segment is marked analyzed.
 */
export class IncrementalAnalysisService {
  private status: WorkerStatus = "idle";
  private controller: AbortController | null = null;
  private running: Promise<RunSummary> | null = null;
  private currentSegment: string | null = null;
  private lastError: string | null = null;

  constructor(private readonly deps: AnalysisServiceDeps) {}

  get projectId(): string {
    return this.deps.projectId;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  get workerStatus(): WorkerStatus {
    return this.status;
  }

  /** Processes pending segments until none remain, the run is stopped, or a fatal error occurs. */
  start(): Promise<RunSummary> {
    return this.launch((context) => this.runLoop(context));
  }

  /** Analyzes one segment, whatever its current analysis state. */
  analyzeOne(segmentId: string): Promise<RunSummary> {
    return this.launch((context) => this.runSingle(segmentId, context));
  }

  /** Signals the worker to stop at its next safe point without waiting. */
  requestStop(): void {
    if (!this.controller || this.controller.signal.aborted) {
      return;
    }
    this.controller.abort();
    logger.info("analysis_stop_requested", { project_id: this.projectId, current_segment: this.currentSegment });
  }

  /** Requests cancellation and waits for the worker to reach a safe point. */
  async stop(): Promise<RunSummary | null> {
    if (!this.running) {
      return null;
    }
    this.requestStop();
    return this.running;
  }

  async waitForIdle(): Promise<RunSummary | null> {
    return this.running ?? null;
  }

  async progress(): Promise<ServiceProgress> {
    const [segments, index] = await Promise.all([this.deps.segments.list(), this.deps.index.loadOrInit()]);
    return {
      ...computeProgress(segments, index),
      is_running: this.isRunning,
      worker_status: this.status,
      current_segment: this.currentSegment,
      last_error: this.lastError,
    };
  }

  /** Returns `target` (a segment id or "all") to the analyzable state. "all" also clears the index. */
  async reset(target: string): Promise<string[]> {
    if (this.running) {
      throw new AnalysisConflictError();
    }
    const changed = await resetProjectState(this.deps, target);
    this.status = "idle";
    this.lastError = null;
    return changed;
  }

  private launch(body: (context: RunContext) => Promise<void>): Promise<RunSummary> {
    if (this.running) {
      return Promise.reject(new AnalysisConflictError());
    }
    try {
      acquireRunLock(this.deps.projectDir);
    } catch (error) {
      return Promise.reject(error);
    }

    const controller = new AbortController();
    this.controller = controller;
    this.status = "running";
    this.lastError = null;

    this.running = this.execute(body, controller.signal).finally(() => {
      releaseRunLock(this.deps.projectDir);
      this.running = null;
      this.controller = null;
      this.currentSegment = null;
    });
    return this.running;
  }

  private async execute(body: (context: RunContext) => Promise<void>, signal: AbortSignal): Promise<RunSummary> {
    const summary: RunSummary = { status: "running", analyzed: [], failed: [], notAtomized: [], error: null };
    logger.info("analysis_run_started", { project_id: this.projectId });

    try {
      const atoms = await this.deps.atoms.load();
      await this.deps.segments.loadOrRebuild(atoms);
      const index = await this.deps.index.loadOrInit();
      await body({ atoms, index, signal, summary });
      summary.status = signal.aborted ? "cancelled" : "completed";
    } catch (error) {
      summary.status = "failed";
      summary.error = errorMessage(error);
      logger.error("analysis_run_failed", {
        project_id: this.projectId,
        segment_id: this.currentSegment,
        fatal: isRunFatalError(error),
        error,
      });
    }

    this.status = summary.status;
    this.lastError = summary.error;
    logger.info("analysis_run_finished", {
      project_id: this.projectId,
      status: summary.status,
      analyzed: summary.analyzed.length,
      failed: summary.failed.length,
    });
    return summary;
  }

  private async runLoop(context: RunContext): Promise<void> {
    while (!context.signal.aborted) {
      const next = await this.deps.segments.nextPending();
      if (!next) {
        return;
      }
      if (!next.atomization_complete) {
        await this.markNotAtomized(next, context.summary);
        return;
      }

      const result = await this.processSegment(next, context);
      if (result.kind === "cancelled") {
        return;
      }
      if (result.kind === "analyzed") {
        context.index = result.index;
      }
    }
  }

  private async runSingle(segmentId: string, context: RunContext): Promise<void> {
    const segment = await this.deps.segments.get(segmentId);
    if (!segment.atomization_complete) {
      await this.markNotAtomized(segment, context.summary);
      return;
    }
    await this.processSegment(segment, context);
  }

  private async markNotAtomized(segment: SegmentRecord, summary: RunSummary): Promise<void> {
    await this.deps.segments.updateStatus(segment.segment_id, "pending", { error_message: ATOMIZATION_INCOMPLETE });
    summary.notAtomized.push(segment.segment_id);
    logger.warn("segment_not_atomized", { project_id: this.projectId, segment_id: segment.segment_id });
  }

  private async processSegment(segment: SegmentRecord, context: RunContext): Promise<SegmentResult> {
    const segmentId = segment.segment_id;
    this.currentSegment = segmentId;
    await this.deps.segments.updateStatus(segmentId, "analyzing");
    logger.info("segment_analysis_started", { project_id: this.projectId, segment_id: segmentId });

    let analysis: SegmentAnalysis;
    try {
      analysis = await this.deps.analyzer.analyze(segment, context.atoms, context.signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        await this.deps.segments.updateStatus(segmentId, "atomized");
        logger.info("segment_analysis_cancelled", { project_id: this.projectId, segment_id: segmentId });
        return { kind: "cancelled" };
      }
      if (isRunFatalError(error)) {
        throw error;
      }
      return this.markFailed(segmentId, error, context.summary);
    }

    let next: AggregatedIndex;
    try {
      next = mergeSegmentAnalysis(context.index, analysis, context.atoms, this.deps.normalizer);
    } catch (error) {
      if (error instanceof MergeFailure) {
        return this.markFailed(segmentId, error, context.summary);
      }
      throw error;
    }

    // Persist the merged index first; the status flip is the commit point.
    await this.deps.index.save(next);
    const entityCount = countFragmentEntities(analysis.entities);
    await this.deps.segments.updateStatus(segmentId, "analyzed", {
      entity_count: entityCount,
      analysis_outcome: analysis.outcome.kind,
    });
    context.summary.analyzed.push(segmentId);
    logger.info("segment_analysis_completed", {
      project_id: this.projectId,
      segment_id: segmentId,
      outcome: analysis.outcome.kind,
      entity_count: entityCount,
      total_entities: next.entities.statistics.total_entities,
    });
    return { kind: "analyzed", index: next };
  }

  private async markFailed(segmentId: string, error: unknown, summary: RunSummary): Promise<SegmentResult> {
    const message = errorMessage(error);
    await this.deps.segments.updateStatus(segmentId, "failed", { error_message: message });
    summary.failed.push(segmentId);
    logger.warn("segment_analysis_failed", {
      project_id: this.projectId,
      segment_id: segmentId,
      error_type: error instanceof Error ? error.name : "unknown",
      error: message,
    });
    return { kind: "failed", message };
  }
}
