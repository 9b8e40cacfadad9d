import type { AggregatedIndex, ProgressSnapshot, SegmentRecord, WorkerStatus } from "../types.js";

/**
 * Counts segment states. `total_entities` comes from the index statistics;
 * per-segment entity counts can drift under re-analysis and are not summed.
 */
export function computeProgress(segments: readonly SegmentRecord[], index: AggregatedIndex): ProgressSnapshot {
  const total = segments.length;
  let analyzed = 0;
  let failed = 0;
  for (const segment of segments) {
    if (segment.status === "analyzed") {
      analyzed += 1;
    } else if (segment.status === "failed") {
      failed += 1;
    }
  }

  return {
    total_segments: total,
    analyzed,
    pending: total - analyzed - failed,
    failed,
    total_entities: index.entities.statistics.total_entities,
    percent: total === 0 ? 0 : Math.floor((100 * analyzed) / total),
  };
}

export interface ServiceProgress extends ProgressSnapshot {
  is_running: boolean;
  worker_status: WorkerStatus;
  current_segment: string | null;
  last_error: string | null;
}
