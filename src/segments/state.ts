import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  IllegalTransitionError,
  SegmentNotFoundError,
  StorageError,
  hasErrorCode,
} from "../errors.js";
import { SEGMENT_STATUSES, type Atom, type SegmentRecord, type SegmentStatus, type SegmentStatusFields } from "../types.js";
import { writeJsonAtomic } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { partitionAtoms } from "./partition.js";

export const SEGMENTS_STATE_FILE = "segments_state.json";

const ALLOWED_TRANSITIONS: Record<SegmentStatus, readonly SegmentStatus[]> = {
  pending: ["pending", "atomized"],
  atomized: ["atomized", "analyzing"],
  analyzing: ["analyzing", "analyzed", "failed", "atomized"],
  analyzed: ["analyzing", "atomized"],
  failed: ["failed", "analyzing", "atomized"],
};

const segmentRecordSchema = z.object({
  segment_id: z.string().min(1),
  start_ms: z.number().nonnegative(),
  end_ms: z.number().nonnegative(),
  duration_ms: z.number().nonnegative(),
  start_time_str: z.string(),
  end_time_str: z.string(),
  atom_refs: z.array(z.number()),
  status: z.enum(SEGMENT_STATUSES),
  atomization_complete: z.boolean(),
  analysis_complete: z.boolean(),
  entity_count: z.number().int().nonnegative().default(0),
  error_message: z.string().nullable().default(null),
  analysis_outcome: z.enum(["llm", "default_applied"]).nullable().default(null),
});

const segmentTableSchema = z.object({
  version: z.literal(1),
  window_minutes: z.number().positive(),
  segments: z.array(segmentRecordSchema),
});

export interface SegmentTable {
  version: 1;
  window_minutes: number;
  segments: SegmentRecord[];
}

export function isTransitionAllowed(from: SegmentStatus, to: SegmentStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Returns why `segments` cannot be used with `atomCount` atoms, or null when
 * every ref is in range and the refs cover the atom list exactly once.
 */
export function findTableProblem(segments: readonly SegmentRecord[], atomCount: number): string | null {
  const seen = new Set<number>();
  for (const segment of segments) {
    for (const ref of segment.atom_refs) {
      if (!Number.isInteger(ref) || ref < 0 || ref >= atomCount) {
        return `${segment.segment_id} references atom ${ref} outside [0, ${atomCount})`;
      }
      if (seen.has(ref)) {
        return `atom ${ref} is referenced by more than one segment`;
      }
      seen.add(ref);
    }
  }
  if (seen.size !== atomCount) {
    return `table covers ${seen.size} atoms but the store holds ${atomCount}`;
  }
  return null;
}

/** Picks the next unit of work: resumable atomized segments first, then never-atomized ones. */
export function selectNextPending(segments: readonly SegmentRecord[]): SegmentRecord | null {
  const resumable = segments.find(
    (segment) => segment.atomization_complete && !segment.analysis_complete && segment.status !== "failed",
  );
  if (resumable) {
    return resumable;
  }
  return segments.find((segment) => segment.status === "pending" && !segment.atomization_complete) ?? null;
}

export function applyTransition(
  segment: SegmentRecord,
  status: SegmentStatus,
  fields: SegmentStatusFields = {},
): SegmentRecord {
  if (!isTransitionAllowed(segment.status, status)) {
    throw new IllegalTransitionError(segment.segment_id, segment.status, status);
  }
  if (status === "analyzed" && fields.entity_count === undefined) {
    throw new Error(`Marking ${segment.segment_id} analyzed requires an entity count.`);
  }

  const next: SegmentRecord = { ...segment, status };
  if (fields.entity_count !== undefined) {
    next.entity_count = fields.entity_count;
  }
  if (fields.error_message !== undefined) {
    next.error_message = fields.error_message;
  }
  if (fields.analysis_outcome !== undefined) {
    next.analysis_outcome = fields.analysis_outcome;
  }

  if (status === "analyzed") {
    next.analysis_complete = true;
  } else if (status === "analyzing" || status === "atomized" || status === "failed") {
    next.analysis_complete = false;
  }
  if (status === "analyzed" || status === "atomized") {
    next.error_message = null;
  }

  return next;
}

export function resetSegment(segment: SegmentRecord): SegmentRecord {
  if (!segment.atomization_complete) {
    return segment;
  }
  return {
    ...segment,
    status: "atomized",
    analysis_complete: false,
    entity_count: 0,
    error_message: null,
    analysis_outcome: null,
  };
}

export class SegmentTableStore {
  readonly filePath: string;
  private readonly defaultWindowMinutes: number;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(projectDir: string, defaultWindowMinutes: number) {
    this.filePath = path.join(projectDir, SEGMENTS_STATE_FILE);
    this.defaultWindowMinutes = defaultWindowMinutes;
  }

  // Read-modify-write sections run one at a time.
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  async read(): Promise<SegmentTable | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw new StorageError(this.filePath, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(this.filePath, error);
    }

    const result = segmentTableSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(this.filePath, result.error.issues[0]?.message ?? "invalid segment table");
    }
    return result.data;
  }

  private async write(table: SegmentTable): Promise<void> {
    try {
      await writeJsonAtomic(this.filePath, table);
    } catch (error) {
      throw new StorageError(this.filePath, error);
    }
  }

  private async requireTable(): Promise<SegmentTable> {
    const table = await this.read();
    if (!table) {
      throw new StorageError(this.filePath, "segment table has not been built");
    }
    return table;
  }

  async list(): Promise<SegmentRecord[]> {
    return (await this.read())?.segments ?? [];
  }

  async get(segmentId: string): Promise<SegmentRecord> {
    const segment = (await this.list()).find((item) => item.segment_id === segmentId);
    if (!segment) {
      throw new SegmentNotFoundError(segmentId);
    }
    return segment;
  }

  /**
   * Returns the persisted table when it still fits `atoms`; otherwise rebuilds
   * and persists it. A persisted table keeps its own window size.
   */
  loadOrRebuild(atoms: readonly Atom[]): Promise<SegmentRecord[]> {
    return this.exclusive(async () => {
      const table = await this.read();
      const window = table?.window_minutes ?? this.defaultWindowMinutes;

      let reason = "missing";
      if (table) {
        const problem = findTableProblem(table.segments, atoms.length);
        if (!problem) {
          return table.segments;
        }
        reason = problem;
      }

      const segments = partitionAtoms(atoms, window);
      await this.write({ version: 1, window_minutes: window, segments });
      logger.info("segment_table_rebuilt", {
        file: this.filePath,
        reason,
        segments: segments.length,
        atoms: atoms.length,
      });
      return segments;
    });
  }

  recreate(atoms: readonly Atom[], windowMinutes: number): Promise<SegmentRecord[]> {
    return this.exclusive(async () => {
      const segments = partitionAtoms(atoms, windowMinutes);
      await this.write({ version: 1, window_minutes: windowMinutes, segments });
      logger.info("segment_table_rebuilt", {
        file: this.filePath,
        reason: "recreate requested",
        segments: segments.length,
        atoms: atoms.length,
      });
      return segments;
    });
  }

  async nextPending(): Promise<SegmentRecord | null> {
    return selectNextPending(await this.list());
  }

  updateStatus(segmentId: string, status: SegmentStatus, fields: SegmentStatusFields = {}): Promise<SegmentRecord> {
    return this.exclusive(async () => {
      const table = await this.requireTable();
      const index = table.segments.findIndex((segment) => segment.segment_id === segmentId);
      const current = table.segments[index];
      if (!current) {
        throw new SegmentNotFoundError(segmentId);
      }

      const next = applyTransition(current, status, fields);
      table.segments[index] = next;
      await this.write(table);
      logger.debug("segment_status_updated", { segment_id: segmentId, from: current.status, to: status });
      return next;
    });
  }

  /** Clears analysis results so the segment (or `"all"`) is picked up again. Returns the ids that changed. */
  reset(target: string): Promise<string[]> {
    return this.exclusive(async () => {
      const table = await this.requireTable();
      if (target !== "all" && !table.segments.some((segment) => segment.segment_id === target)) {
        throw new SegmentNotFoundError(target);
      }

      const changed: string[] = [];
      table.segments = table.segments.map((segment) => {
        if (target !== "all" && segment.segment_id !== target) {
          return segment;
        }
        const next = resetSegment(segment);
        if (next !== segment) {
          changed.push(segment.segment_id);
        }
        return next;
      });

      await this.write(table);
      logger.info("segments_reset", { target, changed: changed.length });
      return changed;
    });
  }
}
