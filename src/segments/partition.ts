import type { Atom, SegmentRecord } from "../types.js";
import { minutesToMs, msToTimeStr } from "../utils/time.js";

export function segmentIdFor(index: number): string {
  return `SEG_${String(index + 1).padStart(3, "0")}`;
}

/**
 * Cuts the timeline into fixed windows and assigns each atom to the window
 * containing its start. References are positional indices into `atoms`.
 */
export function partitionAtoms(atoms: readonly Atom[], windowMinutes: number): SegmentRecord[] {
  if (!Number.isFinite(windowMinutes) || windowMinutes <= 0) {
    throw new Error(`Segment window must be a positive number of minutes, got ${windowMinutes}.`);
  }
  if (atoms.length === 0) {
    return [];
  }

  const windowMs = minutesToMs(windowMinutes);
  const totalMs = atoms.reduce((max, atom) => Math.max(max, atom.end_ms), 0);
  const segments: SegmentRecord[] = [];

  for (let start = 0, index = 0; start < totalMs; start += windowMs, index += 1) {
    const end = Math.min(start + windowMs, totalMs);
    const refs: number[] = [];
    atoms.forEach((atom, position) => {
      if (atom.start_ms >= start && atom.start_ms < end) {
        refs.push(position);
      }
    });

    const atomized = refs.length > 0;
    segments.push({
      segment_id: segmentIdFor(index),
      start_ms: start,
      end_ms: end,
      duration_ms: end - start,
      start_time_str: msToTimeStr(start),
      end_time_str: msToTimeStr(end),
      atom_refs: refs,
      status: atomized ? "atomized" : "pending",
      atomization_complete: atomized,
      analysis_complete: false,
      entity_count: 0,
      error_message: null,
      analysis_outcome: null,
    });
  }

  return segments;
}
