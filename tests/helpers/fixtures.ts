import type { Atom, DeepAnalysis, NarrativeSegment } from "../../src/types.js";

export function makeAtom(atomId: string, startMs: number, durationMs = 1000, text = `text of ${atomId}`): Atom {
  return {
    atom_id: atomId,
    start_ms: startMs,
    end_ms: startMs + durationMs,
    duration_ms: durationMs,
    merged_text: text,
    type: "fragment",
    completeness: "complete",
  };
}

export function makeDeepAnalysis(overrides: Partial<DeepAnalysis> = {}): DeepAnalysis {
  return {
    title: "Test segment",
    summary: "A summary.",
    narrative_structure: { type: "chronological", structure: "linear" },
    topics: { primary_topic: null, secondary_topics: [], free_tags: [] },
    entities: { persons: [], countries: [], organizations: [], time_points: [], events: [], concepts: [] },
    core_argument: "",
    key_insights: [],
    importance_score: 0.5,
    quality_score: 0.5,
    ...overrides,
  };
}

export function makeNarrative(
  segmentId: string,
  atoms: readonly Atom[],
  overrides: Partial<DeepAnalysis> = {},
): NarrativeSegment {
  const startMs = atoms[0]?.start_ms ?? 0;
  const endMs = atoms[atoms.length - 1]?.end_ms ?? startMs;
  return {
    ...makeDeepAnalysis(overrides),
    segment_id: segmentId,
    atom_ids: atoms.map((atom) => atom.atom_id),
    start_ms: startMs,
    end_ms: endMs,
    duration_ms: endMs - startMs,
    full_text: atoms.map((atom) => atom.merged_text).join(" "),
  };
}
