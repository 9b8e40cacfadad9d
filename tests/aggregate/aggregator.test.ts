import { describe, expect, it } from "vitest";
import { emptyIndex, mergeAnnotations, mergeSegmentAnalysis } from "../../src/aggregate/aggregator.js";
import { buildEntityFragment } from "../../src/aggregate/entities.js";
import { buildGraphFragment } from "../../src/aggregate/graph.js";
import { EntityNormalizer, loadAliasTable } from "../../src/aggregate/normalize.js";
import { buildTopicFragment } from "../../src/aggregate/topics.js";
import { MergeFailure } from "../../src/errors.js";
import type { Atom, AtomAnnotation, SegmentAnalysis } from "../../src/types.js";
import { makeAtom, makeNarrative } from "../helpers/fixtures.js";

const normalizer = new EntityNormalizer(loadAliasTable());
const atoms = [
  makeAtom("A1", 0, 1000, "Luo Xinghan crossed the river."),
  makeAtom("A2", 1000, 1000, "Luo Xinghan and 罗星汉 both appear here."),
  makeAtom("A3", 2000, 1000, "Later Luo Xinghan returned."),
];

function annotation(atomId: string, segmentId: string, importance = 0.5): AtomAnnotation {
  return {
    atom_id: atomId,
    entities: [],
    topics: [],
    emotion: null,
    importance_score: importance,
    has_entity: false,
    has_topic: false,
    embedding_status: "pending",
    parent_segment_id: segmentId,
  };
}

function analysisFor(segmentId: string, segmentAtoms: Atom[], names: string[]): SegmentAnalysis {
  const narrative = makeNarrative(segmentId, segmentAtoms, {
    topics: { primary_topic: "Border wars", secondary_topics: [], free_tags: ["history"] },
    entities: { persons: names, countries: [], organizations: [], time_points: [], events: [], concepts: [] },
  });
  const entities = buildEntityFragment({
    segmentId,
    entities: narrative.entities,
    primaryTopic: narrative.topics.primary_topic,
    atoms: segmentAtoms,
    normalizer,
  });
  const topics = buildTopicFragment(narrative);
  return {
    segment_id: segmentId,
    narrative,
    outcome: { kind: "llm", analysis: narrative, attempts: 1 },
    entities,
    topics,
    graph: buildGraphFragment(narrative, entities, topics),
    annotations: segmentAtoms.map((atom) => annotation(atom.atom_id, segmentId)),
    skipped_refs: [],
  };
}

describe("mergeSegmentAnalysis", () => {
  it("folds every document of a segment into the index", () => {
    const index = mergeSegmentAnalysis(
      emptyIndex(),
      analysisFor("SEG_001", atoms.slice(0, 2), ["Luo Xinghan"]),
      atoms,
      normalizer,
    );

    expect(index.entities.statistics.total_entities).toBe(1);
    expect(index.entities.persons[0]).toMatchObject({ name: "Luo Xinghan", mentions: 3, context: ["Border wars"] });
    expect(index.topics.statistics).toEqual({ total_primary_topics: 1, total_secondary_topics: 0, total_tags: 1 });
    expect(index.graph.statistics.total_nodes).toBe(3);
    expect(index.annotations.map((item) => item.atom_id)).toEqual(["A1", "A2"]);
  });

  it("keeps mention counts consistent across overlapping segments", () => {
    const first = mergeSegmentAnalysis(
      emptyIndex(),
      analysisFor("SEG_001", atoms.slice(0, 2), ["Luo Xinghan"]),
      atoms,
      normalizer,
    );
    const second = mergeSegmentAnalysis(
      first,
      analysisFor("SEG_002", atoms.slice(1, 3), ["罗星汉"]),
      atoms,
      normalizer,
    );

    expect(second.entities.persons).toHaveLength(1);
    expect(second.entities.persons[0]).toMatchObject({ atom_ids: ["A1", "A2", "A3"], mentions: 4 });
  });

  it("returns the same index when a segment is merged twice", () => {
    const analysis = analysisFor("SEG_001", atoms.slice(0, 2), ["Luo Xinghan"]);
    const once = mergeSegmentAnalysis(emptyIndex(), analysis, atoms, normalizer);

    expect(mergeSegmentAnalysis(once, analysis, atoms, normalizer)).toEqual(once);
  });

  it("rejects an invalid fragment and leaves the index untouched", () => {
    const index = mergeSegmentAnalysis(
      emptyIndex(),
      analysisFor("SEG_001", atoms.slice(0, 2), ["Luo Xinghan"]),
      atoms,
      normalizer,
    );
    const before = structuredClone(index);
    const broken = analysisFor("SEG_002", atoms.slice(2), ["Luo Xinghan"]);
    broken.entities.persons = [
      { name: "", type: "persons", mentions: -1, atom_ids: [], segment_ids: ["SEG_002"], context: [] },
    ];

    expect(() => mergeSegmentAnalysis(index, broken, atoms, normalizer)).toThrow(MergeFailure);
    expect(() => mergeSegmentAnalysis(index, broken, atoms, normalizer)).toThrow(
      "Merge failed for SEG_002: entity fragment is invalid at persons.0.name",
    );
    expect(index).toEqual(before);
  });
});

describe("mergeAnnotations", () => {
  it("keeps the latest annotation per atom in store order", () => {
    const merged = mergeAnnotations(
      [annotation("A3", "SEG_002", 0.2), annotation("A1", "SEG_001", 0.2)],
      [annotation("A1", "SEG_001", 0.9)],
      atoms,
    );

    expect(merged.map((item) => [item.atom_id, item.importance_score])).toEqual([
      ["A1", 0.9],
      ["A3", 0.2],
    ]);
  });
});
