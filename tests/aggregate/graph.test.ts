import { describe, expect, it } from "vitest";
import { buildAtomLookup, buildEntityFragment, emptyEntityIndex, mergeEntities } from "../../src/aggregate/entities.js";
import { buildGraphFragment, emptyGraph, mergeGraph } from "../../src/aggregate/graph.js";
import { EntityNormalizer, loadAliasTable } from "../../src/aggregate/normalize.js";
import { buildTopicFragment, emptyTopicIndex, mergeTopics } from "../../src/aggregate/topics.js";
import type { EntityIndex, GraphFragment, TopicIndex } from "../../src/types.js";
import { makeAtom, makeNarrative } from "../helpers/fixtures.js";

const normalizer = new EntityNormalizer(loadAliasTable());
const atoms = [
  makeAtom("A1", 0, 1000, "Khun Sa fought in the Opium War."),
  makeAtom("A2", 1000, 1000, "Myanmar was the setting in 1967."),
];
const lookup = buildAtomLookup(atoms);

interface SegmentParts {
  graph: GraphFragment;
  entities: EntityIndex;
  topics: TopicIndex;
}

function segment(segmentId: string, base?: SegmentParts): SegmentParts {
  const narrative = makeNarrative(segmentId, atoms, {
    title: `Title ${segmentId}`,
    importance_score: 0.7,
    topics: { primary_topic: "Opium trade", secondary_topics: [], free_tags: [] },
    entities: {
      persons: ["Kun Sha"],
      countries: ["Myanmar"],
      organizations: [],
      time_points: ["1967"],
      events: ["Opium War"],
      concepts: [],
    },
  });
  const entityFragment = buildEntityFragment({
    segmentId,
    entities: narrative.entities,
    primaryTopic: narrative.topics.primary_topic,
    atoms,
    normalizer,
  });
  const topicFragment = buildTopicFragment(narrative);
  return {
    graph: buildGraphFragment(narrative, entityFragment, topicFragment),
    entities: mergeEntities(base?.entities ?? emptyEntityIndex(), entityFragment, lookup, normalizer),
    topics: mergeTopics(base?.topics ?? emptyTopicIndex(), topicFragment),
  };
}

describe("buildGraphFragment", () => {
  it("links entities, topics and the segment without time points", () => {
    const { graph } = segment("SEG_001");

    expect(graph.nodes.map((node) => node.id)).toEqual([
      "topic_Opium trade",
      "segment_SEG_001",
      "persons_Khun Sa",
      "countries_Myanmar",
      "events_Opium War",
    ]);
    expect(graph.edges.map((edge) => `${edge.source} -${edge.relation}-> ${edge.target}`)).toEqual([
      "persons_Khun Sa -appears_in-> segment_SEG_001",
      "persons_Khun Sa -related_topic-> topic_Opium trade",
      "countries_Myanmar -appears_in-> segment_SEG_001",
      "countries_Myanmar -related_topic-> topic_Opium trade",
      "events_Opium War -appears_in-> segment_SEG_001",
      "events_Opium War -related_topic-> topic_Opium trade",
      "topic_Opium trade -covers-> segment_SEG_001",
      "persons_Khun Sa -participates_in-> events_Opium War",
      "persons_Khun Sa -associated_country-> countries_Myanmar",
    ]);
  });
});

describe("mergeGraph", () => {
  it("does not increase edge weights when a segment is merged twice", () => {
    const parts = segment("SEG_001");
    const once = mergeGraph(emptyGraph(), parts.graph, parts.entities, parts.topics);
    const twice = mergeGraph(once, parts.graph, parts.entities, parts.topics);

    expect(twice).toEqual(once);
    expect(twice.edges.every((edge) => edge.weight === 1)).toBe(true);
    expect(twice.statistics.total_nodes).toBe(5);
    expect(twice.statistics.total_edges).toBe(9);
    expect(twice.statistics.edge_types).toMatchObject({ entity_to_segment: 3, person_to_event: 1 });
  });

  it("counts an edge once per observing segment and mirrors index mentions", () => {
    const first = segment("SEG_001");
    const second = segment("SEG_002", first);
    const graph = mergeGraph(
      mergeGraph(emptyGraph(), first.graph, first.entities, first.topics),
      second.graph,
      second.entities,
      second.topics,
    );

    const participates = graph.edges.find((edge) => edge.relation === "participates_in");
    expect(participates).toMatchObject({ weight: 2, segment_ids: ["SEG_001", "SEG_002"] });

    const person = graph.nodes.find((node) => node.id === "persons_Khun Sa");
    expect(person).toMatchObject({ mentions: 1, segment_ids: ["SEG_001", "SEG_002"] });

    const topic = graph.nodes.find((node) => node.id === "topic_Opium trade");
    expect(topic?.weight).toBeCloseTo(1.4);
    expect(graph.statistics.node_types).toEqual({ topic: 1, segment: 2, persons: 1, countries: 1, events: 1 });
  });
});
