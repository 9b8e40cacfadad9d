import { buildEntityFragment } from "../../src/aggregate/entities.js";
import { buildGraphFragment } from "../../src/aggregate/graph.js";
import type { EntityNormalizer } from "../../src/aggregate/normalize.js";
import { buildTopicFragment } from "../../src/aggregate/topics.js";
import { resolveSegmentAtoms } from "../../src/analysis/segment-analyzer.js";
import { CancelledError } from "../../src/errors.js";
import type { SegmentAnalyzerLike } from "../../src/service/analysis-service.js";
import type { Atom, SegmentAnalysis, SegmentRecord } from "../../src/types.js";
import { makeNarrative } from "./fixtures.js";

export type Behaviour = "ok" | "block" | "invalid" | Error;

/**
 * Every segment yields one person ("Luo Xinghan") under the topic "Border"
 * unless a behaviour is set for it. "block" waits for the abort signal.
 */
export class FakeAnalyzer implements SegmentAnalyzerLike {
  readonly calls: string[] = [];
  readonly behaviours = new Map<string, Behaviour>();
  readonly started: Promise<void>;
  private notifyStarted: () => void = () => undefined;

  constructor(private readonly normalizer: EntityNormalizer) {
    this.started = new Promise<void>((resolve) => {
      this.notifyStarted = () => resolve();
    });
  }

  async analyze(segment: SegmentRecord, atoms: readonly Atom[], signal?: AbortSignal): Promise<SegmentAnalysis> {
    this.calls.push(segment.segment_id);
    const behaviour = this.behaviours.get(segment.segment_id) ?? "ok";
    if (behaviour instanceof Error) {
      throw behaviour;
    }
    if (behaviour === "block") {
      this.notifyStarted();
      await new Promise<void>((resolve) => {
        if (!signal || signal.aborted) {
          resolve();
          return;
        }
        signal.addEventListener("abort", () => resolve(), { once: true });
      });
      throw new CancelledError();
    }

    const segmentAtoms = resolveSegmentAtoms(segment, atoms).atoms;
    const narrative = makeNarrative(segment.segment_id, segmentAtoms, {
      topics: { primary_topic: "Border", secondary_topics: [], free_tags: [] },
      entities: {
        persons: ["Luo Xinghan"],
        countries: [],
        organizations: [],
        time_points: [],
        events: [],
        concepts: [],
      },
    });
    const entities = buildEntityFragment({
      segmentId: segment.segment_id,
      entities: narrative.entities,
      primaryTopic: narrative.topics.primary_topic,
      atoms: segmentAtoms,
      normalizer: this.normalizer,
    });
    if (behaviour === "invalid") {
      entities.persons = [
        { name: "", type: "persons", mentions: 0, atom_ids: [], segment_ids: [segment.segment_id], context: [] },
      ];
    }
    const topics = buildTopicFragment(narrative);
    return {
      segment_id: segment.segment_id,
      narrative,
      outcome: { kind: "llm", analysis: narrative, attempts: 1 },
      entities,
      topics,
      graph: buildGraphFragment(narrative, entities, topics),
      annotations: [],
      skipped_refs: [],
    };
  }
}
