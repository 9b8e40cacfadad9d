import type { ZodType, ZodTypeDef } from "zod";
import { MergeFailure, errorMessage } from "../errors.js";
import type { AggregatedIndex, Atom, AtomAnnotation, SegmentAnalysis } from "../types.js";
import { logger } from "../utils/logger.js";
import { buildAtomLookup, emptyEntityIndex, mergeEntities } from "./entities.js";
import { emptyGraph, mergeGraph } from "./graph.js";
import type { EntityNormalizer } from "./normalize.js";
import { annotationListSchema, entityFragmentSchema, graphFragmentSchema, topicFragmentSchema } from "./schemas.js";
import { emptyTopicIndex, mergeTopics } from "./topics.js";

export function emptyIndex(): AggregatedIndex {
  return {
    entities: emptyEntityIndex(),
    topics: emptyTopicIndex(),
    graph: emptyGraph(),
    annotations: [],
  };
}

/** Latest annotation per atom id wins; order follows the atom store. */
export function mergeAnnotations(
  existing: readonly AtomAnnotation[],
  incoming: readonly AtomAnnotation[],
  atoms: readonly Atom[],
): AtomAnnotation[] {
  const byAtom = new Map<string, AtomAnnotation>();
  for (const annotation of [...existing, ...incoming]) {
    byAtom.set(annotation.atom_id, annotation);
  }
  const position = new Map(atoms.map((atom, index) => [atom.atom_id, index]));
  return Array.from(byAtom.values()).sort(
    (a, b) =>
      (position.get(a.atom_id) ?? Number.MAX_SAFE_INTEGER) - (position.get(b.atom_id) ?? Number.MAX_SAFE_INTEGER),
  );
}

function validated<T>(segmentId: string, label: string, schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new MergeFailure(segmentId, `${label} fragment is invalid${where}: ${issue?.message ?? "unknown issue"}`);
  }
  return result.data;
}

/**
 * Produces a new index with one segment's analysis folded in. Either every
 * document is merged or a MergeFailure is thrown and `index` is left as it was.
 */
export function mergeSegmentAnalysis(
  index: AggregatedIndex,
  analysis: SegmentAnalysis,
  atoms: readonly Atom[],
  normalizer: EntityNormalizer,
): AggregatedIndex {
  const segmentId = analysis.segment_id;
  const entities = validated(segmentId, "entity", entityFragmentSchema, analysis.entities);
  const topics = validated(segmentId, "topic", topicFragmentSchema, analysis.topics);
  const graph = validated(segmentId, "graph", graphFragmentSchema, analysis.graph);
  const annotations = validated(segmentId, "annotation", annotationListSchema, analysis.annotations);

  try {
    const working = structuredClone(index);
    const lookup = buildAtomLookup(atoms);

    const mergedEntities = mergeEntities(working.entities, entities, lookup, normalizer);
    const mergedTopics = mergeTopics(working.topics, topics);
    const next: AggregatedIndex = {
      entities: mergedEntities,
      topics: mergedTopics,
      graph: mergeGraph(working.graph, graph, mergedEntities, mergedTopics),
      annotations: mergeAnnotations(working.annotations, annotations, atoms),
    };

    logger.debug("segment_merged", {
      segment_id: segmentId,
      total_entities: next.entities.statistics.total_entities,
      total_nodes: next.graph.statistics.total_nodes,
      total_edges: next.graph.statistics.total_edges,
    });
    return next;
  } catch (error) {
    throw new MergeFailure(segmentId, errorMessage(error));
  }
}
