import type {
  EntityFragment,
  EntityIndex,
  EntityType,
  GraphEdge,
  GraphFragment,
  GraphNode,
  KnowledgeGraph,
  NarrativeSegment,
  TopicFragment,
  TopicIndex,
} from "../types.js";

/** Time points stay out of the graph; they carry no relations of their own. */
export const GRAPH_ENTITY_TYPES = ["persons", "countries", "organizations", "events", "concepts"] as const satisfies
  readonly EntityType[];

interface CoOccurrenceRule {
  from: EntityType;
  to: EntityType;
  relation: string;
  type: string;
}

const CO_OCCURRENCE_RULES: readonly CoOccurrenceRule[] = [
  { from: "persons", to: "events", relation: "participates_in", type: "person_to_event" },
  { from: "persons", to: "countries", relation: "associated_country", type: "person_to_country" },
  { from: "concepts", to: "events", relation: "related_concept", type: "concept_to_event" },
];

export function entityNodeId(type: EntityType, name: string): string {
  return `${type}_${name}`;
}

export function topicNodeId(topic: string): string {
  return `topic_${topic}`;
}

export function segmentNodeId(segmentId: string): string {
  return `segment_${segmentId}`;
}

function edgeKey(edge: Pick<GraphEdge, "source" | "target" | "relation">): string {
  return `${edge.source}\u0000${edge.target}\u0000${edge.relation}`;
}

function countBy<T>(items: readonly T[], keyOf: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const key = keyOf(item);
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

export function computeGraphStatistics(fragment: GraphFragment): KnowledgeGraph["statistics"] {
  return {
    total_nodes: fragment.nodes.length,
    total_edges: fragment.edges.length,
    node_types: countBy(fragment.nodes, (node) => node.type),
    edge_types: countBy(fragment.edges, (edge) => edge.type),
  };
}

export function emptyGraph(): KnowledgeGraph {
  const fragment: GraphFragment = { nodes: [], edges: [] };
  return { ...fragment, statistics: computeGraphStatistics(fragment) };
}

/** Nodes and edges contributed by a single segment. */
export function buildGraphFragment(
  narrative: NarrativeSegment,
  entities: EntityFragment,
  topics: TopicFragment,
): GraphFragment {
  const segmentId = narrative.segment_id;
  const segmentNode = segmentNodeId(segmentId);
  const nodes: GraphNode[] = [];
  const edges = new Map<string, GraphEdge>();

  const addEdge = (source: string, target: string, relation: string, type: string): void => {
    const edge: GraphEdge = { source, target, relation, type, weight: 1, segment_ids: [segmentId] };
    edges.set(edgeKey(edge), edge);
  };

  const topicIds = new Set<string>();
  for (const topic of topics.primary_topics) {
    const id = topicNodeId(topic.topic);
    topicIds.add(id);
    nodes.push({ id, type: "topic", label: topic.topic, weight: topic.weight, segment_ids: [segmentId] });
  }

  nodes.push({
    id: segmentNode,
    type: "segment",
    label: narrative.title,
    importance: narrative.importance_score,
    segment_ids: [segmentId],
  });

  for (const type of GRAPH_ENTITY_TYPES) {
    for (const entity of entities[type]) {
      const id = entityNodeId(type, entity.name);
      nodes.push({ id, type, label: entity.name, mentions: entity.mentions, segment_ids: [segmentId] });
      addEdge(id, segmentNode, "appears_in", "entity_to_segment");
      for (const context of entity.context) {
        if (topicIds.has(topicNodeId(context))) {
          addEdge(id, topicNodeId(context), "related_topic", "entity_to_topic");
        }
      }
    }
  }

  for (const topicId of topicIds) {
    addEdge(topicId, segmentNode, "covers", "topic_to_segment");
  }

  for (const rule of CO_OCCURRENCE_RULES) {
    for (const left of entities[rule.from]) {
      for (const right of entities[rule.to]) {
        addEdge(entityNodeId(rule.from, left.name), entityNodeId(rule.to, right.name), rule.relation, rule.type);
      }
    }
  }

  return { nodes, edges: Array.from(edges.values()) };
}

function union(left: readonly string[], right: readonly string[]): string[] {
  return Array.from(new Set([...left, ...right])).sort();
}

function isGraphEntityType(type: GraphNode["type"]): type is (typeof GRAPH_ENTITY_TYPES)[number] {
  return GRAPH_ENTITY_TYPES.some((entityType) => entityType === type);
}

/**
 * Folds a graph fragment into the graph. An edge's weight is the number of
 * distinct segments that observed it; entity mentions and topic weights are
 * copied from the already-merged entity and topic indexes.
 */
export function mergeGraph(
  graph: KnowledgeGraph,
  fragment: GraphFragment,
  entities: EntityIndex,
  topics: TopicIndex,
): KnowledgeGraph {
  const nodes = new Map<string, GraphNode>();
  for (const node of graph.nodes) {
    nodes.set(node.id, node);
  }
  for (const node of fragment.nodes) {
    const current = nodes.get(node.id);
    if (!current) {
      nodes.set(node.id, node);
    } else if (node.type === "segment") {
      nodes.set(node.id, { ...node, segment_ids: union(current.segment_ids, node.segment_ids) });
    } else {
      nodes.set(node.id, { ...current, segment_ids: union(current.segment_ids, node.segment_ids) });
    }
  }

  const mentionsById = new Map<string, number>();
  for (const type of GRAPH_ENTITY_TYPES) {
    for (const record of entities[type]) {
      mentionsById.set(entityNodeId(type, record.name), record.mentions);
    }
  }
  const weightById = new Map(topics.primary_topics.map((topic) => [topicNodeId(topic.topic), topic.weight]));

  const mergedNodes = Array.from(nodes.values()).map((node) => {
    if (isGraphEntityType(node.type)) {
      return { ...node, mentions: mentionsById.get(node.id) ?? node.mentions };
    }
    if (node.type === "topic") {
      return { ...node, weight: weightById.get(node.id) ?? node.weight };
    }
    return node;
  });

  const edges = new Map<string, GraphEdge>();
  for (const edge of graph.edges) {
    edges.set(edgeKey(edge), edge);
  }
  for (const edge of fragment.edges) {
    const current = edges.get(edgeKey(edge));
    const segmentIds = current ? union(current.segment_ids, edge.segment_ids) : [...edge.segment_ids];
    edges.set(edgeKey(edge), { ...(current ?? edge), segment_ids: segmentIds, weight: segmentIds.length });
  }

  const merged: GraphFragment = { nodes: mergedNodes, edges: Array.from(edges.values()) };
  return { ...merged, statistics: computeGraphStatistics(merged) };
}
