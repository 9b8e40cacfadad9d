import type { Api, Model } from "@mariozechner/pi-ai";

export const ENTITY_TYPES = [
  "persons",
  "countries",
  "organizations",
  "time_points",
  "events",
  "concepts",
] as const;

export const SEGMENT_STATUSES = ["pending", "atomized", "analyzing", "analyzed", "failed"] as const;

export const WORKER_STATUSES = ["idle", "running", "completed", "failed", "cancelled"] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export type SegmentStatus = (typeof SEGMENT_STATUSES)[number];

export type WorkerStatus = (typeof WORKER_STATUSES)[number];

export type VidatlasProvider = "anthropic" | "openai";

export interface VidatlasStoredCredentials {
  anthropicApiKey?: string;
  openaiApiKey?: string;
}

export interface VidatlasConfig {
  provider?: VidatlasProvider;
  model?: string;
  credentials?: VidatlasStoredCredentials;
  dataDir?: string;
  segmentMinutes?: number;
  aliasesPath?: string;
  llm?: {
    maxAttempts?: number;
    maxTokens?: number;
  };
  annotation?: {
    batchSize?: number;
  };
  embedding?: {
    model?: string;
    dimensions?: number;
    apiKey?: string;
  };
}

export interface ResolvedModel {
  provider: VidatlasProvider;
  modelId: string;
  model: Model<Api>;
}

export interface LlmClient {
  provider: VidatlasProvider;
  resolvedModel: ResolvedModel;
  apiKey: string;
}

/** Smallest indivisible transcript unit. Read-only once loaded. */
export interface Atom {
  atom_id: string;
  start_ms: number;
  end_ms: number;
  duration_ms: number;
  merged_text: string;
  type: string;
  completeness: string;
  source_utterance_ids?: number[];
}

export type AnalysisSource = "llm" | "default_applied";

export interface SegmentRecord {
  segment_id: string;
  start_ms: number;
  end_ms: number;
  duration_ms: number;
  start_time_str: string;
  end_time_str: string;
  /** Positional indices into the atom store, never atom ids. */
  atom_refs: number[];
  status: SegmentStatus;
  atomization_complete: boolean;
  analysis_complete: boolean;
  entity_count: number;
  error_message: string | null;
  analysis_outcome: AnalysisSource | null;
}

export interface SegmentStatusFields {
  entity_count?: number;
  error_message?: string | null;
  analysis_outcome?: AnalysisSource | null;
}

export interface TopicsAnalysis {
  primary_topic: string | null;
  secondary_topics: string[];
  free_tags: string[];
}

export type EntitiesAnalysis = Record<EntityType, string[]>;

export interface DeepAnalysis {
  title: string;
  summary: string;
  narrative_structure: {
    type: string;
    structure: string;
  };
  topics: TopicsAnalysis;
  entities: EntitiesAnalysis;
  core_argument: string;
  key_insights: string[];
  importance_score: number;
  quality_score: number;
}

/** Analysis output for one scheduling segment. */
export interface NarrativeSegment extends DeepAnalysis {
  segment_id: string;
  atom_ids: string[];
  start_ms: number;
  end_ms: number;
  duration_ms: number;
  full_text: string;
}

export type AnalysisOutcome =
  | { kind: "llm"; analysis: DeepAnalysis; attempts: number }
  | { kind: "default_applied"; analysis: DeepAnalysis; attempts: number; reason: string };

export interface AnnotationEntity {
  name: string;
  type: string;
}

export interface AtomEmotion {
  type: "positive" | "negative" | "neutral";
  score: number;
}

export interface AtomAnnotation {
  atom_id: string;
  entities: AnnotationEntity[];
  topics: string[];
  emotion: AtomEmotion | null;
  importance_score: number;
  has_entity: boolean;
  has_topic: boolean;
  embedding_status: "pending" | "completed" | "failed";
  parent_segment_id: string;
}

export interface EntityRecord {
  name: string;
  type: EntityType;
  mentions: number;
  atom_ids: string[];
  segment_ids: string[];
  context: string[];
}

export interface EntityStatistics {
  total_entities: number;
  by_type: Record<EntityType, number>;
}

export type EntityIndex = Record<EntityType, EntityRecord[]> & {
  statistics: EntityStatistics;
};

export type EntityFragment = Record<EntityType, EntityRecord[]>;

export interface PrimaryTopicRecord {
  topic: string;
  weight: number;
  weight_by_segment: Record<string, number>;
  segment_ids: string[];
  atom_ids: string[];
  subtopics: string[];
  tags: string[];
}

export interface SecondaryTopicRecord {
  topic: string;
  weight: number;
  weight_by_segment: Record<string, number>;
  segment_ids: string[];
  parent_topics: string[];
}

export interface TagRecord {
  tag: string;
  count: number;
  segment_ids: string[];
  related_topics: string[];
}

export interface TopicIndex {
  primary_topics: PrimaryTopicRecord[];
  secondary_topics: SecondaryTopicRecord[];
  tags: TagRecord[];
  statistics: {
    total_primary_topics: number;
    total_secondary_topics: number;
    total_tags: number;
  };
}

export type TopicFragment = Omit<TopicIndex, "statistics">;

export type GraphNodeType = EntityType | "topic" | "segment";

export interface GraphNode {
  id: string;
  type: GraphNodeType;
  label: string;
  mentions?: number;
  weight?: number;
  importance?: number;
  segment_ids: string[];
}

export interface GraphEdge {
  source: string;
  target: string;
  relation: string;
  type: string;
  weight: number;
  segment_ids: string[];
}

export interface KnowledgeGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
  statistics: {
    total_nodes: number;
    total_edges: number;
    node_types: Record<string, number>;
    edge_types: Record<string, number>;
  };
}

export type GraphFragment = Omit<KnowledgeGraph, "statistics">;

export interface AggregatedIndex {
  entities: EntityIndex;
  topics: TopicIndex;
  graph: KnowledgeGraph;
  annotations: AtomAnnotation[];
}

export interface SegmentAnalysis {
  segment_id: string;
  narrative: NarrativeSegment;
  outcome: AnalysisOutcome;
  entities: EntityFragment;
  topics: TopicFragment;
  graph: GraphFragment;
  annotations: AtomAnnotation[];
  skipped_refs: number[];
}

export interface ProgressSnapshot {
  total_segments: number;
  analyzed: number;
  pending: number;
  failed: number;
  total_entities: number;
  percent: number;
}
