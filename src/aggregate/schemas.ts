import { z } from "zod";
import { ENTITY_TYPES } from "../types.js";

export const entityRecordSchema = z.object({
  name: z.string().min(1),
  type: z.enum(ENTITY_TYPES),
  mentions: z.number().int().nonnegative(),
  atom_ids: z.array(z.string()),
  segment_ids: z.array(z.string()),
  context: z.array(z.string()),
});

const entityListSchema = z.array(entityRecordSchema).default([]);

export const entityFragmentSchema = z.object({
  persons: entityListSchema,
  countries: entityListSchema,
  organizations: entityListSchema,
  time_points: entityListSchema,
  events: entityListSchema,
  concepts: entityListSchema,
});

export const entityIndexSchema = entityFragmentSchema.extend({
  statistics: z
    .object({
      total_entities: z.number().int().nonnegative(),
      by_type: z.object({
        persons: z.number().int().nonnegative(),
        countries: z.number().int().nonnegative(),
        organizations: z.number().int().nonnegative(),
        time_points: z.number().int().nonnegative(),
        events: z.number().int().nonnegative(),
        concepts: z.number().int().nonnegative(),
      }),
    })
    .optional(),
});

const weightBySegmentSchema = z.record(z.number());

export const primaryTopicSchema = z.object({
  topic: z.string().min(1),
  weight: z.number(),
  weight_by_segment: weightBySegmentSchema,
  segment_ids: z.array(z.string()),
  atom_ids: z.array(z.string()),
  subtopics: z.array(z.string()),
  tags: z.array(z.string()),
});

export const secondaryTopicSchema = z.object({
  topic: z.string().min(1),
  weight: z.number(),
  weight_by_segment: weightBySegmentSchema,
  segment_ids: z.array(z.string()),
  parent_topics: z.array(z.string()),
});

export const tagSchema = z.object({
  tag: z.string().min(1),
  count: z.number().int().nonnegative(),
  segment_ids: z.array(z.string()),
  related_topics: z.array(z.string()),
});

export const topicFragmentSchema = z.object({
  primary_topics: z.array(primaryTopicSchema).default([]),
  secondary_topics: z.array(secondaryTopicSchema).default([]),
  tags: z.array(tagSchema).default([]),
});

export const topicIndexSchema = topicFragmentSchema.extend({
  statistics: z
    .object({
      total_primary_topics: z.number().int().nonnegative(),
      total_secondary_topics: z.number().int().nonnegative(),
      total_tags: z.number().int().nonnegative(),
    })
    .optional(),
});

export const graphNodeSchema = z.object({
  id: z.string().min(1),
  type: z.enum([...ENTITY_TYPES, "topic", "segment"] as const),
  label: z.string(),
  mentions: z.number().optional(),
  weight: z.number().optional(),
  importance: z.number().optional(),
  segment_ids: z.array(z.string()),
});

export const graphEdgeSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  relation: z.string().min(1),
  type: z.string().min(1),
  weight: z.number().nonnegative(),
  segment_ids: z.array(z.string()),
});

export const graphFragmentSchema = z.object({
  nodes: z.array(graphNodeSchema).default([]),
  edges: z.array(graphEdgeSchema).default([]),
});

export const graphIndexSchema = graphFragmentSchema.extend({
  statistics: z
    .object({
      total_nodes: z.number().int().nonnegative(),
      total_edges: z.number().int().nonnegative(),
      node_types: z.record(z.number()),
      edge_types: z.record(z.number()),
    })
    .optional(),
});

export const atomAnnotationSchema = z.object({
  atom_id: z.string().min(1),
  entities: z.array(z.object({ name: z.string(), type: z.string() })),
  topics: z.array(z.string()),
  emotion: z
    .object({
      type: z.enum(["positive", "negative", "neutral"]),
      score: z.number(),
    })
    .nullable(),
  importance_score: z.number(),
  has_entity: z.boolean(),
  has_topic: z.boolean(),
  embedding_status: z.enum(["pending", "completed", "failed"]),
  parent_segment_id: z.string(),
});

export const annotationListSchema = z.array(atomAnnotationSchema);
