import type {
  NarrativeSegment,
  PrimaryTopicRecord,
  SecondaryTopicRecord,
  TagRecord,
  TopicFragment,
  TopicIndex,
} from "../types.js";
import { roundTo } from "../utils/validation.js";

export const SECONDARY_TOPIC_FACTOR = 0.6;

export function emptyTopicFragment(): TopicFragment {
  return { primary_topics: [], secondary_topics: [], tags: [] };
}

export function computeTopicStatistics(fragment: TopicFragment): TopicIndex["statistics"] {
  return {
    total_primary_topics: fragment.primary_topics.length,
    total_secondary_topics: fragment.secondary_topics.length,
    total_tags: fragment.tags.length,
  };
}

export function emptyTopicIndex(): TopicIndex {
  const fragment = emptyTopicFragment();
  return { ...fragment, statistics: computeTopicStatistics(fragment) };
}

function cleanNames(values: readonly string[]): string[] {
  return Array.from(new Set(values.map((value) => value.trim()).filter((value) => value.length > 0)));
}

export function buildTopicFragment(narrative: NarrativeSegment): TopicFragment {
  const segmentId = narrative.segment_id;
  const primary = narrative.topics.primary_topic?.trim() || null;
  const secondary = cleanNames(narrative.topics.secondary_topics).filter((topic) => topic !== primary);
  const tags = cleanNames(narrative.topics.free_tags);
  const importance = roundTo(narrative.importance_score);
  const secondaryWeight = roundTo(narrative.importance_score * SECONDARY_TOPIC_FACTOR);

  const fragment = emptyTopicFragment();
  if (primary) {
    fragment.primary_topics.push({
      topic: primary,
      weight: importance,
      weight_by_segment: { [segmentId]: importance },
      segment_ids: [segmentId],
      atom_ids: [...narrative.atom_ids],
      subtopics: secondary,
      tags,
    });
  }

  fragment.secondary_topics = secondary.map((topic) => ({
    topic,
    weight: secondaryWeight,
    weight_by_segment: { [segmentId]: secondaryWeight },
    segment_ids: [segmentId],
    parent_topics: primary ? [primary] : [],
  }));

  fragment.tags = tags.map((tag) => ({
    tag,
    count: 1,
    segment_ids: [segmentId],
    related_topics: primary ? [primary] : [],
  }));

  return fragment;
}

function union(left: readonly string[], right: readonly string[]): string[] {
  return Array.from(new Set([...left, ...right]));
}

function sumWeights(weights: Record<string, number>): number {
  return roundTo(Object.values(weights).reduce((sum, weight) => sum + weight, 0));
}

function mergeKeyed<T>(
  existing: readonly T[],
  incoming: readonly T[],
  keyOf: (item: T) => string,
  combine: (current: T, next: T) => T,
): T[] {
  const byKey = new Map<string, T>();
  for (const item of existing) {
    byKey.set(keyOf(item), item);
  }
  for (const item of incoming) {
    const current = byKey.get(keyOf(item));
    byKey.set(keyOf(item), current ? combine(current, item) : item);
  }
  return Array.from(byKey.values());
}

function byWeight<T extends { weight: number; topic: string }>(a: T, b: T): number {
  return b.weight - a.weight || a.topic.localeCompare(b.topic);
}

/**
 * Folds a topic fragment into the index. A segment's weight contribution is
 * stored per segment id and replaced on re-merge, so weights never inflate.
 */
export function mergeTopics(index: TopicIndex, fragment: TopicFragment): TopicIndex {
  const primary = mergeKeyed<PrimaryTopicRecord>(
    index.primary_topics,
    fragment.primary_topics,
    (record) => record.topic,
    (current, next) => ({
      ...current,
      weight_by_segment: { ...current.weight_by_segment, ...next.weight_by_segment },
      segment_ids: union(current.segment_ids, next.segment_ids).sort(),
      atom_ids: union(current.atom_ids, next.atom_ids),
      subtopics: union(current.subtopics, next.subtopics),
      tags: union(current.tags, next.tags),
    }),
  ).map((record) => ({ ...record, weight: sumWeights(record.weight_by_segment) }));

  const secondary = mergeKeyed<SecondaryTopicRecord>(
    index.secondary_topics,
    fragment.secondary_topics,
    (record) => record.topic,
    (current, next) => ({
      ...current,
      weight_by_segment: { ...current.weight_by_segment, ...next.weight_by_segment },
      segment_ids: union(current.segment_ids, next.segment_ids).sort(),
      parent_topics: union(current.parent_topics, next.parent_topics),
    }),
  ).map((record) => ({ ...record, weight: sumWeights(record.weight_by_segment) }));

  const tags = mergeKeyed<TagRecord>(
    index.tags,
    fragment.tags,
    (record) => record.tag,
    (current, next) => ({
      ...current,
      segment_ids: union(current.segment_ids, next.segment_ids).sort(),
      related_topics: union(current.related_topics, next.related_topics),
    }),
  ).map((record) => ({ ...record, count: record.segment_ids.length }));

  const merged: TopicFragment = {
    primary_topics: primary.sort(byWeight),
    secondary_topics: secondary.sort(byWeight),
    tags: tags.sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag)),
  };
  return { ...merged, statistics: computeTopicStatistics(merged) };
}
