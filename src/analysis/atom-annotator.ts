import { z } from "zod";
import { CancelledError } from "../errors.js";
import { ParseResponseError, parseJsonFromLlm } from "../llm/parse-json.js";
import { attemptWithRetries } from "../llm/retry.js";
import type { TextGenerator } from "../llm/text-generator.js";
import type { Atom, AtomAnnotation, AtomEmotion } from "../types.js";
import { logger } from "../utils/logger.js";
import { clamp, isRecord, roundTo } from "../utils/validation.js";
import { ANNOTATION_SYSTEM_PROMPT, buildAnnotationPrompt } from "./prompts.js";

const IMPORTANT_KEYWORDS = [
  "important",
  "key",
  "critical",
  "major",
  "breakthrough",
  "historic",
  "first",
  "重要",
  "关键",
  "核心",
  "主要",
  "重大",
  "突破",
  "历史",
  "首次",
  "第一",
];

const annotationItemSchema = z.object({
  atom_id: z.string().min(1),
  entities: z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((item) => {
        if (typeof item === "string" && item.trim()) {
          return [{ name: item.trim(), type: "concepts" }];
        }
        if (isRecord(item) && typeof item.name === "string" && item.name.trim()) {
          return [{ name: item.name.trim(), type: typeof item.type === "string" ? item.type : "concepts" }];
        }
        return [];
      }),
    ),
  topics: z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((item) => (typeof item === "string" && item.trim() ? [item.trim()] : [])),
    ),
  emotion: z
    .object({
      type: z.enum(["positive", "negative", "neutral"]),
      score: z.number().finite().transform((value) => clamp(value, 0, 1)),
    })
    .nullable()
    .catch(null),
});

type AnnotationItem = z.infer<typeof annotationItemSchema>;

/** Heuristic 0..1 importance from length, entity/topic counts, emotion and keywords. */
export function computeImportanceScore(
  text: string,
  entityCount: number,
  topicCount: number,
  emotion: AtomEmotion | null,
): number {
  if (!text.trim()) {
    return 0;
  }

  let score = 0.5;
  const length = Array.from(text).length;
  if (length >= 50 && length <= 200) {
    score += 0.1;
  } else if (length > 200) {
    score += 0.05;
  }

  score += Math.min(entityCount * 0.05, 0.2);
  score += Math.min(topicCount * 0.05, 0.15);

  if (emotion && emotion.type !== "neutral") {
    score += Math.min(emotion.score, 0.8) * 0.1;
  }

  const lowered = text.toLowerCase();
  const keywordHits = IMPORTANT_KEYWORDS.filter((keyword) => lowered.includes(keyword)).length;
  score += Math.min(keywordHits * 0.02, 0.1);

  return roundTo(clamp(score, 0, 1));
}

function buildAnnotation(
  atom: Atom,
  segmentId: string,
  item: AnnotationItem | undefined,
  status: AtomAnnotation["embedding_status"],
): AtomAnnotation {
  const entities = item?.entities ?? [];
  const topics = item?.topics ?? [];
  const emotion = item?.emotion ?? null;
  return {
    atom_id: atom.atom_id,
    entities,
    topics,
    emotion,
    importance_score: computeImportanceScore(atom.merged_text, entities.length, topics.length, emotion),
    has_entity: entities.length > 0,
    has_topic: topics.length > 0,
    embedding_status: status,
    parent_segment_id: segmentId,
  };
}

/** Accepts `{annotations: [...]}` or a bare array; items that do not parse are skipped. */
export function parseAnnotationResponse(raw: unknown): Map<string, AnnotationItem> {
  const list = isRecord(raw) ? raw.annotations : raw;
  if (!Array.isArray(list)) {
    throw new ParseResponseError("Annotation response has no annotations array.");
  }

  const items = new Map<string, AnnotationItem>();
  for (const entry of list) {
    const parsed = annotationItemSchema.safeParse(entry);
    if (parsed.success) {
      items.set(parsed.data.atom_id, parsed.data);
    }
  }
  return items;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += step) {
    chunks.push(items.slice(index, index + step));
  }
  return chunks;
}

export interface AnnotateParams {
  generator: TextGenerator;
  segmentId: string;
  atoms: readonly Atom[];
  batchSize: number;
  maxAttempts: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/**
 * Annotates atoms in batches, one model call per batch. A batch that keeps
 * failing yields bare annotations marked `failed` instead of failing the segment.
 */
export async function annotateAtoms(params: AnnotateParams): Promise<AtomAnnotation[]> {
  const annotations: AtomAnnotation[] = [];
  const batches = chunk(params.atoms, params.batchSize);

  for (const [batchIndex, batch] of batches.entries()) {
    if (params.signal?.aborted) {
      throw new CancelledError();
    }

    const prompt = buildAnnotationPrompt(params.segmentId, batch);
    const result = await attemptWithRetries(
      async () => {
        const text = await params.generator.generate(prompt, {
          maxTokens: params.maxTokens,
          signal: params.signal,
          systemPrompt: ANNOTATION_SYSTEM_PROMPT,
        });
        return parseAnnotationResponse(parseJsonFromLlm(text));
      },
      {
        maxAttempts: params.maxAttempts,
        label: `annotation:${params.segmentId}:${batchIndex + 1}`,
        signal: params.signal,
      },
    );

    if (result.ok) {
      for (const atom of batch) {
        annotations.push(buildAnnotation(atom, params.segmentId, result.value.get(atom.atom_id), "pending"));
      }
      continue;
    }

    logger.warn("annotation_batch_failed", {
      segment_id: params.segmentId,
      batch: batchIndex + 1,
      batches: batches.length,
      atoms: batch.length,
      reason: result.reason,
    });
    for (const atom of batch) {
      annotations.push(buildAnnotation(atom, params.segmentId, undefined, "failed"));
    }
  }

  return annotations;
}
