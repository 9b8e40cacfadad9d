import { z } from "zod";
import { CancelledError, SegmentAnalysisFailure, errorMessage } from "../errors.js";
import { ParseResponseError, parseJsonFromLlm } from "../llm/parse-json.js";
import { attemptWithRetries, type AttemptResult } from "../llm/retry.js";
import type { TextGenerator } from "../llm/text-generator.js";
import type { AnalysisOutcome, DeepAnalysis, SegmentRecord } from "../types.js";
import { logger } from "../utils/logger.js";
import { clamp, isRecord, roundTo } from "../utils/validation.js";
import { DEEP_ANALYSIS_SYSTEM_PROMPT, buildDeepAnalysisPrompt } from "./prompts.js";

const DEFAULT_SCORE = 0.5;
const MISSING_SCORE = 0.7;
const SUMMARY_FALLBACK_CHARS = 300;

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.flatMap((item) => (typeof item === "string" && item.trim().length > 0 ? [item.trim()] : [])),
  );

const optionalText = z.string().trim().min(1).optional().catch(undefined);

const score = z
  .number()
  .finite()
  .catch(MISSING_SCORE)
  .transform((value) => roundTo(clamp(value, 0, 1)));

const deepAnalysisResponseSchema = z.object({
  title: optionalText,
  summary: optionalText,
  narrative_structure: z
    .object({
      type: z.string().catch("unknown"),
      structure: z.string().catch(""),
    })
    .catch({ type: "unknown", structure: "" }),
  topics: z
    .object({
      primary_topic: z.string().trim().min(1).nullable().catch(null),
      secondary_topics: stringList,
      free_tags: stringList,
    })
    .catch({ primary_topic: null, secondary_topics: [], free_tags: [] }),
  entities: z
    .object({
      persons: stringList,
      countries: stringList,
      organizations: stringList,
      time_points: stringList,
      events: stringList,
      concepts: stringList,
    })
    .catch({ persons: [], countries: [], organizations: [], time_points: [], events: [], concepts: [] }),
  core_argument: optionalText,
  key_insights: stringList.optional(),
  // Older prompts nested these two under ai_analysis.
  ai_analysis: z
    .object({
      core_argument: optionalText,
      key_insights: stringList.optional(),
    })
    .optional()
    .catch(undefined),
  importance_score: score,
  quality_score: score,
});

export interface NormalizeContext {
  segmentId: string;
  fullText: string;
}

/**
 * Turns a parsed model response into a complete DeepAnalysis. Missing or
 * malformed fields get defaults; a non-object response is unusable.
 */
export function normalizeDeepAnalysis(raw: unknown, context: NormalizeContext): DeepAnalysis {
  if (!isRecord(raw)) {
    throw new ParseResponseError("Deep analysis response is not a JSON object.");
  }
  const parsed = deepAnalysisResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseResponseError(`Deep analysis response is malformed: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }

  const data = parsed.data;
  const summary =
    data.summary ??
    (context.fullText.length > SUMMARY_FALLBACK_CHARS
      ? `${context.fullText.slice(0, SUMMARY_FALLBACK_CHARS)}...`
      : context.fullText);

  return {
    title: data.title ?? `Segment ${context.segmentId}`,
    summary,
    narrative_structure: data.narrative_structure,
    topics: data.topics,
    entities: data.entities,
    core_argument: data.core_argument ?? data.ai_analysis?.core_argument ?? "",
    key_insights: data.key_insights ?? data.ai_analysis?.key_insights ?? [],
    importance_score: data.importance_score,
    quality_score: data.quality_score,
  };
}

/** Deterministic analysis used once every attempt has failed. */
export function createDefaultAnalysis(segmentId: string): DeepAnalysis {
  return {
    title: `Untitled segment ${segmentId}`,
    summary: "",
    narrative_structure: { type: "unknown", structure: "" },
    topics: { primary_topic: null, secondary_topics: [], free_tags: [] },
    entities: { persons: [], countries: [], organizations: [], time_points: [], events: [], concepts: [] },
    core_argument: "",
    key_insights: [],
    importance_score: DEFAULT_SCORE,
    quality_score: DEFAULT_SCORE,
  };
}

export interface DeepAnalysisParams {
  generator: TextGenerator;
  segment: SegmentRecord;
  fullText: string;
  maxAttempts: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export async function analyzeDeep(params: DeepAnalysisParams): Promise<AnalysisOutcome> {
  const segmentId = params.segment.segment_id;
  const prompt = buildDeepAnalysisPrompt(params.segment, params.fullText);

  let result: AttemptResult<DeepAnalysis>;
  try {
    result = await attemptWithRetries(
      async () => {
        const text = await params.generator.generate(prompt, {
          maxTokens: params.maxTokens,
          signal: params.signal,
          systemPrompt: DEEP_ANALYSIS_SYSTEM_PROMPT,
        });
        return normalizeDeepAnalysis(parseJsonFromLlm(text), { segmentId, fullText: params.fullText });
      },
      { maxAttempts: params.maxAttempts, label: `deep_analysis:${segmentId}`, signal: params.signal },
    );
  } catch (error) {
    if (error instanceof CancelledError) {
      throw error;
    }
    throw new SegmentAnalysisFailure(segmentId, `Deep analysis failed: ${errorMessage(error)}`);
  }

  if (result.ok) {
    return { kind: "llm", analysis: result.value, attempts: result.attempts };
  }

  logger.warn("default_analysis_applied", {
    segment_id: segmentId,
    attempts: result.attempts,
    reason: result.reason,
  });
  return {
    kind: "default_applied",
    analysis: createDefaultAnalysis(segmentId),
    attempts: result.attempts,
    reason: result.reason,
  };
}
