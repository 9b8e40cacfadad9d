import { buildEntityFragment } from "../aggregate/entities.js";
import { buildGraphFragment } from "../aggregate/graph.js";
import type { EntityNormalizer } from "../aggregate/normalize.js";
import { buildTopicFragment } from "../aggregate/topics.js";
import { CancelledError, SegmentAnalysisFailure, errorMessage } from "../errors.js";
import type { TextGenerator } from "../llm/text-generator.js";
import type { Atom, AtomAnnotation, NarrativeSegment, SegmentAnalysis, SegmentRecord } from "../types.js";
import { logger } from "../utils/logger.js";
import { annotateAtoms } from "./atom-annotator.js";
import { analyzeDeep } from "./deep-analyzer.js";
import { mergeAtomText } from "./prompts.js";

export interface ResolvedSegmentAtoms {
  atoms: Atom[];
  skipped: number[];
}

/** Maps positional refs onto atoms; refs outside the store are reported, not fatal. */
export function resolveSegmentAtoms(segment: SegmentRecord, atoms: readonly Atom[]): ResolvedSegmentAtoms {
  const resolved: Atom[] = [];
  const skipped: number[] = [];
  for (const ref of segment.atom_refs) {
    const atom = Number.isInteger(ref) ? atoms[ref] : undefined;
    if (atom) {
      resolved.push(atom);
    } else {
      skipped.push(ref);
    }
  }
  return { atoms: resolved, skipped };
}

export interface SegmentAnalyzerOptions {
  maxAttempts: number;
  maxTokens: number;
  batchSize: number;
}

export interface SegmentAnalyzerDeps {
  generator: TextGenerator;
  normalizer: EntityNormalizer;
  options: SegmentAnalyzerOptions;
}

export class SegmentAnalyzer {
  private readonly deps: SegmentAnalyzerDeps;

  constructor(deps: SegmentAnalyzerDeps) {
    this.deps = deps;
  }

  async analyze(segment: SegmentRecord, atoms: readonly Atom[], signal?: AbortSignal): Promise<SegmentAnalysis> {
    const segmentId = segment.segment_id;
    const { atoms: segmentAtoms, skipped } = resolveSegmentAtoms(segment, atoms);
    if (skipped.length > 0) {
      logger.warn("segment_refs_skipped", { segment_id: segmentId, skipped, store_size: atoms.length });
    }
    if (segmentAtoms.length === 0) {
      throw new SegmentAnalysisFailure(segmentId, "No atoms in segment");
    }

    const fullText = mergeAtomText(segmentAtoms);
    const { generator, normalizer, options } = this.deps;

    const outcome = await analyzeDeep({
      generator,
      segment,
      fullText,
      maxAttempts: options.maxAttempts,
      maxTokens: options.maxTokens,
      signal,
    });

    let annotations: AtomAnnotation[];
    try {
      annotations = await annotateAtoms({
        generator,
        segmentId,
        atoms: segmentAtoms,
        batchSize: options.batchSize,
        maxAttempts: options.maxAttempts,
        maxTokens: options.maxTokens,
        signal,
      });
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      throw new SegmentAnalysisFailure(segmentId, `Atom annotation failed: ${errorMessage(error)}`);
    }

    const narrative: NarrativeSegment = {
      ...outcome.analysis,
      segment_id: segmentId,
      atom_ids: segmentAtoms.map((atom) => atom.atom_id),
      start_ms: segment.start_ms,
      end_ms: segment.end_ms,
      duration_ms: segment.duration_ms,
      full_text: fullText,
    };

    const entities = buildEntityFragment({
      segmentId,
      entities: narrative.entities,
      primaryTopic: narrative.topics.primary_topic,
      atoms: segmentAtoms,
      normalizer,
    });
    const topics = buildTopicFragment(narrative);

    logger.info("segment_analyzed", {
      segment_id: segmentId,
      outcome: outcome.kind,
      attempts: outcome.attempts,
      atoms: segmentAtoms.length,
      annotations: annotations.length,
    });

    return {
      segment_id: segmentId,
      narrative,
      outcome,
      entities,
      topics,
      graph: buildGraphFragment(narrative, entities, topics),
      annotations,
      skipped_refs: skipped,
    };
  }
}
