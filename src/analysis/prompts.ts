import type { Atom, SegmentRecord } from "../types.js";
import { formatDuration } from "../utils/time.js";

export const DEEP_ANALYSIS_SYSTEM_PROMPT = `You are a video content analyst. You read one time window of a spoken transcript (history, politics, finance commentary) and describe it as structured data.

Return exactly one JSON object and nothing else. No prose before or after it.

## Output shape

{
  "title": "10-20 word headline for the window",
  "summary": "150-300 word summary",
  "narrative_structure": { "type": "historical narrative | argument | case study | data walkthrough", "structure": "e.g. background -> crisis -> decision -> outcome" },
  "topics": { "primary_topic": "main topic", "secondary_topics": ["..."], "free_tags": ["3-10 keywords"] },
  "entities": {
    "persons": [], "countries": [], "organizations": [],
    "time_points": [], "events": [], "concepts": []
  },
  "core_argument": "one sentence",
  "key_insights": ["3-5 short insights"],
  "importance_score": 0.0,
  "quality_score": 0.0
}

## Entities

Use the name as spoken in the transcript. One name per entry: "Khun Sa", not "Khun Sa defected".
Do not repeat a person under two spellings. Leave a list empty rather than guessing.

## Scores

importance_score and quality_score are numbers from 0 to 1.`;

export const ANNOTATION_SYSTEM_PROMPT = `You annotate short transcript fragments ("atoms") one by one.

Return exactly one JSON object:
{ "annotations": [ { "atom_id": "A001", "entities": [{ "name": "...", "type": "persons|countries|organizations|time_points|events|concepts" }], "topics": ["..."], "emotion": { "type": "positive|negative|neutral", "score": 0.0 } } ] }

Include every atom_id you are given, in order. Use an empty list when an atom has no entities or topics, and null for emotion when the tone is unclear.`;

export function mergeAtomText(atoms: readonly Atom[]): string {
  return [...atoms]
    .sort((a, b) => a.start_ms - b.start_ms)
    .map((atom) => atom.merged_text)
    .join("\n\n");
}

export function buildDeepAnalysisPrompt(segment: SegmentRecord, fullText: string): string {
  const context = {
    segment_id: segment.segment_id,
    start_time: segment.start_time_str,
    end_time: segment.end_time_str,
    duration: formatDuration(segment.duration_ms),
  };
  return [
    "Context:",
    JSON.stringify(context),
    "",
    "Transcript:",
    fullText,
    "",
    "Analyze this window and return the JSON object.",
  ].join("\n");
}

export function buildAnnotationPrompt(segmentId: string, atoms: readonly Atom[]): string {
  const lines = atoms.map((atom) => `[${atom.atom_id}] ${atom.merged_text.replace(/\s+/g, " ").trim()}`);
  return [`Segment ${segmentId}. Annotate these ${atoms.length} atoms:`, "", ...lines].join("\n");
}
