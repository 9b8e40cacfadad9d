import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  annotateAtoms,
  chunk,
  computeImportanceScore,
  parseAnnotationResponse,
} from "../../src/analysis/atom-annotator.js";
import { CancelledError, LlmAuthError } from "../../src/errors.js";
import { ParseResponseError } from "../../src/llm/parse-json.js";
import { makeAtom } from "../helpers/fixtures.js";
import { ScriptedGenerator } from "../helpers/llm.js";

const atoms = [makeAtom("A001", 0), makeAtom("A002", 1000), makeAtom("A003", 2000)];

function run(generator: ScriptedGenerator, signal?: AbortSignal) {
  return annotateAtoms({
    generator,
    segmentId: "SEG_001",
    atoms,
    batchSize: 2,
    maxAttempts: 2,
    maxTokens: 4000,
    signal,
  });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("computeImportanceScore", () => {
  it("scores empty text as zero", () => {
    expect(computeImportanceScore("   ", 3, 3, null)).toBe(0);
  });

  it("rewards moderate length over long text", () => {
    expect(computeImportanceScore("x".repeat(60), 0, 0, null)).toBe(0.6);
    expect(computeImportanceScore("x".repeat(250), 0, 0, null)).toBe(0.55);
    expect(computeImportanceScore("short", 0, 0, null)).toBe(0.5);
  });

  it("adds capped entity, topic, emotion and keyword bonuses", () => {
    expect(computeImportanceScore("A historic first.", 2, 1, { type: "negative", score: 0.9 })).toBeCloseTo(0.77);
    expect(computeImportanceScore("short", 10, 10, { type: "neutral", score: 1 })).toBeCloseTo(0.85);
  });
});

describe("parseAnnotationResponse", () => {
  it("accepts a bare array and skips items without an atom id", () => {
    const items = parseAnnotationResponse([{ atom_id: "A001", entities: ["Myanmar"] }, { topics: ["x"] }]);

    expect(Array.from(items.keys())).toEqual(["A001"]);
    expect(items.get("A001")).toEqual({
      atom_id: "A001",
      entities: [{ name: "Myanmar", type: "concepts" }],
      topics: [],
      emotion: null,
    });
  });

  it("rejects a response without an annotations array", () => {
    expect(() => parseAnnotationResponse({ result: [] })).toThrow(ParseResponseError);
  });
});

describe("chunk", () => {
  it("splits into batches of the given size", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});

describe("annotateAtoms", () => {
  it("annotates each batch and marks atoms of an exhausted batch as failed", async () => {
    const generator = new ScriptedGenerator([
      JSON.stringify({
        annotations: [
          {
            atom_id: "A001",
            entities: [{ name: "Khun Sa", type: "persons" }],
            topics: ["Opium"],
            emotion: { type: "neutral", score: 0.4 },
          },
        ],
      }),
      "not json",
      "not json either",
    ]);

    const annotations = await run(generator);

    expect(generator.calls).toBe(3);
    expect(generator.prompts[0]).toContain("[A001] text of A001");
    expect(generator.prompts[0]).toContain("[A002] text of A002");
    expect(annotations).toEqual([
      {
        atom_id: "A001",
        entities: [{ name: "Khun Sa", type: "persons" }],
        topics: ["Opium"],
        emotion: { type: "neutral", score: 0.4 },
        importance_score: 0.6,
        has_entity: true,
        has_topic: true,
        embedding_status: "pending",
        parent_segment_id: "SEG_001",
      },
      {
        atom_id: "A002",
        entities: [],
        topics: [],
        emotion: null,
        importance_score: 0.5,
        has_entity: false,
        has_topic: false,
        embedding_status: "pending",
        parent_segment_id: "SEG_001",
      },
      {
        atom_id: "A003",
        entities: [],
        topics: [],
        emotion: null,
        importance_score: 0.5,
        has_entity: false,
        has_topic: false,
        embedding_status: "failed",
        parent_segment_id: "SEG_001",
      },
    ]);
  });

  it("propagates permanent provider errors", async () => {
    const generator = new ScriptedGenerator([new LlmAuthError("401")]);

    await expect(run(generator)).rejects.toBeInstanceOf(LlmAuthError);
  });

  it("stops before the next batch once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(run(new ScriptedGenerator([]), controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
