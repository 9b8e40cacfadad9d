import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EntityNormalizer, loadAliasTable } from "../../src/aggregate/normalize.js";
import { saveAtoms } from "../../src/atoms/store.js";
import type { ResolvedSettings } from "../../src/config.js";
import { IncrementalAnalysisService } from "../../src/service/analysis-service.js";
import { ProjectServiceRegistry, createAnalysisService, openProjectStores } from "../../src/service/registry.js";
import { makeAtom } from "../helpers/fixtures.js";
import { ScriptedGenerator } from "../helpers/llm.js";

const tempDirs: string[] = [];

async function makeSettings(): Promise<ResolvedSettings> {
  const dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "vidatlas-registry-"));
  tempDirs.push(dataDir);
  return {
    provider: "anthropic",
    model: "claude-sonnet-4-20250514",
    dataDir,
    segmentMinutes: 20,
    maxAttempts: 2,
    maxTokens: 4000,
    annotationBatchSize: 10,
    embeddingModel: "text-embedding-3-small",
    embeddingDimensions: 1536,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe("openProjectStores", () => {
  it("places every store under the project directory", async () => {
    const settings = await makeSettings();

    const stores = openProjectStores(settings, "history-01");

    expect(stores.projectDir).toBe(path.join(settings.dataDir, "history-01"));
    expect(stores.atoms.filePath).toBe(path.join(settings.dataDir, "history-01", "atoms.jsonl"));
    expect(stores.segments.filePath).toBe(path.join(settings.dataDir, "history-01", "segments_state.json"));
    expect(stores.index.pathFor("graph")).toBe(path.join(settings.dataDir, "history-01", "knowledge_graph.json"));
  });

  it("rejects project ids that would escape the data directory", async () => {
    const settings = await makeSettings();

    expect(() => openProjectStores(settings, "../etc")).toThrow('Invalid project id "../etc"');
  });
});

describe("createAnalysisService", () => {
  it("wires the analyzer to the generator and runs a project end to end", async () => {
    const settings = await makeSettings();
    const stores = openProjectStores(settings, "demo");
    await saveAtoms(stores.atoms.filePath, [makeAtom("A001", 0, 5000, "Khun Sa crossed into Thailand.")]);
    const generator = new ScriptedGenerator([
      JSON.stringify({
        title: "Crossing",
        summary: "Khun Sa crosses the border.",
        topics: { primary_topic: "Border", secondary_topics: [], free_tags: [] },
        entities: { persons: ["Khun Sa"], countries: ["Thailand"] },
      }),
      JSON.stringify({ annotations: [{ atom_id: "A001", entities: ["Khun Sa"], topics: ["Border"] }] }),
    ]);

    const service = createAnalysisService("demo", {
      settings,
      generator,
      normalizer: new EntityNormalizer(loadAliasTable()),
    });
    const summary = await service.start();

    expect(summary).toMatchObject({ status: "completed", analyzed: ["SEG_001"], failed: [] });
    expect(generator.calls).toBe(2);
    const progress = await service.progress();
    expect(progress).toMatchObject({ total_segments: 1, analyzed: 1, total_entities: 2, percent: 100 });
  });
});

describe("ProjectServiceRegistry", () => {
  it("creates one service per project and reuses it", () => {
    const created: string[] = [];
    const registry = new ProjectServiceRegistry((projectId) => {
      created.push(projectId);
      return fakeService(projectId);
    });

    const first = registry.get("alpha");
    registry.get("beta");

    expect(registry.get("alpha")).toBe(first);
    expect(created).toEqual(["alpha", "beta"]);
    expect(registry.projectIds()).toEqual(["alpha", "beta"]);
  });

  it("stops every service it created", async () => {
    const stopped: string[] = [];
    const registry = new ProjectServiceRegistry((projectId) => fakeService(projectId, stopped));
    registry.get("alpha");
    registry.get("beta");

    await registry.stopAll();

    expect(stopped).toEqual(["alpha", "beta"]);
  });
});

function fakeService(projectId: string, stopped: string[] = []): IncrementalAnalysisService {
  const stores = openProjectStores({ dataDir: os.tmpdir(), segmentMinutes: 20 }, projectId);
  const service = new IncrementalAnalysisService({
    projectId,
    ...stores,
    analyzer: { analyze: () => Promise.reject(new Error("not used")) },
    normalizer: new EntityNormalizer(loadAliasTable()),
  });
  vi.spyOn(service, "stop").mockImplementation(async () => {
    stopped.push(projectId);
    return null;
  });
  return service;
}
