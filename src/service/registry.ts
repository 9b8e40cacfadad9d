import path from "node:path";
import { IndexStore } from "../aggregate/index-store.js";
import type { EntityNormalizer } from "../aggregate/normalize.js";
import { SegmentAnalyzer } from "../analysis/segment-analyzer.js";
import { ATOMS_FILE, AtomStore } from "../atoms/store.js";
import { resolveProjectDir, type ResolvedSettings } from "../config.js";
import type { TextGenerator } from "../llm/text-generator.js";
import { SegmentTableStore } from "../segments/state.js";
import { IncrementalAnalysisService } from "./analysis-service.js";

export interface ProjectStores {
  projectDir: string;
  atoms: AtomStore;
  segments: SegmentTableStore;
  index: IndexStore;
}

/** Stores for one project directory; no LLM access needed. */
export function openProjectStores(settings: Pick<ResolvedSettings, "dataDir" | "segmentMinutes">, projectId: string): ProjectStores {
  const projectDir = resolveProjectDir(settings.dataDir, projectId);
  return {
    projectDir,
    atoms: new AtomStore(path.join(projectDir, ATOMS_FILE)),
    segments: new SegmentTableStore(projectDir, settings.segmentMinutes),
    index: new IndexStore(projectDir),
  };
}

export interface ServiceFactoryContext {
  settings: ResolvedSettings;
  generator: TextGenerator;
  normalizer: EntityNormalizer;
}

export function createAnalysisService(projectId: string, context: ServiceFactoryContext): IncrementalAnalysisService {
  const stores = openProjectStores(context.settings, projectId);
  return new IncrementalAnalysisService({
    projectId,
    projectDir: stores.projectDir,
    atoms: stores.atoms,
    segments: stores.segments,
    index: stores.index,
    normalizer: context.normalizer,
    analyzer: new SegmentAnalyzer({
      generator: context.generator,
      normalizer: context.normalizer,
      options: {
        maxAttempts: context.settings.maxAttempts,
        maxTokens: context.settings.maxTokens,
        batchSize: context.settings.annotationBatchSize,
      },
    }),
  });
}

/** One long-lived service per project id. */
export class ProjectServiceRegistry {
  private readonly services = new Map<string, IncrementalAnalysisService>();

  constructor(private readonly factory: (projectId: string) => IncrementalAnalysisService) {}

  get(projectId: string): IncrementalAnalysisService {
    const existing = this.services.get(projectId);
    if (existing) {
      return existing;
    }
    const service = this.factory(projectId);
    this.services.set(projectId, service);
    return service;
  }

  projectIds(): string[] {
    return Array.from(this.services.keys());
  }

  async stopAll(): Promise<void> {
    await Promise.all(Array.from(this.services.values(), (service) => service.stop()));
  }
}
