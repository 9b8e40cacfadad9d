import fs from "node:fs/promises";
import path from "node:path";
import type { ZodType, ZodTypeDef } from "zod";
import { StorageError, hasErrorCode } from "../errors.js";
import type { AggregatedIndex } from "../types.js";
import { removeIfExists, writeJsonAtomic } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { emptyIndex } from "./aggregator.js";
import { computeEntityStatistics } from "./entities.js";
import { computeGraphStatistics } from "./graph.js";
import { annotationListSchema, entityIndexSchema, graphIndexSchema, topicIndexSchema } from "./schemas.js";
import { computeTopicStatistics } from "./topics.js";

export const INDEX_FILES = {
  entities: "entities.json",
  topics: "topics.json",
  graph: "knowledge_graph.json",
  annotations: "atom_annotations.json",
} as const;

type IndexDocument = keyof typeof INDEX_FILES;

const INDEX_DOCUMENTS: readonly IndexDocument[] = ["entities", "topics", "graph", "annotations"];

export class IndexStore {
  private readonly projectDir: string;

  constructor(projectDir: string) {
    this.projectDir = projectDir;
  }

  pathFor(document: IndexDocument): string {
    return path.join(this.projectDir, INDEX_FILES[document]);
  }

  private async readDocument<T>(
    document: IndexDocument,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T | null> {
    const filePath = this.pathFor(document);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw new StorageError(filePath, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(filePath, error);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(filePath, result.error.issues[0]?.message ?? `invalid ${document} document`);
    }
    return result.data;
  }

  /** The last fully written index, or an empty one for documents not yet on disk. */
  async loadOrInit(): Promise<AggregatedIndex> {
    const empty = emptyIndex();
    const [entities, topics, graph, annotations] = await Promise.all([
      this.readDocument("entities", entityIndexSchema),
      this.readDocument("topics", topicIndexSchema),
      this.readDocument("graph", graphIndexSchema),
      this.readDocument("annotations", annotationListSchema),
    ]);

    return {
      entities: entities ? { ...entities, statistics: computeEntityStatistics(entities) } : empty.entities,
      topics: topics ? { ...topics, statistics: computeTopicStatistics(topics) } : empty.topics,
      graph: graph ? { ...graph, statistics: computeGraphStatistics(graph) } : empty.graph,
      annotations: annotations ?? empty.annotations,
    };
  }

  async save(index: AggregatedIndex): Promise<void> {
    const writes: Array<[IndexDocument, unknown]> = [
      ["entities", index.entities],
      ["topics", index.topics],
      ["graph", index.graph],
      ["annotations", index.annotations],
    ];
    for (const [document, value] of writes) {
      const filePath = this.pathFor(document);
      try {
        await writeJsonAtomic(filePath, value);
      } catch (error) {
        throw new StorageError(filePath, error);
      }
    }
    logger.debug("index_saved", {
      dir: this.projectDir,
      total_entities: index.entities.statistics.total_entities,
      annotations: index.annotations.length,
    });
  }

  async clear(): Promise<number> {
    let removed = 0;
    for (const document of INDEX_DOCUMENTS) {
      const filePath = this.pathFor(document);
      try {
        if (await removeIfExists(filePath)) {
          removed += 1;
        }
      } catch (error) {
        throw new StorageError(filePath, error);
      }
    }
    logger.info("index_cleared", { dir: this.projectDir, removed });
    return removed;
  }
}
