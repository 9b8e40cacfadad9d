import type { Client } from "@libsql/client";
import { createEmbedder, resolveEmbeddingApiKey, type Embedder } from "../embeddings/client.js";
import { indexAtoms, searchAtoms } from "../search/atom-search.js";
import { countVectors, initVectorStore, openVectorDb } from "../search/vector-store.js";
import { openProjectStores } from "../service/registry.js";
import { withRunLock } from "../service/run-lock.js";
import { formatSuccess, formatWarn, ui } from "../ui.js";
import {
  guardCommand,
  loadCommandContext,
  stderrLine,
  stdoutLine,
  type CommandContext,
  type CommandResult,
} from "./shared.js";

export const DEFAULT_SEARCH_LIMIT = 10;

export interface SearchCommandOptions {
  limit?: number;
  json?: boolean;
}

export interface SearchCommandDeps {
  loadContextFn: (env: NodeJS.ProcessEnv) => CommandContext;
  createEmbedderFn: (context: CommandContext) => Embedder;
  openDbFn: (projectDir: string) => Promise<Client>;
  stdoutLine: (message: string) => void;
  stderrLine: (message: string) => void;
}

function createDefaultEmbedder(context: CommandContext): Embedder {
  return createEmbedder({
    apiKey: resolveEmbeddingApiKey(context.config, context.env),
    model: context.settings.embeddingModel,
    dimensions: context.settings.embeddingDimensions,
  });
}

function resolveDeps(deps?: Partial<SearchCommandDeps>): SearchCommandDeps {
  return {
    loadContextFn: deps?.loadContextFn ?? loadCommandContext,
    createEmbedderFn: deps?.createEmbedderFn ?? createDefaultEmbedder,
    openDbFn: deps?.openDbFn ?? openVectorDb,
    stdoutLine: deps?.stdoutLine ?? stdoutLine,
    stderrLine: deps?.stderrLine ?? stderrLine,
  };
}

/** Embeds every atom of a project into its vector store. */
export async function runIndexCommand(
  projectId: string,
  deps?: Partial<SearchCommandDeps>,
): Promise<CommandResult> {
  const resolvedDeps = resolveDeps(deps);
  return guardCommand(resolvedDeps, async () => {
    const context = resolvedDeps.loadContextFn(process.env);
    const stores = openProjectStores(context.settings, projectId);
    const embedder = resolvedDeps.createEmbedderFn(context);

    const result = await withRunLock(stores.projectDir, async () => {
      const atoms = await stores.atoms.load();
      const segments = await stores.segments.loadOrRebuild(atoms);
      const db = await resolvedDeps.openDbFn(stores.projectDir);
      try {
        return await indexAtoms({
          db,
          embedder,
          atoms,
          segments,
          dimensions: context.settings.embeddingDimensions,
        });
      } finally {
        db.close();
      }
    });

    resolvedDeps.stdoutLine(formatSuccess(`Indexed ${result.indexed} atom(s)`));
    if (result.removed > 0) {
      resolvedDeps.stdoutLine(formatWarn(`Removed ${result.removed} vector(s) of atoms no longer in the store`));
    }
    return { exitCode: 0 };
  });
}

export async function runSearchCommand(
  projectId: string,
  query: string,
  options: SearchCommandOptions,
  deps?: Partial<SearchCommandDeps>,
): Promise<CommandResult> {
  const resolvedDeps = resolveDeps(deps);
  return guardCommand(resolvedDeps, async () => {
    const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new Error(`--limit must be a positive integer, got ${limit}.`);
    }

    const context = resolvedDeps.loadContextFn(process.env);
    const stores = openProjectStores(context.settings, projectId);

    const db = await resolvedDeps.openDbFn(stores.projectDir);
    try {
      await initVectorStore(db, context.settings.embeddingDimensions);
      if ((await countVectors(db)) === 0) {
        resolvedDeps.stdoutLine(formatWarn(`No indexed atoms. Run \`vidatlas index ${projectId}\` first.`));
        return { exitCode: 0 };
      }

      const embedder = resolvedDeps.createEmbedderFn(context);
      const matches = await searchAtoms({ db, embedder, query, limit });
      if (options.json === true) {
        resolvedDeps.stdoutLine(JSON.stringify(matches, null, 2));
        return { exitCode: 0 };
      }
      for (const match of matches) {
        const score = (1 - match.distance).toFixed(3);
        resolvedDeps.stdoutLine(
          `${ui.bold(match.id)} ${ui.dim(match.segment_id ?? "-")} ${ui.muted(score)}  ${match.text}`,
        );
      }
    } finally {
      db.close();
    }
    return { exitCode: 0 };
  });
}
