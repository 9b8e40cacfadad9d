import { INDEX_FILES } from "../aggregate/index-store.js";
import { resetProjectState } from "../service/analysis-service.js";
import { openProjectStores } from "../service/registry.js";
import { formatSuccess } from "../ui.js";
import {
  guardCommand,
  loadCommandContext,
  stderrLine,
  stdoutLine,
  type CommandContext,
  type CommandResult,
} from "./shared.js";

export interface ResetCommandOptions {
  confirmReset?: boolean;
}

export interface ResetCommandDeps {
  loadContextFn: (env: NodeJS.ProcessEnv) => CommandContext;
  stdoutLine: (message: string) => void;
  stderrLine: (message: string) => void;
}

/**
 * Resets one segment, or with no segment the whole project. A full reset
 * deletes the aggregated index and is a dry run unless confirmed.
 */
export async function runResetCommand(
  projectId: string,
  segmentId: string | undefined,
  options: ResetCommandOptions,
  deps?: Partial<ResetCommandDeps>,
): Promise<CommandResult> {
  const resolvedDeps: ResetCommandDeps = {
    loadContextFn: deps?.loadContextFn ?? loadCommandContext,
    stdoutLine: deps?.stdoutLine ?? stdoutLine,
    stderrLine: deps?.stderrLine ?? stderrLine,
  };
  const target = segmentId?.trim() || "all";

  return guardCommand(resolvedDeps, async () => {
    const context = resolvedDeps.loadContextFn(process.env);
    const stores = openProjectStores(context.settings, projectId);

    if (target === "all" && options.confirmReset !== true) {
      resolvedDeps.stdoutLine(`[dry run] vidatlas reset ${projectId} would perform the following actions:`);
      resolvedDeps.stdoutLine("  - Return every atomized segment to the analyzable state");
      for (const document of Object.values(INDEX_FILES)) {
        resolvedDeps.stdoutLine(`  - Delete: ${document}`);
      }
      resolvedDeps.stdoutLine("Run with --confirm-reset to execute.");
      return { exitCode: 0 };
    }

    const changed = await resetProjectState(stores, target);
    resolvedDeps.stdoutLine(formatSuccess(`Reset ${changed.length} segment(s)`));
    return { exitCode: 0 };
  });
}
