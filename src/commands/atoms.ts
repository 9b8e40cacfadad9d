import { openProjectStores } from "../service/registry.js";
import { formatError, formatLabel, formatSuccess } from "../ui.js";
import { formatDuration, msToTimeStr } from "../utils/time.js";
import {
  guardCommand,
  loadCommandContext,
  stderrLine,
  stdoutLine,
  type CommandContext,
  type CommandResult,
} from "./shared.js";

export interface AtomsCommandDeps {
  loadContextFn: (env: NodeJS.ProcessEnv) => CommandContext;
  stdoutLine: (message: string) => void;
  stderrLine: (message: string) => void;
}

function resolveDeps(deps?: Partial<AtomsCommandDeps>): AtomsCommandDeps {
  return {
    loadContextFn: deps?.loadContextFn ?? loadCommandContext,
    stdoutLine: deps?.stdoutLine ?? stdoutLine,
    stderrLine: deps?.stderrLine ?? stderrLine,
  };
}

/** Exit code 1 when the store holds duplicate atom ids. */
export async function runAtomsCheckCommand(
  projectId: string,
  deps?: Partial<AtomsCommandDeps>,
): Promise<CommandResult> {
  const resolvedDeps = resolveDeps(deps);
  return guardCommand(resolvedDeps, async () => {
    const context = resolvedDeps.loadContextFn(process.env);
    const report = await openProjectStores(context.settings, projectId).atoms.check();

    resolvedDeps.stdoutLine(formatLabel("Atoms", String(report.total)));
    resolvedDeps.stdoutLine(formatLabel("Spoken time", formatDuration(report.totalDurationMs)));
    resolvedDeps.stdoutLine(formatLabel("Last end", msToTimeStr(report.lastEndMs)));

    if (report.duplicates.length > 0) {
      resolvedDeps.stdoutLine(formatError(`Duplicate atom ids: ${report.duplicates.join(", ")}`));
      resolvedDeps.stdoutLine(`Run \`vidatlas atoms repair ${projectId}\` to renumber.`);
      return { exitCode: 1 };
    }
    resolvedDeps.stdoutLine(formatSuccess("Atom ids are unique"));
    return { exitCode: 0 };
  });
}

export async function runAtomsRepairCommand(
  projectId: string,
  deps?: Partial<AtomsCommandDeps>,
): Promise<CommandResult> {
  const resolvedDeps = resolveDeps(deps);
  return guardCommand(resolvedDeps, async () => {
    const context = resolvedDeps.loadContextFn(process.env);
    const result = await openProjectStores(context.settings, projectId).atoms.repair();
    resolvedDeps.stdoutLine(formatSuccess(`Renumbered ${result.renamed} of ${result.total} atom(s)`));
    return { exitCode: 0 };
  });
}
