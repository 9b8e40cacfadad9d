import { openProjectStores } from "../service/registry.js";
import { withRunLock } from "../service/run-lock.js";
import { formatLabel, formatWarn, ui } from "../ui.js";
import { msToTimeStr } from "../utils/time.js";
import {
  guardCommand,
  loadCommandContext,
  stderrLine,
  stdoutLine,
  type CommandContext,
  type CommandResult,
} from "./shared.js";

export interface SegmentsCommandOptions {
  minutes?: number;
  recreate?: boolean;
}

export interface SegmentsCommandDeps {
  loadContextFn: (env: NodeJS.ProcessEnv) => CommandContext;
  stdoutLine: (message: string) => void;
  stderrLine: (message: string) => void;
}

/** Loads (building when needed) or recreates the segment table and lists it. */
export async function runSegmentsCommand(
  projectId: string,
  options: SegmentsCommandOptions,
  deps?: Partial<SegmentsCommandDeps>,
): Promise<CommandResult> {
  const resolvedDeps: SegmentsCommandDeps = {
    loadContextFn: deps?.loadContextFn ?? loadCommandContext,
    stdoutLine: deps?.stdoutLine ?? stdoutLine,
    stderrLine: deps?.stderrLine ?? stderrLine,
  };

  return guardCommand(resolvedDeps, async () => {
    if (options.minutes !== undefined && (!Number.isFinite(options.minutes) || options.minutes <= 0)) {
      throw new Error(`--minutes must be a positive number, got ${options.minutes}.`);
    }

    const context = resolvedDeps.loadContextFn(process.env);
    const windowMinutes = options.minutes ?? context.settings.segmentMinutes;
    const stores = openProjectStores({ ...context.settings, segmentMinutes: windowMinutes }, projectId);
    const atoms = await stores.atoms.load();

    // Building or recreating the table writes it, so no run may be active.
    const segments = await withRunLock(stores.projectDir, () =>
      options.recreate === true
        ? stores.segments.recreate(atoms, windowMinutes)
        : stores.segments.loadOrRebuild(atoms),
    );

    const table = await stores.segments.read();
    if (options.minutes !== undefined && table && table.window_minutes !== options.minutes) {
      resolvedDeps.stderrLine(
        formatWarn(
          `Existing table uses ${table.window_minutes}-minute windows; pass --recreate to repartition (analysis state is lost).`,
        ),
      );
    }

    resolvedDeps.stdoutLine(formatLabel("Atoms", String(atoms.length)));
    resolvedDeps.stdoutLine(formatLabel("Segments", String(segments.length)));
    for (const segment of segments) {
      const range = `${msToTimeStr(segment.start_ms)}-${msToTimeStr(segment.end_ms)}`;
      resolvedDeps.stdoutLine(
        `${segment.segment_id}  ${ui.dim(range)}  atoms=${segment.atom_refs.length}  ${segment.status}`,
      );
    }
    return { exitCode: 0 };
  });
}
