import { ATOMIZATION_INCOMPLETE } from "../service/analysis-service.js";
import { computeProgress } from "../service/progress.js";
import { openProjectStores } from "../service/registry.js";
import type { ProgressSnapshot, SegmentRecord } from "../types.js";
import { formatLabel, formatWarn, progressBar, ui } from "../ui.js";
import { msToTimeStr } from "../utils/time.js";
import {
  guardCommand,
  loadCommandContext,
  stderrLine,
  stdoutLine,
  type CommandContext,
  type CommandResult,
} from "./shared.js";

export interface StatusCommandOptions {
  json?: boolean;
}

export interface StatusCommandDeps {
  loadContextFn: (env: NodeJS.ProcessEnv) => CommandContext;
  stdoutLine: (message: string) => void;
  stderrLine: (message: string) => void;
}

export interface StatusReport extends ProgressSnapshot {
  project_id: string;
  segments: Array<
    Pick<SegmentRecord, "segment_id" | "start_ms" | "end_ms" | "status" | "entity_count" | "error_message">
  >;
}

type SegmentSummary = StatusReport["segments"][number];

export async function buildStatusReport(projectId: string, context: CommandContext): Promise<StatusReport> {
  const stores = openProjectStores(context.settings, projectId);
  const [segments, index] = await Promise.all([stores.segments.list(), stores.index.loadOrInit()]);
  return {
    project_id: projectId,
    ...computeProgress(segments, index),
    segments: segments.map((segment) => ({
      segment_id: segment.segment_id,
      start_ms: segment.start_ms,
      end_ms: segment.end_ms,
      status: segment.status,
      entity_count: segment.entity_count,
      error_message: segment.error_message,
    })),
  };
}

function describeSegment(segment: SegmentSummary): string {
  const range = `${msToTimeStr(segment.start_ms)}-${msToTimeStr(segment.end_ms)}`;
  return `${segment.segment_id}  ${ui.dim(range)}  ${segment.status}`;
}

export async function runStatusCommand(
  projectId: string,
  options: StatusCommandOptions,
  deps?: Partial<StatusCommandDeps>,
): Promise<CommandResult> {
  const resolvedDeps: StatusCommandDeps = {
    loadContextFn: deps?.loadContextFn ?? loadCommandContext,
    stdoutLine: deps?.stdoutLine ?? stdoutLine,
    stderrLine: deps?.stderrLine ?? stderrLine,
  };

  return guardCommand(resolvedDeps, async () => {
    const context = resolvedDeps.loadContextFn(process.env);
    const report = await buildStatusReport(projectId, context);

    if (options.json === true) {
      resolvedDeps.stdoutLine(JSON.stringify(report, null, 2));
      return { exitCode: 0 };
    }

    if (report.total_segments === 0) {
      resolvedDeps.stdoutLine(formatWarn(`No segment table for ${projectId}. Run \`vidatlas segments ${projectId}\`.`));
      return { exitCode: 0 };
    }

    resolvedDeps.stdoutLine(ui.bold(projectId));
    resolvedDeps.stdoutLine(
      `${progressBar(report.percent)} ${report.analyzed}/${report.total_segments} (${report.percent}%)`,
    );
    resolvedDeps.stdoutLine(formatLabel("Pending", String(report.pending)));
    resolvedDeps.stdoutLine(formatLabel("Failed", String(report.failed)));
    resolvedDeps.stdoutLine(formatLabel("Entities", String(report.total_entities)));

    for (const segment of report.segments) {
      if (segment.status === "failed") {
        resolvedDeps.stdoutLine(`${describeSegment(segment)}  ${ui.error(segment.error_message ?? "")}`);
      } else if (segment.error_message === ATOMIZATION_INCOMPLETE) {
        resolvedDeps.stdoutLine(`${describeSegment(segment)}  ${ui.warn(ATOMIZATION_INCOMPLETE)}`);
      }
    }
    return { exitCode: 0 };
  });
}
