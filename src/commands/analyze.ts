import * as clack from "@clack/prompts";
import { EntityNormalizer, loadAliasTable } from "../aggregate/normalize.js";
import { createLlmClient } from "../llm/client.js";
import { createTextGenerator } from "../llm/text-generator.js";
import type { IncrementalAnalysisService, RunSummary } from "../service/analysis-service.js";
import { createAnalysisService } from "../service/registry.js";
import { installSignalHandlers, onWake } from "../shutdown.js";
import { banner, formatLabel, formatWarn, progressBar, ui } from "../ui.js";
import {
  guardCommand,
  loadCommandContext,
  stderrLine,
  stdoutLine,
  type CommandContext,
  type CommandResult,
} from "./shared.js";

export interface AnalyzeCommandOptions {
  provider?: string;
  model?: string;
  verbose?: boolean;
}

export interface AnalyzeCommandDeps {
  loadContextFn: (env: NodeJS.ProcessEnv) => CommandContext;
  createServiceFn: (
    projectId: string,
    context: CommandContext,
    options: AnalyzeCommandOptions,
  ) => IncrementalAnalysisService;
  installSignalHandlersFn: () => void;
  onWakeFn: (fn: (() => void) | null) => void;
  stdoutLine: (message: string) => void;
  stderrLine: (message: string) => void;
}

function createService(
  projectId: string,
  context: CommandContext,
  options: AnalyzeCommandOptions,
): IncrementalAnalysisService {
  const client = createLlmClient({
    provider: options.provider,
    model: options.model,
    config: context.config,
    env: context.env,
  });
  const generator = createTextGenerator(client, {
    verbose: options.verbose === true,
    onStreamDelta: options.verbose === true ? (delta) => process.stderr.write(delta) : undefined,
  });
  return createAnalysisService(projectId, {
    settings: context.settings,
    generator,
    normalizer: new EntityNormalizer(loadAliasTable(context.settings.aliasesPath)),
  });
}

function resolveDeps(deps?: Partial<AnalyzeCommandDeps>): AnalyzeCommandDeps {
  return {
    loadContextFn: deps?.loadContextFn ?? loadCommandContext,
    createServiceFn: deps?.createServiceFn ?? createService,
    installSignalHandlersFn: deps?.installSignalHandlersFn ?? installSignalHandlers,
    onWakeFn: deps?.onWakeFn ?? onWake,
    stdoutLine: deps?.stdoutLine ?? stdoutLine,
    stderrLine: deps?.stderrLine ?? stderrLine,
  };
}

async function reportRun(
  service: IncrementalAnalysisService,
  summary: RunSummary,
  deps: AnalyzeCommandDeps,
): Promise<CommandResult> {
  const progress = await service.progress();

  deps.stdoutLine(formatLabel("Run", summary.status));
  deps.stdoutLine(formatLabel("Analyzed this run", String(summary.analyzed.length)));
  if (summary.failed.length > 0) {
    deps.stdoutLine(formatWarn(`${summary.failed.length} segment(s) failed: ${summary.failed.join(", ")}`));
  }
  for (const segmentId of summary.notAtomized) {
    deps.stdoutLine(formatWarn(`${segmentId} is waiting for atomization`));
  }
  deps.stdoutLine(
    `${progressBar(progress.percent)} ${progress.analyzed}/${progress.total_segments} (${progress.percent}%)`,
  );
  deps.stdoutLine(formatLabel("Entities", String(progress.total_entities)));

  if (summary.status === "failed") {
    deps.stderrLine(ui.error(summary.error ?? "Analysis run failed."));
    return { exitCode: 1 };
  }
  return { exitCode: 0 };
}

async function runWithStop(
  projectId: string,
  options: AnalyzeCommandOptions,
  deps: AnalyzeCommandDeps,
  run: (service: IncrementalAnalysisService) => Promise<RunSummary>,
): Promise<CommandResult> {
  const context = deps.loadContextFn(process.env);
  const service = deps.createServiceFn(projectId, context, options);
  const clackOutput = { output: process.stderr };

  clack.intro(banner(), clackOutput);
  deps.installSignalHandlersFn();
  deps.onWakeFn(() => service.requestStop());
  try {
    const summary = await run(service);
    const result = await reportRun(service, summary, deps);
    clack.outro(summary.status === "completed" ? "Done" : `Run ${summary.status}`, clackOutput);
    return result;
  } finally {
    deps.onWakeFn(null);
  }
}

/** Analyzes every pending segment of a project. Ctrl-C stops at the next safe point. */
export async function runAnalyzeCommand(
  projectId: string,
  options: AnalyzeCommandOptions,
  deps?: Partial<AnalyzeCommandDeps>,
): Promise<CommandResult> {
  const resolvedDeps = resolveDeps(deps);
  return guardCommand(resolvedDeps, () =>
    runWithStop(projectId, options, resolvedDeps, (service) => {
      resolvedDeps.stderrLine(ui.dim(`Analyzing ${projectId}...`));
      return service.start();
    }),
  );
}

export async function runAnalyzeOneCommand(
  projectId: string,
  segmentId: string,
  options: AnalyzeCommandOptions,
  deps?: Partial<AnalyzeCommandDeps>,
): Promise<CommandResult> {
  const resolvedDeps = resolveDeps(deps);
  return guardCommand(resolvedDeps, () =>
    runWithStop(projectId, options, resolvedDeps, (service) => {
      resolvedDeps.stderrLine(ui.dim(`Analyzing ${projectId} ${segmentId}...`));
      return service.analyzeOne(segmentId);
    }),
  );
}
