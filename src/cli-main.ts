import { Command } from "commander";
import { parseIntOption, parsePositiveNumberOption } from "./cli/option-parsers.js";
import { runAnalyzeCommand, runAnalyzeOneCommand } from "./commands/analyze.js";
import { runAtomsCheckCommand, runAtomsRepairCommand } from "./commands/atoms.js";
import { runConfigSetCommand, runConfigShowCommand } from "./commands/config.js";
import { runResetCommand } from "./commands/reset.js";
import { runIndexCommand, runSearchCommand } from "./commands/search.js";
import { runSegmentsCommand } from "./commands/segments.js";
import { runStatusCommand } from "./commands/status.js";
import { CONFIG_SET_KEYS } from "./config.js";
import { APP_VERSION } from "./version.js";
import type { AnalyzeCommandOptions } from "./commands/analyze.js";

interface StatusCliOptions {
  json?: boolean;
}

interface ResetCliOptions {
  confirmReset?: boolean;
}

interface SegmentsCliOptions {
  minutes?: number;
  recreate?: boolean;
}

interface SearchCliOptions {
  limit?: number;
  json?: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("vidatlas")
    .description("Incremental knowledge extraction from long video transcripts")
    .version(APP_VERSION);

  program
    .command("analyze")
    .description("Analyze every pending segment of a project (Ctrl-C stops after the current segment)")
    .argument("<project>", "Project id")
    .option("--provider <name>", "LLM provider: anthropic, openai")
    .option("--model <model>", "LLM model to use")
    .option("--verbose", "Stream model output to stderr", false)
    .action(async (projectId: string, opts: AnalyzeCommandOptions) => {
      const result = await runAnalyzeCommand(projectId, opts);
      process.exitCode = result.exitCode;
    });

  program
    .command("analyze-one")
    .description("Analyze (or re-analyze) a single segment")
    .argument("<project>", "Project id")
    .argument("<segment>", "Segment id, e.g. SEG_003")
    .option("--provider <name>", "LLM provider: anthropic, openai")
    .option("--model <model>", "LLM model to use")
    .option("--verbose", "Stream model output to stderr", false)
    .action(async (projectId: string, segmentId: string, opts: AnalyzeCommandOptions) => {
      const result = await runAnalyzeOneCommand(projectId, segmentId, opts);
      process.exitCode = result.exitCode;
    });

  program
    .command("status")
    .description("Show analysis progress for a project")
    .argument("<project>", "Project id")
    .option("--json", "Print the progress report as JSON", false)
    .action(async (projectId: string, opts: StatusCliOptions) => {
      const result = await runStatusCommand(projectId, opts);
      process.exitCode = result.exitCode;
    });

  program
    .command("reset")
    .description("Reset one segment, or the whole project, to be analyzed again")
    .argument("<project>", "Project id")
    .argument("[segment]", "Segment id; omit to reset every segment and delete the index")
    .option("--confirm-reset", "Execute a full project reset (otherwise a dry run)", false)
    .action(async (projectId: string, segmentId: string | undefined, opts: ResetCliOptions) => {
      const result = await runResetCommand(projectId, segmentId, opts);
      process.exitCode = result.exitCode;
    });

  program
    .command("segments")
    .description("Build (or load) the segment table and list it")
    .argument("<project>", "Project id")
    .option("--minutes <n>", "Window size in minutes", parsePositiveNumberOption)
    .option("--recreate", "Repartition from scratch; analysis state is lost", false)
    .action(async (projectId: string, opts: SegmentsCliOptions) => {
      const result = await runSegmentsCommand(projectId, opts);
      process.exitCode = result.exitCode;
    });

  const atomsCommand = program.command("atoms").description("Inspect and repair the atom store");

  atomsCommand
    .command("check")
    .description("Report atom count, duration and duplicate ids")
    .argument("<project>", "Project id")
    .action(async (projectId: string) => {
      const result = await runAtomsCheckCommand(projectId);
      process.exitCode = result.exitCode;
    });

  atomsCommand
    .command("repair")
    .description("Renumber atom ids by position (A001, A002, ...)")
    .argument("<project>", "Project id")
    .action(async (projectId: string) => {
      const result = await runAtomsRepairCommand(projectId);
      process.exitCode = result.exitCode;
    });

  program
    .command("index")
    .description("Embed every atom into the project's vector store")
    .argument("<project>", "Project id")
    .action(async (projectId: string) => {
      const result = await runIndexCommand(projectId);
      process.exitCode = result.exitCode;
    });

  program
    .command("search")
    .description("Semantic search over indexed atoms")
    .argument("<project>", "Project id")
    .argument("<query>", "Search text")
    .option("--limit <n>", "Maximum number of results", parseIntOption)
    .option("--json", "Print matches as JSON", false)
    .action(async (projectId: string, query: string, opts: SearchCliOptions) => {
      const result = await runSearchCommand(projectId, query, opts);
      process.exitCode = result.exitCode;
    });

  const configCommand = program.command("config").description("Show and update vidatlas configuration");

  configCommand
    .command("show")
    .description("Show the effective configuration with secrets masked")
    .action(async () => {
      const result = await runConfigShowCommand();
      process.exitCode = result.exitCode;
    });

  configCommand
    .command("set")
    .description(`Set one config value: ${CONFIG_SET_KEYS.join(", ")}`)
    .argument("<key>", `Config key: ${CONFIG_SET_KEYS.join(", ")}`)
    .argument("<value>", "Config value")
    .action(async (key: string, value: string) => {
      const result = await runConfigSetCommand(key, value);
      process.exitCode = result.exitCode;
    });

  return program;
}
