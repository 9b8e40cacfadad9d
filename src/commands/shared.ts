import { readConfig, resolveSettings, type ResolvedSettings } from "../config.js";
import { errorMessage } from "../errors.js";
import type { VidatlasConfig } from "../types.js";
import { formatError } from "../ui.js";

export interface CommandResult {
  exitCode: number;
}

export interface CommandContext {
  config: VidatlasConfig | null;
  settings: ResolvedSettings;
  env: NodeJS.ProcessEnv;
}

export interface CommandIo {
  stdoutLine: (message: string) => void;
  stderrLine: (message: string) => void;
}

export function stdoutLine(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function stderrLine(message: string): void {
  process.stderr.write(`${message}\n`);
}

export function loadCommandContext(env: NodeJS.ProcessEnv = process.env): CommandContext {
  const config = readConfig(env);
  return { config, settings: resolveSettings(config, env), env };
}

/** Runs a command body; any error becomes a printed message and exit code 1. */
export async function guardCommand(io: CommandIo, body: () => Promise<CommandResult>): Promise<CommandResult> {
  try {
    return await body();
  } catch (error) {
    io.stderrLine(formatError(errorMessage(error)));
    return { exitCode: 1 };
  }
}
