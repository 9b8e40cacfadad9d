import {
  maskSecret,
  readConfig,
  resolveConfigPath,
  resolveSettings,
  setConfigKey,
  writeConfig,
} from "../config.js";
import type { VidatlasConfig } from "../types.js";
import { formatLabel, formatSuccess, ui } from "../ui.js";
import { guardCommand, stderrLine, stdoutLine, type CommandResult } from "./shared.js";

export interface ConfigCommandDeps {
  env: NodeJS.ProcessEnv;
  readConfigFn: (env: NodeJS.ProcessEnv) => VidatlasConfig | null;
  writeConfigFn: (config: VidatlasConfig, env: NodeJS.ProcessEnv) => void;
  stdoutLine: (message: string) => void;
  stderrLine: (message: string) => void;
}

function resolveDeps(deps?: Partial<ConfigCommandDeps>): ConfigCommandDeps {
  return {
    env: deps?.env ?? process.env,
    readConfigFn: deps?.readConfigFn ?? readConfig,
    writeConfigFn: deps?.writeConfigFn ?? writeConfig,
    stdoutLine: deps?.stdoutLine ?? stdoutLine,
    stderrLine: deps?.stderrLine ?? stderrLine,
  };
}

/** Prints the effective settings; secrets are masked. */
export async function runConfigShowCommand(deps?: Partial<ConfigCommandDeps>): Promise<CommandResult> {
  const resolvedDeps = resolveDeps(deps);
  return guardCommand(resolvedDeps, async () => {
    const config = resolvedDeps.readConfigFn(resolvedDeps.env);
    const settings = resolveSettings(config, resolvedDeps.env);
    const lines = [
      formatLabel("Config file", resolveConfigPath(resolvedDeps.env) + (config ? "" : ui.dim(" (not found)"))),
      formatLabel("Provider", settings.provider),
      formatLabel("Model", settings.model),
      formatLabel("Data dir", settings.dataDir),
      formatLabel("Segment minutes", String(settings.segmentMinutes)),
      formatLabel("LLM attempts", String(settings.maxAttempts)),
      formatLabel("LLM max tokens", String(settings.maxTokens)),
      formatLabel("Annotation batch", String(settings.annotationBatchSize)),
      formatLabel("Aliases", settings.aliasesPath ?? ui.dim("(bundled)")),
      formatLabel("Embedding model", `${settings.embeddingModel} (${settings.embeddingDimensions})`),
      "",
      ui.bold("Credentials"),
      formatLabel("  Anthropic API Key", maskSecret(config?.credentials?.anthropicApiKey)),
      formatLabel("  OpenAI API Key", maskSecret(config?.credentials?.openaiApiKey)),
      formatLabel("  Embedding API Key", maskSecret(config?.embedding?.apiKey)),
    ];
    for (const line of lines) {
      resolvedDeps.stdoutLine(line);
    }
    return { exitCode: 0 };
  });
}

export async function runConfigSetCommand(
  key: string,
  value: string,
  deps?: Partial<ConfigCommandDeps>,
): Promise<CommandResult> {
  const resolvedDeps = resolveDeps(deps);
  return guardCommand(resolvedDeps, async () => {
    const current = resolvedDeps.readConfigFn(resolvedDeps.env);
    const next = setConfigKey(current, key, value);
    resolvedDeps.writeConfigFn(next, resolvedDeps.env);
    resolvedDeps.stdoutLine(formatSuccess(`Updated ${key}`));
    return { exitCode: 0 };
  });
}
