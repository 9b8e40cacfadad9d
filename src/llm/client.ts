import { readConfig, resolveSettings } from "../config.js";
import type { LlmClient, VidatlasConfig, VidatlasProvider } from "../types.js";
import { normalizeProvider, resolveModel } from "./models.js";

export interface ResolveLlmClientInput {
  provider?: string;
  model?: string;
  config?: VidatlasConfig | null;
  env?: NodeJS.ProcessEnv;
}

function resolveApiKey(
  provider: VidatlasProvider,
  config: VidatlasConfig | null,
  env: NodeJS.ProcessEnv,
): string | undefined {
  if (provider === "anthropic") {
    return env.ANTHROPIC_API_KEY?.trim() || config?.credentials?.anthropicApiKey;
  }
  return env.OPENAI_API_KEY?.trim() || config?.credentials?.openaiApiKey;
}

export function createLlmClient(input: ResolveLlmClientInput = {}): LlmClient {
  const env = input.env ?? process.env;
  const config = input.config === undefined ? readConfig(env) : input.config;
  const settings = resolveSettings(config, env);

  const provider = normalizeProvider(input.provider?.trim() || settings.provider);
  const resolvedModel = resolveModel(provider, input.model?.trim() || settings.model);
  const apiKey = resolveApiKey(provider, config, env);
  if (!apiKey) {
    const envName = provider === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY";
    throw new Error(
      [
        `No API key configured for provider "${provider}".`,
        `Set ${envName}, or add credentials to the config file.`,
      ].join("\n"),
    );
  }

  return {
    provider,
    resolvedModel,
    apiKey,
  };
}
