import { getModels, type Api, type Model } from "@mariozechner/pi-ai";
import { isVidatlasProvider } from "../config.js";
import type { ResolvedModel, VidatlasProvider } from "../types.js";

const MODEL_ALIASES: Record<VidatlasProvider, Record<string, string>> = {
  anthropic: {
    opus: "claude-opus-4-6",
    sonnet: "claude-sonnet-4-20250514",
  },
  openai: {
    gpt: "gpt-4.1",
    "gpt-mini": "gpt-4.1-mini",
    "gpt-nano": "gpt-4.1-nano",
  },
};

export function normalizeProvider(value: string): VidatlasProvider {
  const normalized = value.trim().toLowerCase();
  if (!isVidatlasProvider(normalized)) {
    throw new Error(`Unsupported provider "${value}". Expected one of: anthropic, openai.`);
  }
  return normalized;
}

function normalizeModelId(provider: VidatlasProvider, model: string): string {
  const trimmed = model.trim();
  if (!trimmed) {
    throw new Error("Model cannot be empty.");
  }

  const aliasKey = trimmed.toLowerCase();
  return MODEL_ALIASES[provider][aliasKey] ?? trimmed;
}

export function resolveModel(providerRaw: string, modelRaw: string): ResolvedModel {
  const provider = normalizeProvider(providerRaw);
  const modelId = normalizeModelId(provider, modelRaw);
  const bareModelId = modelId.startsWith(`${provider}/`) ? modelId.slice(provider.length + 1) : modelId;

  const models: Model<Api>[] = getModels(provider);
  const model = models.find((candidate) => candidate.id === modelId || candidate.id === bareModelId);

  if (!model) {
    throw new Error(`Model "${modelId}" is not available for provider "${provider}" in @mariozechner/pi-ai.`);
  }

  return {
    provider,
    modelId: model.id,
    model,
  };
}
