import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { hasErrorCode } from "./errors.js";
import type { VidatlasConfig, VidatlasProvider } from "./types.js";
import { isRecord, isValidProjectId, toPositiveInt, toPositiveNumber, toTrimmedString } from "./utils/validation.js";

export type ConfigSetKey = "provider" | "model" | "dataDir" | "segmentMinutes";

export const CONFIG_SET_KEYS: readonly ConfigSetKey[] = ["provider", "model", "dataDir", "segmentMinutes"];

const PROVIDER_SET = new Set<string>(["anthropic", "openai"]);
const CONFIG_FILE_MODE = 0o600;
const CONFIG_DIR_MODE = 0o700;

export const DEFAULT_PROVIDER: VidatlasProvider = "anthropic";
export const DEFAULT_MODEL = "sonnet";
export const DEFAULT_SEGMENT_MINUTES = 20;
export const DEFAULT_LLM_MAX_ATTEMPTS = 3;
export const DEFAULT_LLM_MAX_TOKENS = 4000;
export const DEFAULT_ANNOTATION_BATCH_SIZE = 10;
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
export const DEFAULT_EMBEDDING_DIMENSIONS = 1024;

/** Every tunable with its default applied. */
export interface ResolvedSettings {
  provider: VidatlasProvider;
  model: string;
  dataDir: string;
  segmentMinutes: number;
  maxAttempts: number;
  maxTokens: number;
  annotationBatchSize: number;
  aliasesPath?: string;
  embeddingModel: string;
  embeddingDimensions: number;
}

function resolveUserPath(inputPath: string): string {
  if (!inputPath.startsWith("~")) {
    return inputPath;
  }
  return path.join(os.homedir(), inputPath.slice(1));
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.VIDATLAS_CONFIG_PATH?.trim();
  if (explicit) {
    return resolveUserPath(explicit);
  }
  return path.join(os.homedir(), ".vidatlas", "config.json");
}

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.dirname(resolveConfigPath(env));
}

export function resolveDefaultDataDir(): string {
  return path.join(os.homedir(), ".vidatlas", "projects");
}

export function isVidatlasProvider(value: string): value is VidatlasProvider {
  return PROVIDER_SET.has(value);
}

function normalizeStoredCredentials(input: unknown): VidatlasConfig["credentials"] | undefined {
  if (!isRecord(input)) {
    return undefined;
  }

  const normalized: NonNullable<VidatlasConfig["credentials"]> = {};
  const anthropicApiKey = toTrimmedString(input.anthropicApiKey);
  if (anthropicApiKey) {
    normalized.anthropicApiKey = anthropicApiKey;
  }
  const openaiApiKey = toTrimmedString(input.openaiApiKey);
  if (openaiApiKey) {
    normalized.openaiApiKey = openaiApiKey;
  }

  return Object.keys(normalized).length > 0 ? normalized : undefined;
}

function normalizeLlmConfig(input: unknown): VidatlasConfig["llm"] | undefined {
  if (!isRecord(input)) {
    return undefined;
  }

  const normalized: NonNullable<VidatlasConfig["llm"]> = {};
  const maxAttempts = toPositiveInt(input.maxAttempts);
  if (maxAttempts !== undefined) {
    normalized.maxAttempts = maxAttempts;
  }
  const maxTokens = toPositiveInt(input.maxTokens);
  if (maxTokens !== undefined) {
    normalized.maxTokens = maxTokens;
  }

  return Object.keys(normalized).length > 0 ? normalized : undefined;
}

function normalizeAnnotationConfig(input: unknown): VidatlasConfig["annotation"] | undefined {
  if (!isRecord(input)) {
    return undefined;
  }
  const batchSize = toPositiveInt(input.batchSize);
  return batchSize === undefined ? undefined : { batchSize };
}

function normalizeEmbeddingConfig(input: unknown): VidatlasConfig["embedding"] | undefined {
  if (!isRecord(input)) {
    return undefined;
  }

  const normalized: NonNullable<VidatlasConfig["embedding"]> = {};
  const model = toTrimmedString(input.model);
  if (model) {
    normalized.model = model;
  }
  const dimensions = toPositiveInt(input.dimensions);
  if (dimensions !== undefined) {
    normalized.dimensions = dimensions;
  }
  const apiKey = toTrimmedString(input.apiKey);
  if (apiKey) {
    normalized.apiKey = apiKey;
  }

  return Object.keys(normalized).length > 0 ? normalized : undefined;
}

export function normalizeConfig(input: unknown): VidatlasConfig {
  const record = isRecord(input) ? input : {};
  const normalized: VidatlasConfig = {};

  const provider = toTrimmedString(record.provider)?.toLowerCase();
  if (provider && isVidatlasProvider(provider)) {
    normalized.provider = provider;
  }

  const model = toTrimmedString(record.model);
  if (model) {
    normalized.model = model;
  }

  const credentials = normalizeStoredCredentials(record.credentials);
  if (credentials) {
    normalized.credentials = credentials;
  }

  const dataDir = toTrimmedString(record.dataDir);
  if (dataDir) {
    normalized.dataDir = dataDir;
  }

  const segmentMinutes = toPositiveNumber(record.segmentMinutes);
  if (segmentMinutes !== undefined) {
    normalized.segmentMinutes = segmentMinutes;
  }

  const aliasesPath = toTrimmedString(record.aliasesPath);
  if (aliasesPath) {
    normalized.aliasesPath = aliasesPath;
  }

  const llm = normalizeLlmConfig(record.llm);
  if (llm) {
    normalized.llm = llm;
  }

  const annotation = normalizeAnnotationConfig(record.annotation);
  if (annotation) {
    normalized.annotation = annotation;
  }

  const embedding = normalizeEmbeddingConfig(record.embedding);
  if (embedding) {
    normalized.embedding = embedding;
  }

  return normalized;
}

function ensureConfigDir(env: NodeJS.ProcessEnv = process.env): void {
  const configDir = resolveConfigDir(env);
  fs.mkdirSync(configDir, { recursive: true, mode: CONFIG_DIR_MODE });
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): VidatlasConfig | null {
  const configPath = resolveConfigPath(env);

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Failed to parse config at ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return normalizeConfig(parsed);
}

export function writeConfig(config: VidatlasConfig, env: NodeJS.ProcessEnv = process.env): void {
  ensureConfigDir(env);
  const configPath = resolveConfigPath(env);
  const normalized = normalizeConfig(config);
  const tmpPath = `${configPath}.tmp`;
  fs.writeFileSync(tmpPath, `${JSON.stringify(normalized, null, 2)}\n`, {
    encoding: "utf8",
    mode: CONFIG_FILE_MODE,
  });
  fs.renameSync(tmpPath, configPath);
}

export function resolveSettings(
  config: VidatlasConfig | null,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedSettings {
  const dataDir = env.VIDATLAS_DATA_DIR?.trim() || config?.dataDir || resolveDefaultDataDir();
  const settings: ResolvedSettings = {
    provider: config?.provider ?? DEFAULT_PROVIDER,
    model: config?.model ?? DEFAULT_MODEL,
    dataDir: resolveUserPath(dataDir),
    segmentMinutes: config?.segmentMinutes ?? DEFAULT_SEGMENT_MINUTES,
    maxAttempts: config?.llm?.maxAttempts ?? DEFAULT_LLM_MAX_ATTEMPTS,
    maxTokens: config?.llm?.maxTokens ?? DEFAULT_LLM_MAX_TOKENS,
    annotationBatchSize: config?.annotation?.batchSize ?? DEFAULT_ANNOTATION_BATCH_SIZE,
    embeddingModel: config?.embedding?.model ?? DEFAULT_EMBEDDING_MODEL,
    embeddingDimensions: config?.embedding?.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS,
  };
  if (config?.aliasesPath) {
    settings.aliasesPath = resolveUserPath(config.aliasesPath);
  }
  return settings;
}

export function resolveProjectDir(dataDir: string, projectId: string): string {
  if (!isValidProjectId(projectId)) {
    throw new Error(`Invalid project id "${projectId}". Use letters, digits, "-" or "_" (max 64).`);
  }
  return path.join(dataDir, projectId);
}

function normalizeValue(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error("Value cannot be empty.");
  }
  return trimmed;
}

export function setConfigKey(current: VidatlasConfig | null, key: string, value: string): VidatlasConfig {
  const next = normalizeConfig(current ?? {});
  const normalizedValue = normalizeValue(value);

  if (key === "provider") {
    const provider = normalizedValue.toLowerCase();
    if (!isVidatlasProvider(provider)) {
      throw new Error(`Invalid provider "${value}". Expected one of: anthropic, openai.`);
    }
    next.provider = provider;
    return next;
  }

  if (key === "model") {
    next.model = normalizedValue;
    return next;
  }

  if (key === "dataDir") {
    next.dataDir = normalizedValue;
    return next;
  }

  if (key === "segmentMinutes") {
    const minutes = toPositiveNumber(Number(normalizedValue));
    if (minutes === undefined) {
      throw new Error(`Invalid segmentMinutes "${value}". Expected a positive number.`);
    }
    next.segmentMinutes = minutes;
    return next;
  }

  throw new Error(`Invalid key. Expected one of: ${CONFIG_SET_KEYS.map((item) => `"${item}"`).join(", ")}.`);
}

export function maskSecret(secret: string | undefined): string {
  if (!secret) {
    return "(not set)";
  }

  const trimmed = secret.trim();
  if (!trimmed) {
    return "(not set)";
  }

  return `****${trimmed.slice(-4)}`;
}
