import { z } from "zod";
import type { VidatlasConfig } from "../types.js";
import { logger } from "../utils/logger.js";

const OPENAI_EMBEDDINGS_URL = "https://api.openai.com/v1/embeddings";
export const EMBEDDING_BATCH_SIZE = 200;
export const EMBEDDING_MAX_CONCURRENCY = 3;
const EMBEDDING_MAX_ATTEMPTS = 5;

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number().finite()),
    }),
  ),
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export interface EmbedOptions {
  apiKey: string;
  model: string;
  dimensions: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  maxAttempts?: number;
}

/** Embeds a list of texts; output order matches input order. */
export type Embedder = (texts: string[]) => Promise<number[][]>;

function chunkArray<T>(values: readonly T[], chunkSize: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < values.length; i += chunkSize) {
    out.push(values.slice(i, i + chunkSize));
  }
  return out;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function getErrorSnippet(rawBody: string, fallbackMessage = "unknown error"): string {
  const trimmed = rawBody.trim();
  if (!trimmed) {
    return fallbackMessage;
  }

  const body = errorBodySchema.safeParse(tryParseJson(trimmed));
  if (body.success && body.data.error.message.trim()) {
    return body.data.error.message.trim();
  }

  const maxLength = 200;
  if (trimmed.length <= maxLength) {
    return trimmed;
  }
  return `${trimmed.slice(0, maxLength)}...`;
}

function buildHttpError(status: number, body: string): Error {
  const detail = getErrorSnippet(body);

  if (status === 401) {
    return new Error(`OpenAI embeddings request failed (401): invalid API key. ${detail}`);
  }

  if (status === 429) {
    return new Error(`OpenAI embeddings request failed (429): rate limited. ${detail}`);
  }

  return new Error(`OpenAI embeddings request failed (${status}): ${detail}`);
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}

function isRetryableNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const message = error.message.toLowerCase();
  return (
    message.includes("timeout") ||
    message.includes("network") ||
    message.includes("connection") ||
    message.includes("fetch failed")
  );
}

async function sleepMs(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffMs(attempt: number): number {
  return Math.min(2000 * 2 ** (attempt - 1), 60_000);
}

async function embedBatch(texts: string[], options: EmbedOptions): Promise<number[][]> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const sleep = options.sleep ?? sleepMs;
  const maxAttempts = options.maxAttempts ?? EMBEDDING_MAX_ATTEMPTS;

  let rawBody = "";
  for (let attempt = 1; ; attempt += 1) {
    let response: Response;
    try {
      response = await fetchImpl(OPENAI_EMBEDDINGS_URL, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: options.model,
          dimensions: options.dimensions,
          input: texts,
        }),
      });
    } catch (error) {
      if (attempt < maxAttempts && isRetryableNetworkError(error)) {
        logger.warn("embedding_attempt_failed", { attempt, error });
        await sleep(backoffMs(attempt));
        continue;
      }
      throw error;
    }

    rawBody = await response.text();
    if (response.ok) {
      break;
    }

    const httpError = buildHttpError(response.status, rawBody);
    if (attempt < maxAttempts && isRetryableStatus(response.status)) {
      logger.warn("embedding_attempt_failed", { attempt, status: response.status });
      await sleep(backoffMs(attempt));
      continue;
    }
    throw httpError;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch (error) {
    throw new Error(
      `OpenAI embeddings response was not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = embeddingResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error("OpenAI embeddings response missing data array.");
  }

  const sorted = [...result.data.data].sort((a, b) => a.index - b.index);
  if (sorted.length !== texts.length) {
    throw new Error(
      `OpenAI embeddings response length mismatch: expected ${texts.length}, received ${sorted.length}.`,
    );
  }

  return sorted.map((item) => item.embedding);
}

export async function embed(texts: string[], options: EmbedOptions): Promise<number[][]> {
  if (texts.length === 0) {
    return [];
  }

  const apiKey = options.apiKey.trim();
  if (!apiKey) {
    throw new Error("OpenAI API key is required for embeddings.");
  }

  const batches = chunkArray(texts, EMBEDDING_BATCH_SIZE);
  const out: Array<number[] | undefined> = new Array<number[] | undefined>(texts.length).fill(undefined);

  let nextBatchIndex = 0;
  const worker = async (): Promise<void> => {
    while (true) {
      const batchIndex = nextBatchIndex;
      nextBatchIndex += 1;

      const batch = batches[batchIndex];
      if (!batch) {
        return;
      }

      const batchEmbeddings = await embedBatch(batch, { ...options, apiKey });
      const offset = batchIndex * EMBEDDING_BATCH_SIZE;
      batchEmbeddings.forEach((embedding, i) => {
        out[offset + i] = embedding;
      });
    }
  };

  const workerCount = Math.min(EMBEDDING_MAX_CONCURRENCY, batches.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const vectors = out.filter((item): item is number[] => item !== undefined);
  if (vectors.length !== texts.length) {
    throw new Error("Embedding generation failed to return all vectors.");
  }
  return vectors;
}

export function createEmbedder(options: EmbedOptions): Embedder {
  return (texts) => embed(texts, options);
}

export function resolveEmbeddingApiKey(
  config: VidatlasConfig | null | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const fromEmbeddingConfig = config?.embedding?.apiKey?.trim();
  if (fromEmbeddingConfig) {
    return fromEmbeddingConfig;
  }

  const fromStoredCredentials = config?.credentials?.openaiApiKey?.trim();
  if (fromStoredCredentials) {
    return fromStoredCredentials;
  }

  const fromEnv = env.OPENAI_API_KEY?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  throw new Error(
    "OpenAI API key is required for embeddings. Set config.embedding.apiKey, config.credentials.openaiApiKey, or OPENAI_API_KEY.",
  );
}
