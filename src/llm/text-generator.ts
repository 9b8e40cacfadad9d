import type { AssistantMessage } from "@mariozechner/pi-ai";
import { CancelledError, LlmAuthError, RateLimitedError, TransientLlmError } from "../errors.js";
import type { LlmClient } from "../types.js";
import { extractAssistantText, runSimpleStream, type StreamSimpleFn } from "./stream.js";

export interface GenerateOptions {
  maxTokens: number;
  signal?: AbortSignal;
  systemPrompt?: string;
}

/** Prompt in, text out. The analyzer depends on nothing else from the LLM layer. */
export interface TextGenerator {
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export interface TextGeneratorDeps {
  streamSimpleImpl?: StreamSimpleFn;
  verbose?: boolean;
  onStreamDelta?: (delta: string, kind: "text" | "thinking") => void;
}

const RATE_LIMIT_MARKERS = ["429", "rate limit", "rate_limit", "rate limited", "too many requests"];
const AUTH_MARKERS = ["401", "403", "unauthorized", "forbidden", "invalid api key", "invalid x-api-key", "authentication"];
const TRANSIENT_MARKERS = [
  "500",
  "502",
  "503",
  "504",
  "529",
  "overloaded",
  "timeout",
  "timed out",
  "network",
  "connection",
  "econnreset",
  "socket hang up",
  "fetch failed",
];

/** Maps a provider failure onto the retryable / permanent error taxonomy. */
export function classifyLlmError(error: unknown): Error {
  if (
    error instanceof RateLimitedError ||
    error instanceof TransientLlmError ||
    error instanceof LlmAuthError ||
    error instanceof CancelledError
  ) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const lowered = message.toLowerCase();

  if (RATE_LIMIT_MARKERS.some((marker) => lowered.includes(marker))) {
    return new RateLimitedError(message);
  }
  if (AUTH_MARKERS.some((marker) => lowered.includes(marker))) {
    return new LlmAuthError(message);
  }
  if (TRANSIENT_MARKERS.some((marker) => lowered.includes(marker))) {
    return new TransientLlmError(message);
  }

  return error instanceof Error ? error : new Error(message);
}

function assertUsableResponse(response: AssistantMessage, signal: AbortSignal | undefined): void {
  if (response.stopReason === "aborted" || signal?.aborted) {
    throw new CancelledError();
  }
  if (response.stopReason === "error" || response.errorMessage) {
    throw new Error(response.errorMessage ?? "unknown error");
  }
}

export function createTextGenerator(client: LlmClient, deps: TextGeneratorDeps = {}): TextGenerator {
  return {
    async generate(prompt: string, options: GenerateOptions): Promise<string> {
      if (options.signal?.aborted) {
        throw new CancelledError();
      }

      try {
        const response = await runSimpleStream({
          model: client.resolvedModel.model,
          context: {
            systemPrompt: options.systemPrompt,
            messages: [{ role: "user", content: prompt, timestamp: Date.now() }],
          },
          options: {
            apiKey: client.apiKey,
            maxTokens: options.maxTokens,
            signal: options.signal,
          },
          verbose: deps.verbose,
          streamSimpleImpl: deps.streamSimpleImpl,
          onStreamDelta: deps.onStreamDelta,
        });
        assertUsableResponse(response, options.signal);
        return extractAssistantText(response);
      } catch (error) {
        throw classifyLlmError(error);
      }
    },
  };
}
