import type { SegmentStatus } from "./types.js";

export class CorruptStoreError extends Error {
  readonly filePath: string;
  readonly line: number;
  readonly reason: string;

  constructor(filePath: string, line: number, reason: string) {
    super(`Corrupt atom store at ${filePath}:${line}: ${reason}`);
    this.name = "CorruptStoreError";
    this.filePath = filePath;
    this.line = line;
    this.reason = reason;
  }
}

export class IdentityViolation extends Error {
  readonly duplicates: string[];

  constructor(duplicates: string[]) {
    super(
      `Duplicate atom ids: ${duplicates.join(", ")}. Run \`vidatlas atoms repair <project>\` to renumber.`,
    );
    this.name = "IdentityViolation";
    this.duplicates = duplicates;
  }
}

export class IllegalTransitionError extends Error {
  readonly segmentId: string;
  readonly from: SegmentStatus;
  readonly to: SegmentStatus;

  constructor(segmentId: string, from: SegmentStatus, to: SegmentStatus) {
    super(`Illegal transition for ${segmentId}: ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
    this.segmentId = segmentId;
    this.from = from;
    this.to = to;
  }
}

export class SegmentNotFoundError extends Error {
  readonly segmentId: string;

  constructor(segmentId: string) {
    super(`Segment not found: ${segmentId}`);
    this.name = "SegmentNotFoundError";
    this.segmentId = segmentId;
  }
}

export class SegmentAnalysisFailure extends Error {
  readonly segmentId: string;
  readonly reason: string;

  constructor(segmentId: string, reason: string) {
    super(reason);
    this.name = "SegmentAnalysisFailure";
    this.segmentId = segmentId;
    this.reason = reason;
  }
}

export class MergeFailure extends Error {
  readonly segmentId: string;
  readonly reason: string;

  constructor(segmentId: string, reason: string) {
    super(`Merge failed for ${segmentId}: ${reason}`);
    this.name = "MergeFailure";
    this.segmentId = segmentId;
    this.reason = reason;
  }
}

export class RateLimitedError extends Error {
  constructor(message = "LLM rate limit reached") {
    super(message);
    this.name = "RateLimitedError";
  }
}

export class TransientLlmError extends Error {
  constructor(message = "Transient LLM error") {
    super(message);
    this.name = "TransientLlmError";
  }
}

export class LlmAuthError extends Error {
  constructor(message = "LLM authentication failed") {
    super(message);
    this.name = "LlmAuthError";
  }
}

export class AnalysisConflictError extends Error {
  constructor(message = "An analysis run is already in progress for this project.") {
    super(message);
    this.name = "AnalysisConflictError";
  }
}

export class StorageError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Storage error at ${filePath}: ${errorMessage(cause)}`, { cause });
    this.name = "StorageError";
    this.filePath = filePath;
  }
}

export class CancelledError extends Error {
  constructor(message = "Analysis cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isRetryableLlmError(error: unknown): boolean {
  return error instanceof RateLimitedError || error instanceof TransientLlmError;
}

export function isRunFatalError(error: unknown): boolean {
  return error instanceof IdentityViolation || error instanceof StorageError;
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
