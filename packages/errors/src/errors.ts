import { AppError } from "./app-error.js";

export interface ErrorContextOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Malformed or unusable input. Page-level input errors are recovered locally. */
export class InputError extends AppError {
  constructor(message = "Invalid input", options?: ErrorContextOptions) {
    super({
      message,
      code: "INPUT_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/** The embedding backend could not be initialized. Fatal for any embedding work. */
export class ModelUnavailableError extends AppError {
  public readonly provider: string;

  constructor(
    message = "Embedding model unavailable",
    provider: string,
    options?: ErrorContextOptions,
  ) {
    super({
      message,
      code: "MODEL_UNAVAILABLE",
      details: options?.details,
      cause: options?.cause,
    });
    this.provider = provider;
  }
}

/** A specific batch failed to embed. Callers isolate the batch and continue. */
export class EmbeddingError extends AppError {
  public readonly itemIndices: number[];

  constructor(
    message = "Embedding failed",
    itemIndices: number[] = [],
    options?: ErrorContextOptions,
  ) {
    super({
      message,
      code: "EMBEDDING_ERROR",
      retryable: true,
      details: options?.details,
      cause: options?.cause,
    });
    this.itemIndices = itemIndices;
  }
}

export type CacheOperation = "read" | "write" | "delete" | "clear";

/** Cache read, write or corruption failure. Treated as a miss by callers. */
export class CacheError extends AppError {
  public readonly operation: CacheOperation;

  constructor(message = "Cache failure", operation: CacheOperation, options?: ErrorContextOptions) {
    super({
      message,
      code: "CACHE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.operation = operation;
  }
}

export class DocumentNotIngestedError extends AppError {
  public readonly documentId: string;

  constructor(documentId: string, options?: ErrorContextOptions) {
    super({
      message: `Document "${documentId}" has not been ingested`,
      code: "DOCUMENT_NOT_INGESTED",
      details: { documentId, ...options?.details },
      cause: options?.cause,
    });
    this.documentId = documentId;
  }
}

export class IngestCancelledError extends AppError {
  public readonly documentId: string;

  constructor(documentId: string, options?: ErrorContextOptions) {
    super({
      message: `Ingestion of document "${documentId}" was cancelled`,
      code: "INGEST_CANCELLED",
      details: { documentId, ...options?.details },
      cause: options?.cause,
    });
    this.documentId = documentId;
  }
}

/** An ingest or query failed as a whole; `details` names the document and the stage. */
export class PipelineError extends AppError {
  constructor(message = "Pipeline failed", options?: ErrorContextOptions) {
    super({
      message,
      code: "PIPELINE_ERROR",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
  }
}
