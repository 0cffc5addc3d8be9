import {
  DocumentNotIngestedError,
  EmbeddingError,
  IngestCancelledError,
  InputError,
  ModelUnavailableError,
  PipelineError,
} from "@docseek/errors";

export type IngestStage = "lookup" | "chunk" | "embed" | "commit";
export type QueryStage = "resolve" | "lookup" | "embed" | "rank" | "commit";

export interface StageContext {
  operation: "ingest" | "query";
  documentId: string;
  stage: IngestStage | QueryStage;
}

/**
 * Attach `{ documentId, stage }` to an error that fails a whole operation.
 * Caller mistakes and cancellation pass through untouched; embedding errors
 * keep their class; anything else becomes a PipelineError. The original is
 * always the `cause`.
 */
export function wrapStageError(error: unknown, context: StageContext): unknown {
  if (
    error instanceof InputError ||
    error instanceof DocumentNotIngestedError ||
    error instanceof IngestCancelledError ||
    error instanceof PipelineError
  ) {
    return error;
  }

  const details = { documentId: context.documentId, stage: context.stage };

  if (error instanceof ModelUnavailableError) {
    return new ModelUnavailableError(error.message, error.provider, {
      details: { ...error.details, ...details },
      cause: error,
    });
  }
  if (error instanceof EmbeddingError) {
    return new EmbeddingError(error.message, error.itemIndices, {
      details: { ...error.details, ...details },
      cause: error,
    });
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new PipelineError(
    `${context.operation === "ingest" ? "Ingest" : "Query"} of document "${context.documentId}" failed at ${context.stage}: ${reason}`,
    { details, cause: error },
  );
}

export async function inStage<T>(context: StageContext, fn: () => Promise<T> | T): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    throw wrapStageError(error, context);
  }
}
