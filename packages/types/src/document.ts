export type DocumentState = "uningested" | "ingesting" | "ingested";

/**
 * Registry record mapping a caller-chosen document id to the fingerprint of
 * the content last ingested under it.
 */
export interface DocumentRecord {
  documentId: string;
  fingerprint: string;
  pageCount: number;
  chunkCount: number;
  ingestedAt: string;
}

export interface IngestResult {
  documentId: string;
  fingerprint: string;
  pageCount: number;
  chunkCount: number;
  skippedCount: number;
  fromCache: boolean;
  model: string;
  dimensions: number;
  durationMs: number;
}

export interface IngestProgress {
  documentId: string;
  pagesDone: number;
  pagesTotal: number;
  elapsedSeconds: number;
  /** null until at least one page has completed. */
  estimatedSecondsRemaining: number | null;
}

export interface ProgressObserver {
  onProgress(progress: IngestProgress): void;
}

export interface IngestOptions {
  observer?: ProgressObserver;
  signal?: AbortSignal;
}
