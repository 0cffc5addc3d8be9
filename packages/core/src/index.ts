export { RetrievalOrchestrator } from "./orchestrator.js";
export type { RetrievalOrchestratorOptions } from "./orchestrator.js";

export { createRetrievalService, createRetrievalServiceFromEnv } from "./bootstrap.js";
export type { AskResult, RetrievalService, RetrievalServiceOverrides } from "./bootstrap.js";

export { ingest } from "./ingestion-pipeline.js";
export type { IngestionDependencies, IngestionInput, IngestionOutput } from "./ingestion-pipeline.js";

export { retrieve } from "./retrieval-pipeline.js";
export type { RetrievalDependencies, RetrievalRequest } from "./retrieval-pipeline.js";

export { ProgressTracker } from "./progress-tracker.js";
export type { ProgressTrackerOptions } from "./progress-tracker.js";
export { normalizeQuery } from "./query-normalizer.js";
export { inStage, wrapStageError } from "./stage-error.js";
export type { IngestStage, QueryStage, StageContext } from "./stage-error.js";
