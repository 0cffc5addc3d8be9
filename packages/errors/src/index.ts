export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  InputError,
  ModelUnavailableError,
  EmbeddingError,
  CacheError,
  DocumentNotIngestedError,
  IngestCancelledError,
  PipelineError,
} from "./errors.js";
export type { ErrorContextOptions, CacheOperation } from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitBreakerLogger } from "./circuit-breaker.js";

export { withRetry, backoffDelay } from "./retry.js";
export type { RetryOptions, RetryAttemptInfo } from "./retry.js";
