import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** A call still pending after this many ms counts as a failure. Default: 30000 */
  timeout?: number;
  /** Failure percentage over the rolling window that opens the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** How long the circuit stays open before a probe is let through. Default: 60000 */
  resetTimeout?: number;
  /** Calls needed in the window before the threshold applies. Default: 0 */
  volumeThreshold?: number;
}

/** Any logger with pino's `(fields, message)` methods fits. */
export interface CircuitBreakerLogger {
  warn(obj: Record<string, unknown>, msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
}

/**
 * Wraps a remote call so that a failing backend is skipped for a while
 * instead of being hit on every request. State changes are logged.
 */
export function createCircuitBreaker<TI extends unknown[], TR>(
  name: string,
  fn: (...args: TI) => Promise<TR>,
  options: CircuitBreakerOptions = {},
  logger?: CircuitBreakerLogger,
): CircuitBreaker<TI, TR> {
  const resetTimeout = options.resetTimeout ?? 60_000;
  const breaker = new CircuitBreaker<TI, TR>(fn, {
    name,
    timeout: options.timeout ?? 30_000,
    errorThresholdPercentage: options.errorThresholdPercentage ?? 50,
    volumeThreshold: options.volumeThreshold ?? 0,
    resetTimeout,
  });

  breaker.on("open", () => {
    logger?.warn({ breaker: name, retryInMs: resetTimeout }, "circuit open");
  });
  breaker.on("halfOpen", () => {
    logger?.info({ breaker: name }, "circuit half-open");
  });
  breaker.on("close", () => {
    logger?.info({ breaker: name }, "circuit closed");
  });

  return breaker;
}
