import type CircuitBreaker from "opossum";
import { createCircuitBreaker } from "@docseek/errors";
import type { CircuitBreakerOptions } from "@docseek/errors";
import type { Logger } from "@docseek/logger";
import type {
  AnalysisFailureReason,
  AnalysisInput,
  AnalysisOutcome,
  IPassageAnalyzer,
} from "./analyzer.interface.js";

export interface AnalysisRunnerOptions {
  timeoutMs?: number;
  breaker?: Omit<CircuitBreakerOptions, "timeout">;
  logger?: Logger;
}

function errorCode(error: unknown): unknown {
  if (typeof error !== "object" || error === null) return undefined;
  return "code" in error ? error.code : undefined;
}

function httpStatus(error: unknown): unknown {
  if (typeof error !== "object" || error === null) return undefined;
  if ("statusCode" in error) return error.statusCode;
  return "status" in error ? error.status : undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyAnalysisError(error: unknown): AnalysisFailureReason {
  const code = errorCode(error);
  const status = httpStatus(error);
  const message = messageOf(error).toLowerCase();

  if (code === "EOPENBREAKER") return "unavailable";
  if (code === "ETIMEDOUT") return "timeout";
  if (status === 429 || message.includes("quota") || message.includes("rate limit")) {
    return "quota-exceeded";
  }
  if (status === 401 || status === 403 || message.includes("invalid api key")) {
    return "invalid-api-key";
  }
  return "error";
}

/**
 * Runs the analyzer behind a circuit breaker with a timeout. Every failure
 * is reported as an outcome; `run` never rejects.
 */
export class AnalysisRunner {
  private readonly breaker: CircuitBreaker<[AnalysisInput], string>;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly analyzer: IPassageAnalyzer,
    options: AnalysisRunnerOptions = {},
  ) {
    this.logger = options.logger?.child({ component: "analysis" });
    this.breaker = createCircuitBreaker(
      `analysis:${analyzer.name}`,
      (input: AnalysisInput) => this.analyzer.analyze(input),
      { ...options.breaker, timeout: options.timeoutMs ?? 30_000 },
      this.logger,
    );
  }

  async run(input: AnalysisInput): Promise<AnalysisOutcome> {
    if (input.passages.length === 0) {
      return { status: "skipped", reason: "no-passages" };
    }

    try {
      const text = (await this.breaker.fire(input)).trim();
      if (text.length === 0) {
        return { status: "failed", reason: "empty-response", message: "Analyzer returned no text" };
      }
      return { status: "ok", text };
    } catch (error: unknown) {
      const reason = classifyAnalysisError(error);
      this.logger?.warn({ err: error, reason, analyzer: this.analyzer.name }, "analysis failed");
      return { status: "failed", reason, message: messageOf(error) };
    }
  }

  shutdown(): void {
    this.breaker.shutdown();
  }
}
