import type { RankedResult } from "@docseek/types";

export interface AnalysisInput {
  query: string;
  passages: readonly RankedResult[];
}

/** Generative summarisation over ranked passages. Read-only: never sees caches or ranking. */
export interface IPassageAnalyzer {
  readonly name: string;
  analyze(input: AnalysisInput): Promise<string>;
}

export type AnalysisFailureReason =
  | "quota-exceeded"
  | "invalid-api-key"
  | "timeout"
  | "unavailable"
  | "empty-response"
  | "error";

export type AnalysisOutcome =
  | { status: "ok"; text: string }
  | { status: "skipped"; reason: "no-passages" | "disabled" }
  | { status: "failed"; reason: AnalysisFailureReason; message: string };
