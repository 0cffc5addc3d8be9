export type {
  AnalysisFailureReason,
  AnalysisInput,
  AnalysisOutcome,
  IPassageAnalyzer,
} from "./analyzer.interface.js";
export { assembleContext } from "./context-assembler.js";
export type { ContextFormat } from "./context-assembler.js";
export { buildAnalysisPrompt } from "./prompt.js";
export { CohereAnalyzer } from "./cohere-analyzer.js";
export type { CohereAnalyzerConfig } from "./cohere-analyzer.js";
export { AnalysisRunner, classifyAnalysisError } from "./analysis-runner.js";
export type { AnalysisRunnerOptions } from "./analysis-runner.js";
