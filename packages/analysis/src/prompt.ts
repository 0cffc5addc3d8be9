import type { RankedResult } from "@docseek/types";
import { assembleContext } from "./context-assembler.js";
import type { ContextFormat } from "./context-assembler.js";

export function buildAnalysisPrompt(
  query: string,
  passages: readonly RankedResult[],
  format: ContextFormat = "plain",
): string {
  return `Based on the following passages from a document, answer this question: "${query}"

${assembleContext(passages, format)}

Instructions:
1. Give a clear and concise answer based ONLY on the information in the passages
2. If the passages do not contain enough information to answer fully, say so
3. Use bullet points or numbered lists when appropriate
4. Cite specific details from the passages, with their page numbers, to support the answer

Answer:`;
}
