import type { RankedResult } from "@docseek/types";

export type ContextFormat = "xml" | "markdown" | "plain";

function source(result: RankedResult): string {
  return `page ${String(result.chunk.pageIndex + 1)}`;
}

/**
 * Lay out ranked passages for a language model.
 *
 * - xml: `<passage>` elements inside `<context>`
 * - markdown: one heading per passage
 * - plain: numbered sections
 */
export function assembleContext(passages: readonly RankedResult[], format: ContextFormat): string {
  if (passages.length === 0) return "";

  switch (format) {
    case "xml":
      return assembleXml(passages);
    case "markdown":
      return assembleMarkdown(passages);
    case "plain":
    default:
      return assemblePlain(passages);
  }
}

function assembleXml(passages: readonly RankedResult[]): string {
  const parts = passages.map(
    (p) =>
      `<passage rank="${String(p.rank)}" source="${source(p)}" confidence="${String(p.confidence)}">\n${p.chunk.content}\n</passage>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(passages: readonly RankedResult[]): string {
  const parts = passages.map(
    (p) =>
      `### Passage ${String(p.rank)} (${source(p)}, ${String(p.confidence)}% match)\n\n${p.chunk.content}`,
  );

  return `## Retrieved Passages\n\n${parts.join("\n\n---\n\n")}`;
}

function assemblePlain(passages: readonly RankedResult[]): string {
  const parts = passages.map(
    (p) =>
      `[${String(p.rank)}] (Source: ${source(p)}, confidence ${String(p.confidence)}%)\n${p.chunk.content}`,
  );

  return parts.join("\n\n");
}
