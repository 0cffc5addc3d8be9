import { createHash } from "node:crypto";
import type {
  Chunk,
  ChunkBuildReport,
  ChunkBuildResult,
  ChunkBuilderConfig,
} from "@docseek/types";
import type { IChunkBuilder } from "./chunker.interface.js";
import { findBoilerplate } from "./boilerplate.js";
import { fingerprintPages, hashContent, sortPages } from "./content-hash.js";
import { packParagraphs, toParagraphs } from "./segmenter.js";
import { alphaRatio, cleanLine, countWords, isPageNumberLine } from "./text-cleaner.js";

export const DEFAULT_CHUNK_BUILDER_CONFIG: Readonly<ChunkBuilderConfig> = Object.freeze({
  maxWords: 150,
  minWords: 5,
  minChars: 20,
  minAlphaRatio: 0.5,
  boilerplateLines: 2,
  boilerplateMinPages: 3,
  boilerplateRatio: 0.5,
});

export function chunkId(fingerprint: string, pageIndex: number, sequence: number): string {
  return `${fingerprint.slice(0, 16)}:${pageIndex}:${sequence}`;
}

/**
 * Turns noisy OCR pages into deduplicated, quality-filtered chunks.
 * Pure and synchronous; garbage in yields an empty list, never an error.
 */
export class ChunkBuilder implements IChunkBuilder {
  readonly config: Readonly<ChunkBuilderConfig>;
  readonly configDigest: string;

  constructor(config: Partial<ChunkBuilderConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_CHUNK_BUILDER_CONFIG, ...config });
    const c = this.config;
    const canonical = [
      c.maxWords,
      c.minWords,
      c.minChars,
      c.minAlphaRatio,
      c.boilerplateLines,
      c.boilerplateMinPages,
      c.boilerplateRatio,
    ].join("|");
    this.configDigest = createHash("sha256").update(canonical).digest("hex").slice(0, 12);
  }

  build(pages: readonly unknown[], fingerprint?: string): Chunk[] {
    return this.buildWithReport(pages, fingerprint).chunks;
  }

  buildWithReport(pages: readonly unknown[], fingerprint?: string): ChunkBuildResult {
    const input: readonly unknown[] = Array.isArray(pages) ? pages : [];
    const validPages = sortPages(input);
    const documentFingerprint = fingerprint ?? fingerprintPages(validPages);

    const report: ChunkBuildReport = {
      pagesReceived: input.length,
      pagesSkipped: input.length - validPages.length,
      boilerplateLinesRemoved: 0,
      duplicatesDropped: 0,
      lowQualityDropped: 0,
      chunkCount: 0,
    };

    const pageLines = validPages.map((page) =>
      page.text.split(/\r\n|\r|\n/).map((raw) => {
        const line = cleanLine(raw);
        if (line.length > 0 && isPageNumberLine(line)) {
          report.boilerplateLinesRemoved++;
          return "";
        }
        return line;
      }),
    );

    const boilerplate = findBoilerplate(pageLines, {
      edgeLines: this.config.boilerplateLines,
      minPages: this.config.boilerplateMinPages,
      ratio: this.config.boilerplateRatio,
    });
    pageLines.forEach((lines, pageNo) => {
      for (const i of boilerplate[pageNo] ?? []) {
        lines[i] = "";
        report.boilerplateLinesRemoved++;
      }
    });

    const seenParagraphs = new Set<string>();
    const seenChunks = new Set<string>();
    const chunks: Chunk[] = [];

    validPages.forEach((page, pageNo) => {
      const paragraphs: string[] = [];
      for (const paragraph of toParagraphs(pageLines[pageNo] ?? [])) {
        const hash = hashContent(paragraph);
        if (seenParagraphs.has(hash)) {
          report.duplicatesDropped++;
          continue;
        }
        seenParagraphs.add(hash);
        if (alphaRatio(paragraph) < this.config.minAlphaRatio) {
          report.lowQualityDropped++;
          continue;
        }
        paragraphs.push(paragraph);
      }

      let sequence = 0;
      for (const content of packParagraphs(paragraphs, this.config.maxWords)) {
        const contentHash = hashContent(content);
        if (seenChunks.has(contentHash)) {
          report.duplicatesDropped++;
          continue;
        }
        seenChunks.add(contentHash);
        if (!this.passesQuality(content)) {
          report.lowQualityDropped++;
          continue;
        }
        chunks.push({
          id: chunkId(documentFingerprint, page.pageIndex, sequence),
          documentFingerprint,
          pageIndex: page.pageIndex,
          sequence,
          content,
          contentHash,
          wordCount: countWords(content),
        });
        sequence++;
      }
    });

    report.chunkCount = chunks.length;
    return { chunks, report };
  }

  private passesQuality(content: string): boolean {
    return (
      countWords(content) >= this.config.minWords &&
      content.length >= this.config.minChars &&
      alphaRatio(content) >= this.config.minAlphaRatio
    );
  }
}
