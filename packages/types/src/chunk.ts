export interface RawPage {
  pageIndex: number;
  text: string;
}

export interface Chunk {
  /** `<fingerprint prefix>:<pageIndex>:<sequence>` */
  id: string;
  documentFingerprint: string;
  pageIndex: number;
  /** Position within the page, contiguous from 0. */
  sequence: number;
  content: string;
  contentHash: string;
  wordCount: number;
}

export interface ChunkBuilderConfig {
  maxWords: number;
  minWords: number;
  minChars: number;
  /** Letters divided by non-whitespace characters. */
  minAlphaRatio: number;
  /** Lines inspected at the top and bottom of each page for running headers/footers. */
  boilerplateLines: number;
  boilerplateMinPages: number;
  /** Share of pages a line shape must appear on to count as a header/footer. */
  boilerplateRatio: number;
}

export interface ChunkBuildReport {
  pagesReceived: number;
  pagesSkipped: number;
  boilerplateLinesRemoved: number;
  duplicatesDropped: number;
  lowQualityDropped: number;
  chunkCount: number;
}

export interface ChunkBuildResult {
  chunks: Chunk[];
  report: ChunkBuildReport;
}
