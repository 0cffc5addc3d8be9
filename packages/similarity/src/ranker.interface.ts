import type { RankParams, RankedResult } from "@docseek/types";

export interface ISimilarityRanker {
  readonly name: string;
  /**
   * At most `k` results in descending score order, each scoring at least
   * `minScore`. Equal scores are ordered by page, then by position on the page.
   */
  rank(params: RankParams): RankedResult[];
}
