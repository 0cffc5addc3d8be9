import type { ISimilarityRanker } from "./ranker.interface.js";
import { LinearScanRanker } from "./linear-scan-ranker.js";

export type { ISimilarityRanker } from "./ranker.interface.js";
export { LinearScanRanker } from "./linear-scan-ranker.js";
export { toConfidence } from "./confidence.js";

export type RankerType = "linear";

export function createRanker(type: RankerType = "linear"): ISimilarityRanker {
  switch (type) {
    case "linear":
      return new LinearScanRanker();
    default:
      throw new Error(`Unknown ranker type: ${String(type)}`);
  }
}
