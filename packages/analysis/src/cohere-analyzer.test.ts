import { beforeEach, describe, expect, it, vi } from "vitest";
import type { RankedResult } from "@docseek/types";
import { CohereAnalyzer } from "./cohere-analyzer.js";
import { buildAnalysisPrompt } from "./prompt.js";

const { chat } = vi.hoisted(() => ({ chat: vi.fn() }));

vi.mock("cohere-ai", () => ({
  CohereClient: class {
    v2 = { chat };
  },
}));

const PASSAGE: RankedResult = {
  rank: 1,
  score: 0.83,
  confidence: 83,
  chunk: {
    id: "doc:0:0",
    documentFingerprint: "doc",
    pageIndex: 0,
    sequence: 0,
    content: "Paris is the capital of France.",
    contentHash: "hash",
    wordCount: 6,
  },
};

describe("CohereAnalyzer", () => {
  beforeEach(() => {
    chat.mockReset();
  });

  it("sends the analysis prompt and joins the text parts", async () => {
    chat.mockResolvedValue({
      message: {
        role: "assistant",
        content: [
          { type: "text", text: "Paris is the capital " },
          { type: "text", text: "of France (page 1).\n" },
        ],
      },
    });
    const analyzer = new CohereAnalyzer({ apiKey: "test-key" });

    const text = await analyzer.analyze({ query: "capital of france", passages: [PASSAGE] });

    expect(text).toBe("Paris is the capital of France (page 1).");
    expect(chat).toHaveBeenCalledWith({
      model: "command-r-08-2024",
      messages: [{ role: "user", content: buildAnalysisPrompt("capital of france", [PASSAGE]) }],
      temperature: 0.7,
      maxTokens: 1024,
    });
  });

  it("returns an empty string when the reply has no text", async () => {
    chat.mockResolvedValue({ message: { role: "assistant" } });
    const analyzer = new CohereAnalyzer({ apiKey: "test-key", model: "command-a" });

    expect(await analyzer.analyze({ query: "q", passages: [PASSAGE] })).toBe("");
  });
});
