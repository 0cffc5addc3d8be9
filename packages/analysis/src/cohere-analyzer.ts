import { CohereClient } from "cohere-ai";
import type { AnalysisInput, IPassageAnalyzer } from "./analyzer.interface.js";
import { buildAnalysisPrompt } from "./prompt.js";

const DEFAULT_MODEL = "command-r-08-2024";

export interface CohereAnalyzerConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class CohereAnalyzer implements IPassageAnalyzer {
  readonly name = "cohere";
  readonly model: string;
  private client: CohereClient;
  private temperature: number;
  private maxTokens: number;

  constructor(config: CohereAnalyzerConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature ?? 0.7;
    this.maxTokens = config.maxTokens ?? 1024;
  }

  async analyze(input: AnalysisInput): Promise<string> {
    const response = await this.client.v2.chat({
      model: this.model,
      messages: [{ role: "user", content: buildAnalysisPrompt(input.query, input.passages) }],
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });

    const parts: string[] = [];
    for (const item of response.message?.content ?? []) {
      if (item.type === "text") parts.push(item.text);
    }
    return parts.join("").trim();
  }
}
