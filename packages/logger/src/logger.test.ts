import { describe, expect, it } from "vitest";
import { createLogger } from "./logger.js";

function capture() {
  const lines: string[] = [];
  const logger = createLogger({
    level: "debug",
    service: "docseek-test",
    destination: { write: (line: string) => lines.push(line) },
  });
  const entries = (): unknown[] => lines.map((line): unknown => JSON.parse(line));
  return { logger, entries };
}

describe("createLogger", () => {
  it("writes JSON lines named after the service", () => {
    const { logger, entries } = capture();
    logger.child({ component: "orchestrator" }).info({ documentId: "atlas.pdf" }, "document ingested");

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 30,
        name: "docseek-test",
        component: "orchestrator",
        documentId: "atlas.pdf",
        msg: "document ingested",
        time: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/),
      }),
    ]);
  });

  it("redacts credentials and masks e-mail addresses", () => {
    const { logger, entries } = capture();
    logger.warn(
      {
        apiKey: "test-key",
        config: { cohere: { apiKey: "test-key" } },
        query: "who emailed ops@example.org",
      },
      "analysis failed",
    );

    expect(entries()[0]).toMatchObject({
      apiKey: "[REDACTED]",
      config: { cohere: { apiKey: "[REDACTED]" } },
      query: "who emailed [REDACTED]",
    });
  });

  it("respects the level", () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: "silent",
      destination: { write: (line: string) => lines.push(line) },
    });
    logger.error("dropped");
    expect(lines).toEqual([]);
  });
});
