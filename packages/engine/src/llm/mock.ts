import type { LLMClient, LLMRequest, LLMResponse } from "./index.js";

/**
 * Mock LLM client that returns a canned event summary for development
 * and demos. The fixture matches `SummaryResponseSchema`, wrapped in a
 * markdown fence the way chat models often answer, so the summarizer's
 * unwrapping is exercised too.
 */

const MOCK_SUMMARY = JSON.stringify(
  {
    summary:
      "Recent coverage points to cooling inflation and a softer labor market, which traders read as support for the event. Reporting is consistent across major outlets, though officials have not committed to a decision.",
    key_points: [
      "Inflation data came in below expectations",
      "Futures pricing shifted toward the YES outcome",
      "Officials stressed that decisions remain data-dependent",
    ],
    sentiment: "bullish",
    confidence: "medium",
  },
  null,
  2
);

export class MockLLMClient implements LLMClient {
  private latencyMs: number;

  /**
   * @param latencyMs - simulated API latency
   */
  constructor(latencyMs = 200) {
    this.latencyMs = latencyMs;
  }

  async call(_request: LLMRequest): Promise<LLMResponse> {
    if (this.latencyMs > 0) {
      await new Promise((r) => setTimeout(r, this.latencyMs));
    }

    return {
      content: "```json\n" + MOCK_SUMMARY + "\n```",
      model: "mock-model",
      tokensUsed: 0,
    };
  }
}
