import type { EventSummary, ScoredArticle } from "../types.js";
import { SummaryResponseSchema } from "../types.js";
import type { LLMClient } from "../llm/index.js";
import {
  buildSummarySystemPrompt,
  buildSummaryUserPrompt,
} from "./prompts.js";
import type { SummaryPromptInput } from "./prompts.js";

const FALLBACK_KEY_POINTS = 3;
const HEADLINE_LIMIT = 80;
const UNAVAILABLE = "AI summary unavailable";

/**
 * Pulls the JSON object out of a chat answer, dropping a surrounding
 * ```json fence when the model added one.
 */
export function extractJson(content: string): string {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  return (fenced ? fenced[1] : content).trim();
}

/**
 * Summary built from headlines alone, used when no LLM is configured
 * or the LLM call fails. `reason` ends the summary sentence.
 */
export function fallbackSummary(
  title: string,
  articles: ScoredArticle[],
  reason: string = UNAVAILABLE
): EventSummary {
  if (articles.length === 0) {
    return {
      eventTitle: title,
      summary: "No news articles found.",
      keyPoints: [],
      sentiment: "neutral",
      confidence: "low",
      sourcesUsed: 0,
    };
  }

  return {
    eventTitle: title,
    summary: `Found ${articles.length} relevant news articles. ${reason}.`,
    keyPoints: articles
      .slice(0, FALLBACK_KEY_POINTS)
      .map(
        ({ article }) =>
          `[${article.sourceName}] ${article.title.slice(0, HEADLINE_LIMIT)}`
      ),
    sentiment: "neutral",
    confidence: "low",
    sourcesUsed: articles.length,
  };
}

/**
 * Turns the ranked coverage of an event into a short summary.
 *
 * Never throws: without an LLM client, or when the model's answer
 * cannot be parsed, it returns `fallbackSummary`.
 */
export interface EventSummarizerOptions {
  /** Fallback wording when no client is configured, e.g. which key to set. */
  disabledReason?: string;
}

export class EventSummarizer {
  private llmClient: LLMClient | null;
  private disabledReason: string;

  constructor(llmClient: LLMClient | null, options: EventSummarizerOptions = {}) {
    this.llmClient = llmClient;
    this.disabledReason = options.disabledReason ?? UNAVAILABLE;
  }

  get enabled(): boolean {
    return this.llmClient !== null;
  }

  async summarizeEvent(input: SummaryPromptInput): Promise<EventSummary> {
    if (!this.llmClient) {
      return fallbackSummary(input.title, input.articles, this.disabledReason);
    }

    if (input.articles.length === 0) {
      return {
        eventTitle: input.title,
        summary: "No relevant news articles found for this event.",
        keyPoints: ["No recent news coverage"],
        sentiment: "neutral",
        confidence: "low",
        sourcesUsed: 0,
      };
    }

    try {
      const response = await this.llmClient.call({
        systemPrompt: buildSummarySystemPrompt(),
        userPrompt: buildSummaryUserPrompt(input),
        maxTokens: 500,
        temperature: 0.3,
      });

      const validated = SummaryResponseSchema.parse(
        JSON.parse(extractJson(response.content))
      );

      return {
        eventTitle: input.title,
        summary: validated.summary,
        keyPoints: validated.key_points,
        sentiment: validated.sentiment,
        confidence: validated.confidence,
        sourcesUsed: input.articles.length,
      };
    } catch (error) {
      console.warn(`[summarizer] AI summarization failed: ${error}`);
      return fallbackSummary(input.title, input.articles);
    }
  }
}

export { buildSummarySystemPrompt, buildSummaryUserPrompt, formatMarketPrice } from "./prompts.js";
export type { SummaryPromptInput } from "./prompts.js";
