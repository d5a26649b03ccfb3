import { z } from "zod";

/** Source of "now" for time-dependent rules. Injected so tests can pin it. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// ── Markets ──────────────────────────────────────────────────────

export interface Market {
  id: string;
  question: string;
  slug: string;
  outcomes: string[];
  outcomePrices: number[]; // 0-1 per outcome
  volume: number;
  active: boolean;
  closed: boolean;
}

export interface Event {
  id: string;
  slug: string;
  title: string;
  description: string;
  startDate?: Date;
  endDate?: Date;
  category?: string;
  tags: string[]; // presentation order from the source
  active: boolean;
  closed: boolean;
  volume: number;
  markets: Market[];
}

// ── News ─────────────────────────────────────────────────────────

export interface Article {
  sourceId?: string;
  sourceName: string;
  author?: string;
  title: string;
  description?: string;
  url: string;
  imageUrl?: string;
  publishedAt?: Date;
  content?: string;
}

export interface ScoredArticle {
  article: Article;
  score: number; // open-ended additive sum, not normalized
  matchReasons: string[];
}

export interface TimeWindow {
  from: Date;
  to: Date;
}

// ── Summaries ────────────────────────────────────────────────────

export type Sentiment = "bullish" | "bearish" | "neutral";
export type SummaryConfidence = "high" | "medium" | "low";

export interface EventSummary {
  eventTitle: string;
  summary: string;
  keyPoints: string[];
  sentiment: Sentiment;
  confidence: SummaryConfidence;
  sourcesUsed: number;
}

// ── Zod Schemas (runtime validation of LLM JSON output) ─────────

export const SummaryResponseSchema = z.object({
  summary: z.string().default(""),
  key_points: z.array(z.string()).default([]),
  sentiment: z.enum(["bullish", "bearish", "neutral"]).default("neutral"),
  confidence: z.enum(["high", "medium", "low"]).default("medium"),
});

export type SummaryResponse = z.infer<typeof SummaryResponseSchema>;
