import type { Event, EventSummary, ScoredArticle } from "../types.js";

/*
 * Wire shapes of the HTTP API. Field names are snake_case and dates are
 * ISO strings; relevance_score is the raw additive score, not 0-1.
 */

export interface ArticleResponse {
  source_name: string;
  title: string;
  description: string | null;
  url: string;
  image_url: string | null;
  published_at: string | null;
  relevance_score: number;
}

export interface MarketResponse {
  id: string;
  question: string;
  outcomes: string[];
  prices: number[];
}

export interface EventSummaryResponse {
  summary: string;
  key_points: string[];
  sentiment: string;
  confidence: string;
  sources_used: number;
}

export interface EventWithNewsResponse {
  id: string;
  slug: string;
  title: string;
  description: string;
  category: string | null;
  tags: string[];
  start_date: string | null;
  end_date: string | null;
  volume: number;
  active: boolean;
  closed: boolean;
  markets: MarketResponse[];
  articles: ArticleResponse[];
  summary: EventSummaryResponse | null;
}

export function toArticleResponse({ article, score }: ScoredArticle): ArticleResponse {
  return {
    source_name: article.sourceName,
    title: article.title,
    description: article.description ?? null,
    url: article.url,
    image_url: article.imageUrl ?? null,
    published_at: article.publishedAt?.toISOString() ?? null,
    relevance_score: score,
  };
}

export function toSummaryResponse(summary: EventSummary): EventSummaryResponse {
  return {
    summary: summary.summary,
    key_points: summary.keyPoints,
    sentiment: summary.sentiment,
    confidence: summary.confidence,
    sources_used: summary.sourcesUsed,
  };
}

export function toEventResponse(
  event: Event,
  articles: ScoredArticle[],
  summary: EventSummary | null
): EventWithNewsResponse {
  return {
    id: event.id,
    slug: event.slug,
    title: event.title,
    description: event.description,
    category: event.category ?? null,
    tags: event.tags,
    start_date: event.startDate?.toISOString() ?? null,
    end_date: event.endDate?.toISOString() ?? null,
    volume: event.volume,
    active: event.active,
    closed: event.closed,
    markets: event.markets.map((m) => ({
      id: m.id,
      question: m.question,
      outcomes: m.outcomes,
      prices: m.outcomePrices,
    })),
    articles: articles.map(toArticleResponse),
    summary: summary ? toSummaryResponse(summary) : null,
  };
}
