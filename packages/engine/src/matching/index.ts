import type { Article, Clock, Event, ScoredArticle } from "../types.js";
import { systemClock } from "../types.js";
import type { NewsClient } from "../news/index.js";
import { buildNewsQuery, splitQueryTerms } from "./query.js";
import { getTimeWindow } from "./window.js";
import { scoreArticle } from "./scorer.js";

export interface MatchOptions {
  maxArticles?: number;
  minScore?: number;
  /** Candidate pool fetched before scoring, independent of `maxArticles`. */
  pageSize?: number;
  language?: string;
  defaultDaysBack?: number;
  now?: Clock;
  onProgress?: (stage: string, detail: string) => void;
}

/**
 * Finds the news coverage for one event.
 *
 * 1. query: title terms, specific tags and quoted entities.
 * 2. window: search range derived from the event dates.
 * 3. fetch: one search call sorted by relevancy. Any failure is
 *    logged and yields an empty list; the caller never sees the error.
 * 4. score: every candidate is scored against the query terms.
 * 5. rank: drop scores below `minScore`, sort descending (stable,
 *    so ties keep fetch order) and keep the first `maxArticles`.
 */
export async function matchNewsToEvent(
  event: Event,
  newsClient: NewsClient,
  options: MatchOptions = {}
): Promise<ScoredArticle[]> {
  const {
    maxArticles = 5,
    minScore = 2.0,
    pageSize = 20,
    language = "en",
    defaultDaysBack = 7,
    now = systemClock,
    onProgress,
  } = options;

  const query = buildNewsQuery(event);
  const queryTerms = splitQueryTerms(query);
  onProgress?.("query", query);

  const window = getTimeWindow(event, { defaultDaysBack, now });
  onProgress?.(
    "window",
    `${window.from.toISOString().slice(0, 10)} to ${window.to.toISOString().slice(0, 10)}`
  );

  let articles: Article[];
  try {
    ({ articles } = await newsClient.searchEverything({
      query,
      from: window.from,
      to: window.to,
      language,
      sortBy: "relevancy",
      pageSize,
    }));
  } catch (error) {
    console.warn(
      `[matching] Failed to fetch news for "${event.title}": ${error}`
    );
    return [];
  }
  onProgress?.("fetch", `Fetched ${articles.length} candidate article(s).`);

  const scoredAt = now();
  const ranked = articles
    .map((article) => scoreArticle(article, event, queryTerms, scoredAt))
    .filter((scored) => scored.score >= minScore)
    .sort((a, b) => b.score - a.score)
    .slice(0, maxArticles);

  onProgress?.(
    "rank",
    `${ranked.length} article(s) scored at least ${minScore}.`
  );
  return ranked;
}

export { extractKeyTerms, detectNamedEntities, STOP_WORDS } from "./terms.js";
export { buildNewsQuery, splitQueryTerms, GENERIC_TAGS } from "./query.js";
export { getTimeWindow } from "./window.js";
export type { TimeWindowOptions } from "./window.js";
export { scoreArticle, QUALITY_SOURCES } from "./scorer.js";
