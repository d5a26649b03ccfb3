import type { Article, Event, ScoredArticle } from "../types.js";
import { detectNamedEntities } from "./terms.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const TITLE_MATCH_WEIGHT = 3;
export const DESCRIPTION_MATCH_WEIGHT = 1;
export const ENTITY_MATCH_WEIGHT = 5;
export const VERY_RECENT_BONUS = 2;
export const RECENT_BONUS = 1;
export const QUALITY_SOURCE_BONUS = 1;

export const QUALITY_SOURCES: readonly string[] = [
  "reuters",
  "bloomberg",
  "associated press",
  "bbc",
  "cnn",
  "wall street journal",
  "new york times",
  "washington post",
  "financial times",
  "the economist",
  "politico",
  "axios",
];

function countMatches(terms: string[], text: string): number {
  return terms.filter((term) => text.includes(term)).length;
}

/**
 * Scores how well an article covers an event. Pure apart from `now`,
 * which only feeds the recency rule.
 *
 * Rules are additive and evaluated in a fixed order; `matchReasons`
 * lists the ones that fired in that order:
 *
 * | rule        | weight             | reason                  |
 * |-------------|--------------------|-------------------------|
 * | title       | +3 per term        | `title_match:<n>`       |
 * | description | +1 per term        | `desc_match:<n>`        |
 * | entity      | +5 per entity      | `entity:<text>`         |
 * | recency     | +2 (≤1d), +1 (≤3d) | `very_recent`, `recent` |
 * | source      | +1                 | `quality_source`        |
 *
 * Matching is case-insensitive substring matching without word
 * boundaries, so "fed" matches "federal".
 */
export function scoreArticle(
  article: Article,
  event: Event,
  queryTerms: string[],
  now: Date = new Date()
): ScoredArticle {
  let score = 0;
  const reasons: string[] = [];

  const articleTitle = article.title.toLowerCase();
  const articleDesc = (article.description ?? "").toLowerCase();
  const terms = queryTerms.map((term) =>
    term.replace(/^"+|"+$/g, "").toLowerCase()
  );

  const titleMatches = countMatches(terms, articleTitle);
  if (titleMatches > 0) {
    score += titleMatches * TITLE_MATCH_WEIGHT;
    reasons.push(`title_match:${titleMatches}`);
  }

  const descMatches = countMatches(terms, articleDesc);
  if (descMatches > 0) {
    score += descMatches * DESCRIPTION_MATCH_WEIGHT;
    reasons.push(`desc_match:${descMatches}`);
  }

  for (const entity of detectNamedEntities(event.title)) {
    if (articleTitle.includes(entity.toLowerCase())) {
      score += ENTITY_MATCH_WEIGHT;
      reasons.push(`entity:${entity}`);
    }
  }

  if (article.publishedAt) {
    // Whole days elapsed: 47 hours is still "1 day old"
    const daysOld = Math.floor(
      (now.getTime() - article.publishedAt.getTime()) / DAY_MS
    );
    if (daysOld <= 1) {
      score += VERY_RECENT_BONUS;
      reasons.push("very_recent");
    } else if (daysOld <= 3) {
      score += RECENT_BONUS;
      reasons.push("recent");
    }
  }

  const sourceLower = article.sourceName.toLowerCase();
  if (QUALITY_SOURCES.some((source) => sourceLower.includes(source))) {
    score += QUALITY_SOURCE_BONUS;
    reasons.push("quality_source");
  }

  return { article, score, matchReasons: reasons };
}
