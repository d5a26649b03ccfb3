import type { Event } from "../types.js";
import { STOP_WORDS, detectNamedEntities, extractKeyTerms } from "./terms.js";

/** Category labels too broad to narrow a news search. */
export const GENERIC_TAGS: ReadonlySet<string> = new Set([
  "business",
  "politics",
  "news",
  "world",
  "us",
  "usa",
  "america",
  "global",
  "international",
  "economy",
  "economic",
  "predictions",
  "2024",
  "2025",
  "2026",
]);

const TITLE_TERM_LIMIT = 5;

/**
 * Builds the news search query for an event.
 *
 * Terms are collected in three passes:
 * 1. the first five key terms of the title
 * 2. tags that are not generic and not already collected
 * 3. named entities from the title, quoted for exact-phrase search and
 *    inserted at the front, so the last entity detected comes first
 *
 * The query is the first `maxTerms` terms joined by spaces.
 */
export function buildNewsQuery(event: Event, maxTerms = 8): string {
  const terms = extractKeyTerms(event.title).slice(0, TITLE_TERM_LIMIT);

  for (const tag of event.tags) {
    const tagLower = tag.toLowerCase();
    const seen = terms.some((term) => term.toLowerCase() === tagLower);
    if (!GENERIC_TAGS.has(tagLower) && !seen) {
      terms.push(tag);
      if (terms.length >= maxTerms) break;
    }
  }

  for (const entity of detectNamedEntities(event.title)) {
    if (!STOP_WORDS.has(entity.toLowerCase()) && !terms.includes(entity)) {
      terms.unshift(`"${entity}"`);
      if (terms.length >= maxTerms) break;
    }
  }

  return terms.slice(0, maxTerms).join(" ");
}

/**
 * Splits a built query back into scoring terms. A quoted phrase stays a
 * single term (quotes included) so "Elon Musk" is matched as a phrase
 * rather than as two separate words.
 */
export function splitQueryTerms(query: string): string[] {
  return query.match(/"[^"]*"|\S+/g) ?? [];
}
