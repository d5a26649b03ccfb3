import { readFileSync } from "node:fs";
import { z } from "zod";

/**
 * Function words plus terms every prediction market shares
 * ("market", "resolve", "yes", "no"). Loaded once from data/.
 */
export const STOP_WORDS: ReadonlySet<string> = new Set(
  z
    .array(z.string())
    .parse(
      JSON.parse(
        readFileSync(
          new URL("../../data/stop-words.json", import.meta.url),
          "utf8"
        )
      )
    )
);

// Runs of capitalized words: "Federal Reserve", "Elon Musk", "Bitcoin".
// Boundaries are Unicode-aware, so "Nicolás" is one word and never
// yields a partial "Nicol".
const NAMED_ENTITY_PATTERN =
  /(?<![\p{L}\p{N}_])[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*(?![\p{L}\p{N}_])/gu;

/**
 * Lower-cases, blanks out punctuation and keeps tokens that are neither
 * stop words nor shorter than three characters. Length counts code
 * points, not UTF-16 units. Order and duplicates are preserved.
 */
export function extractKeyTerms(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, " ")
    .split(/\s+/)
    .filter((word) => [...word].length > 2 && !STOP_WORDS.has(word));
}

/**
 * Capitalization-based entity detection. Not an NER model: a sentence
 * starting with "Will Trump" yields the single entity "Will Trump".
 */
export function detectNamedEntities(text: string): string[] {
  return text.match(NAMED_ENTITY_PATTERN) ?? [];
}
