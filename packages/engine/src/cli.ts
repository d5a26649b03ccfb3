#!/usr/bin/env node

/**
 * CLI entry point: matches news to the highest-volume active events
 * and prints the query, search window and ranked articles for each.
 *
 * Usage:
 *   USE_MOCKS=true npx tsx src/cli.ts
 *   USE_MOCKS=true npx tsx src/cli.ts 5 --summary
 */

import "dotenv/config";
import { loadConfig } from "./config.js";
import { createServices } from "./services.js";
import {
  buildNewsQuery,
  getTimeWindow,
  matchNewsToEvent,
} from "./matching/index.js";

// ── Parse CLI arguments ──────────────────────────────────────────

const args = process.argv.slice(2);
const limit = parseInt(args.find((arg) => /^\d+$/.test(arg)) ?? "3", 10);
const withSummary = args.includes("--summary");

const config = loadConfig();
const { marketClient, newsClient, summarizer } = createServices(config);

const day = (date: Date) => date.toISOString().slice(0, 10);

async function main(): Promise<void> {
  console.log("=".repeat(70));
  console.log("  PREDICTION MARKET NEWS: Event/News Matching");
  console.log("=".repeat(70));
  console.log(`Mode: ${config.useMocks ? "MOCK (no API keys)" : "LIVE (using real APIs)"}`);

  const events = await marketClient.getEvents({ limit });

  for (const event of events) {
    console.log(`\nEvent: ${event.title}`);
    console.log(`  Tags: ${event.tags.slice(0, 3).join(", ")}`);
    console.log(`  Query: ${buildNewsQuery(event)}`);

    const window = getTimeWindow(event, {
      defaultDaysBack: config.defaultDaysBack,
    });
    console.log(`  Time window: ${day(window.from)} to ${day(window.to)}`);

    const articles = await matchNewsToEvent(event, newsClient, {
      maxArticles: config.maxArticlesPerEvent,
      language: config.news.language,
      defaultDaysBack: config.defaultDaysBack,
    });

    if (articles.length === 0) {
      console.log("  No matching articles found");
    }
    for (const { article, score, matchReasons } of articles) {
      console.log(`\n  [${score.toFixed(1)}] ${article.title.slice(0, 60)}`);
      console.log(`      Source: ${article.sourceName}`);
      console.log(`      Reasons: ${matchReasons.join(", ")}`);
    }

    if (withSummary && articles.length > 0) {
      const summary = await summarizer.summarizeEvent({
        title: event.title,
        description: event.description,
        articles,
        marketPrice: event.markets[0]?.outcomePrices[0],
      });
      console.log(`\n  Summary: ${summary.summary}`);
      for (const point of summary.keyPoints) {
        console.log(`    - ${point}`);
      }
      console.log(`  Sentiment: ${summary.sentiment} | Confidence: ${summary.confidence}`);
    }

    console.log("\n" + "-".repeat(70));
  }
}

main().catch((error) => {
  console.error("\nMatching failed:", error);
  process.exit(1);
});
