#!/usr/bin/env node

/**
 * HTTP API server.
 *
 * Endpoints:
 *   GET /api/v1/health                Remote service status
 *   GET /api/v1/events                Events with matched news and summaries
 *   GET /api/v1/events/:slug          One event with news and summary
 *   GET /api/v1/events/:slug/news     Ranked articles for one event
 *   GET /api/v1/search?q=...          Keyword search over events
 *
 * Usage:
 *   USE_MOCKS=true npx tsx src/api.ts
 *   NEWS_API_KEY=... OPENAI_API_KEY=... npx tsx src/api.ts
 */

import "dotenv/config";
import http from "node:http";
import { loadConfig } from "./config.js";
import { createServices } from "./services.js";
import { createRequestHandler } from "./server/routes.js";

const config = loadConfig();
const services = createServices(config);

const handleRequest = createRequestHandler({
  ...services,
  defaultMaxArticles: config.maxArticlesPerEvent,
  matchOptions: {
    language: config.news.language,
    defaultDaysBack: config.defaultDaysBack,
  },
  mode: config.useMocks ? "mock" : "live",
});

const server = http.createServer((req, res) => {
  handleRequest(req, res).catch((error) => {
    console.error("[api] Unhandled error:", error);
    if (!res.headersSent) res.writeHead(500);
    res.end();
  });
});

server.listen(config.port, () => {
  console.log(`\n${"=".repeat(60)}`);
  console.log("  PREDICTION MARKET NEWS API Server");
  console.log(`${"=".repeat(60)}`);
  console.log(`  Port:     ${config.port}`);
  console.log(`  Mode:     ${config.useMocks ? "MOCK (no API keys)" : "LIVE (real APIs)"}`);
  const summaryMode = config.useMocks ? "mock" : config.llm.provider;
  console.log(`  Summary:  ${services.summarizer.enabled ? summaryMode : "headline fallback"}`);
  console.log(`\n  Endpoints:`);
  console.log(`    GET  /api/v1/health`);
  console.log(`    GET  /api/v1/events`);
  console.log(`    GET  /api/v1/events/:slug`);
  console.log(`    GET  /api/v1/events/:slug/news`);
  console.log(`    GET  /api/v1/search?q=...`);
  console.log(`${"=".repeat(60)}\n`);
});
