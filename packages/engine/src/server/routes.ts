import type http from "node:http";
import type { z } from "zod";
import type { Event, EventSummary, ScoredArticle } from "../types.js";
import type { MarketClient } from "../markets/index.js";
import type { NewsClient } from "../news/index.js";
import type { EventSummarizer } from "../summarizer/index.js";
import type { MatchOptions } from "../matching/index.js";
import { matchNewsToEvent } from "../matching/index.js";
import { toArticleResponse, toEventResponse } from "./responses.js";
import type { EventWithNewsResponse } from "./responses.js";
import {
  EventNewsParams,
  SearchParams,
  describeIssue,
  eventDetailParams,
  eventListParams,
} from "./params.js";

export const API_VERSION = "1.0.0";
const SEARCH_ARTICLES_PER_EVENT = 3;

export interface ApiDependencies {
  marketClient: MarketClient;
  newsClient: NewsClient;
  summarizer: EventSummarizer;
  /** Shared matching settings; `maxArticles` comes from each request. */
  matchOptions?: Omit<MatchOptions, "maxArticles">;
  defaultMaxArticles?: number;
  mode?: "mock" | "live";
}

/**
 * Send a JSON response with CORS headers.
 */
function sendJson(res: http.ServerResponse, status: number, data: unknown) {
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": "*",
    "Access-Control-Allow-Methods": "GET, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  });
  res.end(status === 204 ? undefined : JSON.stringify(data));
}

type ParseResult<T> = { ok: true; value: T } | { ok: false };

/** Validates query parameters, answering 400 itself on failure. */
function parseQuery<T extends z.ZodTypeAny>(
  schema: T,
  url: URL,
  res: http.ServerResponse
): ParseResult<z.output<T>> {
  const result = schema.safeParse(Object.fromEntries(url.searchParams));
  if (!result.success) {
    sendJson(res, 400, { error: describeIssue(result.error) });
    return { ok: false };
  }
  return { ok: true, value: result.data };
}

/** Decodes a path segment; null when it holds a malformed escape. */
function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

/** YES price of the first market, the headline number for an event. */
function headlinePrice(event: Event): number | undefined {
  return event.markets[0]?.outcomePrices[0];
}

/**
 * Builds the HTTP handler. Routes:
 *
 *   GET /                             service banner
 *   GET /api/v1/health                probes both remote services
 *   GET /api/v1/events                events with news and summaries
 *   GET /api/v1/events/:slug          one event with news and summary
 *   GET /api/v1/events/:slug/news     ranked articles only
 *   GET /api/v1/search?q=             keyword search over events
 */
export function createRequestHandler(deps: ApiDependencies) {
  const defaultMaxArticles = deps.defaultMaxArticles ?? 5;
  const listParams = eventListParams(defaultMaxArticles);
  const detailParams = eventDetailParams(defaultMaxArticles);

  function matchNews(event: Event, maxArticles: number): Promise<ScoredArticle[]> {
    return matchNewsToEvent(event, deps.newsClient, {
      ...deps.matchOptions,
      maxArticles,
    });
  }

  async function summarize(
    event: Event,
    articles: ScoredArticle[]
  ): Promise<EventSummary | null> {
    if (articles.length === 0) return null;
    return deps.summarizer.summarizeEvent({
      title: event.title,
      description: event.description,
      articles,
      marketPrice: headlinePrice(event),
    });
  }

  async function checkService(
    name: string,
    probe: () => Promise<number>
  ): Promise<boolean> {
    try {
      return (await probe()) > 0;
    } catch (error) {
      console.warn(`[api] Health probe for ${name} failed: ${error}`);
      return false;
    }
  }

  return async function handleRequest(
    req: http.IncomingMessage,
    res: http.ServerResponse
  ): Promise<void> {
    const { method } = req;
    const url = new URL(req.url ?? "/", "http://localhost");
    const path = url.pathname.replace(/\/+$/, "") || "/";

    /* Handle CORS preflight */
    if (method === "OPTIONS") {
      sendJson(res, 204, null);
      return;
    }

    if (method !== "GET") {
      sendJson(res, 405, { error: "Method not allowed" });
      return;
    }

    try {
      /* ── GET / ── */
      if (path === "/") {
        sendJson(res, 200, {
          message: "Prediction Market News API",
          version: API_VERSION,
          health: "/api/v1/health",
        });
        return;
      }

      /* ── GET /api/v1/health ── */
      if (path === "/api/v1/health") {
        const [polymarket, newsapi] = await Promise.all([
          checkService(deps.marketClient.name, async () =>
            (await deps.marketClient.getEvents({ limit: 1 })).length
          ),
          checkService(deps.newsClient.name, async () =>
            (await deps.newsClient.getTopHeadlines({ country: "us", pageSize: 1 }))
              .articles.length
          ),
        ]);

        sendJson(res, 200, {
          status: polymarket && newsapi ? "ok" : "degraded",
          version: API_VERSION,
          mode: deps.mode ?? "live",
          services: { polymarket, newsapi },
        });
        return;
      }

      /* ── GET /api/v1/events ── */
      if (path === "/api/v1/events") {
        const params = parseQuery(listParams, url, res);
        if (!params.ok) return;
        const q = params.value;

        const events = await deps.marketClient.getEvents({
          limit: q.limit,
          offset: (q.page - 1) * q.limit,
          active: q.active,
          closed: q.closed,
        });

        // One event at a time: each match is one outbound news call
        const results: EventWithNewsResponse[] = [];
        for (const event of events) {
          const articles = q.include_news
            ? await matchNews(event, q.max_articles)
            : [];
          const summary = q.include_summary
            ? await summarize(event, articles)
            : null;
          results.push(toEventResponse(event, articles, summary));
        }

        sendJson(res, 200, {
          events: results,
          total: results.length,
          page: q.page,
          limit: q.limit,
        });
        return;
      }

      /* ── GET /api/v1/search ── */
      if (path === "/api/v1/search") {
        const params = parseQuery(SearchParams, url, res);
        if (!params.ok) return;
        const q = params.value;

        const events = await deps.marketClient.searchEvents(q.q, q.limit);
        const results: EventWithNewsResponse[] = [];
        for (const event of events) {
          const articles = q.include_news
            ? await matchNews(event, SEARCH_ARTICLES_PER_EVENT)
            : [];
          results.push(toEventResponse(event, articles, null));
        }

        sendJson(res, 200, {
          query: q.q,
          results,
          count: results.length,
        });
        return;
      }

      /* ── GET /api/v1/events/:slug[/news] ── */
      const eventRoute = path.match(/^\/api\/v1\/events\/([^/]+)(\/news)?$/);
      if (eventRoute) {
        const slug = decodeSegment(eventRoute[1]);
        if (slug === null) {
          sendJson(res, 404, { error: `Event '${eventRoute[1]}' not found` });
          return;
        }
        const newsOnly = eventRoute[2] !== undefined;

        if (newsOnly) {
          const params = parseQuery(EventNewsParams, url, res);
          if (!params.ok) return;

          const event = await deps.marketClient.getEventBySlug(slug);
          if (!event) {
            sendJson(res, 404, { error: `Event '${slug}' not found` });
            return;
          }

          const articles = await matchNews(event, params.value.max_articles);
          sendJson(res, 200, articles.map(toArticleResponse));
          return;
        }

        const params = parseQuery(detailParams, url, res);
        if (!params.ok) return;

        const event = await deps.marketClient.getEventBySlug(slug);
        if (!event) {
          sendJson(res, 404, { error: `Event '${slug}' not found` });
          return;
        }

        const articles = await matchNews(event, params.value.max_articles);
        const summary = params.value.include_summary
          ? await summarize(event, articles)
          : null;
        sendJson(res, 200, toEventResponse(event, articles, summary));
        return;
      }

      /* 404 for everything else */
      sendJson(res, 404, { error: "Not found" });
    } catch (err) {
      const message = err instanceof Error ? err.message : "Internal server error";
      console.error(`[api] ${method} ${path} failed:`, message);
      sendJson(res, 500, { error: message });
    }
  };
}
