import type { Article, Clock } from "../types.js";
import { systemClock } from "../types.js";
import type {
  NewsClient,
  NewsSearchResult,
  SearchEverythingParams,
  TopHeadlinesParams,
} from "./index.js";

const HOUR_MS = 60 * 60 * 1000;

/**
 * Offline news provider. Returns the same fixture set for every query,
 * with publish times relative to the injected clock so recency bonuses
 * behave as they would against live data. The scorer does the filtering.
 */
export class MockNewsClient implements NewsClient {
  name = "mock";
  private now: Clock;

  constructor(now: Clock = systemClock) {
    this.now = now;
  }

  async searchEverything(
    params: SearchEverythingParams
  ): Promise<NewsSearchResult> {
    const articles = this.fixtures().slice(0, params.pageSize ?? 20);
    return { articles, totalResults: articles.length };
  }

  async getTopHeadlines(
    params: TopHeadlinesParams = {}
  ): Promise<NewsSearchResult> {
    const articles = this.fixtures().slice(0, params.pageSize ?? 20);
    return { articles, totalResults: articles.length };
  }

  private fixtures(): Article[] {
    const hoursAgo = (hours: number) =>
      new Date(this.now().getTime() - hours * HOUR_MS);

    return [
      {
        sourceId: "reuters",
        sourceName: "Reuters",
        title: "Federal Reserve signals rate cut as inflation cools",
        description:
          "Federal Reserve officials pointed to easing price pressures and a softer labor market ahead of the December meeting.",
        url: "https://example.com/news/fed-signals-cut",
        publishedAt: hoursAgo(6),
      },
      {
        sourceId: "bloomberg",
        sourceName: "Bloomberg",
        title: "Traders price in December rate cut after jobs data",
        description:
          "Futures markets moved toward a quarter-point cut by the Federal Reserve after payrolls missed estimates.",
        url: "https://example.com/news/traders-price-cut",
        publishedAt: hoursAgo(30),
      },
      {
        sourceName: "Crypto Daily",
        title: "Bitcoin climbs past $100k as ETF inflows accelerate",
        description:
          "Spot bitcoin funds recorded their largest weekly inflow of the quarter.",
        url: "https://example.com/news/bitcoin-100k",
        publishedAt: hoursAgo(12),
      },
      {
        sourceId: "politico",
        sourceName: "Politico",
        title: "Senate leaders trade offers as shutdown deadline nears",
        description:
          "Negotiators remain apart on spending levels with the government shutdown deadline days away.",
        url: "https://example.com/news/shutdown-deadline",
        publishedAt: hoursAgo(60),
      },
      {
        sourceName: "Local Ledger",
        title: "City council approves new parking rules",
        description: "The measure takes effect next spring.",
        url: "https://example.com/news/parking-rules",
        publishedAt: hoursAgo(150),
      },
    ];
  }
}
