import type { Article } from "../types.js";

export type NewsSortOrder = "relevancy" | "popularity" | "publishedAt";

export interface SearchEverythingParams {
  query: string;
  from?: Date;
  to?: Date;
  language?: string;
  sortBy?: NewsSortOrder;
  page?: number;
  pageSize?: number; // capped at 100
  domains?: string[];
  excludeDomains?: string[];
}

export interface TopHeadlinesParams {
  country?: string;
  category?: string;
  sources?: string[];
  query?: string;
  page?: number;
  pageSize?: number;
}

export interface NewsSearchResult {
  articles: Article[];
  totalResults: number;
}

/**
 * Interface for news providers. The matching pipeline only needs
 * `searchEverything`; headlines back the health check.
 *
 * Implementations throw on transport errors and non-ok responses;
 * callers decide whether that is fatal.
 */
export interface NewsClient {
  name: string;
  searchEverything(params: SearchEverythingParams): Promise<NewsSearchResult>;
  getTopHeadlines(params?: TopHeadlinesParams): Promise<NewsSearchResult>;
}

export { NewsAPIClient, parseArticle } from "./newsapi.js";
export type { NewsAPIClientOptions } from "./newsapi.js";
export { MockNewsClient } from "./mock.js";
