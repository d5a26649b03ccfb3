import { z } from "zod";
import type { Article } from "../types.js";
import { RemoteServiceError } from "../errors.js";
import type {
  NewsClient,
  NewsSearchResult,
  SearchEverythingParams,
  TopHeadlinesParams,
} from "./index.js";

const MAX_PAGE_SIZE = 100;

const RawArticleSchema = z.object({
  source: z
    .object({
      id: z.string().nullish(),
      name: z.string().nullish(),
    })
    .nullish(),
  author: z.string().nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  urlToImage: z.string().nullish(),
  publishedAt: z.string().nullish(),
  content: z.string().nullish(),
});

type RawArticle = z.infer<typeof RawArticleSchema>;

const ResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  totalResults: z.number().optional(),
  articles: z.array(RawArticleSchema).optional(),
});

function parseDate(value: string | null | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/** Converts one NewsAPI article record into an `Article`. */
export function parseArticle(raw: RawArticle): Article {
  return {
    sourceId: raw.source?.id ?? undefined,
    sourceName: raw.source?.name ?? "Unknown",
    author: raw.author ?? undefined,
    title: raw.title ?? "",
    description: raw.description ?? undefined,
    url: raw.url ?? "",
    imageUrl: raw.urlToImage ?? undefined,
    publishedAt: parseDate(raw.publishedAt),
    content: raw.content ?? undefined,
  };
}

/** NewsAPI takes calendar days, not timestamps. */
function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export interface NewsAPIClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * NewsAPI.org client covering /everything and /top-headlines.
 *
 * Every request is bounded by `timeoutMs`; a timeout surfaces as the
 * fetch abort error. There are no retries.
 */
export class NewsAPIClient implements NewsClient {
  name = "newsapi";
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: NewsAPIClientOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.NEWS_API_KEY ?? "";
    this.baseUrl = options.baseUrl ?? "https://newsapi.org/v2";
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async searchEverything(
    params: SearchEverythingParams
  ): Promise<NewsSearchResult> {
    const query = new URLSearchParams({
      q: params.query,
      language: params.language ?? "en",
      sortBy: params.sortBy ?? "relevancy",
      page: String(params.page ?? 1),
      pageSize: String(Math.min(params.pageSize ?? 20, MAX_PAGE_SIZE)),
    });

    if (params.from) query.set("from", formatDay(params.from));
    if (params.to) query.set("to", formatDay(params.to));
    if (params.domains?.length) query.set("domains", params.domains.join(","));
    if (params.excludeDomains?.length) {
      query.set("excludeDomains", params.excludeDomains.join(","));
    }

    return this.request("/everything", query);
  }

  async getTopHeadlines(
    params: TopHeadlinesParams = {}
  ): Promise<NewsSearchResult> {
    const query = new URLSearchParams({
      page: String(params.page ?? 1),
      pageSize: String(Math.min(params.pageSize ?? 20, MAX_PAGE_SIZE)),
    });

    if (params.country) query.set("country", params.country);
    if (params.category) query.set("category", params.category);
    if (params.sources?.length) query.set("sources", params.sources.join(","));
    if (params.query) query.set("q", params.query);

    // The endpoint rejects requests without at least one filter
    if (!params.country && !params.category && !params.sources?.length && !params.query) {
      query.set("country", "us");
    }

    return this.request("/top-headlines", query);
  }

  private async request(
    endpoint: string,
    query: URLSearchParams
  ): Promise<NewsSearchResult> {
    if (!this.apiKey) {
      throw new Error("NEWS_API_KEY is not set");
    }
    query.set("apiKey", this.apiKey);

    const response = await fetch(`${this.baseUrl}${endpoint}?${query}`, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const body: unknown = await response.json().catch(() => null);
    const parsed = ResponseSchema.safeParse(body);

    if (!response.ok || !parsed.success || parsed.data.status !== "ok") {
      const message = parsed.success
        ? parsed.data.message ?? "Unknown error"
        : "Unexpected response body";
      throw new RemoteServiceError(
        "NewsAPI",
        message,
        response.ok ? undefined : response.status
      );
    }

    return {
      articles: (parsed.data.articles ?? []).map(parseArticle),
      totalResults: parsed.data.totalResults ?? 0,
    };
  }
}
