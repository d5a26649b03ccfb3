import { describe, it, expect, vi, afterEach } from "vitest";
import { matchNewsToEvent } from "../src/matching/index.js";
import type {
  NewsClient,
  NewsSearchResult,
  SearchEverythingParams,
} from "../src/news/index.js";
import type { Article } from "../src/types.js";
import { clock, daysFromNow, makeArticle, makeEvent, NOW } from "./fixtures.js";

/**
 * In-process news provider: records the search it receives and answers
 * with fixed articles, or fails when given an error.
 */
class FakeNewsClient implements NewsClient {
  name = "fake";
  searches: SearchEverythingParams[] = [];

  constructor(private result: Article[] | Error) {}

  async searchEverything(
    params: SearchEverythingParams
  ): Promise<NewsSearchResult> {
    this.searches.push(params);
    if (this.result instanceof Error) throw this.result;
    return { articles: this.result, totalResults: this.result.length };
  }

  async getTopHeadlines(): Promise<NewsSearchResult> {
    return { articles: [], totalResults: 0 };
  }
}

const event = makeEvent({ title: "Elon Musk buys Twitter" });

// Scores against the query '"Twitter" "Elon Musk" elon musk buys twitter'
const dealStory = makeArticle({ title: "Elon Musk completes Twitter deal" }); // 25
const muskComment = makeArticle({ title: "Musk comments on markets", sourceName: "Reuters" }); // 4
const weather = makeArticle({ title: "Weather update" }); // 0
const outage = makeArticle({ title: "Twitter outage reported", sourceName: "Reuters" }); // 12
const rockets = makeArticle({ title: "Elon talks rockets" }); // 3
const muskSpeaks = makeArticle({ title: "Musk speaks", sourceName: "Reuters" }); // 4

const fetched = [dealStory, muskComment, weather, outage, rockets, muskSpeaks];

describe("matchNewsToEvent", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("searches with the built query, the event window and a pool of 20", async () => {
    const news = new FakeNewsClient([]);
    await matchNewsToEvent(event, news, { now: clock });

    expect(news.searches).toEqual([
      {
        query: '"Twitter" "Elon Musk" elon musk buys twitter',
        from: daysFromNow(-7),
        to: NOW,
        language: "en",
        sortBy: "relevancy",
        pageSize: 20,
      },
    ]);
  });

  it("ranks articles by score, dropping those below minScore", async () => {
    const ranked = await matchNewsToEvent(event, new FakeNewsClient(fetched), {
      now: clock,
    });

    expect(ranked.map((s) => s.score)).toEqual([25, 12, 4, 4, 3]);
    expect(ranked.map((s) => s.article)).toEqual([
      dealStory,
      outage,
      muskComment,
      muskSpeaks,
      rockets,
    ]);
  });

  it("keeps fetch order for equal scores", async () => {
    const ranked = await matchNewsToEvent(
      event,
      new FakeNewsClient([muskSpeaks, muskComment]),
      { now: clock }
    );

    expect(ranked.map((s) => s.article)).toEqual([muskSpeaks, muskComment]);
  });

  it("truncates to maxArticles", async () => {
    const ranked = await matchNewsToEvent(event, new FakeNewsClient(fetched), {
      now: clock,
      maxArticles: 2,
    });

    expect(ranked.map((s) => s.article)).toEqual([dealStory, outage]);
  });

  it("honours a custom minScore", async () => {
    const ranked = await matchNewsToEvent(event, new FakeNewsClient(fetched), {
      now: clock,
      minScore: 5,
    });

    expect(ranked.every((s) => s.score >= 5)).toBe(true);
    expect(ranked).toHaveLength(2);
  });

  it("returns an empty list when the search finds nothing", async () => {
    const ranked = await matchNewsToEvent(event, new FakeNewsClient([]), {
      now: clock,
    });

    expect(ranked).toEqual([]);
  });

  it("returns an empty list and logs when the search fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const ranked = await matchNewsToEvent(
      event,
      new FakeNewsClient(new Error("NewsAPI error 429: rate limited")),
      { now: clock }
    );

    expect(ranked).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      '[matching] Failed to fetch news for "Elon Musk buys Twitter": Error: NewsAPI error 429: rate limited'
    );
  });

  it("reports each stage through onProgress", async () => {
    const stages: string[] = [];
    await matchNewsToEvent(event, new FakeNewsClient(fetched), {
      now: clock,
      onProgress: (stage) => stages.push(stage),
    });

    expect(stages).toEqual(["query", "window", "fetch", "rank"]);
  });
});
