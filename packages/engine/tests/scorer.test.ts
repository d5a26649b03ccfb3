import { describe, it, expect } from "vitest";
import { scoreArticle } from "../src/matching/scorer.js";
import { buildNewsQuery, splitQueryTerms } from "../src/matching/query.js";
import { hoursAgo, makeArticle, makeEvent, NOW } from "./fixtures.js";

/**
 * Events with lower-case titles have no named entities, which keeps
 * the entity rule out of tests aimed at other rules.
 */
const plainEvent = makeEvent({ title: "rate decision" });

describe("scoreArticle", () => {
  it("counts title and description term matches", () => {
    const scored = scoreArticle(
      makeArticle({
        title: "Federal Reserve weighs a cut",
        description: "Inflation cooled in May",
      }),
      plainEvent,
      ['"Federal Reserve"', "inflation", "cut"],
      NOW
    );

    expect(scored.score).toBe(7);
    expect(scored.matchReasons).toEqual(["title_match:2", "desc_match:1"]);
  });

  it("matches terms inside longer words", () => {
    const scored = scoreArticle(
      makeArticle({ title: "Federal budget talks resume" }),
      plainEvent,
      ["fed"],
      NOW
    );

    expect(scored.score).toBe(3);
    expect(scored.matchReasons).toEqual(["title_match:1"]);
  });

  it("adds five per event entity found in the article title", () => {
    const scored = scoreArticle(
      makeArticle({ title: "Twitter shares jump" }),
      makeEvent({ title: "Elon Musk buys Twitter" }),
      [],
      NOW
    );

    expect(scored.score).toBe(5);
    expect(scored.matchReasons).toEqual(["entity:Twitter"]);
  });

  it.each([
    [6, 2, ["very_recent"]],
    [24, 2, ["very_recent"]],
    [47, 2, ["very_recent"]],
    [48, 1, ["recent"]],
    [72, 1, ["recent"]],
    [96, 0, []],
  ])("gives a recency bonus to an article %i hours old", (hours, bonus, reasons) => {
    const scored = scoreArticle(
      makeArticle({ title: "Unrelated", publishedAt: hoursAgo(hours) }),
      plainEvent,
      [],
      NOW
    );

    expect(scored.score).toBe(bonus);
    expect(scored.matchReasons).toEqual(reasons);
  });

  it.each([
    ["Reuters", 1],
    ["BBC News", 1],
    ["The Associated Press", 1],
    ["The Economist", 1],
    ["Economist Daily", 0],
    ["Example Wire", 0],
  ])("scores source %s with quality bonus %i", (sourceName, bonus) => {
    const scored = scoreArticle(
      makeArticle({ title: "Unrelated", sourceName }),
      plainEvent,
      [],
      NOW
    );

    expect(scored.score).toBe(bonus);
  });

  it("lists reasons in rule order when every rule fires", () => {
    const event = makeEvent({ title: "Elon Musk buys Twitter" });
    const queryTerms = splitQueryTerms(buildNewsQuery(event));

    const scored = scoreArticle(
      makeArticle({
        sourceName: "Reuters",
        title: "Elon Musk completes purchase of Twitter",
        description: "The deal closed after Musk waived conditions.",
        publishedAt: hoursAgo(6),
      }),
      event,
      queryTerms,
      NOW
    );

    // title: twitter, elon musk, elon, musk, twitter → 5 × 3
    // desc: musk → 1
    expect(scored.score).toBe(15 + 1 + 5 + 5 + 2 + 1);
    expect(scored.matchReasons).toEqual([
      "title_match:5",
      "desc_match:1",
      "entity:Elon Musk",
      "entity:Twitter",
      "very_recent",
      "quality_source",
    ]);
  });

  it("skips rules whose fields are missing", () => {
    const scored = scoreArticle(
      makeArticle({ title: "Rate decision due", description: undefined }),
      plainEvent,
      ["rate"],
      NOW
    );

    expect(scored.score).toBe(3);
    expect(scored.matchReasons).toEqual(["title_match:1"]);
  });

  it("returns the same result for the same inputs", () => {
    const article = makeArticle({
      title: "Fed holds rates",
      description: "Rates unchanged",
      publishedAt: hoursAgo(30),
    });
    const first = scoreArticle(article, plainEvent, ["rates", "fed"], NOW);
    const second = scoreArticle(article, plainEvent, ["rates", "fed"], NOW);

    expect(second).toEqual(first);
    expect(first.article).toBe(article);
  });
});
