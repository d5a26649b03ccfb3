import { describe, it, expect, vi, afterEach } from "vitest";
import { GammaMarketClient, parseEvent } from "../src/markets/gamma.js";

const rawEvent = {
  id: 903,
  slug: "fed-decision-in-july",
  title: "Fed decision in July?",
  description: "Which way will the FOMC move?",
  startDate: "2025-05-01T00:00:00Z",
  endDate: "2025-07-30T00:00:00Z",
  category: "Economics",
  tags: [{ label: "Fed Rates" }, "Economy", { id: 4 }],
  active: true,
  closed: false,
  volume: "1234.5",
  markets: [
    {
      id: 1,
      question: "Rate cut in July?",
      slug: "rate-cut-in-july",
      outcomes: '["Yes", "No"]',
      outcomePrices: '["0.35", "0.65"]',
      volumeNum: 900,
      active: true,
      closed: false,
    },
    {
      id: 2,
      question: "Broken market",
      outcomes: "not json",
    },
  ],
};

function stubFetch(body: string, status = 200) {
  const fetchMock = vi.fn(
    async (_url: string, _init?: RequestInit) => new Response(body, { status })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const client = new GammaMarketClient({ baseUrl: "https://gamma.example.test" });

describe("parseEvent", () => {
  it("normalizes tags, numbers, dates and JSON-encoded market lists", () => {
    const event = parseEvent(rawEvent);

    expect(event.id).toBe("903");
    expect(event.tags).toEqual(["Fed Rates", "Economy"]);
    expect(event.volume).toBe(1234.5);
    expect(event.startDate).toEqual(new Date("2025-05-01T00:00:00Z"));
    expect(event.markets).toEqual([
      {
        id: "1",
        question: "Rate cut in July?",
        slug: "rate-cut-in-july",
        outcomes: ["Yes", "No"],
        outcomePrices: [0.35, 0.65],
        volume: 900,
        active: true,
        closed: false,
      },
    ]);
  });

  it("drops tag entries that are neither strings nor labels", () => {
    const event = parseEvent({
      id: "1",
      title: "Fed cut?",
      tags: [{ label: "Fed" }, null, 7, { label: null }, "Rates"],
    });

    expect(event.tags).toEqual(["Fed", "Rates"]);
  });

  it("fills defaults for a sparse record", () => {
    const event = parseEvent({ id: "7", title: "Sparse" });

    expect(event).toEqual({
      id: "7",
      slug: "",
      title: "Sparse",
      description: "",
      startDate: undefined,
      endDate: undefined,
      category: undefined,
      tags: [],
      active: false,
      closed: false,
      volume: 0,
      markets: [],
    });
  });
});

describe("GammaMarketClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requests events ordered by volume", async () => {
    const fetchMock = stubFetch(JSON.stringify([rawEvent]));

    const events = await client.getEvents({ limit: 5 });

    const url = new URL(fetchMock.mock.calls[0][0]);
    expect(url.pathname).toBe("/events");
    expect(url.searchParams.get("limit")).toBe("5");
    expect(url.searchParams.get("active")).toBe("true");
    expect(url.searchParams.get("closed")).toBe("false");
    expect(url.searchParams.get("order")).toBe("volume");
    expect(url.searchParams.get("ascending")).toBe("false");
    expect(events.map((e) => e.slug)).toEqual(["fed-decision-in-july"]);
  });

  it("accepts an object-wrapped event list", async () => {
    stubFetch(JSON.stringify({ data: [rawEvent] }));

    const events = await client.getEvents();

    expect(events).toHaveLength(1);
  });

  it("skips malformed event records", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    stubFetch(JSON.stringify([{ id: "bad", title: 42 }, rawEvent]));

    const events = await client.getEvents();

    expect(events.map((e) => e.slug)).toEqual(["fed-decision-in-july"]);
    expect(warn).toHaveBeenCalledOnce();
    warn.mockRestore();
  });

  it("returns null for a malformed slug lookup", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    stubFetch(JSON.stringify([{ id: "bad", markets: "none" }]));

    expect(await client.getEventBySlug("bad")).toBeNull();
    warn.mockRestore();
  });

  it("returns null for an unknown slug", async () => {
    stubFetch("[]");
    expect(await client.getEventBySlug("missing")).toBeNull();

    stubFetch("not found", 404);
    expect(await client.getEventBySlug("missing")).toBeNull();
  });

  it("propagates other failures", async () => {
    stubFetch("upstream down", 502);

    await expect(client.getEventBySlug("any")).rejects.toThrow(
      "Gamma API error 502: upstream down"
    );
  });

  it("searches title, description and tags", async () => {
    const other = { ...rawEvent, slug: "other", title: "Other", description: "", tags: [] };
    stubFetch(JSON.stringify([other, rawEvent]));

    const byTag = await client.searchEvents("fed rates");
    const byDescription = await client.searchEvents("FOMC");

    expect(byTag.map((e) => e.slug)).toEqual(["fed-decision-in-july"]);
    expect(byDescription.map((e) => e.slug)).toEqual(["fed-decision-in-july"]);
  });
});
