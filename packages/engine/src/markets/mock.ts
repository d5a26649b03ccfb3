import type { Clock, Event } from "../types.js";
import { systemClock } from "../types.js";
import type { GetEventsParams, MarketClient } from "./index.js";
import { filterEvents } from "./search.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Offline market provider with a handful of fixture events. Dates are
 * relative to the injected clock so time windows stay meaningful.
 */
export class MockMarketClient implements MarketClient {
  name = "mock";
  private now: Clock;

  constructor(now: Clock = systemClock) {
    this.now = now;
  }

  async getEvents(params: GetEventsParams = {}): Promise<Event[]> {
    const { limit = 50, offset = 0, active = true, closed = false } = params;
    return this.fixtures()
      .filter((event) => event.active === active && event.closed === closed)
      .slice(offset, offset + limit);
  }

  async getEventBySlug(slug: string): Promise<Event | null> {
    return this.fixtures().find((event) => event.slug === slug) ?? null;
  }

  async searchEvents(
    query: string,
    limit = 20,
    active = true
  ): Promise<Event[]> {
    const events = await this.getEvents({ limit: 100, active });
    return filterEvents(events, query, limit);
  }

  private fixtures(): Event[] {
    const daysFromNow = (days: number) =>
      new Date(this.now().getTime() + days * DAY_MS);

    return [
      {
        id: "1001",
        slug: "fed-rate-cut-in-december",
        title: "Will the Federal Reserve cut rates in December?",
        description:
          "Resolves YES if the FOMC lowers the federal funds target range at its December meeting.",
        startDate: daysFromNow(-20),
        endDate: daysFromNow(25),
        category: "Economics",
        tags: ["Economy", "Fed Rates", "Finance"],
        active: true,
        closed: false,
        volume: 1_250_000,
        markets: [
          {
            id: "2001",
            question: "Fed cuts rates in December?",
            slug: "fed-cuts-rates-in-december",
            outcomes: ["Yes", "No"],
            outcomePrices: [0.72, 0.28],
            volume: 1_250_000,
            active: true,
            closed: false,
          },
        ],
      },
      {
        id: "1002",
        slug: "bitcoin-above-100k-on-friday",
        title: "Bitcoin above $100k on Friday?",
        description:
          "Resolves YES if the BTC/USDT close on Friday is above 100,000.",
        startDate: daysFromNow(-3),
        endDate: daysFromNow(4),
        category: "Crypto",
        tags: ["Crypto", "Bitcoin"],
        active: true,
        closed: false,
        volume: 830_000,
        markets: [
          {
            id: "2002",
            question: "Bitcoin above $100k on Friday?",
            slug: "bitcoin-above-100k-on-friday",
            outcomes: ["Yes", "No"],
            outcomePrices: [0.41, 0.59],
            volume: 830_000,
            active: true,
            closed: false,
          },
        ],
      },
      {
        id: "1003",
        slug: "government-shutdown-this-month",
        title: "Government shutdown this month?",
        description:
          "Resolves YES if a lapse in appropriations begins before the end of the month.",
        endDate: daysFromNow(12),
        category: "Politics",
        tags: ["Politics", "Congress"],
        active: true,
        closed: false,
        volume: 410_000,
        markets: [
          {
            id: "2003",
            question: "Government shutdown this month?",
            slug: "government-shutdown-this-month",
            outcomes: ["Yes", "No"],
            outcomePrices: [0.18, 0.82],
            volume: 410_000,
            active: true,
            closed: false,
          },
        ],
      },
    ];
  }
}
