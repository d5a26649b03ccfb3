import type { Article, Event } from "../src/types.js";

export const NOW = new Date("2025-06-15T12:00:00Z");
export const clock = () => NOW;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * HOUR_MS);
}

export function daysFromNow(days: number): Date {
  return new Date(NOW.getTime() + days * DAY_MS);
}

export function makeEvent(overrides: Partial<Event> = {}): Event {
  return {
    id: "test-001",
    slug: "test-event",
    title: "Test event",
    description: "",
    tags: [],
    active: true,
    closed: false,
    volume: 0,
    markets: [],
    ...overrides,
  };
}

export function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    sourceName: "Example Wire",
    title: "Untitled",
    url: "https://example.com/article",
    ...overrides,
  };
}
