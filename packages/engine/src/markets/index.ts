import type { Event } from "../types.js";

export interface GetEventsParams {
  limit?: number;
  offset?: number;
  active?: boolean;
  closed?: boolean;
  order?: "volume" | "startDate" | "endDate";
  ascending?: boolean;
}

/**
 * Interface for prediction-market providers. Events are returned fully
 * parsed; matching never sees the provider's wire format.
 */
export interface MarketClient {
  name: string;
  getEvents(params?: GetEventsParams): Promise<Event[]>;
  /** Resolves to null when no event has this slug. */
  getEventBySlug(slug: string): Promise<Event | null>;
  searchEvents(query: string, limit?: number, active?: boolean): Promise<Event[]>;
}

export { filterEvents } from "./search.js";
export { GammaMarketClient, parseEvent } from "./gamma.js";
export type { GammaMarketClientOptions } from "./gamma.js";
export { MockMarketClient } from "./mock.js";
