import { z } from "zod";
import type { Event, Market } from "../types.js";
import { RemoteServiceError } from "../errors.js";
import type { GetEventsParams, MarketClient } from "./index.js";
import { filterEvents } from "./search.js";

const SEARCH_POOL_SIZE = 100;

const numeric = z.union([z.number(), z.string()]).nullish();

function decodeJsonList(value: string): unknown[] | null {
  try {
    const decoded: unknown = JSON.parse(value);
    return Array.isArray(decoded) ? decoded : null;
  } catch {
    return null;
  }
}

/** Gamma encodes some list fields as JSON strings ("[\"Yes\",\"No\"]"). */
const jsonList = z
  .union([z.string(), z.array(z.union([z.string(), z.number()]))])
  .nullish()
  .transform((value, ctx): unknown[] => {
    if (value === null || value === undefined) return [];
    if (Array.isArray(value)) return value;
    const decoded = decodeJsonList(value);
    if (decoded) return decoded;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not a JSON list" });
    return z.NEVER;
  });

const RawMarketSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  question: z.string().nullish(),
  slug: z.string().nullish(),
  outcomes: jsonList,
  outcomePrices: jsonList,
  volumeNum: numeric,
  volume: numeric,
  active: z.boolean().nullish(),
  closed: z.boolean().nullish(),
});

const RawEventSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  slug: z.string().nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  startDate: z.string().nullish(),
  endDate: z.string().nullish(),
  category: z.string().nullish(),
  tags: z.array(z.unknown()).nullish(),
  active: z.boolean().nullish(),
  closed: z.boolean().nullish(),
  volume: numeric,
  markets: z.array(z.unknown()).nullish(),
});

const EventListSchema = z.union([
  z.array(z.unknown()),
  z
    .object({
      events: z.array(z.unknown()).optional(),
      data: z.array(z.unknown()).optional(),
    })
    .transform((body) => body.events ?? body.data ?? []),
]);

function toNumber(value: number | string | null | undefined): number {
  const n = Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

function parseDate(value: string | null | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

const TagObjectSchema = z.object({ label: z.string() });

/** A tag is a plain string or a `{ label }` object; anything else is dropped. */
function tagLabel(tag: unknown): string | null {
  if (typeof tag === "string") return tag;
  const parsed = TagObjectSchema.safeParse(tag);
  return parsed.success && parsed.data.label ? parsed.data.label : null;
}

/** Returns null for a market record that cannot be parsed. */
function parseMarket(raw: unknown): Market | null {
  const result = RawMarketSchema.safeParse(raw);
  if (!result.success) return null;
  const m = result.data;

  const prices = m.outcomePrices.map((p) => Number(p));
  if (prices.some((p) => Number.isNaN(p))) return null;

  return {
    id: String(m.id ?? ""),
    question: m.question ?? "",
    slug: m.slug ?? "",
    outcomes: m.outcomes.map(String),
    outcomePrices: prices,
    volume: toNumber(m.volumeNum) || toNumber(m.volume),
    active: m.active ?? false,
    closed: m.closed ?? false,
  };
}

/**
 * Converts a Gamma event record into an `Event`. Tags may be plain
 * strings or `{ label }` objects; other tag entries and unparseable
 * markets are dropped. Throws when the record itself is malformed.
 */
export function parseEvent(raw: unknown): Event {
  const e = RawEventSchema.parse(raw);

  const tags: string[] = [];
  for (const tag of e.tags ?? []) {
    const label = tagLabel(tag);
    if (label !== null) tags.push(label);
  }

  const markets: Market[] = [];
  for (const rawMarket of e.markets ?? []) {
    const market = parseMarket(rawMarket);
    if (market) markets.push(market);
  }

  return {
    id: String(e.id ?? ""),
    slug: e.slug ?? "",
    title: e.title ?? "",
    description: e.description ?? "",
    startDate: parseDate(e.startDate),
    endDate: parseDate(e.endDate),
    category: e.category ?? undefined,
    tags,
    active: e.active ?? false,
    closed: e.closed ?? false,
    volume: toNumber(e.volume),
    markets,
  };
}

/** Parses a list of event records, skipping the ones that are malformed. */
function parseEvents(records: unknown[]): Event[] {
  const events: Event[] = [];
  for (const record of records) {
    try {
      events.push(parseEvent(record));
    } catch (error) {
      console.warn(`[gamma] Skipping malformed event record: ${error}`);
    }
  }
  return events;
}

export interface GammaMarketClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Polymarket Gamma API client. Read-only and keyless.
 */
export class GammaMarketClient implements MarketClient {
  name = "polymarket";
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: GammaMarketClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? "https://gamma-api.polymarket.com";
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async getEvents(params: GetEventsParams = {}): Promise<Event[]> {
    const query = new URLSearchParams({
      limit: String(params.limit ?? 50),
      offset: String(params.offset ?? 0),
      active: String(params.active ?? true),
      closed: String(params.closed ?? false),
      order: params.order ?? "volume",
      ascending: String(params.ascending ?? false),
    });

    const body = await this.request("/events", query);
    return parseEvents(EventListSchema.parse(body));
  }

  async getEventBySlug(slug: string): Promise<Event | null> {
    try {
      const body = await this.request(
        "/events",
        new URLSearchParams({ slug })
      );
      const [first] = EventListSchema.parse(body);
      if (first === undefined) return null;
      const [event] = parseEvents([first]);
      return event ?? null;
    } catch (error) {
      if (
        error instanceof RemoteServiceError &&
        (error.status === 404 || error.status === 422)
      ) {
        return null;
      }
      throw error;
    }
  }

  async searchEvents(
    query: string,
    limit = 20,
    active = true
  ): Promise<Event[]> {
    const events = await this.getEvents({ limit: SEARCH_POOL_SIZE, active });
    return filterEvents(events, query, limit);
  }

  private async request(
    endpoint: string,
    query: URLSearchParams
  ): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${endpoint}?${query}`, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new RemoteServiceError("Gamma API", errorBody, response.status);
    }

    return response.json();
  }
}
