import type { Event } from "../types.js";

/**
 * Case-insensitive substring search over title, description and tags.
 * Shared by every client whose provider has no search endpoint.
 */
export function filterEvents(
  events: Event[],
  query: string,
  limit: number
): Event[] {
  const needle = query.toLowerCase();
  return events
    .filter((event) =>
      `${event.title} ${event.description} ${event.tags.join(" ")}`
        .toLowerCase()
        .includes(needle)
    )
    .slice(0, limit);
}
