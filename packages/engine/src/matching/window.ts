import type { Clock, Event, TimeWindow } from "../types.js";
import { systemClock } from "../types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_LOOKBACK_DAYS = 30;

export interface TimeWindowOptions {
  defaultDaysBack?: number;
  bufferDays?: number;
  now?: Clock;
}

function daysFrom(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Derives the news search window from the event's lifecycle.
 *
 * `to` is the event's end date when it lies in the future, capped at one
 * day ahead; otherwise now. `from` is the start date minus `bufferDays`,
 * never earlier than 30 days ago; without a start date it is
 * `defaultDaysBack` days ago. The window is not checked for order: an
 * event that starts in the future yields `from > to`.
 *
 * Dates are absolute instants, so offsets in the source timestamps are
 * already normalized onto one timeline.
 */
export function getTimeWindow(
  event: Event,
  options: TimeWindowOptions = {}
): TimeWindow {
  const { defaultDaysBack = 7, bufferDays = 2, now: clock = systemClock } =
    options;
  const now = clock();

  let to = now;
  if (event.endDate && event.endDate.getTime() > now.getTime()) {
    const cap = daysFrom(now, 1);
    to = event.endDate.getTime() < cap.getTime() ? event.endDate : cap;
  }

  let from: Date;
  if (event.startDate) {
    const buffered = daysFrom(event.startDate, -bufferDays);
    const earliest = daysFrom(now, -MAX_LOOKBACK_DAYS);
    from = buffered.getTime() > earliest.getTime() ? buffered : earliest;
  } else {
    from = daysFrom(now, -defaultDaysBack);
  }

  return { from, to };
}
