import { CanonicalEvent } from "./types";

export interface LocalDateTime {
  date: string; // YYYY-MM-DD
  minutes: number; // minutes since local midnight
}

export interface WindowOptions {
  now: Date;
  days: number;
  timezone: string;
  /** Events of today that started less than this long ago are still kept. */
  graceMinutes?: number;
}

/**
 * Wall-clock date and time of `now` in `timezone`. The league publishes local
 * dates and times without an offset, so the window is computed the same way.
 */
export function localDateTime(now: Date, timezone: string): LocalDateTime {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((entry) => entry.type === type)?.value ?? "00";

  return {
    date: `${part("year")}-${part("month")}-${part("day")}`,
    minutes: Number(part("hour")) * 60 + Number(part("minute")),
  };
}

export function addDays(date: string, days: number): string {
  const [year = 0, month = 1, day = 1] = date.split("-").map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return shifted.toISOString().slice(0, 10);
}

function minutesOf(time: string): number {
  const [hours = 0, minutes = 0] = time.split(":").map(Number);
  return hours * 60 + minutes;
}

/**
 * Restricts events to the next `days` days. Today's events stay only while
 * they have not started (allowing `graceMinutes`), so that events which simply
 * happened are not later reported as removed.
 */
export function filterToWindow(
  events: readonly CanonicalEvent[],
  options: WindowOptions
): CanonicalEvent[] {
  const { now, days, timezone, graceMinutes = 60 } = options;
  const local = localDateTime(now, timezone);
  const lastDate = addDays(local.date, days);
  const earliestStart = local.minutes - graceMinutes;

  return events.filter((event) => {
    if (event.date === local.date) {
      return minutesOf(event.startTime) > earliestStart;
    }
    return event.date > local.date && event.date <= lastDate;
  });
}
