import { CalendarDate } from "@shared/calendar-date";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Business "today": the local clock truncated to its calendar day. */
export function today(clock: Clock): CalendarDate {
  return CalendarDate.fromDate(clock.now());
}
