import { DataError } from "../errors.js";
import type { SeasonBounds } from "../types.js";
import type { BootstrapEvent } from "./schemas.js";

export function deriveSeasonBounds(events: BootstrapEvent[]): SeasonBounds {
  const dates = events
    .map((event) => event.deadline_time)
    .filter((value): value is string => Boolean(value));

  if (dates.length === 0) {
    throw new DataError("No deadline_time found in events.");
  }

  let minDate = dates[0];
  let maxDate = dates[0];
  for (const date of dates) {
    const time = Date.parse(date);
    if (time < Date.parse(minDate)) minDate = date;
    if (time > Date.parse(maxDate)) maxDate = date;
  }
  return { minDate, maxDate };
}
