import type { SensorDeparture, ServiceMessage } from "@mvgboard/core";
import type { Departure } from "../models/mvg";

export interface DepartureFilterOptions {
  /** Empty, or a blank first entry, disables the filter. Same for `lines`. */
  destinations: readonly string[];
  lines: readonly string[];
  timeOffsetMinutes: number;
}

/**
 * Whole minutes from `now` (epoch ms) until `departureTime` (epoch seconds),
 * truncated toward zero: 90 seconds ago is -1, 30 seconds ago is 0.
 */
export const minutesUntilDeparture = (departureTime: number, now: number = Date.now()): number => {
  const minutes = Math.trunc((departureTime * 1000 - now) / 60_000);
  return minutes === 0 ? 0 : minutes;
};

const isFilterActive = (values: readonly string[]) => values.length > 0 && (values[0] ?? "").trim() !== "";

export const filterDepartures = (
  departures: readonly Departure[],
  options: DepartureFilterOptions,
  now: number = Date.now(),
): SensorDeparture[] => {
  const filterDestinations = isFilterActive(options.destinations);
  const filterLines = isFilterActive(options.lines);

  const selected: SensorDeparture[] = [];
  for (const departure of departures) {
    if (filterDestinations && !options.destinations.includes(departure.destination)) continue;
    if (filterLines && !options.lines.includes(departure.line)) continue;

    const timeInMins = minutesUntilDeparture(departure.time, now);
    if (timeInMins < options.timeOffsetMinutes) continue;

    selected.push({
      destination: departure.destination,
      line: departure.line,
      type: departure.type,
      cancelled: departure.cancelled,
      icon: departure.icon,
      platform: departure.platform,
      time_in_mins: timeInMins,
    });
  }
  return selected;
};

/** Service messages carried by the departures, first occurrence kept. */
export const collectMessages = (departures: readonly Departure[]): ServiceMessage[] => {
  const seen = new Set<string>();
  const messages: ServiceMessage[] = [];
  departures.forEach((departure) => {
    departure.messages.forEach((message) => {
      const key = JSON.stringify(message);
      if (seen.has(key)) return;
      seen.add(key);
      messages.push(message);
    });
  });
  return messages;
};
