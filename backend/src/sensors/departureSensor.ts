import type { SensorDeparture, SensorState, ServiceMessage } from "@mvgboard/core";
import type { Departure, Station } from "../models/mvg";
import { transportTypesForLabels, type TransportTypeKey } from "../mvg/catalog";
import type { MvgClient } from "../mvg/client";
import { InvalidStationIdError, safeErrorMessage } from "../mvg/errors";
import { createLogger } from "../utils/logger";
import { collectMessages, filterDepartures } from "./departureFilter";
import type { SensorEntryConfig } from "./sensorConfig";

export const NONE_ICON = "mdi:clock";
export const ATTRIBUTION = "Data provided by mvg.de";

const log = createLogger("sensor");

export interface DepartureSensorOptions {
  sensorId: string;
  station: Station;
  entry: SensorEntryConfig;
  now?: () => number;
}

const resolveTransportTypes = (products: string[] | null): TransportTypeKey[] | null =>
  products && products.length > 0 ? transportTypesForLabels(products) : null;

export class DepartureSensor {
  readonly id: string;
  readonly station: Station;
  private readonly entry: SensorEntryConfig;
  private readonly now: () => number;
  private departures: SensorDeparture[] = [];
  private messages: ServiceMessage[] = [];
  private lastUpdatedAt: string | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly client: MvgClient,
    options: DepartureSensorOptions,
  ) {
    this.id = options.sensorId;
    this.station = options.station;
    this.entry = options.entry;
    this.now = options.now ?? Date.now;
  }

  get name() {
    return this.entry.name ?? this.station.name;
  }

  async refresh(): Promise<SensorState> {
    let fetched: Departure[];
    try {
      fetched = await this.client.getDepartures(
        { stationId: this.station.id },
        {
          offset: this.entry.timeoffset,
          limit: this.entry.number,
          transportTypes: resolveTransportTypes(this.entry.products),
        },
      );
    } catch (error) {
      if (error instanceof InvalidStationIdError) {
        log.warn("Station id not understood, showing no departures", {
          sensor: this.id,
          stationId: error.stationId,
        });
        this.update([], []);
        return this.snapshot();
      }
      this.lastError = safeErrorMessage(error);
      throw error;
    }

    const now = this.now();
    this.update(
      filterDepartures(
        fetched,
        {
          destinations: this.entry.destinations,
          lines: this.entry.lines,
          timeOffsetMinutes: this.entry.timeoffset,
        },
        now,
      ),
      collectMessages(fetched),
      now,
    );
    return this.snapshot();
  }

  snapshot(): SensorState {
    const [next] = this.departures;
    return {
      sensorId: this.id,
      name: this.name,
      stationId: this.station.id,
      stationName: this.station.name,
      state: next ? next.time_in_mins : null,
      unit: "min",
      icon: next ? next.icon : NONE_ICON,
      attribution: ATTRIBUTION,
      attributes: next
        ? {
            ...next,
            departures: this.departures.map((departure) => ({ ...departure })),
            messages: this.messages.map((message) => ({ ...message })),
          }
        : null,
      lastUpdatedAt: this.lastUpdatedAt,
      lastError: this.lastError,
    };
  }

  private update(departures: SensorDeparture[], messages: ServiceMessage[], now: number = this.now()) {
    this.departures = departures;
    this.messages = messages;
    this.lastUpdatedAt = new Date(now).toISOString();
    this.lastError = null;
  }
}
