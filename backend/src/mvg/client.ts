import { z } from "zod";
import type { FetchLike } from "@mvgboard/core";
import { config } from "../config";
import {
  locationLabelSchema,
  locationPositionSchema,
  locationTypeSchema,
  rawDepartureSchema,
  recordListSchema,
  stationIdListSchema,
  stationLocationSchema,
  unknownListSchema,
  type Departure,
  type MvgLineRecord,
  type MvgRawDeparture,
  type MvgStationRecord,
  type Station,
  type StationId,
} from "../models/mvg";
import {
  ENDPOINTS,
  MVGAPI_DEFAULT_LIMIT,
  TRANSPORT_TYPES,
  defaultTransportTypes,
  type EndpointName,
  type TransportTypeKey,
} from "./catalog";
import { InvalidStationIdError, MvgApiError } from "./errors";
import { callApi, type QueryArgs } from "./http";

const STATION_ID_PATTERN = /^de:[0-9]{2,5}:[0-9]+/;
const STATION_PARSE_ERROR = "Bad API call: Could not parse station data";
const DEPARTURE_PARSE_ERROR = "Bad MVG API call: Invalid departure data";

const departureListSchema = z.array(rawDepartureSchema);

/**
 * Syntactic check for a global station id (VDV recommendation 432), e.g. `de:09162:70`.
 * The pattern is anchored at the start only.
 */
export const isValidStationIdFormat = (stationId: string) => STATION_ID_PATTERN.test(stationId);

const parseOrThrow = <S extends z.ZodTypeAny>(schema: S, value: unknown, message: string): z.infer<S> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new MvgApiError(message, { cause: result.error });
  }
  return result.data;
};

const toSeconds = (epochMs: number) => Math.trunc(epochMs / 1000);

export const normalizeDeparture = (departure: MvgRawDeparture): Departure => {
  const transportType = TRANSPORT_TYPES[departure.transportType];
  return {
    time: toSeconds(departure.realtimeDepartureTime),
    planned: toSeconds(departure.plannedDepartureTime),
    platform: departure.platform == null ? null : String(departure.platform),
    realtime: departure.realtime,
    line: departure.label,
    destination: departure.destination,
    type: transportType.label,
    icon: transportType.icon,
    cancelled: departure.cancelled,
    messages: departure.messages,
    stopPointGlobalId: departure.stopPointGlobalId,
  };
};

export interface MvgClientOptions {
  fibBaseUrl?: string;
  zdmBaseUrl?: string;
  fetchImpl?: FetchLike;
}

export interface DepartureQuery {
  /** Number of departures, the API defaults to 10 and caps at 100. */
  limit?: number;
  /** Offset in minutes, e.g. the walking time to the station. */
  offset?: number;
  /** `null` or omitted selects every type except rail replacement service. */
  transportTypes?: TransportTypeKey[] | null;
}

/** The station a sensor polls, passed explicitly instead of living on the client. */
export interface StationBinding {
  stationId: StationId;
}

/**
 * Stateless client for the MVG API at mvg.de. Stations can be looked up by
 * "name, place" (`Universität, München`) or by global station id (`de:09162:70`).
 *
 * Every method issues its own request; failures surface as {@link MvgApiError},
 * malformed station ids passed to {@link MvgClient.listDepartures} as
 * {@link InvalidStationIdError}.
 */
export class MvgClient {
  private readonly fibBaseUrl: string;
  private readonly zdmBaseUrl: string;
  private readonly fetchImpl: FetchLike | undefined;

  constructor(options: MvgClientOptions = {}) {
    this.fibBaseUrl = options.fibBaseUrl ?? config.mvgFibBaseUrl;
    this.zdmBaseUrl = options.zdmBaseUrl ?? config.mvgZdmBaseUrl;
    this.fetchImpl = options.fetchImpl;
  }

  get baseUrls() {
    return { fib: this.fibBaseUrl, zdm: this.zdmBaseUrl };
  }

  async isValidStationId(stationId: string, checkExistence = false): Promise<boolean> {
    if (!isValidStationIdFormat(stationId)) return false;
    if (!checkExistence) return true;
    const stationIds = parseOrThrow(stationIdListSchema, await this.call("stationIds"), STATION_PARSE_ERROR);
    return stationIds.includes(stationId);
  }

  async listStationIds(): Promise<StationId[]> {
    const stationIds = parseOrThrow(stationIdListSchema, await this.call("stationIds"), STATION_PARSE_ERROR);
    return [...stationIds].sort();
  }

  async listStations(): Promise<MvgStationRecord[]> {
    return parseOrThrow(recordListSchema, await this.call("stations"), STATION_PARSE_ERROR);
  }

  async listLines(): Promise<MvgLineRecord[]> {
    return parseOrThrow(recordListSchema, await this.call("lines"), STATION_PARSE_ERROR);
  }

  /**
   * Finds a station by "name, place" or global station id.
   *
   * With an id the search only supplies name, place and coordinates; the returned
   * id is always the one passed in. With a name the first `STATION` result wins.
   * Coordinates come from the first search result in both cases.
   */
  async findStation(query: string): Promise<Station | null> {
    const trimmed = query.trim();
    const results = parseOrThrow(
      unknownListSchema,
      await this.call("location", { query: trimmed }),
      STATION_PARSE_ERROR,
    );

    const [first] = results;
    if (first === undefined) return null;

    if (isValidStationIdFormat(trimmed)) {
      const label = parseOrThrow(locationLabelSchema, first, STATION_PARSE_ERROR);
      const position = parseOrThrow(locationPositionSchema, first, STATION_PARSE_ERROR);
      return {
        id: trimmed,
        name: label.name,
        place: label.place,
        latitude: position.latitude,
        longitude: position.longitude,
      };
    }

    for (const entry of results) {
      const location = parseOrThrow(locationTypeSchema, entry, STATION_PARSE_ERROR);
      if (location.type !== "STATION") continue;
      const station = parseOrThrow(stationLocationSchema, entry, STATION_PARSE_ERROR);
      // TODO: take coordinates from the matched entry once the first-result coupling is confirmed unintended
      const position = parseOrThrow(locationPositionSchema, first, STATION_PARSE_ERROR);
      return {
        id: station.globalId,
        name: station.name,
        place: station.place,
        latitude: position.latitude,
        longitude: position.longitude,
      };
    }

    return null;
  }

  /** Nearest station to the given coordinates (decimal degrees), or `null`. */
  async findNearby(latitude: number, longitude: number): Promise<Station | null> {
    const results = parseOrThrow(
      unknownListSchema,
      await this.call("nearby", { latitude, longitude }),
      STATION_PARSE_ERROR,
    );

    const [first] = results;
    if (first === undefined) return null;

    const station = parseOrThrow(stationLocationSchema, first, STATION_PARSE_ERROR);
    const position = parseOrThrow(locationPositionSchema, first, STATION_PARSE_ERROR);
    return {
      id: station.globalId,
      name: station.name,
      place: station.place,
      latitude: position.latitude,
      longitude: position.longitude,
    };
  }

  /** Next departures at a station, in the order the API returned them. */
  async listDepartures(stationId: StationId, query: DepartureQuery = {}): Promise<Departure[]> {
    if (!isValidStationIdFormat(stationId)) {
      throw new InvalidStationIdError(stationId);
    }

    const { limit = MVGAPI_DEFAULT_LIMIT, offset = 0 } = query;
    const transportTypes = query.transportTypes ?? defaultTransportTypes();
    const payload = await this.call("departures", {
      globalId: stationId,
      offsetInMinutes: offset,
      limit,
      transportTypes: transportTypes.join(","),
    });

    return parseOrThrow(departureListSchema, payload, DEPARTURE_PARSE_ERROR).map(normalizeDeparture);
  }

  async getDepartures(binding: StationBinding, query: DepartureQuery = {}): Promise<Departure[]> {
    return this.listDepartures(binding.stationId, query);
  }

  private async call(endpoint: EndpointName, args?: QueryArgs) {
    const { base, path, args: accepted } = ENDPOINTS[endpoint];
    const baseUrl = base === "fib" ? this.fibBaseUrl : this.zdmBaseUrl;
    const query: QueryArgs = Object.fromEntries(accepted.map((name) => [name, null]));
    return callApi(baseUrl, path, { ...query, ...args }, this.fetchImpl);
  }
}

export const createMvgClient = (options: MvgClientOptions = {}) => new MvgClient(options);
