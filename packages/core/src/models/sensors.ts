import type { IsoTimestamp } from "./common";

/** Service message attached to a departure by the MVG API, passed through untouched. */
export type ServiceMessage = Record<string, unknown>;

export interface SensorDeparture {
  destination: string;
  line: string;
  type: string;
  cancelled: boolean;
  icon: string;
  platform: string | null;
  time_in_mins: number;
}

export interface SensorAttributes extends SensorDeparture {
  departures: SensorDeparture[];
  messages: ServiceMessage[];
}

export interface SensorState {
  sensorId: string;
  name: string;
  stationId: string;
  stationName: string;
  /** Minutes until the next matching departure, `null` when nothing matches. */
  state: number | null;
  unit: "min";
  icon: string;
  attribution: string;
  attributes: SensorAttributes | null;
  lastUpdatedAt: IsoTimestamp | null;
  lastError: string | null;
}

export interface SensorListResponse {
  sensors: SensorState[];
}

export interface HealthResponse {
  status: "ok";
  timestamp: IsoTimestamp;
  mvgFibBaseUrl: string;
  mvgZdmBaseUrl: string;
  sensors: number;
  scanIntervalMs: number;
}
