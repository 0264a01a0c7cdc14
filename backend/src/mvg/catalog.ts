import type { TransportTypeKey } from "@mvgboard/core";

export type { TransportTypeKey };

export const MVGAPI_DEFAULT_LIMIT = 10; // API defaults to 10, caps at 100

export interface TransportTypeInfo {
  key: TransportTypeKey;
  label: string;
  icon: string;
}

export const TRANSPORT_TYPE_KEYS = [
  "BAHN",
  "SBAHN",
  "UBAHN",
  "TRAM",
  "BUS",
  "REGIONAL_BUS",
  "SEV",
  "SCHIFF",
] as const satisfies readonly TransportTypeKey[];

export const TRANSPORT_TYPES: Readonly<Record<TransportTypeKey, Readonly<TransportTypeInfo>>> = Object.freeze({
  BAHN: { key: "BAHN", label: "Bahn", icon: "mdi:train" },
  SBAHN: { key: "SBAHN", label: "S-Bahn", icon: "mdi:subway-variant" },
  UBAHN: { key: "UBAHN", label: "U-Bahn", icon: "mdi:subway" },
  TRAM: { key: "TRAM", label: "Tram", icon: "mdi:tram" },
  BUS: { key: "BUS", label: "Bus", icon: "mdi:bus" },
  REGIONAL_BUS: { key: "REGIONAL_BUS", label: "Regionalbus", icon: "mdi:bus" },
  SEV: { key: "SEV", label: "SEV", icon: "mdi:taxi" },
  SCHIFF: { key: "SCHIFF", label: "Schiff", icon: "mdi:ferry" },
});

/** Every transport type except rail replacement service (SEV). */
export const defaultTransportTypes = (): TransportTypeKey[] => TRANSPORT_TYPE_KEYS.filter((key) => key !== "SEV");

export const isTransportTypeKey = (value: string): value is TransportTypeKey =>
  (TRANSPORT_TYPE_KEYS as readonly string[]).includes(value);

export const transportTypesForLabels = (labels: readonly string[]): TransportTypeKey[] =>
  TRANSPORT_TYPE_KEYS.filter((key) => labels.includes(TRANSPORT_TYPES[key].label));

export type ApiBase = "fib" | "zdm";

export type EndpointName = "location" | "nearby" | "departures" | "stationIds" | "stations" | "lines";

export interface EndpointInfo {
  base: ApiBase;
  path: string;
  args: readonly string[];
}

export const ENDPOINTS: Readonly<Record<EndpointName, Readonly<EndpointInfo>>> = Object.freeze({
  location: { base: "fib", path: "/locations", args: ["query"] },
  nearby: { base: "fib", path: "/stations/nearby", args: ["latitude", "longitude"] },
  departures: {
    base: "fib",
    path: "/departures",
    args: ["globalId", "limit", "offsetInMinutes", "transportTypes"],
  },
  stationIds: { base: "zdm", path: "/mvgStationGlobalIds", args: [] },
  stations: { base: "zdm", path: "/stations", args: [] },
  lines: { base: "zdm", path: "/lines", args: [] },
});
