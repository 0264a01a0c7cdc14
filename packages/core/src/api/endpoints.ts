import type { FetchLike, RequestInitWithSignal } from "./types";
import type { HealthResponse, SensorListResponse, SensorState } from "../models/sensors";

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

export const buildUrl = (baseUrl: string, path: string, query?: Record<string, string | number | undefined>) => {
  const url = new URL(`${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`);
  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value === undefined || value === null) return;
      url.searchParams.set(key, String(value));
    });
  }
  return url.toString();
};

const handleJson = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    throw new Error(`mvgboard API request failed (${response.status})`);
  }
  return (await response.json()) as T;
};

export interface ClientInit extends RequestInitWithSignal {
  fetchImpl?: FetchLike;
}

const send = async <T>(url: string, init: ClientInit = {}): Promise<T> => {
  const { fetchImpl = fetch, ...rest } = init;
  const response = await fetchImpl(url, { ...rest });
  return handleJson<T>(response);
};

export const fetchHealth = async (baseUrl: string, init?: ClientInit): Promise<HealthResponse> =>
  send<HealthResponse>(buildUrl(baseUrl, "/api/health"), init);

export const fetchSensors = async (baseUrl: string, init?: ClientInit): Promise<SensorState[]> => {
  const payload = await send<SensorListResponse>(buildUrl(baseUrl, "/api/sensors"), init);
  return payload.sensors;
};

export const fetchSensor = async (
  baseUrl: string,
  sensorId: string,
  init?: ClientInit,
): Promise<SensorState> =>
  send<SensorState>(buildUrl(baseUrl, `/api/sensors/${encodeURIComponent(sensorId)}`), init);
