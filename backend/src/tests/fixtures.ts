import type { FetchLike } from "@mvgboard/core";
import { MvgClient } from "../mvg/client";

export const FIB_BASE = "https://fib.test/api/bgw-pt/v3";
export const ZDM_BASE = "https://zdm.test/.rest/zdm";

export interface FakeResponse {
  status?: number;
  contentType?: string;
  body?: unknown;
  rawBody?: string;
  error?: Error;
}

export const createFakeFetch = (handler: (url: URL) => FakeResponse) => {
  const calls: URL[] = [];
  const fetchImpl: FetchLike = async (input) => {
    const url = new URL(input);
    calls.push(url);
    const reply = handler(url);
    if (reply.error) throw reply.error;
    return new Response(reply.rawBody ?? JSON.stringify(reply.body ?? null), {
      status: reply.status ?? 200,
      headers: { "Content-Type": reply.contentType ?? "application/json" },
    });
  };
  return { calls, fetchImpl };
};

export const createTestClient = (handler: (url: URL) => FakeResponse) => {
  const fake = createFakeFetch(handler);
  const client = new MvgClient({ fibBaseUrl: FIB_BASE, zdmBaseUrl: ZDM_BASE, fetchImpl: fake.fetchImpl });
  return { client, calls: fake.calls };
};

export const hauptbahnhof = {
  type: "STATION",
  globalId: "de:09162:6",
  name: "Hauptbahnhof",
  place: "München",
  latitude: 48.14003,
  longitude: 11.56107,
};

export const universitaet = {
  type: "STATION",
  globalId: "de:09162:70",
  name: "Universität",
  place: "München",
  latitude: 48.15007,
  longitude: 11.581,
};

export const rawDeparture = (overrides: Record<string, unknown> = {}) => ({
  plannedDepartureTime: 1668524460000,
  realtime: true,
  delayInMinutes: 2,
  realtimeDepartureTime: 1668524580000,
  transportType: "UBAHN",
  label: "U3",
  divaId: "010U3",
  network: "swm",
  trainType: "",
  destination: "Fürstenried West",
  cancelled: false,
  sev: false,
  platform: 2,
  messages: [],
  bannerHash: "",
  occupancy: "LOW",
  stopPointGlobalId: "de:09162:70:2:2",
  ...overrides,
});
