import cors from "cors";
import express, { type Response } from "express";
import type { HealthResponse, MvgboardErrorResponse, SensorListResponse } from "@mvgboard/core";
import type { AppConfig } from "./config";
import { isTransportTypeKey } from "./mvg/catalog";
import type { MvgClient } from "./mvg/client";
import { InvalidStationIdError, MvgApiError } from "./mvg/errors";
import type { DepartureSensor } from "./sensors/departureSensor";
import { logger } from "./utils/logger";

export interface AppDependencies {
  sensors: readonly DepartureSensor[];
  client: MvgClient;
  config: Pick<AppConfig, "scanIntervalMs" | "enableDiagnostics">;
}

const parseNumberParam = (value: unknown): number | undefined => {
  if (typeof value !== "string" || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parseStringList = (value: unknown): string[] => {
  if (typeof value !== "string") return [];
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
};

const sendError = (res: Response, status: number, body: MvgboardErrorResponse) => res.status(status).json(body);

const sendUpstreamFailure = (res: Response, context: string, error: unknown) => {
  if (error instanceof InvalidStationIdError) {
    return sendError(res, 400, { error: "invalid_station_id", message: error.message });
  }
  if (error instanceof MvgApiError) {
    logger.warn(`${context} failed upstream`, { message: error.message });
    return sendError(res, 502, { error: "upstream_error", message: error.message });
  }
  logger.error(`${context} failed`, { message: String(error) });
  return sendError(res, 500, { error: "internal_error", message: `Unable to complete ${context.toLowerCase()}` });
};

export const createApp = ({ sensors, client, config }: AppDependencies) => {
  const app = express();

  app.use(cors());

  app.get("/api/health", (_req, res) => {
    const { fib, zdm } = client.baseUrls;
    const body: HealthResponse = {
      status: "ok",
      timestamp: new Date().toISOString(),
      mvgFibBaseUrl: fib,
      mvgZdmBaseUrl: zdm,
      sensors: sensors.length,
      scanIntervalMs: config.scanIntervalMs,
    };
    res.json(body);
  });

  app.get("/api/sensors", (_req, res) => {
    const body: SensorListResponse = { sensors: sensors.map((sensor) => sensor.snapshot()) };
    res.json(body);
  });

  app.get("/api/sensors/:sensorId", (req, res) => {
    const sensor = sensors.find((candidate) => candidate.id === req.params.sensorId);
    if (!sensor) {
      return sendError(res, 404, { error: "not_found", message: `Unknown sensor ${req.params.sensorId}` });
    }
    return res.json(sensor.snapshot());
  });

  if (config.enableDiagnostics) {
    app.get("/api/dev/stations/search", async (req, res) => {
      const query = typeof req.query.query === "string" ? req.query.query : "";
      if (!query.trim()) {
        return sendError(res, 400, { error: "bad_request", message: "query is required" });
      }
      try {
        return res.json({ station: await client.findStation(query) });
      } catch (error) {
        return sendUpstreamFailure(res, "Station search", error);
      }
    });

    app.get("/api/dev/stations/nearby", async (req, res) => {
      const lat = parseNumberParam(req.query.lat);
      const lng = parseNumberParam(req.query.lng);
      if (lat === undefined || lng === undefined) {
        return sendError(res, 400, { error: "bad_request", message: "lat and lng are required" });
      }
      try {
        return res.json({ station: await client.findNearby(lat, lng) });
      } catch (error) {
        return sendUpstreamFailure(res, "Nearby lookup", error);
      }
    });

    app.get("/api/dev/departures/:stationId", async (req, res) => {
      const limit = parseNumberParam(req.query.limit);
      const offset = parseNumberParam(req.query.offset);
      const requestedTypes = parseStringList(req.query.transportTypes);
      const transportTypes = requestedTypes.filter(isTransportTypeKey);
      if (transportTypes.length !== requestedTypes.length) {
        return sendError(res, 400, { error: "bad_request", message: "unknown transport type" });
      }
      try {
        const departures = await client.listDepartures(req.params.stationId, {
          limit,
          offset,
          transportTypes: transportTypes.length > 0 ? transportTypes : null,
        });
        return res.json({ departures });
      } catch (error) {
        return sendUpstreamFailure(res, "Departure lookup", error);
      }
    });
  }

  return app;
};
