import { execFileSync } from "node:child_process";
import path from "node:path";
import { z } from "zod";
import type { FetchLike } from "@mvgboard/core";
import type { Departure, MvgLineRecord, MvgStationRecord, Station, StationId } from "../models/mvg";
import { TRANSPORT_TYPE_KEYS } from "./catalog";
import { MvgClient } from "./client";
import { InvalidStationIdError, MvgApiError, safeErrorMessage } from "./errors";

const WORKER_PATH = path.join(__dirname, `blockingWorker${path.extname(__filename)}`);
const WORKER_MAX_BUFFER = 64 * 1024 * 1024;
const LOADER_FLAGS = new Set(["--import", "--require", "-r", "--loader", "--experimental-loader", "--conditions", "-C"]);

const blockingRequestSchema = z.discriminatedUnion("operation", [
  z.object({ operation: z.literal("stationIds") }),
  z.object({ operation: z.literal("stations") }),
  z.object({ operation: z.literal("lines") }),
  z.object({
    operation: z.literal("isValidStationId"),
    stationId: z.string(),
    checkExistence: z.boolean().optional(),
  }),
  z.object({ operation: z.literal("station"), query: z.string() }),
  z.object({ operation: z.literal("nearby"), latitude: z.number(), longitude: z.number() }),
  z.object({
    operation: z.literal("departures"),
    stationId: z.string(),
    limit: z.number().int().optional(),
    offset: z.number().int().optional(),
    transportTypes: z.array(z.enum(TRANSPORT_TYPE_KEYS)).nullish(),
  }),
]);

export type BlockingRequest = z.infer<typeof blockingRequestSchema>;

export interface BlockingResults {
  stationIds: StationId[];
  stations: MvgStationRecord[];
  lines: MvgLineRecord[];
  isValidStationId: boolean;
  station: Station | null;
  nearby: Station | null;
  departures: Departure[];
}

const envelopeSchema = z.object({
  request: blockingRequestSchema,
  fibBaseUrl: z.string().optional(),
  zdmBaseUrl: z.string().optional(),
});

export type BlockingEnvelope = z.infer<typeof envelopeSchema>;

const workerOutputSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), result: z.unknown() }),
  z.object({
    ok: z.literal(false),
    error: z.object({ name: z.string(), message: z.string(), stationId: z.string().optional() }),
  }),
]);

export type WorkerOutput = z.infer<typeof workerOutputSchema>;

export const runOperation = async (client: MvgClient, request: BlockingRequest): Promise<unknown> => {
  switch (request.operation) {
    case "stationIds":
      return client.listStationIds();
    case "stations":
      return client.listStations();
    case "lines":
      return client.listLines();
    case "isValidStationId":
      return client.isValidStationId(request.stationId, request.checkExistence);
    case "station":
      return client.findStation(request.query);
    case "nearby":
      return client.findNearby(request.latitude, request.longitude);
    case "departures":
      return client.listDepartures(request.stationId, {
        limit: request.limit,
        offset: request.offset,
        transportTypes: request.transportTypes,
      });
  }
};

/** Runs one request inside the worker process and packs the outcome for the parent. */
export const executeEnvelope = async (raw: string | undefined, fetchImpl?: FetchLike): Promise<WorkerOutput> => {
  try {
    const envelope = envelopeSchema.parse(JSON.parse(raw ?? ""));
    const client = new MvgClient({
      fibBaseUrl: envelope.fibBaseUrl,
      zdmBaseUrl: envelope.zdmBaseUrl,
      fetchImpl,
    });
    return { ok: true, result: await runOperation(client, envelope.request) };
  } catch (error) {
    if (error instanceof InvalidStationIdError) {
      return { ok: false, error: { name: error.name, message: error.message, stationId: error.stationId } };
    }
    const name = error instanceof MvgApiError ? error.name : "WorkerError";
    return { ok: false, error: { name, message: safeErrorMessage(error) } };
  }
};

/** Turns worker stdout back into a result, or into the error the worker reported. */
export const decodeWorkerOutput = (stdout: string): unknown => {
  const lines = stdout.trim().split("\n");
  let payload: unknown;
  try {
    payload = JSON.parse(lines[lines.length - 1] ?? "");
  } catch (error) {
    throw new MvgApiError("Blocking call returned an unreadable result", { cause: error });
  }
  const parsed = workerOutputSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MvgApiError("Blocking call returned an unreadable result", { cause: parsed.error });
  }
  const output = parsed.data;
  if (output.ok) return output.result;
  if (output.error.name === "InvalidStationIdError") {
    throw new InvalidStationIdError(output.error.stationId ?? "");
  }
  throw new MvgApiError(output.error.message);
};

/** Loader flags (tsx and friends) the worker needs to load the same sources as the parent. */
export const loaderArgs = (execArgv: readonly string[]): string[] => {
  const kept: string[] = [];
  for (let index = 0; index < execArgv.length; index += 1) {
    const arg = execArgv[index] ?? "";
    const [flag = ""] = arg.split("=");
    if (!LOADER_FLAGS.has(flag)) continue;
    kept.push(arg);
    const value = execArgv[index + 1];
    if (!arg.includes("=") && value !== undefined) {
      kept.push(value);
      index += 1;
    }
  }
  return kept;
};

export interface BlockingOptions {
  fibBaseUrl?: string;
  zdmBaseUrl?: string;
  timeoutMs?: number;
}

/**
 * Synchronous counterpart of the {@link MvgClient} methods for callers without an
 * event loop to await on. Blocks the calling thread until a child process has
 * run the request to completion.
 */
export const runBlocking = <K extends keyof BlockingResults>(
  request: BlockingRequest & { operation: K },
  options: BlockingOptions = {},
): BlockingResults[K] => {
  const envelope: BlockingEnvelope = {
    request,
    fibBaseUrl: options.fibBaseUrl,
    zdmBaseUrl: options.zdmBaseUrl,
  };

  let stdout: string;
  try {
    stdout = execFileSync(process.execPath, [...loaderArgs(process.execArgv), WORKER_PATH, JSON.stringify(envelope)], {
      encoding: "utf-8",
      env: { ...process.env, LOG_LEVEL: "error" },
      maxBuffer: WORKER_MAX_BUFFER,
      timeout: options.timeoutMs,
      stdio: ["ignore", "pipe", "inherit"],
    });
  } catch (error) {
    throw new MvgApiError(`Blocking call failed: ${safeErrorMessage(error)}`, { cause: error });
  }

  return decodeWorkerOutput(stdout) as BlockingResults[K];
};

export const mvgSync = {
  stationIds: (options?: BlockingOptions) => runBlocking({ operation: "stationIds" }, options),
  stations: (options?: BlockingOptions) => runBlocking({ operation: "stations" }, options),
  lines: (options?: BlockingOptions) => runBlocking({ operation: "lines" }, options),
  station: (query: string, options?: BlockingOptions) => runBlocking({ operation: "station", query }, options),
  nearby: (latitude: number, longitude: number, options?: BlockingOptions) =>
    runBlocking({ operation: "nearby", latitude, longitude }, options),
  departures: (
    stationId: StationId,
    query: Omit<Extract<BlockingRequest, { operation: "departures" }>, "operation" | "stationId"> = {},
    options?: BlockingOptions,
  ) => runBlocking({ operation: "departures", stationId, ...query }, options),
};
