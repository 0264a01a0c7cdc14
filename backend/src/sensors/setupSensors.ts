import type { MvgClient } from "../mvg/client";
import { createLogger } from "../utils/logger";
import { DepartureSensor } from "./departureSensor";
import { SensorConfigError, type SensorEntryConfig } from "./sensorConfig";

const log = createLogger("setup");

export const toSensorId = (name: string) =>
  name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "") || "sensor";

const uniqueId = (base: string, taken: Set<string>) => {
  let candidate = base;
  let suffix = 2;
  while (taken.has(candidate)) {
    candidate = `${base}_${suffix}`;
    suffix += 1;
  }
  taken.add(candidate);
  return candidate;
};

export interface SetupOptions {
  now?: () => number;
}

/** Resolves every configured station and builds one sensor per entry, in order. */
export const setupSensors = async (
  client: MvgClient,
  entries: readonly SensorEntryConfig[],
  options: SetupOptions = {},
): Promise<DepartureSensor[]> => {
  const taken = new Set<string>();
  const sensors: DepartureSensor[] = [];

  for (const entry of entries) {
    const station = await client.findStation(entry.station);
    if (!station) {
      throw new SensorConfigError(`Invalid station name: ${entry.station}`);
    }
    const sensorId = uniqueId(toSensorId(entry.name ?? station.name), taken);
    log.info("Sensor configured", { sensor: sensorId, stationId: station.id, station: station.name });
    sensors.push(new DepartureSensor(client, { sensorId, station, entry, now: options.now }));
  }

  return sensors;
};
