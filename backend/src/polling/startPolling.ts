import { config } from "../config";
import type { DepartureSensor } from "../sensors/departureSensor";
import { createLogger } from "../utils/logger";

const log = createLogger("polling");

export interface PollingJob {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  initialDelayMs?: number;
  timer?: NodeJS.Timeout;
  stopped?: boolean;
}

export const createSensorJobs = (sensors: readonly DepartureSensor[], intervalMs: number): PollingJob[] =>
  sensors.map((sensor) => ({
    name: `sensor:${sensor.id}`,
    intervalMs,
    initialDelayMs: 0,
    run: async () => {
      const state = await sensor.refresh();
      log.debug("Sensor refreshed", { sensor: sensor.id, state: state.state });
    },
  }));

const startJob = (job: PollingJob) => {
  const scheduleNext = (delayMs: number) => {
    if (job.stopped) return;
    job.timer = setTimeout(async () => {
      const start = Date.now();
      try {
        await job.run();
        log.debug("Polling job completed", { job: job.name, durationMs: Date.now() - start });
      } catch (error) {
        log.error("Polling job failed", { job: job.name, message: String(error) });
      } finally {
        scheduleNext(job.intervalMs);
      }
    }, Math.max(0, delayMs));
  };

  scheduleNext(job.initialDelayMs ?? 0);
};

export interface PollingBundle {
  jobs: PollingJob[];
}

export interface PollingOptions {
  intervalMs?: number;
}

export const initializePolling = (
  sensors: readonly DepartureSensor[],
  options: PollingOptions = {},
): PollingBundle => {
  const jobs = createSensorJobs(sensors, options.intervalMs ?? config.scanIntervalMs);
  jobs.forEach(startJob);
  return { jobs };
};

export const stopPolling = (bundle: PollingBundle) => {
  bundle.jobs.forEach((job) => {
    job.stopped = true;
    if (job.timer) clearTimeout(job.timer);
  });
};
