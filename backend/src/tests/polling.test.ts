import test from "node:test";
import assert from "node:assert/strict";
import { initializePolling, stopPolling } from "../polling/startPolling";
import { DepartureSensor } from "../sensors/departureSensor";
import { sensorEntrySchema } from "../sensors/sensorConfig";
import { createTestClient, hauptbahnhof, rawDeparture } from "./fixtures";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test("polling keeps refreshing after a failed run and stops on request", async () => {
  let requests = 0;
  let reachedThird: () => void = () => undefined;
  const thirdRequest = new Promise<void>((resolve) => {
    reachedThird = resolve;
  });

  const { client } = createTestClient(() => {
    requests += 1;
    if (requests === 3) reachedThird();
    if (requests === 1) return { status: 500, body: {} };
    return { body: [rawDeparture({ realtimeDepartureTime: Date.now() + 5 * 60_000 })] };
  });
  const sensor = new DepartureSensor(client, {
    sensorId: "hauptbahnhof",
    station: { ...hauptbahnhof, id: hauptbahnhof.globalId },
    entry: sensorEntrySchema.parse({ station: "Hauptbahnhof" }),
  });

  const polling = initializePolling([sensor], { intervalMs: 5 });
  await thirdRequest;
  stopPolling(polling);
  await sleep(20);
  const settled = requests;
  await sleep(40);

  assert.equal(requests, settled);
  assert.equal(polling.jobs.length, 1);
  assert.equal(polling.jobs[0]?.name, "sensor:hauptbahnhof");
  assert.notEqual(sensor.snapshot().lastUpdatedAt, null);
});
