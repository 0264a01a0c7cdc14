import test from "node:test";
import assert from "node:assert/strict";
import { sensorConfigSchema, SensorConfigError } from "../sensors/sensorConfig";
import { setupSensors, toSensorId } from "../sensors/setupSensors";
import { createTestClient, hauptbahnhof, universitaet } from "./fixtures";

const searchHandler = (url: URL) => {
  const query = url.searchParams.get("query") ?? "";
  if (query.startsWith("Hauptbahnhof") || query === "de:09162:6") return { body: [hauptbahnhof] };
  if (query.startsWith("Universität")) return { body: [universitaet] };
  return { body: [] };
};

test("toSensorId builds ascii slugs", () => {
  assert.equal(toSensorId("Münchner Freiheit"), "munchner_freiheit");
  assert.equal(toSensorId("  U3 -> Moosach! "), "u3_moosach");
  assert.equal(toSensorId("???"), "sensor");
});

test("setupSensors resolves each station in order", async () => {
  const { client, calls } = createTestClient(searchHandler);
  const { nextdeparture } = sensorConfigSchema.parse({
    nextdeparture: [
      { station: "Universität, München" },
      { station: "de:09162:6", name: "Hbf Gleis 1" },
      { station: "Hauptbahnhof" },
      { station: "Hauptbahnhof, München" },
    ],
  });

  const sensors = await setupSensors(client, nextdeparture);

  assert.deepEqual(
    sensors.map((sensor) => [sensor.id, sensor.name, sensor.station.id]),
    [
      ["universitat", "Universität", "de:09162:70"],
      ["hbf_gleis_1", "Hbf Gleis 1", "de:09162:6"],
      ["hauptbahnhof", "Hauptbahnhof", "de:09162:6"],
      ["hauptbahnhof_2", "Hauptbahnhof", "de:09162:6"],
    ],
  );
  assert.deepEqual(
    calls.map((url) => url.searchParams.get("query")),
    ["Universität, München", "de:09162:6", "Hauptbahnhof", "Hauptbahnhof, München"],
  );
});

test("setupSensors fails on a station it cannot find", async () => {
  const { client } = createTestClient(searchHandler);
  const { nextdeparture } = sensorConfigSchema.parse({ nextdeparture: [{ station: "Atlantis" }] });
  await assert.rejects(setupSensors(client, nextdeparture), (error: unknown) => {
    assert.ok(error instanceof SensorConfigError);
    assert.equal(error.message, "Invalid station name: Atlantis");
    return true;
  });
});
