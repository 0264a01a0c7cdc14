import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { SensorConfigError, loadSensorConfig, parseSensorConfig } from "../sensors/sensorConfig";

const expectConfigError = (pattern: RegExp) => (error: unknown) => {
  assert.ok(error instanceof SensorConfigError);
  assert.match(error.message, pattern);
  return true;
};

test("parseSensorConfig fills in defaults", () => {
  const parsed = parseSensorConfig({ nextdeparture: [{ station: "Hauptbahnhof" }] });
  assert.deepEqual(parsed, {
    nextdeparture: [
      {
        station: "Hauptbahnhof",
        destinations: [""],
        lines: [""],
        products: null,
        timeoffset: 0,
        number: 5,
      },
    ],
  });
});

test("parseSensorConfig splits comma-separated lists", () => {
  const parsed = parseSensorConfig({
    nextdeparture: [
      {
        station: "Universität, München",
        destinations: "Messestadt Ost, Klinikum Großhadern",
        lines: ["U3", "U6"],
        products: "U-Bahn,Bus",
        timeoffset: 4,
        number: 8,
        name: "Uni",
      },
    ],
  });
  const [entry] = parsed.nextdeparture;
  assert.deepEqual(entry?.destinations, ["Messestadt Ost", "Klinikum Großhadern"]);
  assert.deepEqual(entry?.lines, ["U3", "U6"]);
  assert.deepEqual(entry?.products, ["U-Bahn", "Bus"]);
  assert.equal(entry?.timeoffset, 4);
  assert.equal(entry?.number, 8);
  assert.equal(entry?.name, "Uni");
});

test("parseSensorConfig accepts numeric strings and a zero count", () => {
  const parsed = parseSensorConfig({ nextdeparture: [{ station: "Hauptbahnhof", timeoffset: "2", number: 0 }] });
  assert.equal(parsed.nextdeparture[0]?.timeoffset, 2);
  assert.equal(parsed.nextdeparture[0]?.number, 0);

  assert.throws(
    () => parseSensorConfig({ nextdeparture: [{ station: "Hauptbahnhof", number: "three" }] }),
    expectConfigError(/^Invalid sensor configuration: nextdeparture\.0\.number: /),
  );
});

test("parseSensorConfig rejects negative offsets and empty sensor lists", () => {
  assert.throws(
    () => parseSensorConfig({ nextdeparture: [{ station: "Hauptbahnhof", timeoffset: -1 }] }),
    expectConfigError(/^Invalid sensor configuration: nextdeparture\.0\.timeoffset: /),
  );
  assert.throws(() => parseSensorConfig({ nextdeparture: [] }), expectConfigError(/nextdeparture: /));
  assert.throws(() => parseSensorConfig([]), expectConfigError(/\(root\): /));
});

test("loadSensorConfig reads a JSON file", async (t) => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "mvgboard-"));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));

  const file = path.join(dir, "sensors.json");
  await fs.writeFile(file, JSON.stringify({ nextdeparture: [{ station: "de:09162:70", number: 3 }] }), "utf-8");
  const parsed = await loadSensorConfig(file);
  assert.equal(parsed.nextdeparture[0]?.station, "de:09162:70");
  assert.equal(parsed.nextdeparture[0]?.number, 3);

  const broken = path.join(dir, "broken.json");
  await fs.writeFile(broken, "{ nextdeparture", "utf-8");
  await assert.rejects(loadSensorConfig(broken), expectConfigError(/is not valid JSON$/));

  await assert.rejects(
    loadSensorConfig(path.join(dir, "missing.json")),
    expectConfigError(/^Could not read sensor configuration from /),
  );
});
