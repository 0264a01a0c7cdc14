import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig, parseDiagnosticsFlag } from "../config";

test("an explicit ENABLE_DIAGNOSTICS wins over NODE_ENV", () => {
  assert.equal(loadConfig({ ENABLE_DIAGNOSTICS: "false", NODE_ENV: "development" }).enableDiagnostics, false);
  assert.equal(loadConfig({ ENABLE_DIAGNOSTICS: "true", NODE_ENV: "production" }).enableDiagnostics, true);
  assert.equal(parseDiagnosticsFlag(" FALSE ", undefined), false);
});

test("diagnostics default to on outside production", () => {
  assert.equal(loadConfig({}).enableDiagnostics, true);
  assert.equal(loadConfig({ NODE_ENV: "production" }).enableDiagnostics, false);
  assert.equal(loadConfig({ ENABLE_DIAGNOSTICS: "maybe", NODE_ENV: "production" }).enableDiagnostics, false);
});

test("loadConfig applies defaults for missing or invalid values", () => {
  const loaded = loadConfig({ SCAN_INTERVAL_MS: "-5", LOG_LEVEL: "WARN" });
  assert.equal(loaded.port, 4000);
  assert.equal(loaded.scanIntervalMs, 30_000);
  assert.equal(loaded.logLevel, "warn");
  assert.equal(loaded.mvgFibBaseUrl, "https://www.mvg.de/api/bgw-pt/v3");
  assert.equal(loaded.sensorsConfigPath, "sensors.json");
});
