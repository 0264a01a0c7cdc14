import dotenv from "dotenv";

dotenv.config();

const DEFAULT_PORT = 4000;
const DEFAULT_MVG_FIB_BASE_URL = "https://www.mvg.de/api/bgw-pt/v3";
const DEFAULT_MVG_ZDM_BASE_URL = "https://www.mvg.de/.rest/zdm";
const DEFAULT_SENSORS_CONFIG = "sensors.json";
const DEFAULT_SCAN_INTERVAL_MS = 30_000;
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  port: number;
  mvgFibBaseUrl: string;
  mvgZdmBaseUrl: string;
  sensorsConfigPath: string;
  scanIntervalMs: number;
  logLevel: LogLevel;
  enableDiagnostics: boolean;
}

export const normalizeLogLevel = (value?: string): LogLevel => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
};

export const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

export const parseDiagnosticsFlag = (value: string | undefined, nodeEnv: string | undefined): boolean => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  return nodeEnv !== "production";
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: parsePositiveNumber(env.PORT, DEFAULT_PORT),
  mvgFibBaseUrl: env.MVG_FIB_BASE_URL ?? DEFAULT_MVG_FIB_BASE_URL,
  mvgZdmBaseUrl: env.MVG_ZDM_BASE_URL ?? DEFAULT_MVG_ZDM_BASE_URL,
  sensorsConfigPath: env.SENSORS_CONFIG ?? DEFAULT_SENSORS_CONFIG,
  scanIntervalMs: parsePositiveNumber(env.SCAN_INTERVAL_MS, DEFAULT_SCAN_INTERVAL_MS),
  logLevel: normalizeLogLevel(env.LOG_LEVEL),
  enableDiagnostics: parseDiagnosticsFlag(env.ENABLE_DIAGNOSTICS, env.NODE_ENV),
});

export const config: AppConfig = loadConfig();
