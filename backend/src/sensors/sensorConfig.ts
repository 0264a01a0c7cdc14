import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

export class SensorConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SensorConfigError";
  }
}

// A list, or a comma-separated string whose members are trimmed.
const csvList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : value.split(",").map((entry) => entry.trim())));

export const sensorEntrySchema = z.object({
  station: z.string().trim().min(1),
  destinations: csvList.default([""]),
  lines: csvList.default([""]),
  products: csvList.nullable().default(null),
  timeoffset: z.coerce.number().int().nonnegative().default(0),
  number: z.coerce.number().int().nonnegative().default(5),
  name: z.string().optional(),
});

export const sensorConfigSchema = z.object({
  nextdeparture: z.array(sensorEntrySchema).min(1),
});

export type SensorEntryConfig = z.infer<typeof sensorEntrySchema>;
export type SensorConfig = z.infer<typeof sensorConfigSchema>;

const describeIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");

export const parseSensorConfig = (raw: unknown): SensorConfig => {
  const result = sensorConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new SensorConfigError(`Invalid sensor configuration: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
};

export const loadSensorConfig = async (filePath: string): Promise<SensorConfig> => {
  const resolved = path.resolve(process.cwd(), filePath);
  let contents: string;
  try {
    contents = await fs.readFile(resolved, "utf-8");
  } catch (error) {
    throw new SensorConfigError(`Could not read sensor configuration from ${resolved}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new SensorConfigError(`Sensor configuration at ${resolved} is not valid JSON`, { cause: error });
  }
  return parseSensorConfig(raw);
};
