import { z } from "zod";
import { TRANSPORT_TYPE_KEYS } from "../mvg/catalog";

export type StationId = string;

export interface Station {
  id: StationId;
  name: string;
  place: string;
  latitude: number;
  longitude: number;
}

export const locationTypeSchema = z.object({ type: z.string() }).passthrough();

export const locationPositionSchema = z
  .object({
    latitude: z.number(),
    longitude: z.number(),
  })
  .passthrough();

export const locationLabelSchema = z
  .object({
    name: z.string(),
    place: z.string(),
  })
  .passthrough();

export const stationLocationSchema = locationLabelSchema.extend({ globalId: z.string() });

export const messageSchema = z.object({}).catchall(z.unknown());

export type MvgMessage = z.infer<typeof messageSchema>;

export const rawDepartureSchema = z
  .object({
    realtimeDepartureTime: z.number(),
    plannedDepartureTime: z.number(),
    platform: z.union([z.string(), z.number()]).nullish(),
    realtime: z.boolean(),
    label: z.string(),
    destination: z.string(),
    transportType: z.enum(TRANSPORT_TYPE_KEYS),
    cancelled: z.boolean(),
    messages: z.array(messageSchema),
    stopPointGlobalId: z.string(),
  })
  .passthrough();

export type MvgRawDeparture = z.infer<typeof rawDepartureSchema>;

export interface Departure {
  time: number;
  planned: number;
  platform: string | null;
  realtime: boolean;
  line: string;
  destination: string;
  type: string;
  icon: string;
  cancelled: boolean;
  messages: MvgMessage[];
  stopPointGlobalId: string;
}

export const unknownListSchema = z.array(z.unknown());
export const stationIdListSchema = z.array(z.string());
export const recordListSchema = z.array(z.record(z.string(), z.unknown()));

export type MvgStationRecord = Record<string, unknown>;
export type MvgLineRecord = Record<string, unknown>;
