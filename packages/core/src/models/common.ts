export type IsoTimestamp = string;

export type TransportTypeKey =
  | "BAHN"
  | "SBAHN"
  | "UBAHN"
  | "TRAM"
  | "BUS"
  | "REGIONAL_BUS"
  | "SEV"
  | "SCHIFF";

export interface MvgboardErrorResponse {
  error: string;
  message?: string;
}
