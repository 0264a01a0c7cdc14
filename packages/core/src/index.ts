export * from "./models/common";
export * from "./models/sensors";
export * from "./api/types";
export * from "./api/endpoints";
