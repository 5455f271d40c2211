export * from "./availability";
export * from "./station-ids";
export * from "./time";
export * from "./types";
export * from "./zone";
