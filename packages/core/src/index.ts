export * from "./field";
export * from "./common";
export * from "./cluster";
export * from "./vpc";
export * from "./allow-list";
export * from "./read-replica";
export * from "./backup";
export * from "./integration";
export * from "./db-audit-logging";
export * from "./errors";
export * from "./engine-config";
export * from "./log";
export * from "./constants";

export const DBPLANE_VERSION = "0.1.0";
