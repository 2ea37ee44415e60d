export * from "./region-order";
export * from "./read-purpose";
export * from "./context";
export * from "./cluster-reader";
export * from "./read-replica-reader";
export * from "./network-reader";
export * from "./resource-reader";
export * from "./drift";
