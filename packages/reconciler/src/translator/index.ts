export * from "./validators";
export * from "./cross-reference";
export * from "./cluster-translator";
export * from "./read-replica-translator";
export * from "./network-translator";
export * from "./backup-translator";
export * from "./integration-translator";
