export * from "./poller";
export * from "./translator";
export * from "./reader";
export * from "./managers";
export { KeyedMutex } from "./locking/keyed-mutex";
export type { LockLease } from "./locking/keyed-mutex";
export { ReconcilerFactory } from "./reconciler-factory";
export type { ReconcilerFactoryConfig, Reconcilers } from "./reconciler-factory";
