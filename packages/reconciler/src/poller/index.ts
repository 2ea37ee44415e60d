export * from "./clock";
export * from "./retry-policy";
export * from "./outcome";
export * from "./operation-poller";
export * from "./watchers";
