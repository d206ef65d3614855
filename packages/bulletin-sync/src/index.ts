export * from "./failure.js";
export * from "./node.js";
export * from "./peers.js";
export * from "./pool.js";
export * from "./reconcile.js";
export * from "./replication.js";
export * from "./state.js";
export * from "./timing.js";
export * from "./transport.js";
export * from "./types.js";
