export type NodeId = string;
export type MessageId = string;

/**
 * Lamport timestamp. Ordered by `counter`, then `nodeId`.
 */
export type LogicalTimestamp = {
  counter: number;
  nodeId: NodeId;
};

/**
 * A board message. Never edited once created: a given `id` carries the same
 * fields on every node that holds it.
 */
export type Message = {
  id: MessageId;
  author: string;
  content: string;
  logicalTs: LogicalTimestamp;
  originNode: NodeId;
  /** Wall-clock creation time (ISO-8601). Diagnostic only. */
  createdAt: string;
};

export type Principal = {
  username: string;
};

/**
 * Capability check in front of the write path. Throws `AuthorizationError`
 * when the token is missing or not accepted.
 */
export interface AuthGate {
  authorize(token: string | undefined): Principal;
}

export * from "./clock.js";
export * from "./codec.js";
export * from "./errors.js";
export * from "./ids.js";
export * from "./log.js";
export * from "./logger.js";
export * from "./order.js";
export * from "./store.js";
