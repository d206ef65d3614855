import type { MessageId, NodeId } from "./index.js";

export type BulletinErrorCode =
  | "AUTHORIZATION_ERROR"
  | "DUPLICATE_ID"
  | "PEER_UNREACHABLE"
  | "RECONCILIATION_PARTIAL_FAILURE"
  | "PERSISTENCE_ERROR"
  | "NODE_OFFLINE"
  | "INVALID_MESSAGE"
  | "CONFIGURATION_ERROR";

/**
 * Base class for every error this project raises on purpose.
 */
export class BulletinError extends Error {
  constructor(
    message: string,
    readonly code: BulletinErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "BulletinError";
    if (Error.captureStackTrace) Error.captureStackTrace(this, new.target);
  }
}

/**
 * Missing, malformed or rejected credentials. Nothing was mutated.
 */
export class AuthorizationError extends BulletinError {
  constructor(message = "authentication required") {
    super(message, "AUTHORIZATION_ERROR");
    this.name = "AuthorizationError";
  }
}

/**
 * A locally-authored message reused an id already in the store. Points at an
 * id-generation bug.
 */
export class DuplicateIdError extends BulletinError {
  constructor(readonly messageId: MessageId) {
    super(`message id already exists: ${messageId}`, "DUPLICATE_ID");
    this.name = "DuplicateIdError";
  }
}

/**
 * Transient failure talking to a peer. Retried locally, never shown to clients.
 */
export class PeerUnreachableError extends BulletinError {
  constructor(
    readonly peerId: NodeId,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(`peer ${peerId} unreachable: ${message}`, "PEER_UNREACHABLE", options);
    this.name = "PeerUnreachableError";
  }
}

export type PeerFailure = {
  peerId: NodeId;
  error: Error;
};

/**
 * One or more peers could not be reconciled this round.
 */
export class ReconciliationPartialFailure extends BulletinError {
  constructor(readonly failures: readonly PeerFailure[]) {
    super(
      `reconciliation failed for ${failures.length} peer(s): ${failures.map((f) => f.peerId).join(", ")}`,
      "RECONCILIATION_PARTIAL_FAILURE"
    );
    this.name = "ReconciliationPartialFailure";
  }
}

/**
 * The message log could not durably record a write.
 */
export class PersistenceError extends BulletinError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PERSISTENCE_ERROR", options);
    this.name = "PersistenceError";
  }
}

/**
 * The node is simulating an outage and refuses replication traffic.
 */
export class NodeOfflineError extends BulletinError {
  constructor(readonly nodeId: NodeId) {
    super(`node ${nodeId} is offline`, "NODE_OFFLINE");
    this.name = "NodeOfflineError";
  }
}

export class InvalidMessageError extends BulletinError {
  constructor(message: string) {
    super(message, "INVALID_MESSAGE");
    this.name = "InvalidMessageError";
  }
}

export class ConfigurationError extends BulletinError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
