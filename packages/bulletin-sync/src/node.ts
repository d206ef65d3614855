import type { AuthGate, Logger, Message, MessageLog, NodeId } from "@bulletin/interface";
import {
  AuthorizationError,
  InvalidMessageError,
  LamportClock,
  MessageStore,
  NodeOfflineError,
  assertNodeId,
  formatMessageId,
  silentLogger,
} from "@bulletin/interface";

import { FailureSimulator } from "./failure.js";
import { PeerRegistry } from "./peers.js";
import type { ReconciliationReport } from "./reconcile.js";
import { ReconciliationService } from "./reconcile.js";
import type { PushOutcome } from "./replication.js";
import { ReplicationManager } from "./replication.js";
import type { NodeMode } from "./state.js";
import { NodeState } from "./state.js";
import type { RetryPolicy, Sleep } from "./timing.js";
import type { PeerEndpoint, PeerTransport } from "./transport.js";
import type { PeerConfig, PeerEntry, PushAck } from "./types.js";

export const MAX_CONTENT_LENGTH = 4096;

export type BulletinNodeOptions = {
  nodeId: NodeId;
  peers: readonly PeerConfig[];
  log: MessageLog;
  transport: PeerTransport;
  auth: AuthGate;
  logger?: Logger;
  failureThreshold?: number;
  retry?: Partial<RetryPolicy>;
  replicationConcurrency?: number;
  pushTimeoutMs?: number;
  pullTimeoutMs?: number;
  /** Periodic anti-entropy interval; 0 or unset disables it. */
  reconcileIntervalMs?: number;
  sleep?: Sleep;
  now?: () => Date;
  onPushOutcome?: (outcome: PushOutcome) => void;
};

export type PostMessageInput = {
  token: string | undefined;
  content: unknown;
  /** Optional; must match the token's user when given. */
  author?: string;
};

export type NodeStatus = {
  nodeId: NodeId;
  mode: NodeMode;
  messages: number;
  clock: number;
  pendingPushes: number;
  peers: PeerEntry[];
};

/**
 * One board node: store, clock, peers, replication, reconciliation and the
 * outage switch wired together. Also serves the node-to-node endpoint.
 */
export class BulletinNode implements PeerEndpoint {
  readonly nodeId: NodeId;
  readonly clock: LamportClock;
  readonly store: MessageStore;
  readonly registry: PeerRegistry;
  readonly state: NodeState;
  readonly replication: ReplicationManager;
  readonly reconciliation: ReconciliationService;
  readonly failures: FailureSimulator;

  private readonly log: MessageLog;
  private readonly auth: AuthGate;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private closed = false;

  private constructor(opts: BulletinNodeOptions, clock: LamportClock, store: MessageStore, logger: Logger) {
    this.nodeId = opts.nodeId;
    this.clock = clock;
    this.store = store;
    this.log = opts.log;
    this.auth = opts.auth;
    this.logger = logger;
    this.now = opts.now ?? (() => new Date());

    this.state = new NodeState(opts.nodeId);
    this.registry = new PeerRegistry(opts.nodeId, opts.peers, {
      failureThreshold: opts.failureThreshold,
      logger: logger.child("peers"),
    });
    this.replication = new ReplicationManager({
      state: this.state,
      registry: this.registry,
      transport: opts.transport,
      retry: opts.retry,
      concurrency: opts.replicationConcurrency,
      pushTimeoutMs: opts.pushTimeoutMs,
      sleep: opts.sleep,
      logger: logger.child("replication"),
      onPushOutcome: opts.onPushOutcome,
    });
    this.reconciliation = new ReconciliationService({
      state: this.state,
      registry: this.registry,
      store,
      transport: opts.transport,
      pullTimeoutMs: opts.pullTimeoutMs,
      pushTimeoutMs: opts.pushTimeoutMs,
      logger: logger.child("reconcile"),
    });
    this.failures = new FailureSimulator(this.state, this.reconciliation, logger.child("failure"));
  }

  static async create(opts: BulletinNodeOptions): Promise<BulletinNode> {
    assertNodeId(opts.nodeId);
    if (opts.log.nodeId !== opts.nodeId) {
      throw new Error(`message log belongs to ${opts.log.nodeId}, not ${opts.nodeId}`);
    }
    const logger = (opts.logger ?? silentLogger).child(opts.nodeId);
    const clock = new LamportClock(opts.nodeId);
    const store = await MessageStore.open({ log: opts.log, clock, logger: logger.child("store") });
    const node = new BulletinNode(opts, clock, store, logger);

    const interval = opts.reconcileIntervalMs ?? 0;
    if (interval > 0) node.reconciliation.start(interval);
    return node;
  }

  /**
   * Client write: authorize, stamp, store durably, then hand to replication.
   * Resolves once the message is stored locally; replication runs after.
   */
  async postMessage(input: PostMessageInput): Promise<Message> {
    const principal = this.auth.authorize(input.token);
    if (input.author !== undefined && input.author !== principal.username) {
      throw new AuthorizationError("author does not match the authenticated user");
    }
    const content = validateContent(input.content);

    const message: Message = {
      id: formatMessageId(this.nodeId, this.store.nextSequence()),
      author: principal.username,
      content,
      logicalTs: this.clock.next(),
      originNode: this.nodeId,
      createdAt: this.now().toISOString(),
    };

    await this.store.insert(message);
    this.logger.debug("message stored", { id: message.id, author: message.author });
    this.replication.onLocalWrite(message);
    return message;
  }

  listMessages(): Message[] {
    return this.store.orderedView();
  }

  async ingest(from: NodeId, messages: readonly Message[]): Promise<PushAck> {
    if (this.state.isOffline()) throw new NodeOfflineError(this.nodeId);
    const added = await this.store.merge(messages);
    if (added > 0) this.logger.debug("ingested replicated messages", { from, added });
    return { added };
  }

  snapshot(): Message[] {
    if (this.state.isOffline()) throw new NodeOfflineError(this.nodeId);
    return this.store.snapshot();
  }

  goOffline(): boolean {
    return this.failures.goOffline();
  }

  goOnline(): Promise<ReconciliationReport | null> {
    return this.failures.goOnline();
  }

  reconcile(): Promise<ReconciliationReport> {
    return this.reconciliation.reconcileAll();
  }

  peers(): PeerEntry[] {
    return this.registry.listPeers();
  }

  status(): NodeStatus {
    return {
      nodeId: this.nodeId,
      mode: this.state.mode,
      messages: this.store.size,
      clock: this.clock.current(),
      pendingPushes: this.replication.pending,
      peers: this.registry.listPeers(),
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.reconciliation.stop();
    await this.replication.close();
    await this.store.whenIdle();
    await this.log.close();
  }
}

function validateContent(content: unknown): string {
  if (typeof content !== "string") throw new InvalidMessageError("content must be a string");
  const trimmed = content.trim();
  if (trimmed.length === 0) throw new InvalidMessageError("content must not be empty");
  if (trimmed.length > MAX_CONTENT_LENGTH) {
    throw new InvalidMessageError(`content exceeds ${MAX_CONTENT_LENGTH} characters`);
  }
  return trimmed;
}
