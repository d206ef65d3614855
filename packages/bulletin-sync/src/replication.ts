import type { Logger, Message, MessageId, NodeId } from "@bulletin/interface";
import { silentLogger, toError } from "@bulletin/interface";

import type { PeerRegistry } from "./peers.js";
import { TaskPool } from "./pool.js";
import type { NodeState } from "./state.js";
import type { RetryPolicy, Sleep } from "./timing.js";
import { backoffDelay, resolveRetryPolicy, sleep as defaultSleep, timeoutSignal } from "./timing.js";
import type { PeerTransport } from "./transport.js";

export type PushOutcome =
  | { status: "delivered"; peerId: NodeId; messageId: MessageId; attempts: number; added: number }
  | { status: "abandoned"; peerId: NodeId; messageId: MessageId; attempts: number; error: Error }
  | { status: "skipped"; peerId: NodeId; messageId: MessageId; attempts: number; reason: "offline" | "closed" };

export type ReplicationManagerOptions = {
  state: NodeState;
  registry: PeerRegistry;
  transport: PeerTransport;
  retry?: Partial<RetryPolicy>;
  /** Push tasks allowed in flight at once. */
  concurrency?: number;
  pushTimeoutMs?: number;
  sleep?: Sleep;
  logger?: Logger;
  onPushOutcome?: (outcome: PushOutcome) => void;
};

/**
 * Fire-and-forget propagation of local writes: one push task per peer per
 * message, retried with capped exponential backoff, never blocking the write
 * path and never surfacing failures to the writer.
 */
export class ReplicationManager {
  readonly retry: RetryPolicy;

  private readonly state: NodeState;
  private readonly registry: PeerRegistry;
  private readonly transport: PeerTransport;
  private readonly pool: TaskPool;
  private readonly pushTimeoutMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly onPushOutcome?: (outcome: PushOutcome) => void;
  private readonly closer = new AbortController();

  constructor(opts: ReplicationManagerOptions) {
    this.state = opts.state;
    this.registry = opts.registry;
    this.transport = opts.transport;
    this.retry = resolveRetryPolicy(opts.retry);
    this.pushTimeoutMs = opts.pushTimeoutMs ?? 3_000;
    this.sleep = opts.sleep ?? defaultSleep;
    this.logger = opts.logger ?? silentLogger;
    this.onPushOutcome = opts.onPushOutcome;
    this.pool = new TaskPool(opts.concurrency ?? 8, this.logger);

    if (!Number.isFinite(this.pushTimeoutMs) || this.pushTimeoutMs <= 0) {
      throw new Error(`invalid pushTimeoutMs: ${opts.pushTimeoutMs}`);
    }
  }

  get pending(): number {
    return this.pool.pending;
  }

  /**
   * Schedule pushes of a freshly stored message. Returns the number of push
   * tasks submitted (0 while offline or closed).
   */
  onLocalWrite(message: Message): number {
    if (this.closer.signal.aborted) return 0;
    if (this.state.isOffline()) {
      this.logger.debug("offline, push suppressed", { id: message.id });
      return 0;
    }

    const peers = this.registry.listPeers();
    for (const peer of peers) {
      this.pool.submit(async () => {
        const outcome = await this.push(peer.peerId, message);
        this.report(outcome);
      });
    }
    return peers.length;
  }

  /**
   * Resolves once every submitted push has settled.
   */
  flush(): Promise<void> {
    return this.pool.whenIdle();
  }

  /**
   * Stop scheduling, cut pending backoff sleeps short, and wait for in-flight
   * pushes to settle.
   */
  async close(): Promise<void> {
    this.closer.abort();
    await this.pool.whenIdle();
  }

  private async push(peerId: NodeId, message: Message): Promise<PushOutcome> {
    const base = { peerId, messageId: message.id };
    const entry = this.registry.get(peerId);
    if (!entry) {
      return { ...base, status: "abandoned", attempts: 0, error: new Error(`unknown peer: ${peerId}`) };
    }

    // A peer already believed down gets one probe instead of the full schedule.
    const maxAttempts = entry.reachable ? this.retry.maxAttempts : 1;
    let attempts = 0;
    let lastError: Error = new Error("push not attempted");

    while (attempts < maxAttempts) {
      if (this.closer.signal.aborted) return { ...base, status: "skipped", attempts, reason: "closed" };
      if (this.state.isOffline()) return { ...base, status: "skipped", attempts, reason: "offline" };

      attempts += 1;
      const scope = timeoutSignal(this.pushTimeoutMs, this.closer.signal);
      try {
        const ack = await this.transport.pushMessages(entry, [message], { signal: scope.signal });
        this.registry.markResult(peerId, true);
        return { ...base, status: "delivered", attempts, added: ack.added };
      } catch (err) {
        lastError = toError(err);
        this.registry.markResult(peerId, false);
        this.logger.debug("push attempt failed", { ...base, attempt: attempts, err: lastError.message });
      } finally {
        scope.dispose();
      }

      if (attempts >= maxAttempts) break;
      const slept = await this.sleep(backoffDelay(this.retry, attempts), this.closer.signal);
      if (!slept) return { ...base, status: "skipped", attempts, reason: "closed" };
    }

    this.logger.warn("push abandoned", { ...base, attempts, err: lastError.message });
    return { ...base, status: "abandoned", attempts, error: lastError };
  }

  private report(outcome: PushOutcome): void {
    if (!this.onPushOutcome) return;
    try {
      this.onPushOutcome(outcome);
    } catch (err) {
      this.logger.error("push outcome listener failed", { err });
    }
  }
}
