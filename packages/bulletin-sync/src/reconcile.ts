import type { Logger, Message, MessageStore, NodeId } from "@bulletin/interface";
import { ReconciliationPartialFailure, silentLogger, toError } from "@bulletin/interface";

import type { PeerRegistry } from "./peers.js";
import type { NodeState } from "./state.js";
import { sleep, timeoutSignal } from "./timing.js";
import type { PeerTransport } from "./transport.js";
import type { PeerEntry } from "./types.js";

export type PeerReconcileResult =
  | { peerId: NodeId; status: "ok"; received: number; added: number; pushed: number }
  | { peerId: NodeId; status: "failed"; error: Error }
  | { peerId: NodeId; status: "skipped"; reason: "offline" };

export type ReconciliationReport = {
  status: "completed" | "skipped";
  /** Messages merged into the local store this round. */
  added: number;
  /** Messages pushed back to peers that lacked them. */
  pushed: number;
  peers: PeerReconcileResult[];
  partialFailure?: ReconciliationPartialFailure;
};

export type ReconcileAllOptions = {
  /**
   * Never join a round already in flight: queue a new one behind it. Used
   * when a round that began earlier may hold snapshots that are now stale.
   */
  fresh?: boolean;
};

export type ReconciliationServiceOptions = {
  state: NodeState;
  registry: PeerRegistry;
  store: MessageStore;
  transport: PeerTransport;
  pullTimeoutMs?: number;
  pushTimeoutMs?: number;
  /** Also send each peer the local messages its snapshot lacked. */
  pushBack?: boolean;
  logger?: Logger;
};

/**
 * Full-state anti-entropy. Pulls every peer's snapshot and merges it; a peer
 * that cannot be reached is skipped until the next round.
 */
export class ReconciliationService {
  private readonly state: NodeState;
  private readonly registry: PeerRegistry;
  private readonly store: MessageStore;
  private readonly transport: PeerTransport;
  private readonly pullTimeoutMs: number;
  private readonly pushTimeoutMs: number;
  private readonly pushBack: boolean;
  private readonly logger: Logger;

  private inFlight: Promise<ReconciliationReport> | null = null;
  private queued: Promise<ReconciliationReport> | null = null;
  private timer: { controller: AbortController; done: Promise<void> } | null = null;

  constructor(opts: ReconciliationServiceOptions) {
    this.state = opts.state;
    this.registry = opts.registry;
    this.store = opts.store;
    this.transport = opts.transport;
    this.pullTimeoutMs = opts.pullTimeoutMs ?? 4_000;
    this.pushTimeoutMs = opts.pushTimeoutMs ?? 3_000;
    this.pushBack = opts.pushBack ?? true;
    this.logger = opts.logger ?? silentLogger;

    if (!Number.isFinite(this.pullTimeoutMs) || this.pullTimeoutMs <= 0) {
      throw new Error(`invalid pullTimeoutMs: ${opts.pullTimeoutMs}`);
    }
  }

  get periodic(): boolean {
    return this.timer !== null;
  }

  async reconcileWith(peer: PeerEntry | NodeId): Promise<PeerReconcileResult> {
    const entry = typeof peer === "string" ? this.registry.get(peer) : peer;
    if (!entry) return { peerId: String(peer), status: "failed", error: new Error(`unknown peer: ${String(peer)}`) };
    const peerId = entry.peerId;
    if (this.state.isOffline()) return { peerId, status: "skipped", reason: "offline" };

    let remote: Message[];
    const pull = timeoutSignal(this.pullTimeoutMs);
    try {
      remote = await this.transport.pullSnapshot(entry, { signal: pull.signal });
    } catch (err) {
      return this.fail(peerId, "pull", err);
    } finally {
      pull.dispose();
    }

    let added: number;
    try {
      added = await this.store.merge(remote);
    } catch (err) {
      // Local persistence failure: the peer is fine, so it is not marked down.
      const error = toError(err);
      this.logger.error("merge of peer snapshot failed", { peerId, err: error });
      return { peerId, status: "failed", error };
    }
    this.registry.markResult(peerId, true);

    let pushed = 0;
    if (this.pushBack && this.state.isOffline()) {
      this.logger.debug("offline, push-back skipped", { peerId });
    } else if (this.pushBack) {
      const remoteIds = new Set(remote.map((m) => m.id));
      const missing = this.store.snapshot().filter((m) => !remoteIds.has(m.id));
      if (missing.length > 0) {
        const push = timeoutSignal(this.pushTimeoutMs);
        try {
          await this.transport.pushMessages(entry, missing, { signal: push.signal });
          pushed = missing.length;
        } catch (err) {
          return this.fail(peerId, "push-back", err);
        } finally {
          push.dispose();
        }
      }
    }

    if (added > 0 || pushed > 0) this.logger.info("reconciled with peer", { peerId, added, pushed });
    return { peerId, status: "ok", received: remote.length, added, pushed };
  }

  /**
   * One anti-entropy round against every configured peer, all in parallel.
   * Overlapping calls share the round already in flight, unless `fresh` is
   * set; fresh callers share the single round queued behind it.
   */
  reconcileAll(opts: ReconcileAllOptions = {}): Promise<ReconciliationReport> {
    const current = this.inFlight;
    if (!current) {
      const round = this.runRound().finally(() => {
        this.inFlight = null;
      });
      this.inFlight = round;
      return round;
    }
    if (!opts.fresh) return current;

    if (!this.queued) {
      const next = (): Promise<ReconciliationReport> => {
        this.queued = null;
        return this.reconcileAll();
      };
      // The earlier round's outcome belongs to its own callers.
      this.queued = current.then(next, next);
    }
    return this.queued;
  }

  /**
   * Run `reconcileAll()` every `intervalMs` until `stop()`.
   */
  start(intervalMs: number): void {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) throw new Error(`invalid intervalMs: ${intervalMs}`);
    if (this.timer) return;

    const controller = new AbortController();
    const signal = controller.signal;
    const done = (async () => {
      while (!signal.aborted) {
        const slept = await sleep(intervalMs, signal);
        if (!slept) break;
        try {
          await this.reconcileAll();
        } catch (err) {
          this.logger.error("periodic reconciliation failed", { err });
        }
      }
    })();
    this.timer = { controller, done };
  }

  async stop(): Promise<void> {
    const timer = this.timer;
    if (!timer) return;
    this.timer = null;
    timer.controller.abort();
    await timer.done;
  }

  private async runRound(): Promise<ReconciliationReport> {
    if (this.state.isOffline()) {
      this.logger.debug("offline, reconciliation skipped");
      return { status: "skipped", added: 0, pushed: 0, peers: [] };
    }

    const peers = this.registry.listPeers();
    this.logger.info("reconciliation started", { peers: peers.length });
    const results = await Promise.all(peers.map((peer) => this.reconcileWith(peer)));

    let added = 0;
    let pushed = 0;
    const failures: { peerId: NodeId; error: Error }[] = [];
    for (const r of results) {
      if (r.status === "ok") {
        added += r.added;
        pushed += r.pushed;
      } else if (r.status === "failed") {
        failures.push({ peerId: r.peerId, error: r.error });
      }
    }

    const report: ReconciliationReport = { status: "completed", added, pushed, peers: results };
    if (failures.length > 0) {
      report.partialFailure = new ReconciliationPartialFailure(failures);
      this.logger.warn(report.partialFailure.message, {
        failures: failures.map((f) => ({ peerId: f.peerId, err: f.error.message })),
      });
    }
    this.logger.info("reconciliation finished", { added, pushed, failed: failures.length });
    return report;
  }

  private fail(peerId: NodeId, phase: "pull" | "push-back", err: unknown): PeerReconcileResult {
    const error = toError(err);
    this.registry.markResult(peerId, false);
    this.logger.warn(`reconciliation ${phase} failed`, { peerId, err: error.message });
    return { peerId, status: "failed", error };
  }
}
