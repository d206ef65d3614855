import type { Logger, NodeId } from "@bulletin/interface";
import { ConfigurationError, silentLogger } from "@bulletin/interface";

import type { PeerConfig, PeerEntry } from "./types.js";

export type PeerRegistryOptions = {
  /** Consecutive failures after which a peer is marked unreachable. */
  failureThreshold?: number;
  now?: () => number;
  logger?: Logger;
};

type MutablePeerEntry = {
  -readonly [K in keyof PeerEntry]: PeerEntry[K];
};

/**
 * Configured peers of one node and what we currently believe about them.
 */
export class PeerRegistry {
  readonly failureThreshold: number;

  private readonly entries = new Map<NodeId, MutablePeerEntry>();
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    readonly selfId: NodeId,
    peers: readonly PeerConfig[],
    opts: PeerRegistryOptions = {}
  ) {
    this.failureThreshold = opts.failureThreshold ?? 3;
    if (!Number.isInteger(this.failureThreshold) || this.failureThreshold < 1) {
      throw new ConfigurationError(`invalid failureThreshold: ${opts.failureThreshold}`);
    }
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? silentLogger;

    for (const peer of peers) {
      if (peer.peerId === selfId) continue;
      if (this.entries.has(peer.peerId)) throw new ConfigurationError(`duplicate peer id: ${peer.peerId}`);
      this.entries.set(peer.peerId, {
        peerId: peer.peerId,
        address: peer.address,
        reachable: true,
        consecutiveFailures: 0,
      });
    }
  }

  listPeers(): PeerEntry[] {
    return Array.from(this.entries.values(), (e) => ({ ...e }));
  }

  reachablePeers(): PeerEntry[] {
    return this.listPeers().filter((p) => p.reachable);
  }

  get(peerId: NodeId): PeerEntry | undefined {
    const entry = this.entries.get(peerId);
    return entry ? { ...entry } : undefined;
  }

  markResult(peerId: NodeId, success: boolean): PeerEntry {
    const entry = this.entries.get(peerId);
    if (!entry) throw new Error(`unknown peer: ${peerId}`);

    const wasReachable = entry.reachable;
    if (success) {
      entry.consecutiveFailures = 0;
      entry.reachable = true;
      entry.lastSuccessAt = this.now();
    } else {
      entry.consecutiveFailures += 1;
      entry.lastFailureAt = this.now();
      if (entry.consecutiveFailures >= this.failureThreshold) entry.reachable = false;
    }

    if (wasReachable !== entry.reachable) {
      const ctx = { peerId, consecutiveFailures: entry.consecutiveFailures };
      if (entry.reachable) this.logger.info("peer reachable again", ctx);
      else this.logger.warn("peer marked unreachable", ctx);
    }
    return { ...entry };
  }
}

/**
 * Parse `id=address` / bare `address` entries separated by commas. A bare
 * address doubles as the peer id.
 */
export function parsePeerList(raw: string): PeerConfig[] {
  const parts = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  return parts.map((part) => {
    const eq = part.indexOf("=");
    const address = (eq >= 0 ? part.slice(eq + 1) : part).trim().replace(/\/+$/, "");
    const peerId = eq >= 0 ? part.slice(0, eq).trim() : address;

    let url: URL;
    try {
      url = new URL(address);
    } catch {
      throw new ConfigurationError(`invalid peer address: ${JSON.stringify(part)}`);
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new ConfigurationError(`peer address must be http(s): ${JSON.stringify(part)}`);
    }
    if (peerId.length === 0) throw new ConfigurationError(`empty peer id in ${JSON.stringify(part)}`);
    return { peerId, address };
  });
}
