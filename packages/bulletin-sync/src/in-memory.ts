import type { Message, NodeId } from "@bulletin/interface";
import { NodeOfflineError, PeerUnreachableError, decodeMessageList } from "@bulletin/interface";

import type { CallOptions, PeerEndpoint, PeerTransport, Unsubscribe, WireCodec } from "./transport.js";
import type { PeerEntry, PushAck } from "./types.js";

export const jsonMessagesCodec: WireCodec<Message[], string> = {
  encode: (messages) => JSON.stringify(messages),
  decode: (wire) => decodeMessageList(JSON.parse(wire)),
};

export type InMemoryNetworkStats = {
  pushes: number;
  pulls: number;
  failed: number;
};

export type InMemoryNetwork = {
  /** Serve `endpoint` at `address` until the returned function is called. */
  attach(address: string, endpoint: PeerEndpoint): Unsubscribe;
  /** Transport for the node reachable at `fromAddress`. */
  transport(fromAddress: string): PeerTransport;
  /** Cut (or restore) the link between two addresses in both directions. */
  setLinkDown(a: string, b: string, down?: boolean): void;
  readonly stats: InMemoryNetworkStats;
};

function linkKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

function macrotask(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/**
 * In-process stand-in for the HTTP mesh. Payloads go through a JSON codec so
 * peers never share object references.
 */
export function createInMemoryNetwork(codec: WireCodec<Message[], string> = jsonMessagesCodec): InMemoryNetwork {
  const endpoints = new Map<string, PeerEndpoint>();
  const downLinks = new Set<string>();
  const stats: InMemoryNetworkStats = { pushes: 0, pulls: 0, failed: 0 };

  const resolve = async (from: string, peer: PeerEntry, opts: CallOptions): Promise<PeerEndpoint> => {
    await macrotask();
    if (opts.signal?.aborted) throw new PeerUnreachableError(peer.peerId, "request aborted");
    if (downLinks.has(linkKey(from, peer.address))) throw new PeerUnreachableError(peer.peerId, "connection refused");
    const endpoint = endpoints.get(peer.address);
    if (!endpoint) throw new PeerUnreachableError(peer.peerId, "connection refused");
    return endpoint;
  };

  const call = async <T>(peerId: NodeId, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (err) {
      stats.failed += 1;
      if (err instanceof PeerUnreachableError) throw err;
      if (err instanceof NodeOfflineError) throw new PeerUnreachableError(peerId, "node offline", 503, { cause: err });
      throw new PeerUnreachableError(peerId, "request failed", 500, { cause: err });
    }
  };

  return {
    attach(address, endpoint) {
      if (endpoints.has(address)) throw new Error(`address already attached: ${address}`);
      endpoints.set(address, endpoint);
      return () => {
        if (endpoints.get(address) === endpoint) endpoints.delete(address);
      };
    },
    transport(fromAddress) {
      const fromId = (): NodeId => endpoints.get(fromAddress)?.nodeId ?? fromAddress;
      return {
        pushMessages: (peer, messages, opts = {}) =>
          call(peer.peerId, async (): Promise<PushAck> => {
            stats.pushes += 1;
            const endpoint = await resolve(fromAddress, peer, opts);
            return endpoint.ingest(fromId(), codec.decode(codec.encode([...messages])));
          }),
        pullSnapshot: (peer, opts = {}) =>
          call(peer.peerId, async () => {
            stats.pulls += 1;
            const endpoint = await resolve(fromAddress, peer, opts);
            return codec.decode(codec.encode(endpoint.snapshot()));
          }),
      };
    },
    setLinkDown(a, b, down = true) {
      if (down) downLinks.add(linkKey(a, b));
      else downLinks.delete(linkKey(a, b));
    },
    stats,
  };
}
