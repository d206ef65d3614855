import type { Message, NodeId } from "@bulletin/interface";

import type { PeerEntry, PushAck } from "./types.js";

export type Unsubscribe = () => void;

export type CallOptions = {
  signal?: AbortSignal;
};

/**
 * Outbound side of the node-to-node protocol.
 *
 * `pushMessages` is `PushMessage` (one or more messages); `pullSnapshot` is
 * `PullSnapshot`. Both reject on any failure: network error, timeout,
 * non-success status, or a peer that is offline.
 */
export interface PeerTransport {
  pushMessages(peer: PeerEntry, messages: readonly Message[], opts?: CallOptions): Promise<PushAck>;
  pullSnapshot(peer: PeerEntry, opts?: CallOptions): Promise<Message[]>;
}

/**
 * Inbound side: what a node serves to its peers.
 */
export interface PeerEndpoint {
  readonly nodeId: NodeId;
  ingest(from: NodeId, messages: readonly Message[]): Promise<PushAck>;
  snapshot(): Message[];
}

export type WireCodec<Value, Wire> = {
  encode(value: Value): Wire;
  decode(wire: Wire): Value;
};
