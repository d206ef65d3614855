import type { NodeId } from "@bulletin/interface";

export type PeerConfig = {
  peerId: NodeId;
  address: string;
};

export type PeerEntry = {
  readonly peerId: NodeId;
  readonly address: string;
  readonly reachable: boolean;
  readonly consecutiveFailures: number;
  readonly lastSuccessAt?: number;
  readonly lastFailureAt?: number;
};

export type PushAck = {
  added: number;
};
