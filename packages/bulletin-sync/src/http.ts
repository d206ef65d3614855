import type { Message, NodeId } from "@bulletin/interface";
import { InvalidMessageError, PeerUnreachableError, decodeMessageList, isValidNodeId } from "@bulletin/interface";

import type { CallOptions, PeerTransport } from "./transport.js";
import type { PeerEntry, PushAck } from "./types.js";

export const REPLICATE_PATH = "/replicate";
export const SNAPSHOT_PATH = "/snapshot";

export type ReplicateRequest = {
  from: NodeId;
  messages: Message[];
};

export type ReplicateResponse = {
  status: "ok";
  added: number;
};

export type SnapshotResponse = {
  nodeId: NodeId;
  messages: Message[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeReplicateRequest(value: unknown): ReplicateRequest {
  if (!isRecord(value)) throw new InvalidMessageError("request body must be an object");
  const from = value.from;
  if (typeof from !== "string" || from.length === 0) throw new InvalidMessageError("from must be a non-empty string");
  return { from, messages: decodeMessageList(value.messages) };
}

export function decodeReplicateResponse(value: unknown): ReplicateResponse {
  if (!isRecord(value) || value.status !== "ok") throw new InvalidMessageError("unexpected replicate response");
  const added = value.added;
  if (typeof added !== "number" || !Number.isInteger(added) || added < 0) {
    throw new InvalidMessageError("replicate response added must be a non-negative integer");
  }
  return { status: "ok", added };
}

export function decodeSnapshotResponse(value: unknown): SnapshotResponse {
  if (!isRecord(value)) throw new InvalidMessageError("snapshot response must be an object");
  const nodeId = value.nodeId;
  if (typeof nodeId !== "string" || !isValidNodeId(nodeId)) {
    throw new InvalidMessageError("snapshot response nodeId is invalid");
  }
  return { nodeId, messages: decodeMessageList(value.messages) };
}

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type HttpPeerTransportOptions = {
  selfId: NodeId;
  fetch?: FetchLike;
};

function joinUrl(address: string, path: string): string {
  return `${address.replace(/\/+$/, "")}${path}`;
}

async function request(peer: PeerEntry, url: string, init: RequestInit, fetchImpl: FetchLike): Promise<unknown> {
  let res: Response;
  try {
    res = await fetchImpl(url, init);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PeerUnreachableError(peer.peerId, reason, undefined, { cause: err });
  }

  if (res.status !== 200) {
    // Drain so the connection can be reused.
    await res.arrayBuffer().catch(() => undefined);
    throw new PeerUnreachableError(peer.peerId, `HTTP ${res.status}`, res.status);
  }

  try {
    return await res.json();
  } catch (err) {
    throw new InvalidMessageError(`peer ${peer.peerId} sent invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * `PushMessage` / `PullSnapshot` over HTTP+JSON using the global `fetch`.
 */
export function createHttpPeerTransport(opts: HttpPeerTransportOptions): PeerTransport {
  const fetchImpl: FetchLike = opts.fetch ?? ((input, init) => fetch(input, init));

  return {
    async pushMessages(peer: PeerEntry, messages: readonly Message[], callOpts: CallOptions = {}): Promise<PushAck> {
      const body: ReplicateRequest = { from: opts.selfId, messages: [...messages] };
      const json = await request(
        peer,
        joinUrl(peer.address, REPLICATE_PATH),
        {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify(body),
          signal: callOpts.signal,
        },
        fetchImpl
      );
      const { added } = decodeReplicateResponse(json);
      return { added };
    },

    async pullSnapshot(peer: PeerEntry, callOpts: CallOptions = {}): Promise<Message[]> {
      const json = await request(
        peer,
        joinUrl(peer.address, SNAPSHOT_PATH),
        { method: "GET", signal: callOpts.signal },
        fetchImpl
      );
      return decodeSnapshotResponse(json).messages;
    },
  };
}
