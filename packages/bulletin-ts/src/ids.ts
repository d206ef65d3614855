import type { MessageId, NodeId } from "./index.js";

const NODE_ID_RE = /^[A-Za-z0-9._-]+$/;

export function isValidNodeId(nodeId: string): boolean {
  return nodeId.length > 0 && nodeId.length <= 64 && NODE_ID_RE.test(nodeId);
}

export function assertNodeId(nodeId: string): NodeId {
  if (!isValidNodeId(nodeId)) {
    throw new Error(`invalid node id: ${JSON.stringify(nodeId)} (expected 1-64 chars of [A-Za-z0-9._-])`);
  }
  return nodeId;
}

/**
 * Message ids are `<originNode>:<seq>`, `seq` being the origin's 1-based write sequence.
 */
export function formatMessageId(originNode: NodeId, seq: number): MessageId {
  if (!Number.isSafeInteger(seq) || seq <= 0) throw new Error(`invalid message sequence: ${seq}`);
  return `${assertNodeId(originNode)}:${seq}`;
}

export function parseMessageId(id: MessageId): { originNode: NodeId; seq: number } | null {
  const sep = id.lastIndexOf(":");
  if (sep <= 0) return null;
  const originNode = id.slice(0, sep);
  const rawSeq = id.slice(sep + 1);
  if (!isValidNodeId(originNode) || !/^[1-9]\d*$/.test(rawSeq)) return null;
  const seq = Number(rawSeq);
  if (!Number.isSafeInteger(seq)) return null;
  return { originNode, seq };
}
