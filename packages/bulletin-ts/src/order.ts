import type { LogicalTimestamp, Message } from "./index.js";

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareLogicalTs(a: LogicalTimestamp, b: LogicalTimestamp): number {
  if (a.counter !== b.counter) return a.counter < b.counter ? -1 : 1;
  return compareStrings(a.nodeId, b.nodeId);
}

// Display order: logicalTs ascending, then id. Identical on every node.
export function compareMessages(a: Message, b: Message): number {
  return compareLogicalTs(a.logicalTs, b.logicalTs) || compareStrings(a.id, b.id);
}

export function maxCounter(messages: Iterable<Message>): number {
  let max = 0;
  for (const m of messages) if (m.logicalTs.counter > max) max = m.logicalTs.counter;
  return max;
}
