import type { LogicalTimestamp, Message } from "./index.js";
import { InvalidMessageError } from "./errors.js";
import { isValidNodeId, parseMessageId } from "./ids.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectString(obj: Record<string, unknown>, field: string, ctx: string): string {
  const val = obj[field];
  if (typeof val !== "string") throw new InvalidMessageError(`${ctx}.${field} must be a string`);
  return val;
}

function decodeLogicalTs(value: unknown, ctx: string): LogicalTimestamp {
  if (!isRecord(value)) throw new InvalidMessageError(`${ctx} must be an object`);
  const counter = value.counter;
  if (typeof counter !== "number" || !Number.isSafeInteger(counter) || counter <= 0) {
    throw new InvalidMessageError(`${ctx}.counter must be a positive integer`);
  }
  const nodeId = expectString(value, "nodeId", ctx);
  if (!isValidNodeId(nodeId)) throw new InvalidMessageError(`${ctx}.nodeId is not a valid node id`);
  return { counter, nodeId };
}

/**
 * Validate an untrusted value (peer payload, persisted row) as a Message.
 * Unknown fields are dropped so the stored shape stays canonical.
 */
export function decodeMessage(value: unknown, ctx = "message"): Message {
  if (!isRecord(value)) throw new InvalidMessageError(`${ctx} must be an object`);

  const id = expectString(value, "id", ctx);
  const parsed = parseMessageId(id);
  if (!parsed) throw new InvalidMessageError(`${ctx}.id is malformed: ${JSON.stringify(id)}`);

  const originNode = expectString(value, "originNode", ctx);
  if (originNode !== parsed.originNode) {
    throw new InvalidMessageError(`${ctx}.originNode does not match id ${id}`);
  }

  const logicalTs = decodeLogicalTs(value.logicalTs, `${ctx}.logicalTs`);
  if (logicalTs.nodeId !== originNode) {
    throw new InvalidMessageError(`${ctx}.logicalTs.nodeId does not match originNode`);
  }

  return {
    id,
    author: expectString(value, "author", ctx),
    content: expectString(value, "content", ctx),
    logicalTs,
    originNode,
    createdAt: expectString(value, "createdAt", ctx),
  };
}

export function decodeMessageList(value: unknown, ctx = "messages"): Message[] {
  if (!Array.isArray(value)) throw new InvalidMessageError(`${ctx} must be an array`);
  return value.map((item, idx) => decodeMessage(item, `${ctx}[${idx}]`));
}

export function encodeMessageJson(message: Message): string {
  return JSON.stringify(message);
}

export function decodeMessageJson(text: string): Message {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new InvalidMessageError(`message is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return decodeMessage(value);
}
