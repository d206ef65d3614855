import type { Message, NodeId } from "./index.js";

/**
 * Durable append-only record of one node's message set.
 *
 * `append` must not resolve until the batch is durable; a rejection means
 * none of the batch may be considered stored.
 */
export interface MessageLog {
  readonly nodeId: NodeId;
  load(): Promise<Message[]>;
  append(messages: readonly Message[]): Promise<void>;
  close(): Promise<void>;
}

export type MemoryMessageLog = MessageLog & {
  readonly entries: readonly Message[];
};

export function createMemoryMessageLog(nodeId: NodeId, initial: readonly Message[] = []): MemoryMessageLog {
  const entries: Message[] = [...initial];
  return {
    nodeId,
    get entries() {
      return entries;
    },
    load: async () => [...entries],
    append: async (messages) => {
      entries.push(...messages);
    },
    close: async () => {},
  };
}
