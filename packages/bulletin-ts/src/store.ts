import type { Message, MessageId, NodeId } from "./index.js";
import type { LamportClock } from "./clock.js";
import type { Logger } from "./logger.js";
import type { MessageLog } from "./log.js";
import { DuplicateIdError, PersistenceError } from "./errors.js";
import { parseMessageId } from "./ids.js";
import { silentLogger } from "./logger.js";
import { compareMessages, maxCounter } from "./order.js";

export type MessageStoreOptions = {
  log: MessageLog;
  clock: LamportClock;
  logger?: Logger;
};

function freezeMessage(message: Message): Message {
  return Object.freeze({ ...message, logicalTs: Object.freeze({ ...message.logicalTs }) });
}

/**
 * Authoritative message set of one node.
 *
 * Mutations (`insert`, `merge`) run one at a time through a write queue and
 * only become visible once the log has accepted them. Reads never observe a
 * half-applied merge.
 */
export class MessageStore {
  readonly nodeId: NodeId;

  private readonly byId = new Map<MessageId, Message>();
  private readonly log: MessageLog;
  private readonly clock: LamportClock;
  private readonly logger: Logger;
  private ordered: Message[] | null = null;
  private writeQueue: Promise<void> = Promise.resolve();
  private localSeq = 0;

  private constructor(opts: MessageStoreOptions) {
    if (opts.log.nodeId !== opts.clock.nodeId) {
      throw new Error(`log belongs to ${opts.log.nodeId}, clock to ${opts.clock.nodeId}`);
    }
    this.nodeId = opts.clock.nodeId;
    this.log = opts.log;
    this.clock = opts.clock;
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * Load the persisted set and restore the clock and local sequence from it.
   */
  static async open(opts: MessageStoreOptions): Promise<MessageStore> {
    const store = new MessageStore(opts);
    let loaded: Message[];
    try {
      loaded = await opts.log.load();
    } catch (err) {
      throw new PersistenceError(`failed to load message log for ${store.nodeId}`, { cause: err });
    }
    for (const message of loaded) {
      if (store.byId.has(message.id)) continue;
      store.byId.set(message.id, freezeMessage(message));
      store.trackSequence(message);
    }
    store.clock.observe(maxCounter(store.byId.values()));
    store.logger.info("message store loaded", {
      nodeId: store.nodeId,
      messages: store.byId.size,
      clock: store.clock.current(),
    });
    return store;
  }

  get size(): number {
    return this.byId.size;
  }

  has(id: MessageId): boolean {
    return this.byId.has(id);
  }

  get(id: MessageId): Message | undefined {
    return this.byId.get(id);
  }

  /**
   * Reserve the next local write sequence number.
   */
  nextSequence(): number {
    this.localSeq += 1;
    return this.localSeq;
  }

  insert(message: Message): Promise<void> {
    return this.enqueue(async () => {
      if (this.byId.has(message.id)) {
        this.logger.error("rejected local write with duplicate id", { id: message.id });
        throw new DuplicateIdError(message.id);
      }
      const frozen = freezeMessage(message);
      await this.append([frozen]);
      this.apply([frozen]);
    });
  }

  /**
   * Add every message whose id is not yet present. Resolves with the number
   * of messages added.
   */
  merge(incoming: Iterable<Message>): Promise<number> {
    const batch = Array.from(incoming);
    return this.enqueue(async () => {
      const fresh = new Map<MessageId, Message>();
      for (const message of batch) {
        if (this.byId.has(message.id) || fresh.has(message.id)) continue;
        fresh.set(message.id, freezeMessage(message));
      }
      if (fresh.size === 0) return 0;

      const added = Array.from(fresh.values());
      await this.append(added);
      this.apply(added);
      return added.length;
    });
  }

  snapshot(): Message[] {
    return Array.from(this.byId.values());
  }

  orderedView(): Message[] {
    if (!this.ordered) this.ordered = this.snapshot().sort(compareMessages);
    return [...this.ordered];
  }

  /**
   * Resolves once every queued mutation has settled.
   */
  whenIdle(): Promise<void> {
    return this.writeQueue;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async append(messages: Message[]): Promise<void> {
    try {
      await this.log.append(messages);
    } catch (err) {
      throw new PersistenceError(`failed to persist ${messages.length} message(s) on ${this.nodeId}`, {
        cause: err,
      });
    }
  }

  private apply(messages: Message[]): void {
    for (const message of messages) {
      this.byId.set(message.id, message);
      this.trackSequence(message);
    }
    this.clock.observe(maxCounter(messages));
    this.ordered = null;
  }

  // A copy of one of our own messages coming back from a peer (e.g. after the
  // local log was lost) must push the sequence past it so ids are never reused.
  private trackSequence(message: Message): void {
    if (message.originNode !== this.nodeId) return;
    const parsed = parseMessageId(message.id);
    if (parsed && parsed.seq > this.localSeq) this.localSeq = parsed.seq;
  }
}
