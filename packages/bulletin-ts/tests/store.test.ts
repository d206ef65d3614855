import { expect, test } from "vitest";

import { LamportClock } from "../src/clock.js";
import { DuplicateIdError, PersistenceError } from "../src/errors.js";
import type { Message } from "../src/index.js";
import { createMemoryMessageLog } from "../src/log.js";
import type { MessageLog } from "../src/log.js";
import { MessageStore } from "../src/store.js";

function msg(originNode: string, seq: number, counter: number, content = `${originNode}#${seq}`): Message {
  return {
    id: `${originNode}:${seq}`,
    author: "alice",
    content,
    logicalTs: { counter, nodeId: originNode },
    originNode,
    createdAt: "2024-01-01T00:00:00.000Z",
  };
}

async function openStore(nodeId: string, log: MessageLog = createMemoryMessageLog(nodeId)) {
  const clock = new LamportClock(nodeId);
  const store = await MessageStore.open({ log, clock });
  return { store, clock, log };
}

function ids(messages: readonly Message[]): string[] {
  return messages.map((m) => m.id);
}

test("insert adds a message and persists it", async () => {
  const log = createMemoryMessageLog("n1");
  const { store } = await openStore("n1", log);
  await store.insert(msg("n1", 1, 1));
  expect(store.has("n1:1")).toBe(true);
  expect(store.size).toBe(1);
  expect(ids(log.entries)).toEqual(["n1:1"]);
});

test("insert rejects a duplicate id without touching the log", async () => {
  const log = createMemoryMessageLog("n1");
  const { store } = await openStore("n1", log);
  await store.insert(msg("n1", 1, 1));
  await expect(store.insert(msg("n1", 1, 2, "other"))).rejects.toBeInstanceOf(DuplicateIdError);
  expect(log.entries).toHaveLength(1);
  expect(store.get("n1:1")?.content).toBe("n1#1");
});

test("merge returns the number of new messages and ignores known ids", async () => {
  const { store } = await openStore("n1");
  await store.insert(msg("n1", 1, 1));
  const added = await store.merge([msg("n1", 1, 1), msg("n2", 1, 1), msg("n2", 2, 4), msg("n2", 2, 4)]);
  expect(added).toBe(2);
  expect(store.size).toBe(3);
});

test("merge is idempotent", async () => {
  const batch = [msg("n2", 1, 1), msg("n3", 1, 2)];
  const { store } = await openStore("n1");
  expect(await store.merge(batch)).toBe(2);
  const first = store.orderedView();
  expect(await store.merge(batch)).toBe(0);
  expect(store.orderedView()).toEqual(first);
});

test("merge order does not matter", async () => {
  const a = [msg("n2", 1, 1), msg("n2", 2, 3), msg("n3", 1, 3)];
  const b = [msg("n3", 1, 3), msg("n3", 2, 5), msg("n4", 1, 2)];

  const { store: ab } = await openStore("n1");
  await ab.merge(a);
  await ab.merge(b);

  const { store: ba } = await openStore("n1");
  await ba.merge(b);
  await ba.merge(a);

  const { store: union } = await openStore("n1");
  await union.merge([...a, ...b]);

  expect(ids(ab.orderedView())).toEqual(ids(ba.orderedView()));
  expect(ids(ab.orderedView())).toEqual(ids(union.orderedView()));
  expect(ab.size).toBe(5);
});

test("orderedView sorts by logical timestamp, then node id, then id", async () => {
  const { store } = await openStore("n1");
  await store.merge([msg("n3", 1, 2), msg("n2", 1, 2), msg("n2", 2, 1), msg("n4", 1, 7)]);
  expect(ids(store.orderedView())).toEqual(["n2:2", "n2:1", "n3:1", "n4:1"]);
});

test("orderedView is identical regardless of arrival order", async () => {
  const messages = [msg("b", 1, 3), msg("a", 1, 3), msg("c", 1, 1), msg("a", 2, 9)];
  const { store: forward } = await openStore("x");
  for (const m of messages) await forward.merge([m]);
  const { store: backward } = await openStore("y");
  for (const m of [...messages].reverse()) await backward.merge([m]);
  expect(ids(forward.orderedView())).toEqual(["c:1", "a:1", "b:1", "a:2"]);
  expect(ids(backward.orderedView())).toEqual(ids(forward.orderedView()));
});

test("orderedView does not advance the clock", async () => {
  const { store, clock } = await openStore("n1");
  await store.merge([msg("n2", 1, 5)]);
  const before = clock.current();
  store.orderedView();
  store.snapshot();
  expect(clock.current()).toBe(before);
});

test("merge advances the clock past observed counters", async () => {
  const { store, clock } = await openStore("n1");
  await store.merge([msg("n2", 1, 17)]);
  expect(clock.next()).toEqual({ counter: 18, nodeId: "n1" });
});

test("open restores messages, clock and local sequence from the log", async () => {
  const log = createMemoryMessageLog("n1", [msg("n1", 1, 1), msg("n2", 1, 5), msg("n1", 2, 6)]);
  const { store, clock } = await openStore("n1", log);
  expect(store.size).toBe(3);
  expect(clock.current()).toBe(6);
  expect(store.nextSequence()).toBe(3);
});

test("a returning copy of our own message bumps the local sequence", async () => {
  const { store } = await openStore("n1");
  await store.merge([msg("n1", 4, 4)]);
  expect(store.nextSequence()).toBe(5);
});

test("persistence failure surfaces and leaves the store unchanged", async () => {
  const failing: MessageLog = {
    nodeId: "n1",
    load: async () => [],
    append: async () => {
      throw new Error("disk full");
    },
    close: async () => {},
  };
  const { store } = await openStore("n1", failing);
  const err = await store.insert(msg("n1", 1, 1)).catch((e: unknown) => e);
  expect(err).toBeInstanceOf(PersistenceError);
  expect(err instanceof PersistenceError && err.cause instanceof Error ? err.cause.message : null).toBe("disk full");
  expect(store.size).toBe(0);
  await expect(store.merge([msg("n2", 1, 1)])).rejects.toBeInstanceOf(PersistenceError);
  expect(store.size).toBe(0);
});

test("a failed write does not block later writes", async () => {
  let fail = true;
  const entries: Message[] = [];
  const flaky: MessageLog = {
    nodeId: "n1",
    load: async () => [],
    append: async (messages) => {
      if (fail) {
        fail = false;
        throw new Error("transient");
      }
      entries.push(...messages);
    },
    close: async () => {},
  };
  const { store } = await openStore("n1", flaky);
  const first = store.insert(msg("n1", 1, 1));
  const second = store.insert(msg("n1", 2, 2));
  await expect(first).rejects.toBeInstanceOf(PersistenceError);
  await second;
  expect(ids(entries)).toEqual(["n1:2"]);
  expect(ids(store.orderedView())).toEqual(["n1:2"]);
});

test("stored messages are frozen", async () => {
  const { store } = await openStore("n1");
  await store.insert(msg("n1", 1, 1));
  const stored = store.get("n1:1");
  expect(Object.isFrozen(stored)).toBe(true);
  expect(Object.isFrozen(stored?.logicalTs)).toBe(true);
});

test("open rejects a log that belongs to another node", async () => {
  await expect(
    MessageStore.open({ log: createMemoryMessageLog("n2"), clock: new LamportClock("n1") })
  ).rejects.toThrow("log belongs to n2, clock to n1");
});
