import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import Database from "better-sqlite3";

import type { Message, MessageLog, NodeId } from "@bulletin/interface";
import { assertNodeId, decodeMessageJson, encodeMessageJson } from "@bulletin/interface";

export type SqliteMessageLogOptions = {
  nodeId: NodeId;
  /** Directory holding one database file per node. */
  dbDir: string;
};

export type SqliteMessageLog = MessageLog & {
  readonly dbPath: string;
};

const SCHEMA = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS messages (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  body TEXT NOT NULL
);
`;

export function nodeDbPath(dbDir: string, nodeId: NodeId): string {
  const hash = crypto.createHash("sha256").update(nodeId, "utf8").digest("hex");
  return path.join(path.resolve(dbDir), `node-${hash}.sqlite3`);
}

type MetaRow = { value: string };
type BodyRow = { body: string };

/**
 * Append-only message log backed by one SQLite file per node. Rows come back
 * in insertion order; re-appending a known id is a no-op.
 */
export async function openSqliteMessageLog(opts: SqliteMessageLogOptions): Promise<SqliteMessageLog> {
  assertNodeId(opts.nodeId);
  await fs.mkdir(path.resolve(opts.dbDir), { recursive: true });

  const dbPath = nodeDbPath(opts.dbDir, opts.nodeId);
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA);

  const stored = db.prepare<[string], MetaRow>("SELECT value FROM meta WHERE key = ?").get("node_id");
  if (!stored) {
    db.prepare("INSERT INTO meta (key, value) VALUES (?, ?)").run("node_id", opts.nodeId);
  } else if (stored.value !== opts.nodeId) {
    db.close();
    throw new Error(`nodeId mismatch for ${dbPath}: expected ${opts.nodeId}, got ${stored.value}`);
  }

  const selectAll = db.prepare<[], BodyRow>("SELECT body FROM messages ORDER BY seq");
  const insert = db.prepare<[string, string]>("INSERT OR IGNORE INTO messages (id, body) VALUES (?, ?)");
  const appendBatch = db.transaction((messages: readonly Message[]) => {
    for (const message of messages) insert.run(message.id, encodeMessageJson(message));
  });

  let closed = false;
  const ensureOpen = () => {
    if (closed) throw new Error(`message log for ${opts.nodeId} is closed`);
  };

  return {
    nodeId: opts.nodeId,
    dbPath,
    async load() {
      ensureOpen();
      return selectAll.all().map((row) => decodeMessageJson(row.body));
    },
    async append(messages) {
      ensureOpen();
      if (messages.length === 0) return;
      appendBatch(messages);
    },
    async close() {
      if (closed) return;
      closed = true;
      db.close();
    },
  };
}
