import crypto from "node:crypto";
import path from "node:path";

import { SessionAuthGate } from "@bulletin/auth";
import type { Logger, NodeId } from "@bulletin/interface";
import { silentLogger } from "@bulletin/interface";
import { openSqliteMessageLog } from "@bulletin/sqlite-node";
import { BulletinNode } from "@bulletin/sync";
import type { PeerConfig, RetryPolicy } from "@bulletin/sync";
import { createHttpPeerTransport } from "@bulletin/sync/http";
import { startBulletinServer } from "@bulletin/sync-server-core";

export type SyncServerOptions = {
  nodeId: NodeId;
  host?: string;
  port?: number;
  dbDir?: string;
  peers?: readonly PeerConfig[];
  /** Shared by every node that should accept the same tokens. */
  tokenSecret?: string;
  users?: Readonly<Record<string, string>>;
  adminKey?: string;
  reconcileIntervalMs?: number;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
};

export type SyncServerHandle = {
  nodeId: NodeId;
  host: string;
  port: number;
  url: string;
  dbDir: string;
  node: BulletinNode;
  close: () => Promise<void>;
};

/**
 * One board node persisted to SQLite under `dbDir`, serving HTTP.
 */
export async function startSyncServer(opts: SyncServerOptions): Promise<SyncServerHandle> {
  const host = opts.host ?? "0.0.0.0";
  const port = Number(opts.port ?? 5001);
  const dbDir = path.resolve(opts.dbDir ?? path.join(process.cwd(), "data"));
  const logger = (opts.logger ?? silentLogger).child(opts.nodeId);

  if (!Number.isFinite(port) || port < 0) throw new Error(`invalid port: ${opts.port}`);

  let tokenSecret = opts.tokenSecret;
  if (!tokenSecret) {
    tokenSecret = crypto.randomBytes(32).toString("hex");
    logger.warn("no token secret configured; tokens are only valid on this node until restart");
  }

  const auth = new SessionAuthGate({ secret: tokenSecret, users: opts.users, logger: logger.child("auth") });
  const log = await openSqliteMessageLog({ nodeId: opts.nodeId, dbDir });

  let node: BulletinNode;
  try {
    node = await BulletinNode.create({
      nodeId: opts.nodeId,
      peers: opts.peers ?? [],
      log,
      transport: createHttpPeerTransport({ selfId: opts.nodeId }),
      auth,
      retry: opts.retry,
      reconcileIntervalMs: opts.reconcileIntervalMs,
      logger: opts.logger,
    });
  } catch (err) {
    await log.close();
    throw err;
  }

  let server: Awaited<ReturnType<typeof startBulletinServer>>;
  try {
    server = await startBulletinServer({
      node,
      login: (username, password) => auth.login(username, password),
      adminKey: opts.adminKey,
      host,
      port,
      logger: logger.child("http"),
    });
  } catch (err) {
    await node.close();
    throw err;
  }

  logger.info("node started", { url: server.url, dbDir, peers: node.peers().length, messages: node.status().messages });

  return {
    nodeId: opts.nodeId,
    host: server.host,
    port: server.port,
    url: server.url,
    dbDir,
    node,
    close: async () => {
      await server.close();
      await node.close();
    },
  };
}
