import path from "node:path";

import { Command, InvalidArgumentError } from "commander";

import { parseUserTable } from "@bulletin/auth";
import type { LogLevel } from "@bulletin/interface";
import { LOG_LEVELS, isLogLevel, isValidNodeId } from "@bulletin/interface";
import type { PeerConfig } from "@bulletin/sync";
import { parsePeerList } from "@bulletin/sync";

export type NodeCliArgs = {
  nodeId: string;
  host: string;
  port: number;
  peers: PeerConfig[];
  dbDir: string;
  reconcileIntervalMs: number;
  tokenSecret?: string;
  adminKey?: string;
  users?: Record<string, string>;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

function parseNodeId(raw: string): string {
  if (!isValidNodeId(raw)) throw new InvalidArgumentError(`invalid node id: ${raw} (letters, digits, ".", "_", "-")`);
  return raw;
}

function parsePort(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0 || n > 65_535) throw new InvalidArgumentError(`invalid port: ${raw}`);
  return n;
}

function parseInterval(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError(`invalid reconcile interval: ${raw}`);
  return n;
}

function parsePeers(raw: string): PeerConfig[] {
  try {
    return parsePeerList(raw);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function parseUsers(raw: string): Record<string, string> {
  try {
    return parseUserTable(raw);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function parseLogLevel(raw: string): LogLevel {
  if (!isLogLevel(raw)) throw new InvalidArgumentError(`invalid log level: ${raw} (allowed: ${LOG_LEVELS.join(", ")})`);
  return raw;
}

function fromEnv<T>(value: string | undefined, parse: (raw: string) => T): T | undefined {
  return value === undefined || value.length === 0 ? undefined : parse(value);
}

/**
 * Flags win over environment variables, which win over defaults.
 */
export function parseNodeCliArgs(opts: { argv?: string[]; env?: Env } = {}): NodeCliArgs {
  const argv = opts.argv ?? process.argv.slice(2);
  const env = opts.env ?? process.env;

  const program = new Command()
    .name("bulletin-node")
    .description("Run one replicated message board node.")
    .exitOverride()
    .configureOutput({ writeErr: () => {} })
    .option("--node-id <id>", "node id (BULLETIN_NODE_ID)", parseNodeId, fromEnv(env.BULLETIN_NODE_ID, parseNodeId))
    .option("--host <host>", "listen host (HOST)", env.HOST || "0.0.0.0")
    .option("--port <n>", "listen port (PORT)", parsePort, fromEnv(env.PORT, parsePort) ?? 5001)
    .option(
      "--peers <list>",
      "comma-separated peers, id=url or url (BULLETIN_PEERS)",
      parsePeers,
      fromEnv(env.BULLETIN_PEERS, parsePeers) ?? []
    )
    .option("--db-dir <dir>", "database directory (BULLETIN_DB_DIR)", env.BULLETIN_DB_DIR || "./data")
    .option(
      "--reconcile-interval-ms <ms>",
      "periodic anti-entropy interval, 0 disables (BULLETIN_RECONCILE_INTERVAL_MS)",
      parseInterval,
      fromEnv(env.BULLETIN_RECONCILE_INTERVAL_MS, parseInterval) ?? 0
    )
    .option("--token-secret <secret>", "session token secret shared by all nodes (BULLETIN_TOKEN_SECRET)", env.BULLETIN_TOKEN_SECRET)
    .option("--admin-key <key>", "key required on admin routes (BULLETIN_ADMIN_KEY)", env.BULLETIN_ADMIN_KEY)
    .option("--users <list>", "user:password pairs replacing the demo users (BULLETIN_USERS)", parseUsers, fromEnv(env.BULLETIN_USERS, parseUsers))
    .option("--log-level <level>", "log level (BULLETIN_LOG_LEVEL)", parseLogLevel, fromEnv(env.BULLETIN_LOG_LEVEL, parseLogLevel) ?? "info");

  program.parse(argv, { from: "user" });

  const parsed = program.opts<{
    nodeId?: string;
    host: string;
    port: number;
    peers: PeerConfig[];
    dbDir: string;
    reconcileIntervalMs: number;
    tokenSecret?: string;
    adminKey?: string;
    users?: Record<string, string>;
    logLevel: LogLevel;
  }>();

  if (!parsed.nodeId) throw new InvalidArgumentError("node id is required (--node-id or BULLETIN_NODE_ID)");

  return {
    nodeId: parsed.nodeId,
    host: parsed.host,
    port: parsed.port,
    peers: parsed.peers,
    dbDir: path.resolve(parsed.dbDir),
    reconcileIntervalMs: parsed.reconcileIntervalMs,
    tokenSecret: parsed.tokenSecret || undefined,
    adminKey: parsed.adminKey || undefined,
    users: parsed.users,
    logLevel: parsed.logLevel,
  };
}
