import http from "node:http";

import { bearerToken, equalSecrets } from "@bulletin/auth";
import type { Logger } from "@bulletin/interface";
import { BulletinError, InvalidMessageError, silentLogger } from "@bulletin/interface";
import type { BulletinErrorCode } from "@bulletin/interface";
import type { BulletinNode, ReconciliationReport } from "@bulletin/sync";
import { REPLICATE_PATH, SNAPSHOT_PATH, decodeReplicateRequest } from "@bulletin/sync/http";
import type { ReplicateResponse, SnapshotResponse } from "@bulletin/sync/http";

export type LoginHandler = (username: string, password: string) => string;

export type BulletinRequestHandlerOptions = {
  node: BulletinNode;
  /** Enables `POST /login`. */
  login?: LoginHandler;
  /** When set, admin routes require a matching `x-admin-key` header. */
  adminKey?: string;
  maxBodyBytes?: number;
  logger?: Logger;
};

export type BulletinServerOptions = BulletinRequestHandlerOptions & {
  host?: string;
  port?: number;
};

export type BulletinServerHandle = {
  host: string;
  port: number;
  url: string;
  close: () => Promise<void>;
};

export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

const STATUS_BY_CODE: Record<BulletinErrorCode, number> = {
  AUTHORIZATION_ERROR: 401,
  DUPLICATE_ID: 409,
  PEER_UNREACHABLE: 502,
  RECONCILIATION_PARTIAL_FAILURE: 500,
  PERSISTENCE_ERROR: 500,
  NODE_OFFLINE: 503,
  INVALID_MESSAGE: 400,
  CONFIGURATION_ERROR: 500,
};

export function statusForError(err: unknown): number {
  return err instanceof BulletinError ? STATUS_BY_CODE[err.code] : 500;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

type Reply = { status: number; body: unknown };

type RouteContext = {
  req: http.IncomingMessage;
  readJson: () => Promise<unknown>;
};

type Route = {
  method: "GET" | "POST";
  path: string;
  admin?: boolean;
  handle: (ctx: RouteContext) => Promise<Reply> | Reply;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;
    const fail = (err: Error) => {
      if (settled) return;
      settled = true;
      reject(err);
    };
    req.on("data", (chunk: Buffer) => {
      if (settled) return;
      size += chunk.length;
      if (size > limit) {
        fail(new HttpError(413, `request body exceeds ${limit} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    req.once("end", () => {
      if (settled) return;
      settled = true;
      resolve(Buffer.concat(chunks).toString("utf8"));
    });
    // Client went away before the body was complete.
    const aborted = () => fail(new HttpError(400, "request aborted"));
    req.once("error", (err) => (req.complete ? fail(err) : aborted()));
    req.once("close", () => {
      if (!req.complete) aborted();
    });
  });
}

/**
 * JSON-safe form of a reconciliation report (errors flattened to messages).
 */
export function reportToJson(report: ReconciliationReport): Record<string, unknown> {
  return {
    status: report.status,
    added: report.added,
    pushed: report.pushed,
    peers: report.peers.map((p) => (p.status === "failed" ? { peerId: p.peerId, status: p.status, error: p.error.message } : p)),
    failedPeers: report.partialFailure?.failures.map((f) => f.peerId) ?? [],
  };
}

function buildRoutes(opts: BulletinRequestHandlerOptions): Route[] {
  const { node, login } = opts;

  const routes: Route[] = [
    { method: "GET", path: "/health", handle: () => ({ status: 200, body: "ok" }) },
    {
      method: "POST",
      path: REPLICATE_PATH,
      handle: async ({ readJson }) => {
        const { from, messages } = decodeReplicateRequest(await readJson());
        const { added } = await node.ingest(from, messages);
        const body: ReplicateResponse = { status: "ok", added };
        return { status: 200, body };
      },
    },
    {
      method: "GET",
      path: SNAPSHOT_PATH,
      handle: () => {
        const body: SnapshotResponse = { nodeId: node.nodeId, messages: node.snapshot() };
        return { status: 200, body };
      },
    },
    {
      method: "GET",
      path: "/messages",
      handle: () => ({ status: 200, body: { messages: node.listMessages() } }),
    },
    {
      method: "POST",
      path: "/messages",
      handle: async ({ req, readJson }) => {
        const body = await readJson();
        if (!isRecord(body)) throw new InvalidMessageError("request body must be an object");
        const author = body.author;
        if (author !== undefined && typeof author !== "string") throw new InvalidMessageError("author must be a string");
        const message = await node.postMessage({
          token: bearerToken(req.headers.authorization),
          content: body.content,
          author,
        });
        return { status: 201, body: { message } };
      },
    },
    { method: "GET", path: "/peers", handle: () => ({ status: 200, body: { peers: node.peers() } }) },
    { method: "GET", path: "/status", handle: () => ({ status: 200, body: node.status() }) },
    {
      method: "POST",
      path: "/admin/offline",
      admin: true,
      handle: () => {
        const changed = node.goOffline();
        return { status: 200, body: { mode: node.state.mode, changed } };
      },
    },
    {
      method: "POST",
      path: "/admin/online",
      admin: true,
      handle: async () => {
        const report = await node.goOnline();
        return {
          status: 200,
          body: { mode: node.state.mode, changed: report !== null, report: report ? reportToJson(report) : null },
        };
      },
    },
    {
      method: "POST",
      path: "/admin/reconcile",
      admin: true,
      handle: async () => ({ status: 200, body: reportToJson(await node.reconcile()) }),
    },
  ];

  if (login) {
    routes.push({
      method: "POST",
      path: "/login",
      handle: async ({ readJson }) => {
        const body = await readJson();
        const username = isRecord(body) ? body.username : undefined;
        const password = isRecord(body) ? body.password : undefined;
        if (typeof username !== "string" || typeof password !== "string" || !username || !password) {
          throw new InvalidMessageError("username and password required");
        }
        return { status: 200, body: { token: login(username, password) } };
      },
    });
  }

  return routes;
}

function adminKeyMatches(req: http.IncomingMessage, adminKey: string): boolean {
  const given = req.headers["x-admin-key"];
  return typeof given === "string" && equalSecrets(given, adminKey);
}

function send(res: http.ServerResponse, reply: Reply): void {
  if (typeof reply.body === "string") {
    res.writeHead(reply.status, { "content-type": "text/plain" });
    res.end(reply.body);
    return;
  }
  res.writeHead(reply.status, { "content-type": "application/json" });
  res.end(JSON.stringify(reply.body));
}

/**
 * Request listener serving the client surface, the admin switches and the
 * node-to-node replication endpoints of one node.
 */
export function createBulletinRequestHandler(opts: BulletinRequestHandlerOptions): RequestHandler {
  const logger = opts.logger ?? silentLogger;
  const maxBodyBytes = Number(opts.maxBodyBytes ?? 10 * 1024 * 1024);
  if (!Number.isFinite(maxBodyBytes) || maxBodyBytes <= 0) throw new Error(`invalid maxBodyBytes: ${opts.maxBodyBytes}`);
  const routes = buildRoutes(opts);

  const dispatch = async (req: http.IncomingMessage): Promise<Reply> => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const matching = routes.filter((r) => r.path === url.pathname);
    if (matching.length === 0) throw new HttpError(404, "not found");
    const route = matching.find((r) => r.method === req.method);
    if (!route) throw new HttpError(405, "method not allowed");

    if (route.admin && opts.adminKey !== undefined && !adminKeyMatches(req, opts.adminKey)) {
      throw new HttpError(401, "admin key required");
    }

    const readJson = async (): Promise<unknown> => {
      const text = await readBody(req, maxBodyBytes);
      if (text.length === 0) return {};
      try {
        return JSON.parse(text);
      } catch {
        throw new HttpError(400, "invalid JSON body");
      }
    };
    return route.handle({ req, readJson });
  };

  return (req, res) => {
    void (async () => {
      let reply: Reply;
      try {
        reply = await dispatch(req);
      } catch (err) {
        if (err instanceof HttpError) {
          reply = { status: err.status, body: { error: err.message } };
        } else if (err instanceof BulletinError) {
          const status = statusForError(err);
          if (status >= 500) logger.error("request failed", { method: req.method, url: req.url, err });
          reply = { status, body: { error: err.message, code: err.code } };
        } else {
          logger.error("unhandled request error", { method: req.method, url: req.url, err });
          reply = { status: 500, body: { error: "internal error" } };
        }
      }
      logger.debug("request", { method: req.method, url: req.url, status: reply.status });
      if (res.headersSent || res.destroyed) return;
      send(res, reply);
    })();
  };
}

export async function startBulletinServer(opts: BulletinServerOptions): Promise<BulletinServerHandle> {
  const host = opts.host ?? "0.0.0.0";
  const port = Number(opts.port ?? 5001);
  if (!Number.isFinite(port) || port < 0) throw new Error(`invalid port: ${opts.port}`);

  const server = http.createServer(createBulletinRequestHandler(opts));

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, resolve);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address ? address.port : port;

  const close = async (): Promise<void> => {
    const closed = new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    server.closeAllConnections();
    await closed;
  };

  return { host, port: actualPort, url: `http://${host}:${actualPort}`, close };
}
