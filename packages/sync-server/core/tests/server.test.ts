import http from "node:http";

import { afterEach, expect, test, vi } from "vitest";

import { SessionAuthGate } from "@bulletin/auth";
import { createMemoryMessageLog } from "@bulletin/interface";
import type { LogContext, Logger, Message } from "@bulletin/interface";
import { BulletinNode } from "@bulletin/sync";
import type { PeerConfig, Sleep } from "@bulletin/sync";
import { createHttpPeerTransport } from "@bulletin/sync/http";

import { createBulletinRequestHandler, startBulletinServer } from "../src/server.js";

const SECRET = "test-secret";
const ADMIN_KEY = "test-admin-key";
const instantSleep: Sleep = async (_ms, signal) => !signal?.aborted;

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  for (const cleanup of cleanups.splice(0).reverse()) await cleanup();
});

async function createNode(nodeId: string, peers: PeerConfig[] = []) {
  const auth = new SessionAuthGate({ secret: SECRET });
  const node = await BulletinNode.create({
    nodeId,
    peers,
    log: createMemoryMessageLog(nodeId),
    transport: createHttpPeerTransport({ selfId: nodeId }),
    auth,
    sleep: instantSleep,
    now: () => new Date("2024-05-01T12:00:00.000Z"),
  });
  cleanups.push(() => node.close());
  return { node, auth };
}

type CallResult = { status: number; body: unknown };

async function call(
  baseUrl: string,
  method: string,
  path: string,
  opts: { json?: unknown; raw?: string; headers?: Record<string, string> } = {}
): Promise<CallResult> {
  const headers: Record<string, string> = { ...opts.headers };
  let body: string | undefined;
  if (opts.raw !== undefined) body = opts.raw;
  else if (opts.json !== undefined) body = JSON.stringify(opts.json);
  if (body !== undefined) headers["content-type"] = "application/json";

  const res = await fetch(`${baseUrl}${path}`, { method, headers, body });
  const text = await res.text();
  const isJson = res.headers.get("content-type") === "application/json";
  return { status: res.status, body: isJson ? JSON.parse(text) : text };
}

async function startSingleNode() {
  const { node, auth } = await createNode("n1");
  const server = await startBulletinServer({
    node,
    login: (username, password) => auth.login(username, password),
    adminKey: ADMIN_KEY,
    host: "127.0.0.1",
    port: 0,
  });
  cleanups.push(() => server.close());
  return { node, auth, url: server.url };
}

function remoteMessage(seq: number): Message {
  return {
    id: `n2:${seq}`,
    author: "bob",
    content: `remote ${seq}`,
    logicalTs: { counter: seq, nodeId: "n2" },
    originNode: "n2",
    createdAt: "2024-01-01T00:00:00.000Z",
  };
}

test("health endpoint returns ok", async () => {
  const { url } = await startSingleNode();
  expect(await call(url, "GET", "/health")).toEqual({ status: 200, body: "ok" });
});

test("login issues tokens for known users only", async () => {
  const { url, auth } = await startSingleNode();

  const ok = await call(url, "POST", "/login", { json: { username: "alice", password: "password1" } });
  expect(ok.status).toBe(200);
  const token = typeof ok.body === "object" && ok.body !== null && "token" in ok.body ? ok.body.token : undefined;
  expect(typeof token).toBe("string");
  expect(auth.verify(String(token))).toEqual({ username: "alice" });

  expect(await call(url, "POST", "/login", { json: { username: "alice", password: "wrong" } })).toEqual({
    status: 401,
    body: { error: "invalid credentials", code: "AUTHORIZATION_ERROR" },
  });
  expect(await call(url, "POST", "/login", { json: { username: "alice" } })).toEqual({
    status: 400,
    body: { error: "username and password required", code: "INVALID_MESSAGE" },
  });
});

test("posting requires a bearer token and valid content", async () => {
  const { url, auth } = await startSingleNode();
  const authorization = `Bearer ${auth.login("alice", "password1")}`;

  expect(await call(url, "POST", "/messages", { json: { content: "hi" } })).toEqual({
    status: 401,
    body: { error: "authentication required", code: "AUTHORIZATION_ERROR" },
  });
  expect(await call(url, "POST", "/messages", { json: { content: "   " }, headers: { authorization } })).toEqual({
    status: 400,
    body: { error: "content must not be empty", code: "INVALID_MESSAGE" },
  });

  const created = await call(url, "POST", "/messages", { json: { content: " hello " }, headers: { authorization } });
  const message = {
    id: "n1:1",
    author: "alice",
    content: "hello",
    logicalTs: { counter: 1, nodeId: "n1" },
    originNode: "n1",
    createdAt: "2024-05-01T12:00:00.000Z",
  };
  expect(created).toEqual({ status: 201, body: { message } });
  expect(await call(url, "GET", "/messages")).toEqual({ status: 200, body: { messages: [message] } });
});

test("replicate merges idempotently and snapshot returns the full set", async () => {
  const { url } = await startSingleNode();

  const push = { from: "n2", messages: [remoteMessage(1)] };
  expect(await call(url, "POST", "/replicate", { json: push })).toEqual({ status: 200, body: { status: "ok", added: 1 } });
  expect(await call(url, "POST", "/replicate", { json: push })).toEqual({ status: 200, body: { status: "ok", added: 0 } });

  const invalid = await call(url, "POST", "/replicate", { json: { from: "n2" } });
  expect(invalid.status).toBe(400);
  expect(await call(url, "POST", "/replicate", { raw: "{" })).toEqual({ status: 400, body: { error: "invalid JSON body" } });

  expect(await call(url, "GET", "/snapshot")).toEqual({
    status: 200,
    body: { nodeId: "n1", messages: [remoteMessage(1)] },
  });
});

test("admin switches need the key and an offline node refuses peer traffic", async () => {
  const { url, auth } = await startSingleNode();
  const admin = { "x-admin-key": ADMIN_KEY };

  expect(await call(url, "POST", "/admin/offline")).toEqual({ status: 401, body: { error: "admin key required" } });
  expect(await call(url, "POST", "/admin/offline", { headers: { "x-admin-key": "test-admin-kez" } })).toEqual({
    status: 401,
    body: { error: "admin key required" },
  });
  expect(await call(url, "POST", "/admin/offline", { headers: admin })).toEqual({
    status: 200,
    body: { mode: "offline", changed: true },
  });

  const replicate = await call(url, "POST", "/replicate", { json: { from: "n2", messages: [remoteMessage(1)] } });
  expect(replicate).toEqual({ status: 503, body: { error: "node n1 is offline", code: "NODE_OFFLINE" } });
  expect((await call(url, "GET", "/snapshot")).status).toBe(503);

  const authorization = `Bearer ${auth.login("bob", "password2")}`;
  const local = await call(url, "POST", "/messages", { json: { content: "still here" }, headers: { authorization } });
  expect(local.status).toBe(201);

  expect(await call(url, "POST", "/admin/online", { headers: admin })).toEqual({
    status: 200,
    body: {
      mode: "online",
      changed: true,
      report: { status: "completed", added: 0, pushed: 0, peers: [], failedPeers: [] },
    },
  });
});

test("unknown routes and methods are reported", async () => {
  const { url } = await startSingleNode();
  expect(await call(url, "GET", "/nope")).toEqual({ status: 404, body: { error: "not found" } });
  expect(await call(url, "DELETE", "/messages")).toEqual({ status: 405, body: { error: "method not allowed" } });
});

async function listenLate(): Promise<{ server: http.Server; url: string }> {
  const server = http.createServer();
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", resolve);
  });
  const address = server.address();
  const port = typeof address === "object" && address ? address.port : 0;
  cleanups.push(
    () =>
      new Promise<void>((resolve) => {
        server.close(() => resolve());
        server.closeAllConnections();
      })
  );
  return { server, url: `http://127.0.0.1:${port}` };
}

test("two nodes replicate and reconcile over HTTP", async () => {
  const sa = await listenLate();
  const sb = await listenLate();
  const { node: a, auth } = await createNode("a", [{ peerId: "b", address: sb.url }]);
  const { node: b } = await createNode("b", [{ peerId: "a", address: sa.url }]);
  sa.server.on("request", createBulletinRequestHandler({ node: a }));
  sb.server.on("request", createBulletinRequestHandler({ node: b }));
  const token = auth.login("alice", "password1");

  await a.postMessage({ token, content: "first" });
  await a.replication.flush();
  expect(b.listMessages().map((m) => m.id)).toEqual(["a:1"]);

  b.goOffline();
  await a.postMessage({ token, content: "while b is down" });
  await b.postMessage({ token, content: "b offline note" });
  await a.replication.flush();
  expect(b.listMessages().map((m) => m.id)).toEqual(["a:1", "b:1"]);

  const report = await b.goOnline();
  expect(report).toMatchObject({ status: "completed", added: 1, pushed: 1 });
  expect(a.listMessages().map((m) => m.id)).toEqual(b.listMessages().map((m) => m.id));
  expect(a.listMessages()).toHaveLength(3);
});

type LogEntry = { level: string; message: string; context?: LogContext };

function recordingLogger(entries: LogEntry[]): Logger {
  const logger: Logger = {
    debug: (message, context) => entries.push({ level: "debug", message, context }),
    info: (message, context) => entries.push({ level: "info", message, context }),
    warn: (message, context) => entries.push({ level: "warn", message, context }),
    error: (message, context) => entries.push({ level: "error", message, context }),
    child: () => logger,
  };
  return logger;
}

test("a client that hangs up mid-upload does not leave its request pending", async () => {
  const { server, url } = await listenLate();
  const { node } = await createNode("n1");
  const entries: LogEntry[] = [];
  server.on("request", createBulletinRequestHandler({ node, logger: recordingLogger(entries) }));
  const arrived = new Promise<void>((resolve) => server.once("request", () => resolve()));

  const { port } = new URL(url);
  const client = http.request({
    host: "127.0.0.1",
    port: Number(port),
    method: "POST",
    path: "/messages",
    headers: { "content-type": "application/json", "content-length": "100" },
  });
  const clientErrors: Error[] = [];
  client.on("error", (err) => clientErrors.push(err));
  client.write("{");
  await arrived;
  client.destroy();

  await vi.waitFor(() => {
    expect(entries.filter((e) => e.message === "request")).toEqual([
      { level: "debug", message: "request", context: { method: "POST", url: "/messages", status: 400 } },
    ]);
  });
  expect(entries.filter((e) => e.level === "error")).toEqual([]);
  expect(node.listMessages()).toEqual([]);
});
