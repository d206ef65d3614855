import { expect, test } from "vitest";

import { AuthorizationError, ConfigurationError } from "@bulletin/interface";

import { base64urlDecode, base64urlEncode } from "../src/base64url.js";
import { SessionAuthGate, bearerToken, parseUserTable } from "../src/gate.js";
import { equalSecrets, signSessionToken, verifySessionToken } from "../src/token.js";

const SECRET = "test-secret";
const T0 = 1_700_000_000_000;

test("login issues a token that verifies to the user", () => {
  const gate = new SessionAuthGate({ secret: SECRET, now: () => T0 });
  const token = gate.login("alice", "password1");

  expect(token).toMatch(/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/);
  expect(gate.verify(token)).toEqual({ username: "alice" });
  expect(gate.authorize(token)).toEqual({ username: "alice" });
});

test("bad credentials are rejected", () => {
  const gate = new SessionAuthGate({ secret: SECRET });
  expect(() => gate.login("alice", "nope")).toThrow(AuthorizationError);
  expect(() => gate.login("mallory", "password1")).toThrow("invalid credentials");
});

test("tokens are checked for presence, shape and signature", () => {
  const gate = new SessionAuthGate({ secret: SECRET });
  const token = gate.login("bob", "password2");
  const [payload = "", mac = ""] = token.split(".");
  const tampered = `${payload.startsWith("A") ? "B" : "A"}${payload.slice(1)}`;

  expect(() => gate.verify(undefined)).toThrow("authentication required");
  expect(() => gate.verify("")).toThrow("authentication required");
  expect(() => gate.verify("garbage")).toThrow("invalid token");
  expect(() => gate.verify(`${payload}.${mac}.x`)).toThrow("invalid token");
  expect(() => gate.verify(`${tampered}.${mac}`)).toThrow("invalid token");

  const other = new SessionAuthGate({ secret: "other-secret" });
  expect(() => other.verify(token)).toThrow("invalid token");
});

test("tokens expire after the ttl", () => {
  let now = T0;
  const gate = new SessionAuthGate({ secret: SECRET, ttlMs: 60_000, now: () => now });
  const token = gate.login("carol", "password3");

  now = T0 + 59_000;
  expect(gate.verify(token)).toEqual({ username: "carol" });
  now = T0 + 60_000;
  expect(() => gate.verify(token)).toThrow("token expired");
});

test("a token for a user no longer configured is refused", () => {
  const issuer = new SessionAuthGate({ secret: SECRET });
  const token = issuer.login("alice", "password1");

  const gate = new SessionAuthGate({ secret: SECRET, users: { bob: "password2" } });
  expect(() => gate.verify(token)).toThrow("unknown user");
});

test("any node sharing the secret accepts the token", () => {
  const a = new SessionAuthGate({ secret: SECRET });
  const b = new SessionAuthGate({ secret: SECRET });
  expect(b.verify(a.login("alice", "password1"))).toEqual({ username: "alice" });
});

test("session claims survive signing", () => {
  const claims = { sub: "alice", iat: 100, exp: 200, jti: "00ff" };
  expect(verifySessionToken(SECRET, signSessionToken(SECRET, claims))).toEqual(claims);
  expect(() => verifySessionToken("wrong-secret", signSessionToken(SECRET, claims))).toThrow("bad token signature");
});

test("configuration is validated", () => {
  expect(() => new SessionAuthGate({ secret: "" })).toThrow(ConfigurationError);
  expect(() => new SessionAuthGate({ secret: SECRET, ttlMs: 10 })).toThrow("invalid token ttl: 10");
});

test("bearerToken extracts the token from an Authorization header", () => {
  expect(bearerToken("Bearer abc.def")).toBe("abc.def");
  expect(bearerToken("bearer   abc.def ")).toBe("abc.def");
  expect(bearerToken("Basic abc")).toBeUndefined();
  expect(bearerToken(undefined)).toBeUndefined();
});

test("parseUserTable reads user:password pairs", () => {
  expect(parseUserTable("alice:pw-a, bob:pw:b,")).toEqual({ alice: "pw-a", bob: "pw:b" });
  expect(() => parseUserTable("alice")).toThrow('invalid user entry: "alice"');
  expect(() => parseUserTable(":pw")).toThrow('invalid user entry: ":pw"');
});

test("base64url round-trips bytes and rejects foreign alphabets", () => {
  const bytes = new Uint8Array([0, 250, 251, 252, 253, 254, 255]);
  expect(base64urlEncode(bytes)).toBe("APr7_P3-_w");
  expect(base64urlDecode("APr7_P3-_w")).toEqual(bytes);
  expect(() => base64urlDecode("AP+/")).toThrow("invalid base64url");
});

test("secrets compare by value", () => {
  expect(equalSecrets("test-secret", "test-secret")).toBe(true);
  expect(equalSecrets("test-secret", "test-secreT")).toBe(false);
  expect(equalSecrets("test-secret", "test-secret-longer")).toBe(false);
  expect(equalSecrets("", "")).toBe(true);
});
