import { decode, encode, rfc8949EncodeOptions } from "cborg";

import { hmac } from "@noble/hashes/hmac";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, randomBytes, utf8ToBytes } from "@noble/hashes/utils";

import { base64urlDecode, base64urlEncode } from "./base64url.js";

export type SessionClaims = {
  /** Username. */
  sub: string;
  /** Issued-at, seconds since epoch. */
  iat: number;
  /** Expiry, seconds since epoch. */
  exp: number;
  jti: string;
};

function encodeClaims(claims: SessionClaims): Uint8Array {
  const map = new Map<string, string | number>([
    ["sub", claims.sub],
    ["iat", claims.iat],
    ["exp", claims.exp],
    ["jti", claims.jti],
  ]);
  return encode(map, rfc8949EncodeOptions);
}

function toNumber(val: unknown, field: string): number {
  if (typeof val === "number" && Number.isInteger(val)) return val;
  if (typeof val === "bigint") {
    if (val > BigInt(Number.MAX_SAFE_INTEGER)) throw new Error(`${field} too large`);
    return Number(val);
  }
  throw new Error(`${field} must be an integer`);
}

function toText(val: unknown, field: string): string {
  if (typeof val !== "string" || val.length === 0) throw new Error(`${field} must be a non-empty string`);
  return val;
}

function decodeClaims(bytes: Uint8Array): SessionClaims {
  const value: unknown = decode(bytes, { useMaps: true });
  if (!(value instanceof Map)) throw new Error("claims must be a map");
  return {
    sub: toText(value.get("sub"), "sub"),
    iat: toNumber(value.get("iat"), "iat"),
    exp: toNumber(value.get("exp"), "exp"),
    jti: toText(value.get("jti"), "jti"),
  };
}

function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i += 1) diff |= (a[i] ?? 0) ^ (b[i] ?? 0);
  return diff === 0;
}

/**
 * Constant-time string comparison. Both sides are hashed first so the
 * running time does not depend on where, or whether, the lengths differ.
 */
export function equalSecrets(a: string, b: string): boolean {
  return equalBytes(sha256(utf8ToBytes(a)), sha256(utf8ToBytes(b)));
}

export function newTokenId(): string {
  return bytesToHex(randomBytes(16));
}

/**
 * `base64url(cbor(claims)).base64url(hmac-sha256(secret, cbor(claims)))`
 */
export function signSessionToken(secret: string, claims: SessionClaims): string {
  const payload = encodeClaims(claims);
  const mac = hmac(sha256, utf8ToBytes(secret), payload);
  return `${base64urlEncode(payload)}.${base64urlEncode(mac)}`;
}

/**
 * Checks shape and signature only; expiry is the caller's business.
 * Throws a plain Error describing what is wrong.
 */
export function verifySessionToken(secret: string, token: string): SessionClaims {
  const parts = token.split(".");
  if (parts.length !== 2) throw new Error("token must have two parts");
  const [payloadPart = "", macPart = ""] = parts;

  const payload = base64urlDecode(payloadPart);
  const mac = base64urlDecode(macPart);
  const expected = hmac(sha256, utf8ToBytes(secret), payload);
  if (!equalBytes(mac, expected)) throw new Error("bad token signature");

  return decodeClaims(payload);
}
