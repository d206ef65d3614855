import type { AuthGate, Logger, Principal } from "@bulletin/interface";
import { AuthorizationError, ConfigurationError, silentLogger } from "@bulletin/interface";

import type { SessionClaims } from "./token.js";
import { newTokenId, signSessionToken, verifySessionToken } from "./token.js";

/** Demo accounts; replace through `users`. */
export const DEFAULT_USERS: Readonly<Record<string, string>> = Object.freeze({
  alice: "password1",
  bob: "password2",
  carol: "password3",
});

export const DEFAULT_TOKEN_TTL_MS = 24 * 60 * 60 * 1000;

export type SessionAuthGateOptions = {
  secret: string;
  users?: Readonly<Record<string, string>>;
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
};

/**
 * Username/password login issuing HMAC-signed session tokens that every node
 * sharing `secret` accepts.
 */
export class SessionAuthGate implements AuthGate {
  private readonly secret: string;
  private readonly users: ReadonlyMap<string, string>;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(opts: SessionAuthGateOptions) {
    if (opts.secret.length === 0) throw new ConfigurationError("token secret must not be empty");
    this.secret = opts.secret;
    this.users = new Map(Object.entries(opts.users ?? DEFAULT_USERS));
    this.ttlMs = opts.ttlMs ?? DEFAULT_TOKEN_TTL_MS;
    if (!Number.isFinite(this.ttlMs) || this.ttlMs < 1000) {
      throw new ConfigurationError(`invalid token ttl: ${opts.ttlMs}`);
    }
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? silentLogger;
  }

  login(username: string, password: string): string {
    const expected = this.users.get(username);
    if (expected === undefined || expected !== password) {
      this.logger.warn("login rejected", { username });
      throw new AuthorizationError("invalid credentials");
    }

    const iat = Math.floor(this.now() / 1000);
    const claims: SessionClaims = { sub: username, iat, exp: iat + Math.floor(this.ttlMs / 1000), jti: newTokenId() };
    this.logger.debug("login", { username, jti: claims.jti });
    return signSessionToken(this.secret, claims);
  }

  verify(token: string | undefined): Principal {
    if (token === undefined || token.length === 0) throw new AuthorizationError("authentication required");

    let claims: SessionClaims;
    try {
      claims = verifySessionToken(this.secret, token);
    } catch (err) {
      this.logger.debug("token rejected", { err: err instanceof Error ? err.message : String(err) });
      throw new AuthorizationError("invalid token");
    }

    if (Math.floor(this.now() / 1000) >= claims.exp) throw new AuthorizationError("token expired");
    if (!this.users.has(claims.sub)) throw new AuthorizationError("unknown user");
    return { username: claims.sub };
  }

  authorize(token: string | undefined): Principal {
    return this.verify(token);
  }
}

/**
 * Token from an `Authorization: Bearer <token>` header value.
 */
export function bearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match?.[1];
}

/**
 * `user:password` pairs separated by commas.
 */
export function parseUserTable(raw: string): Record<string, string> {
  const users: Record<string, string> = {};
  for (const part of raw.split(",")) {
    const entry = part.trim();
    if (entry.length === 0) continue;
    const colon = entry.indexOf(":");
    if (colon <= 0 || colon === entry.length - 1) {
      throw new ConfigurationError(`invalid user entry: ${JSON.stringify(entry)}`);
    }
    users[entry.slice(0, colon)] = entry.slice(colon + 1);
  }
  return users;
}
