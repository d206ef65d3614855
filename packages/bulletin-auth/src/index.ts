export * from "./base64url.js";
export * from "./gate.js";
export * from "./token.js";
