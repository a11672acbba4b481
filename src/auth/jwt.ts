/**
 * Request JWTs for the Coinbase Advanced Trade API.
 *
 * Every REST call carries its own short-lived ES256 token whose `uri` claim
 * pins the method, host and path it was minted for.
 */

import { randomBytes } from "node:crypto";
import jwt, { type JwtHeader } from "jsonwebtoken";
import { AuthError } from "../shared/errors.js";
import { unwrapCredentials } from "./credentials.js";
import type { Credentials } from "./credentials.js";
import type { RequestJwtInput } from "./types.js";

const TOKEN_LIFETIME_SEC = 120;
const METHOD_RE = /^[A-Z]+$/;

/** 16 random bytes, hex encoded; Coinbase rejects replayed nonces. */
export function createNonce(): string {
	return randomBytes(16).toString("hex");
}

/**
 * Mints a bearer token for a single request.
 *
 * @throws AuthError if the method or path is malformed or the key cannot sign
 * @example
 * const token = buildRequestJwt(creds, {
 *   method: "GET", host: "api.coinbase.com", path: "/api/v3/brokerage/accounts",
 *   nowSec: Math.floor(Date.now() / 1000), nonce: createNonce(),
 * });
 */
export function buildRequestJwt(credentials: Credentials, input: RequestJwtInput): string {
	const { keyName, privateKey } = unwrapCredentials(credentials);
	if (!METHOD_RE.test(input.method)) {
		throw new AuthError("Method must contain only uppercase ASCII letters");
	}
	if (!input.path.startsWith("/")) {
		throw new AuthError("Path must start with /");
	}
	if (!Number.isInteger(input.nowSec) || input.nowSec <= 0) {
		throw new AuthError("nowSec must be a positive integer");
	}

	const header: JwtHeader & { nonce: string } = {
		alg: "ES256",
		kid: keyName,
		nonce: input.nonce,
		typ: "JWT",
	};
	const payload = {
		sub: keyName,
		iss: "cdp",
		nbf: input.nowSec,
		exp: input.nowSec + TOKEN_LIFETIME_SEC,
		uri: `${input.method} ${input.host}${input.path}`,
	};

	try {
		return jwt.sign(payload, privateKey, { algorithm: "ES256", header, noTimestamp: true });
	} catch (cause) {
		throw new AuthError("Failed to sign request JWT with the configured private key", { cause });
	}
}
