/**
 * Opaque credential container — secrets never leak through toString,
 * JSON.stringify, or Node.js inspect.
 */

import { inspect } from "node:util";
import { AuthError } from "../shared/errors.js";
import type { CdpKey } from "./types.js";

const store = new WeakMap<Credentials, CdpKey>();

const REDACTED = "[REDACTED]";

/**
 * Sealed API key. The only way back to the raw key is `unwrapCredentials`.
 *
 * @example
 * const creds = createCredentials({ keyName: "organizations/o/apiKeys/k", privateKey: pem });
 * console.log(creds); // [REDACTED]
 */
export class Credentials {
	readonly __opaque = true;

	toString(): string {
		return REDACTED;
	}

	toJSON(): string {
		return REDACTED;
	}

	[inspect.custom](): string {
		return REDACTED;
	}
}

/** @throws AuthError if the key name or private key is blank */
export function createCredentials(key: CdpKey): Credentials {
	if (key.keyName.trim().length === 0) {
		throw new AuthError("CDP key name must not be empty");
	}
	if (key.privateKey.trim().length === 0) {
		throw new AuthError("CDP private key must not be empty");
	}
	const sealed = new Credentials();
	// Env files often carry the PEM with literal "\n" sequences.
	store.set(sealed, {
		keyName: key.keyName.trim(),
		privateKey: key.privateKey.replace(/\\n/g, "\n"),
	});
	return sealed;
}

/** @throws AuthError if the object was not produced by createCredentials */
export function unwrapCredentials(credentials: Credentials): CdpKey {
	const key = store.get(credentials);
	if (!key) {
		throw new AuthError("Invalid credentials object");
	}
	return { ...key };
}
