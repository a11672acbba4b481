/**
 * Auth types — Coinbase CDP API keys.
 *
 * A CDP key is a key name ("organizations/{org}/apiKeys/{id}") plus an EC
 * private key in PEM form. Both are sealed into opaque Credentials before
 * they reach any code that might log.
 */

/** Raw CDP key material before sealing. */
export interface CdpKey {
	/** Key name, sent as the JWT `kid` and `sub`. */
	readonly keyName: string;
	/** PEM-encoded EC (P-256) private key. */
	readonly privateKey: string;
}

/** Claims and header inputs for one signed request. */
export interface RequestJwtInput {
	readonly method: string;
	readonly host: string;
	readonly path: string;
	/** Unix seconds. */
	readonly nowSec: number;
	readonly nonce: string;
}
