/**
 * Client order ids — idempotency keys for one campaign.
 *
 * The venue deduplicates on the key, so a reused key would silently turn a
 * resubmission into a no-op. The issuer hands out each key at most once.
 */

import { randomUUID } from "node:crypto";
import { type ClientOrderId, clientOrderId, idToString } from "../shared/identifiers.js";

export type ClientOrderIdFactory = () => string;

export const randomClientOrderId: ClientOrderIdFactory = () => randomUUID();

const MAX_ATTEMPTS = 10;

export class ClientOrderIdIssuer {
	private readonly issued = new Set<string>();
	private readonly factory: ClientOrderIdFactory;
	private preset: ClientOrderId | null;

	/**
	 * @param preset - caller-supplied key, returned by the first `next()` only
	 */
	constructor(
		factory: ClientOrderIdFactory = randomClientOrderId,
		preset: ClientOrderId | null = null,
	) {
		this.factory = factory;
		this.preset = preset;
	}

	/** @throws Error if the factory keeps producing keys already issued */
	next(): ClientOrderId {
		const preset = this.preset;
		this.preset = null;
		if (preset && this.claim(preset)) return preset;

		for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
			const key = clientOrderId(this.factory());
			if (this.claim(key)) return key;
		}
		throw new Error(`Client order id factory repeated issued keys ${MAX_ATTEMPTS} times`);
	}

	/** Number of distinct keys handed out. */
	get size(): number {
		return this.issued.size;
	}

	private claim(key: ClientOrderId): boolean {
		const raw = idToString(key);
		if (this.issued.has(raw)) return false;
		this.issued.add(raw);
		return true;
	}
}
