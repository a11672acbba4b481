/**
 * Decimal — money and quantity type for the whole engine.
 *
 * Every price, size, increment and notional is a Decimal. Binary floats are
 * never used for money: a misquantized price is rejected by the venue and a
 * misquantized size overspends by epsilons that compound across reprices.
 * Internals are decimal.js-light through LibDecimal.
 */

import { LibDecimal } from "../lib/decimal/index.js";

export class Decimal {
	private readonly inner: LibDecimal;

	private constructor(inner: LibDecimal) {
		this.inner = inner;
	}

	// ── Factories ──────────────────────────────────────────────────

	static from(value: string | number): Decimal {
		return new Decimal(LibDecimal.from(value));
	}

	/** Parse without throwing; `null` for empty or non-numeric input. */
	static tryFrom(value: string | number | null | undefined): Decimal | null {
		if (value === null || value === undefined) return null;
		try {
			return Decimal.from(value);
		} catch {
			return null;
		}
	}

	static zero(): Decimal {
		return new Decimal(LibDecimal.zero());
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.inner.add(other.inner));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.inner.sub(other.inner));
	}

	mul(other: Decimal): Decimal {
		return new Decimal(this.inner.mul(other.inner));
	}

	div(other: Decimal): Decimal {
		return new Decimal(this.inner.div(other.inner));
	}

	// ── Quantization ───────────────────────────────────────────────

	/** Largest multiple of `step` not further from zero than this value. */
	floorToStep(step: Decimal): Decimal {
		return new Decimal(this.inner.floorToStep(step.inner));
	}

	/** Cut to `places` decimal places, never rounding up. */
	truncate(places: number): Decimal {
		return new Decimal(this.inner.truncate(places));
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: Decimal): boolean {
		return this.inner.eq(other.inner);
	}

	gt(other: Decimal): boolean {
		return this.inner.gt(other.inner);
	}

	gte(other: Decimal): boolean {
		return this.inner.gte(other.inner);
	}

	lt(other: Decimal): boolean {
		return this.inner.lt(other.inner);
	}

	lte(other: Decimal): boolean {
		return this.inner.lte(other.inner);
	}

	isZero(): boolean {
		return this.inner.isZero();
	}

	isPositive(): boolean {
		return this.inner.isPositive();
	}

	isNegative(): boolean {
		return this.inner.isNegative();
	}

	static min(a: Decimal, b: Decimal): Decimal {
		return a.lte(b) ? a : b;
	}

	static sum(values: Iterable<Decimal>): Decimal {
		let total = Decimal.zero();
		for (const v of values) total = total.add(v);
		return total;
	}

	// ── Conversion ─────────────────────────────────────────────────

	toString(): string {
		return this.inner.toString();
	}

	toJSON(): string {
		return this.toString();
	}
}
