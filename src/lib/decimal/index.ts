/**
 * LibDecimal — thin wrapper around decimal.js-light.
 *
 * Venue prices and sizes arrive as decimal strings and must be cut to tick
 * and lot increments without binary rounding. Domain code goes through the
 * shared/decimal facade and never imports decimal.js-light directly.
 */
import { Decimal as DecimalLight } from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers), empty or not numeric (for strings)
	 * @example LibDecimal.from("0.00000001")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		try {
			return new LibDecimal(new DecimalLight(trimmed));
		} catch {
			throw new Error(`LibDecimal.from: not a decimal "${trimmed}"`);
		}
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/** @throws Error if dividing by zero */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	// ── Quantization ───────────────────────────────────────────────

	/**
	 * Largest multiple of `step` between zero and this value (truncates toward zero).
	 * @throws Error if step is not positive
	 * @example LibDecimal.from("1.239").floorToStep(LibDecimal.from("0.01")) // "1.23"
	 */
	floorToStep(step: LibDecimal): LibDecimal {
		if (!step.raw.greaterThan(0)) {
			throw new Error("LibDecimal.floorToStep: step must be positive");
		}
		return new LibDecimal(this.raw.dividedToIntegerBy(step.raw).times(step.raw));
	}

	/**
	 * Drops digits past `places` decimal places without rounding.
	 * @example LibDecimal.from("0.123456789").truncate(8) // "0.12345678"
	 */
	truncate(places: number): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(places, DecimalLight.ROUND_DOWN));
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: LibDecimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation without trailing zeros.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed === "-0" ? "0" : fixed;
		}
		const stripped = fixed.replace(/0+$/, "").replace(/\.$/, "");
		return stripped === "-0" ? "0" : stripped;
	}
}
