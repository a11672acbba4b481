/**
 * Validation wrapper — runs Zod schemas and returns Result<T, ValidationError>.
 *
 * Order intents, schedule files and raw venue payloads all pass through
 * `validate()`. Domain code imports `{ z }` from here, not from "zod".
 */

import { z } from "zod";
import { ErrorCategory, TradingError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Input did not match its schema; no venue call was made. */
export class ValidationError extends TradingError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** "path: message" pairs joined for log lines and CLI output. */
	summary(): string {
		return this.issues
			.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
			.join("; ");
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "Validation failed",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError(label, issues));
}

/** Decimal-looking string or finite number, as venues and JSON configs send them. */
export const decimalInput = z.union([
	z.string().trim().regex(/^-?\d+(\.\d+)?$/, "must be a decimal number"),
	z
		.number()
		.finite()
		.transform((n) => n.toString()),
]);
