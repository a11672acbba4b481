/**
 * Logger wrapper — structured JSON logging backed by pino.
 *
 * Opaque credential objects (anything with `__opaque: true`) are replaced
 * before serialization, and key material is redacted by path even when it
 * shows up as a plain string.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

/** Paths always censored, on top of any configured ones. */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"privateKey",
	"*.privateKey",
	"authorization",
	"headers.authorization",
	"headers.Authorization",
];

// ── Credential serializer ───────────────────────────────────────────

function isOpaqueCredential(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		value.__opaque === true
	);
}

function redactCredentials(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaqueCredential(value) ? "[REDACTED]" : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = "info" | "warn" | "error" | "debug";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const write =
		(method: LogMethod) =>
		(msgOrObj: string | Record<string, unknown>, msg?: string): void => {
			if (typeof msgOrObj === "string") {
				pinoLogger[method](msgOrObj);
			} else {
				pinoLogger[method](redactCredentials(msgOrObj), msg ?? "");
			}
		};

	return {
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
		debug: write("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(redactCredentials(bindings)));
		},
	};
}

/**
 * Creates a pino-backed Logger.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.child({ campaignId }).info({ orderId }, "Limit order resting");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
		redact: {
			paths: [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])],
			censor: "[REDACTED]",
		},
	};

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Logger that drops everything; for tests and library use without output. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
