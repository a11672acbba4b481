/**
 * Process configuration read from environment variables.
 *
 * Supported: DCA_SCHEDULE_FILE, DCA_LOG_LEVEL, DCA_PAPER_MODE,
 * DCA_REQUEST_TIMEOUT_MS, COINBASE_API_KEY, COINBASE_API_SECRET.
 * A `.env` file can supply any of them.
 */

import { existsSync, readFileSync } from "node:fs";
import dotenv from "dotenv";
import { ConfigError } from "./errors.js";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
type AppLogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
	/** Path of the JSON schedule file */
	readonly scheduleFile: string;
	readonly logLevel: AppLogLevel;
	/** Run against the in-process paper venue instead of Coinbase */
	readonly paperMode: boolean;
	/** Per-request timeout for venue HTTP calls */
	readonly requestTimeoutMs: number;
	/** CDP key name and PEM; `null` only in paper mode */
	readonly coinbase: { readonly keyName: string; readonly privateKey: string } | null;
}

export const DEFAULT_APP_CONFIG: Omit<AppConfig, "coinbase"> = {
	scheduleFile: "schedule.json",
	logLevel: "info",
	paperMode: false,
	requestTimeoutMs: 10_000,
};

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseLogLevel(raw: string | undefined): AppLogLevel {
	if (raw === undefined || raw === "") return DEFAULT_APP_CONFIG.logLevel;
	const level = LOG_LEVELS.find((l) => l === raw.toLowerCase());
	if (!level) {
		throw new ConfigError(`Invalid DCA_LOG_LEVEL: "${raw}"`, { allowed: LOG_LEVELS });
	}
	return level;
}

function parsePositiveInt(key: string, raw: string | undefined, fallback: number): number {
	if (raw === undefined || raw === "") return fallback;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a positive integer`);
	}
	return parsed;
}

/**
 * Fills gaps in `env` from a dotenv file. Variables already set win; a
 * missing file leaves `env` as it is.
 */
export function withEnvFile(
	path: string,
	env: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
	if (!existsSync(path)) return env;
	let text: string;
	try {
		text = readFileSync(path, "utf8");
	} catch (cause) {
		throw new ConfigError(`Cannot read env file ${path}`, { cause });
	}
	return { ...dotenv.parse(text), ...env };
}

/**
 * Builds the process configuration.
 * @throws ConfigError on malformed values, or when Coinbase keys are missing outside paper mode
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const paperMode = env["DCA_PAPER_MODE"] === "true";
	const keyName = env["COINBASE_API_KEY"];
	const privateKey = env["COINBASE_API_SECRET"];

	let coinbase: AppConfig["coinbase"] = null;
	if (keyName && privateKey) {
		coinbase = { keyName, privateKey };
	} else if (!paperMode) {
		throw new ConfigError("COINBASE_API_KEY and COINBASE_API_SECRET must be set", {
			hasKey: Boolean(keyName),
			hasSecret: Boolean(privateKey),
		});
	}

	return {
		scheduleFile: env["DCA_SCHEDULE_FILE"] || DEFAULT_APP_CONFIG.scheduleFile,
		logLevel: parseLogLevel(env["DCA_LOG_LEVEL"]),
		paperMode,
		requestTimeoutMs: parsePositiveInt(
			"DCA_REQUEST_TIMEOUT_MS",
			env["DCA_REQUEST_TIMEOUT_MS"],
			DEFAULT_APP_CONFIG.requestTimeoutMs,
		),
		coinbase,
	};
}
