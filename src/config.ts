/**
 * Router configuration.
 *
 * Config-driven construction path:
 *   dict (JSON/YAML) -> parseRouterConfig() -> RouterConfig -> new Router(..., { config })
 *
 * | Key                    | Field              | Default                    |
 * |------------------------|--------------------|----------------------------|
 * | not_found_status       | notFoundStatus     | 404                        |
 * | default_content_type   | defaultContentType | "text/html; charset=utf-8" |
 * | log_level              | logLevel           | "warn"                     |
 * | settings               | settings           | {}                         |
 */

import { type LogLevel, isLogLevel } from "./logger.ts";

export const DEFAULT_NOT_FOUND_STATUS = 404;
export const DEFAULT_CONTENT_TYPE = "text/html; charset=utf-8";
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export class RouterConfig {
	constructor(
		/** Status of the outcome when no clause commits. */
		readonly notFoundStatus: number = DEFAULT_NOT_FOUND_STATUS,
		/** Content-Type every response starts with. */
		readonly defaultContentType: string = DEFAULT_CONTENT_TYPE,
		readonly logLevel: LogLevel = DEFAULT_LOG_LEVEL,
		/** Free-form values handler code reads through `ctx.settings`. */
		readonly settings: Readonly<Record<string, unknown>> = {},
	) {}
}

/** Error parsing a config dict into a RouterConfig. */
export class ConfigParseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigParseError";
	}
}

const KNOWN_KEYS = new Set(["not_found_status", "default_content_type", "log_level", "settings"]);

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

/**
 * Parse an unknown value into a RouterConfig.
 *
 * Missing keys take their defaults; unknown keys are rejected.
 */
export function parseRouterConfig(data: unknown): RouterConfig {
	if (data === undefined || data === null) return new RouterConfig();
	if (!isRecord(data)) {
		throw new ConfigParseError(`expected object, got ${describe(data)}`);
	}

	const unknown = Object.keys(data).filter((k) => !KNOWN_KEYS.has(k));
	if (unknown.length > 0) {
		throw new ConfigParseError(
			`unknown config keys: [${unknown.sort().join(", ")}] (expected: [${[...KNOWN_KEYS].sort().join(", ")}])`,
		);
	}

	return new RouterConfig(
		parseStatus(data.not_found_status),
		parseContentType(data.default_content_type),
		parseLogLevel(data.log_level),
		parseSettings(data.settings),
	);
}

function parseStatus(value: unknown): number {
	if (value === undefined) return DEFAULT_NOT_FOUND_STATUS;
	if (typeof value !== "number" || !Number.isInteger(value)) {
		throw new ConfigParseError(`'not_found_status' must be an integer, got ${describe(value)}`);
	}
	if (value < 100 || value > 599) {
		throw new ConfigParseError(`'not_found_status' must be between 100 and 599, got ${value}`);
	}
	return value;
}

function parseContentType(value: unknown): string {
	if (value === undefined) return DEFAULT_CONTENT_TYPE;
	if (typeof value !== "string" || value === "") {
		throw new ConfigParseError(
			`'default_content_type' must be a non-empty string, got ${describe(value)}`,
		);
	}
	return value;
}

function parseLogLevel(value: unknown): LogLevel {
	if (value === undefined) return DEFAULT_LOG_LEVEL;
	if (!isLogLevel(value)) {
		throw new ConfigParseError(
			`'log_level' must be one of [debug, info, warn, error], got ${JSON.stringify(value)}`,
		);
	}
	return value;
}

function parseSettings(value: unknown): Readonly<Record<string, unknown>> {
	if (value === undefined) return {};
	if (!isRecord(value)) {
		throw new ConfigParseError(`'settings' must be an object, got ${describe(value)}`);
	}
	return Object.freeze({ ...value });
}
