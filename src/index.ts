// Dispatch
export { Router, RESERVED_NAMES, assertNoRedefinitions, define } from "./router.ts";
export type { ContextClass, Handler, Middleware, RouterOptions } from "./router.ts";
export { Context } from "./context.ts";
export type { App, ClauseBody, DispatchState, Settings } from "./context.ts";
export { Halt } from "./halt.ts";
// HTTP views: import from "clause-router/http"
// Test utilities (serve, bodyText): import from "clause-router/testing"

// Path cursor and captures
export { MAX_CACHED_PATTERNS, PathCursor, SEGMENT_PATTERN, compileSearch, compileSegment } from "./cursor.ts";
export type { Capture, CursorSnapshot } from "./cursor.ts";
export { CaptureStack } from "./captures.ts";

// Matchers
export { evaluateExpression, literal, pattern, segment, toExpression } from "./expressions.ts";
export type {
	BooleanExpression,
	LiteralExpression,
	MatcherExpression,
	MatcherInput,
	PatternExpression,
	PredicateExpression,
	SegmentExpression,
} from "./expressions.ts";
export { accept, extension, header, host, matchesHost, param, when } from "./matchers.ts";

// Config
export {
	ConfigParseError,
	DEFAULT_CONTENT_TYPE,
	DEFAULT_LOG_LEVEL,
	DEFAULT_NOT_FOUND_STATUS,
	RouterConfig,
	parseRouterConfig,
} from "./config.ts";

// Errors and logging
export { MatcherError, MissingSessionError, RedefinitionError } from "./errors.ts";
export { Logger, isLogLevel } from "./logger.ts";
export type { LogEntry, LogLevel, LoggerOptions } from "./logger.ts";
