import { RE2JS } from "re2js";

import type { Context } from "./context.ts";
import { SEGMENT_PATTERN } from "./cursor.ts";
import { MatcherError } from "./errors.ts";

/** Sugar for "any one path segment", capturing it. */
export const segment: unique symbol = Symbol("segment");

/** String template; `:name` tokens each capture one segment. */
export interface LiteralExpression {
	readonly kind: "literal";
	readonly pattern: string;
}

/** A caller-supplied pattern; its capture groups become captures. */
export interface PatternExpression {
	readonly kind: "pattern";
	readonly pattern: string;
	readonly flags: number;
}

export interface SegmentExpression {
	readonly kind: "segment";
}

/** Arbitrary test; may consume path, push captures or touch the response. */
export interface PredicateExpression {
	readonly kind: "predicate";
	readonly test: (ctx: Context) => unknown;
}

export interface BooleanExpression {
	readonly kind: "boolean";
	readonly value: boolean;
}

/** Discriminated union of all matcher variants. */
export type MatcherExpression =
	| LiteralExpression
	| PatternExpression
	| SegmentExpression
	| PredicateExpression
	| BooleanExpression;

/** Anything `on` accepts in matcher position. */
export type MatcherInput =
	| MatcherExpression
	| string
	| RegExp
	| boolean
	| null
	| undefined
	| typeof segment;

const TOKEN = /:\w+/g;

const ANY_SEGMENT: SegmentExpression = { kind: "segment" };
const MATCH: BooleanExpression = { kind: "boolean", value: true };
const NO_MATCH: BooleanExpression = { kind: "boolean", value: false };

export function literal(template: string): LiteralExpression {
	return { kind: "literal", pattern: template.replace(TOKEN, SEGMENT_PATTERN) };
}

const RE2_FLAGS: Readonly<Record<string, number>> = {
	i: RE2JS.CASE_INSENSITIVE,
	m: RE2JS.MULTILINE,
	s: RE2JS.DOTALL,
};

/**
 * Wrap a RegExp for segment matching.
 *
 * The source is recompiled with RE2, which takes only the i, m and s flags;
 * any other flag throws MatcherError.
 */
export function pattern(re: RegExp): PatternExpression {
	let flags = 0;
	for (const flag of re.flags) {
		const mapped = RE2_FLAGS[flag];
		if (mapped === undefined) {
			throw new MatcherError(`unsupported flag "${flag}" on /${re.source}/${re.flags}`);
		}
		flags |= mapped;
	}
	return { kind: "pattern", pattern: re.source, flags };
}

export function toExpression(input: MatcherInput): MatcherExpression {
	if (typeof input === "string") return literal(input);
	if (typeof input === "boolean") return input ? MATCH : NO_MATCH;
	if (input === null || input === undefined) return NO_MATCH;
	if (input === segment) return ANY_SEGMENT;
	if (input instanceof RegExp) return pattern(input);
	return input;
}

/** Evaluate one matcher against the context's cursor and captures. */
export function evaluateExpression(expr: MatcherExpression, ctx: Context): boolean {
	switch (expr.kind) {
		case "literal":
			return ctx.consume(expr.pattern);
		case "pattern":
			return ctx.consume(expr.pattern, expr.flags);
		case "segment":
			return ctx.consume(SEGMENT_PATTERN);
		case "predicate":
			return Boolean(expr.test(ctx));
		case "boolean":
			return expr.value;
	}
}
