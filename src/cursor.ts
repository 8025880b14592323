import { RE2JS } from "re2js";

import { MatcherError } from "./errors.ts";

/** A bound value: a captured substring, or null for an optional group that did not take part. */
export type Capture = string | null;

/** Pattern for one path segment: anything up to the next slash. */
export const SEGMENT_PATTERN = "([^/]+)";

/** Compiled patterns kept per (pattern, flags). Cleared wholesale when full. */
export const MAX_CACHED_PATTERNS = 1024;

const compiled = new Map<string, RE2JS>();

function compileCached(source: string, flags: number, label: string): RE2JS {
	const key = `${flags}:${source}`;
	const cached = compiled.get(key);
	if (cached !== undefined) return cached;

	let re: RE2JS;
	try {
		re = RE2JS.compile(source, flags);
	} catch (e) {
		throw new MatcherError(`invalid ${label}: ${e instanceof Error ? e.message : String(e)}`);
	}

	if (compiled.size >= MAX_CACHED_PATTERNS) compiled.clear();
	compiled.set(key, re);
	return re;
}

/**
 * Compile a segment pattern anchored at a leading slash.
 *
 * The pattern is wrapped as `\A/(pattern)(/|\z)` so that it must be followed
 * by a separator or the end of the path: "user" never matches "/users".
 * RE2 rejects backreferences and lookaround; those patterns throw MatcherError.
 */
export function compileSegment(pattern: string, flags = 0): RE2JS {
	return compileCached(`\\A/(${pattern})(/|\\z)`, flags, `path pattern "${pattern}"`);
}

/** Compile an unanchored pattern for searching anywhere in a value. Shares the segment cache. */
export function compileSearch(pattern: string, flags = 0): RE2JS {
	return compileCached(pattern, flags, `pattern "${pattern}"`);
}

/** Saved cursor markers, restored when a clause fails. */
export interface CursorSnapshot {
	readonly consumed: string;
	readonly remaining: string;
}

/**
 * The request path split into what routing has consumed and what is left.
 *
 * `consumed + remaining` always equals the path the cursor was created with.
 */
export class PathCursor {
	consumed: string;
	remaining: string;

	constructor(readonly path: string) {
		this.consumed = "";
		this.remaining = path;
	}

	/**
	 * Consume one leading segment matching `pattern`.
	 *
	 * Returns the pattern's own capture groups in order, or null (cursor
	 * untouched) when the remaining path does not start with a match.
	 */
	consume(pattern: string, flags = 0): Capture[] | null {
		const m = compileSegment(pattern, flags).matcher(this.remaining);
		if (!m.find()) return null;

		const last = m.groupCount();
		const vars: Capture[] = [];
		for (let i = 2; i < last; i++) {
			vars.push(m.group(i) ?? null);
		}

		const separator = m.group(last) ?? "";
		this.consumed += `/${m.group(1) ?? ""}`;
		this.remaining = separator + this.remaining.slice(m.end());
		return vars;
	}

	snapshot(): CursorSnapshot {
		return { consumed: this.consumed, remaining: this.remaining };
	}

	restore(snapshot: CursorSnapshot): void {
		this.consumed = snapshot.consumed;
		this.remaining = snapshot.remaining;
	}
}
