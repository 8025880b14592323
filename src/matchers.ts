import type { Context } from "./context.ts";
import { compileSearch } from "./cursor.ts";
import { type PredicateExpression, pattern } from "./expressions.ts";

/** Wrap an arbitrary test as a matcher. A truthy result is a match. */
export function when(test: (ctx: Context) => unknown): PredicateExpression {
	return { kind: "predicate", test };
}

/**
 * Match a final segment ending in `.ext`, capturing the part before it.
 *
 * @example
 *   // GET /styles/app.css
 *   ctx.on("styles", extension("css"), (file) => ctx.res.write(`${file}`)); // "app"
 */
export function extension(ext = "\\w+"): PredicateExpression {
	return when((ctx) => ctx.consume(`([^/]+?)\\.${ext}\\z`));
}

/**
 * Capture a request parameter when it is present and non-empty.
 *
 * Never fails the clause: a missing or empty parameter just adds no capture.
 */
export function param(key: string): PredicateExpression {
	return when((ctx) => {
		const value = ctx.req.param(key);
		if (value !== null && value !== "") ctx.captures.push(value);
		return true;
	});
}

/** Match when the request carries the header, whatever its value. */
export function header(name: string): PredicateExpression {
	return when((ctx) => ctx.req.header(name) !== null);
}

/**
 * Match when the Accept header lists `mimetype` exactly, and answer with it:
 * the response Content-Type is set on a match.
 */
export function accept(mimetype: string): PredicateExpression {
	return when((ctx) => {
		const listed = (ctx.req.header("accept") ?? "").split(",").some((s) => s.trim() === mimetype);
		if (listed) ctx.res.setHeader("Content-Type", mimetype);
		return listed;
	});
}

/** Match the request host by equality, or by a pattern found anywhere in it. */
export function host(name: string | RegExp): PredicateExpression {
	return when((ctx) => matchesHost(name, ctx.req.host));
}

export function matchesHost(name: string | RegExp, actual: string): boolean {
	if (typeof name === "string") return name === actual;

	const { pattern: source, flags } = pattern(name);
	return compileSearch(source, flags).matcher(actual).find();
}
