import { RE2JS } from "re2js";
import { describe, expect, it } from "vitest";
import { MatcherError } from "../src/errors.ts";
import { PathCursor, SEGMENT_PATTERN, compileSearch, compileSegment } from "../src/cursor.ts";

describe("PathCursor", () => {
	it("starts with the whole path remaining", () => {
		const c = new PathCursor("/users/5");
		expect(c.consumed).toBe("");
		expect(c.remaining).toBe("/users/5");
	});

	it("consumes a literal segment and keeps the slash on the rest", () => {
		const c = new PathCursor("/users/5");
		expect(c.consume("users")).toEqual([]);
		expect(c.consumed).toBe("/users");
		expect(c.remaining).toBe("/5");
	});

	it("enforces the segment boundary", () => {
		const c = new PathCursor("/users/5");
		expect(c.consume("user")).toBeNull();
		expect(c.consumed).toBe("");
		expect(c.remaining).toBe("/users/5");
	});

	it("captures one segment", () => {
		const c = new PathCursor("/5");
		expect(c.consume(SEGMENT_PATTERN)).toEqual(["5"]);
		expect(c.consumed).toBe("/5");
		expect(c.remaining).toBe("");
	});

	it("captures only the first of several segments", () => {
		const c = new PathCursor("/5/6");
		expect(c.consume(SEGMENT_PATTERN)).toEqual(["5"]);
		expect(c.remaining).toBe("/6");
	});

	it("returns null for an optional group that did not participate", () => {
		const c = new PathCursor("/a");
		expect(c.consume("a(b)?")).toEqual([null]);
		expect(c.consumed).toBe("/a");
	});

	it("leaves a trailing slash remaining", () => {
		const c = new PathCursor("/users/");
		expect(c.consume("users")).toEqual([]);
		expect(c.remaining).toBe("/");
	});

	it("matches several segments in one pattern", () => {
		const c = new PathCursor("/a/1/b/2/c");
		expect(c.consume("a/([^/]+)/b/([^/]+)")).toEqual(["1", "2"]);
		expect(c.consumed).toBe("/a/1/b/2");
		expect(c.remaining).toBe("/c");
	});

	it("keeps consumed + remaining equal to the path", () => {
		const path = "/a/b/c/d";
		const c = new PathCursor(path);
		for (const p of ["a", "x", SEGMENT_PATTERN, "nope", "c", "d", "e"]) {
			c.consume(p);
			expect(c.consumed + c.remaining).toBe(path);
		}
		expect(c.consumed).toBe(path);
	});

	it("restores a snapshot", () => {
		const c = new PathCursor("/a/b");
		const snap = c.snapshot();
		c.consume("a");
		c.consume("b");
		c.restore(snap);
		expect(c.consumed).toBe("");
		expect(c.remaining).toBe("/a/b");
	});
});

describe("compileSegment", () => {
	it("reuses compiled patterns", () => {
		expect(compileSegment("cached")).toBe(compileSegment("cached"));
	});

	it("rejects backreferences", () => {
		expect(() => compileSegment("(a)\\1")).toThrow(MatcherError);
	});

	it("rejects lookahead", () => {
		expect(() => compileSegment("(?=a)a")).toThrow(MatcherError);
	});
});

describe("compileSearch", () => {
	it("reuses compiled patterns", () => {
		expect(compileSearch("^api\\.")).toBe(compileSearch("^api\\."));
	});

	it("keys the cache by flags", () => {
		expect(compileSearch("api", RE2JS.CASE_INSENSITIVE)).not.toBe(compileSearch("api"));
	});

	it("does not share entries with anchored segment patterns", () => {
		expect(compileSearch("cached")).not.toBe(compileSegment("cached"));
		expect(compileSearch("cached").matcher("x/cached/y").find()).toBe(true);
	});

	it("names the pattern when it cannot compile", () => {
		expect(() => compileSearch("(?<=x)y")).toThrow('invalid pattern "(?<=x)y"');
	});
});
