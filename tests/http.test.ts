import { describe, expect, it } from "vitest";
import { Request } from "../src/http/request.ts";
import { Response } from "../src/http/response.ts";

describe("Request", () => {
	it("splits the query string from the path", () => {
		const req = new Request("get", "/search?q=a%20b+c&flag");
		expect(req.method).toBe("GET");
		expect(req.path).toBe("/search");
		expect(req.query).toBe("q=a%20b+c&flag");
		expect(req.param("q")).toBe("a b c");
		expect(req.param("flag")).toBe("");
		expect(req.cursor.remaining).toBe("/search");
	});

	it("keeps malformed escapes as written", () => {
		expect(new Request("GET", "/?q=%E0%A4%A").param("q")).toBe("%E0%A4%A");
	});

	it("lets form parameters override query parameters", () => {
		const req = new Request("POST", "/?name=query", { form: { name: "form" } });
		expect(req.param("name")).toBe("form");
	});

	it("looks headers up case-insensitively", () => {
		const req = new Request("GET", "/", { headers: { "Content-Type": "text/plain" } });
		expect(req.header("content-type")).toBe("text/plain");
		expect(req.header("CONTENT-TYPE")).toBe("text/plain");
	});

	it("falls back to the configured host", () => {
		expect(new Request("GET", "/", { host: "internal" }).host).toBe("internal");
		expect(new Request("GET", "/").host).toBe("");
	});
});

describe("prototype pollution", () => {
	it("query param __proto__ is an ordinary parameter", () => {
		const req = new Request("GET", "/?__proto__=evil");
		expect(req.param("__proto__")).toBe("evil");
		expect(Object.getPrototypeOf({})).toBe(Object.prototype);
	});

	it("missing query param returns null (not inherited property)", () => {
		const req = new Request("GET", "/?a=1");
		expect(req.param("toString")).toBeNull();
		expect(req.param("hasOwnProperty")).toBeNull();
	});

	it("missing header returns null (not inherited property)", () => {
		const req = new Request("GET", "/", { headers: { "x-custom": "value" } });
		expect(req.header("toString")).toBeNull();
		expect(req.header("constructor")).toBeNull();
	});
});

describe("Response", () => {
	it("tracks Content-Length in bytes", () => {
		const res = new Response();
		res.write("caf");
		res.write("é");
		expect(res.header("content-length")).toBe("5");
		expect(res.finish()).toEqual({
			status: 200,
			headers: { "Content-Length": "5" },
			body: ["caf", "é"],
		});
	});

	it("keeps the first casing of a header name", () => {
		const res = new Response({ "Content-Type": "text/html" });
		res.setHeader("content-type", "text/plain");
		expect(res.finish().headers).toEqual({ "Content-Type": "text/plain" });
	});

	it("redirects", () => {
		const res = new Response();
		res.redirect("/login");
		expect(res.finish()).toEqual({ status: 302, headers: { Location: "/login" }, body: [] });
	});

	it("drops body and entity headers for 204 and 304", () => {
		const res = new Response({ "Content-Type": "text/html" });
		res.write("ignored");
		res.status = 304;
		expect(res.finish()).toEqual({ status: 304, headers: {}, body: [] });
	});
});
