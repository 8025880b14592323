/**
 * Dispatch benchmarks.
 *
 * Measures the hot path: clause evaluation with cursor restore, captures,
 * nesting, and the cost of trying many sibling clauses before a hit.
 *
 * Run: npm run bench
 */

import { bench, run, summary } from "mitata";

import { type Context, type Router, define } from "../src/index.ts";
import { Request } from "../src/http/index.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

function dispatch(app: Router, path: string): void {
	app.call(new Request("GET", path));
}

function siblings(n: number): Router {
	return define((ctx: Context) => {
		for (let i = 0; i < n; i++) {
			ctx.on(`rule_${i}`, () => ctx.res.write(`rule ${i}`));
		}
		ctx.on("target", ":id", (id) => ctx.res.write(`target ${id}`));
	});
}

// ── Core scenarios ───────────────────────────────────────────────────────────

summary(() => {
	const app = define((ctx) => {
		ctx.on("api", () => ctx.res.write("api"));
	});

	bench("literal_hit", () => dispatch(app, "/api"));
	bench("literal_miss_not_found", () => dispatch(app, "/other"));
});

summary(() => {
	const app = define((ctx) => {
		ctx.on("users/:id/posts/:post", (id, post) => ctx.res.write(`${id}/${post}`));
	});
	const regexApp = define((ctx) => {
		ctx.on(/users\/(\d+)\/posts\/(\d+)/, (id, post) => ctx.res.write(`${id}/${post}`));
	});

	bench("template_two_captures", () => dispatch(app, "/users/12/posts/34"));
	bench("regex_two_captures", () => dispatch(regexApp, "/users/12/posts/34"));
});

// ── Nesting ──────────────────────────────────────────────────────────────────

summary(() => {
	const app = define((ctx) => {
		ctx.on("api", () => {
			ctx.on("v1", () => {
				ctx.on("users", () => {
					ctx.on(":id", (id) => ctx.res.write(`user ${id}`));
				});
			});
		});
	});

	bench("nested_depth_4", () => dispatch(app, "/api/v1/users/7"));
});

// ── Scaling: sibling clauses ─────────────────────────────────────────────────

summary(() => {
	for (const n of [10, 50, 100]) {
		const app = siblings(n);
		bench(`siblings_${n}_last_match`, () => dispatch(app, "/target/9"));
	}
});

await run();
