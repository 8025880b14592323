import { CaptureStack } from "./captures.ts";
import type { Capture } from "./cursor.ts";
import { MissingSessionError } from "./errors.ts";
import {
	type MatcherInput,
	type PredicateExpression,
	evaluateExpression,
	segment,
	toExpression,
} from "./expressions.ts";
import { Halt } from "./halt.ts";
import type { Request, Session } from "./http/request.ts";
import type { Outcome, Response } from "./http/response.ts";
import { accept, extension, header, matchesHost, param, when } from "./matchers.ts";

/** Receives the clause's captures, in the order their matchers ran. */
export type ClauseBody = (...captures: Capture[]) => void;

export type DispatchState = "running" | "committed";

/** Read-only router settings visible to handler code. */
export type Settings = Readonly<Record<string, unknown>>;

/** Anything that turns a request into an outcome: a router, or a middleware-wrapped one. */
export interface App {
	call(req: Request): Outcome;
}

function isClauseBody(value: MatcherInput | ClauseBody): value is ClauseBody {
	return typeof value === "function";
}

/**
 * Per-request routing state and the matcher DSL.
 *
 * A fresh context is built for every dispatch. Subclass it to add helpers;
 * the router refuses subclasses that redefine any name declared here.
 *
 * @example
 *   define((ctx) => {
 *     ctx.on(ctx.get, "users/:id", (id) => {
 *       ctx.res.write(`User: ${id}`);
 *     });
 *   });
 */
export class Context {
	readonly captures = new CaptureStack();
	private halted: Halt | null = null;

	constructor(
		readonly req: Request,
		readonly res: Response,
		readonly settings: Settings,
	) {}

	get state(): DispatchState {
		return this.halted === null ? "running" : "committed";
	}

	/** The committed outcome, or null while the dispatch is still running. */
	get outcome(): Outcome | null {
		return this.halted?.outcome ?? null;
	}

	get session(): Session {
		const session = this.req.session;
		if (session === undefined) throw new MissingSessionError();
		return session;
	}

	/**
	 * Try one clause: every matcher must succeed, left to right.
	 *
	 * On success the body runs with the captures and the response is committed,
	 * ending the whole dispatch. On failure the cursor is put back and control
	 * returns to the caller so the next clause can be tried.
	 *
	 * @example
	 *   ctx.on("styles", ctx.extension("css"), (file) => { ... });
	 */
	on(...args: [...MatcherInput[], ClauseBody]): void {
		const body = args[args.length - 1];
		if (body === undefined || !isClauseBody(body)) {
			throw new TypeError("on() takes a clause body as its last argument");
		}
		// committed dispatches evaluate nothing further
		if (this.halted !== null) throw this.halted;

		const snapshot = this.req.cursor.snapshot();
		try {
			this.captures.reset();
			for (let i = 0; i < args.length - 1; i++) {
				const input = args[i];
				if (isClauseBody(input)) {
					throw new TypeError(`on() matcher ${i} is a function; wrap predicates with when()`);
				}
				if (!evaluateExpression(toExpression(input), this)) return;
			}

			body(...this.captures.snapshotAll());
			this.halt(this.res.finish());
		} finally {
			this.req.cursor.restore(snapshot);
		}
	}

	/** Evaluate a single matcher outside of a clause. */
	match(input: MatcherInput): boolean {
		return evaluateExpression(toExpression(input), this);
	}

	/** Consume one leading path segment, pushing the pattern's captures. */
	consume(pattern: string, flags = 0): boolean {
		const vars = this.req.cursor.consume(pattern, flags);
		if (vars === null) return false;
		this.captures.push(...vars);
		return true;
	}

	/** Commit `outcome` and abandon the rest of the dispatch. */
	halt(outcome: Outcome): never {
		if (this.halted === null) this.halted = new Halt(this, outcome);
		throw this.halted;
	}

	/**
	 * Hand the request, path consumed so far included, to another app and
	 * commit whatever it answers.
	 */
	run(app: App): never {
		return this.halt(app.call(this.req));
	}

	get segment(): typeof segment {
		return segment;
	}

	get default(): boolean {
		return true;
	}

	get get(): boolean {
		return this.req.is("GET");
	}

	get post(): boolean {
		return this.req.is("POST");
	}

	get put(): boolean {
		return this.req.is("PUT");
	}

	get delete(): boolean {
		return this.req.is("DELETE");
	}

	host(name: string | RegExp): boolean {
		return matchesHost(name, this.req.host);
	}

	when(test: (ctx: Context) => unknown): PredicateExpression {
		return when(test);
	}

	extension(ext?: string): PredicateExpression {
		return extension(ext);
	}

	param(key: string): PredicateExpression {
		return param(key);
	}

	header(name: string): PredicateExpression {
		return header(name);
	}

	accept(mimetype: string): PredicateExpression {
		return accept(mimetype);
	}
}
