import { RouterConfig } from "./config.ts";
import { type App, Context, type Settings } from "./context.ts";
import { RedefinitionError } from "./errors.ts";
import { Halt } from "./halt.ts";
import type { Request } from "./http/request.ts";
import { type Outcome, Response } from "./http/response.ts";
import { Logger } from "./logger.ts";

/** Top of the matcher tree: runs once per request against a fresh context. */
export type Handler<C extends Context> = (ctx: C) => void;

/** Wraps an app; the first middleware registered ends up outermost. */
export type Middleware = (next: App) => App;

export interface ContextClass<C extends Context> {
	new (req: Request, res: Response, settings: Settings): C;
	readonly prototype: C;
}

export interface RouterOptions {
	config?: RouterConfig;
	logger?: Logger;
}

/** Names the DSL owns. Context subclasses may not redefine them. */
export const RESERVED_NAMES: ReadonlySet<string> = new Set([
	...Object.getOwnPropertyNames(Context.prototype).filter((name) => name !== "constructor"),
	"req",
	"res",
	"captures",
	"settings",
]);

/** Throws RedefinitionError if any class between `contextClass` and Context redefines a DSL name. */
export function assertNoRedefinitions<C extends Context>(contextClass: ContextClass<C>): void {
	let proto: object | null = contextClass.prototype;
	while (proto !== null && proto !== Context.prototype) {
		for (const name of Object.getOwnPropertyNames(proto)) {
			if (name !== "constructor" && RESERVED_NAMES.has(name)) {
				throw new RedefinitionError(name);
			}
		}
		proto = Object.getPrototypeOf(proto);
	}
}

/**
 * Dispatch controller.
 *
 * Each dispatch runs the handler top to bottom. The first clause to succeed
 * (or an explicit `ctx.halt`) commits the outcome and unwinds everything
 * still in progress; a handler that runs to the end without committing gets
 * the not-found outcome. Faults raised by handler code are logged and
 * rethrown untouched.
 */
export class Router<C extends Context = Context> implements App {
	readonly config: RouterConfig;
	readonly logger: Logger;
	private readonly middleware: Middleware[] = [];
	private prototype: App | null = null;

	constructor(
		readonly contextClass: ContextClass<C>,
		private readonly handler: Handler<C>,
		options: RouterOptions = {},
	) {
		assertNoRedefinitions(contextClass);
		this.config = options.config ?? new RouterConfig();
		this.logger = options.logger ?? new Logger({ level: this.config.logLevel });
	}

	get settings(): Settings {
		return this.config.settings;
	}

	use(middleware: Middleware): this {
		this.middleware.push(middleware);
		this.prototype = null;
		return this;
	}

	/** Run the request through the middleware stack and the handler. */
	call(req: Request): Outcome {
		if (this.prototype === null) {
			const core: App = { call: (r) => this.dispatch(r) };
			this.prototype = this.middleware.reduceRight<App>((next, mw) => mw(next), core);
		}
		return this.prototype.call(req);
	}

	/** Run the handler alone, bypassing middleware. */
	dispatch(req: Request): Outcome {
		const res = new Response({ "Content-Type": this.config.defaultContentType });
		const ctx = new this.contextClass(req, res, this.config.settings);
		const log = this.logger.child({ method: req.method, path: req.path });

		try {
			this.handler(ctx);
		} catch (e) {
			if (e instanceof Halt) {
				// another dispatch's commit passing through on its way out
				if (e.owner !== ctx) throw e;
				log.debug("dispatch committed", { status: e.outcome.status });
				return e.outcome;
			}
			log.error("handler fault", e instanceof Error ? e : new Error(String(e)));
			throw e;
		}

		// handler code caught its own halt; the first commit still stands
		const committed = ctx.outcome;
		if (committed !== null) return committed;

		res.status = this.config.notFoundStatus;
		log.debug("no clause matched", { status: res.status });
		return res.finish();
	}

	/** New router with this one's config and logger (middleware is not inherited). */
	derive<D extends Context>(contextClass: ContextClass<D>, handler: Handler<D>): Router<D> {
		return new Router(contextClass, handler, { config: this.config, logger: this.logger });
	}
}

/** Router over the plain Context. */
export function define(handler: Handler<Context>, options: RouterOptions = {}): Router<Context> {
	return new Router(Context, handler, options);
}
