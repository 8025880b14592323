/** Thrown when a path or host pattern cannot be compiled, or carries a flag RE2 does not take. */
export class MatcherError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "MatcherError";
	}
}

/** A Context subclass defines a helper under a reserved DSL name. */
export class RedefinitionError extends MatcherError {
	readonly helper: string;

	constructor(helper: string) {
		super(`cannot redefine reserved routing helper "${helper}"`);
		this.name = "RedefinitionError";
		this.helper = helper;
	}
}

/** `ctx.session` was read but nothing installed a session on the request. */
export class MissingSessionError extends Error {
	constructor() {
		super(
			"You're missing a session handler. Install one with router.use(), " +
				"setting req.session before the router runs.",
		);
		this.name = "MissingSessionError";
	}
}
