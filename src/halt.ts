import type { Outcome } from "./http/response.ts";

/**
 * Thrown to unwind every clause between a commit and its dispatch boundary.
 *
 * Carries the context that raised it so a nested dispatch never catches a
 * halt meant for an outer one.
 */
export class Halt {
	constructor(
		readonly owner: object,
		readonly outcome: Outcome,
	) {}
}
