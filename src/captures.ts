import type { Capture } from "./cursor.ts";

/**
 * Values bound by the matchers of the clause being evaluated.
 *
 * Reset on entry to every clause, so a sibling clause tried earlier never
 * leaks captures into the next one.
 */
export class CaptureStack {
	private values: Capture[] = [];

	reset(): void {
		this.values = [];
	}

	push(...values: Capture[]): void {
		this.values.push(...values);
	}

	/** Copy of the captures in the order their matchers ran. */
	snapshotAll(): Capture[] {
		return [...this.values];
	}
}
