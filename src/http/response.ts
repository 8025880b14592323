/** The terminal result of one dispatch. Frozen once produced. */
export interface Outcome {
	readonly status: number;
	readonly headers: Readonly<Record<string, string>>;
	readonly body: readonly string[];
}

const BODYLESS_STATUSES = new Set([204, 304]);

const encoder = new TextEncoder();

/**
 * Outbound response handle exposed to clause bodies.
 *
 * Header names keep the casing they were first set with; lookups are
 * case-insensitive.
 */
export class Response {
	status = 200;
	private readonly headers = new Map<string, { name: string; value: string }>();
	private readonly chunks: string[] = [];
	private length = 0;

	constructor(headers: Readonly<Record<string, string>> = {}) {
		for (const [name, value] of Object.entries(headers)) {
			this.setHeader(name, value);
		}
	}

	header(name: string): string | null {
		return this.headers.get(name.toLowerCase())?.value ?? null;
	}

	setHeader(name: string, value: string): void {
		const key = name.toLowerCase();
		const existing = this.headers.get(key);
		this.headers.set(key, { name: existing?.name ?? name, value });
	}

	deleteHeader(name: string): void {
		this.headers.delete(name.toLowerCase());
	}

	/** Append to the body. Content-Length tracks the UTF-8 size. */
	write(chunk: string): void {
		this.chunks.push(chunk);
		this.length += encoder.encode(chunk).length;
		this.setHeader("Content-Length", String(this.length));
	}

	redirect(location: string, status = 302): void {
		this.status = status;
		this.setHeader("Location", location);
	}

	get body(): readonly string[] {
		return this.chunks;
	}

	finish(): Outcome {
		if (BODYLESS_STATUSES.has(this.status)) {
			this.deleteHeader("Content-Type");
			this.deleteHeader("Content-Length");
			return freeze(this.status, this.headers, []);
		}
		return freeze(this.status, this.headers, this.chunks);
	}
}

function freeze(
	status: number,
	headers: ReadonlyMap<string, { name: string; value: string }>,
	body: readonly string[],
): Outcome {
	const plain: Record<string, string> = {};
	for (const { name, value } of headers.values()) {
		plain[name] = value;
	}
	return Object.freeze({
		status,
		headers: Object.freeze(plain),
		body: Object.freeze([...body]),
	});
}
