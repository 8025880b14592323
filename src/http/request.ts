import { PathCursor } from "../cursor.ts";

/** Session store installed on a request by middleware. */
export type Session = Map<string, unknown>;

export interface RequestInit {
	readonly headers?: Readonly<Record<string, string>>;
	/** Decoded form body parameters. They win over query parameters of the same name. */
	readonly form?: Readonly<Record<string, string>>;
	/** Used when there is no Host header. */
	readonly host?: string;
	readonly session?: Session;
}

/**
 * Inbound request view for routing.
 *
 * Query string is parsed from rawPath at construction. Headers are
 * stored lowercased for case-insensitive lookup. The cursor starts with
 * the whole path remaining.
 */
export class Request {
	readonly method: string;
	readonly path: string;
	readonly query: string;
	readonly cursor: PathCursor;
	session: Session | undefined;
	private readonly lowerHeaders = new Map<string, string>();
	private readonly params = new Map<string, string>();
	private readonly fallbackHost: string;

	constructor(method = "GET", readonly rawPath = "/", init: RequestInit = {}) {
		this.method = method.toUpperCase();

		const qIdx = rawPath.indexOf("?");
		this.path = qIdx >= 0 ? rawPath.slice(0, qIdx) : rawPath;
		this.query = qIdx >= 0 ? rawPath.slice(qIdx + 1) : "";
		this.cursor = new PathCursor(this.path);

		for (const part of this.query.split("&")) {
			if (!part) continue;
			const eqIdx = part.indexOf("=");
			if (eqIdx >= 0) {
				this.params.set(decode(part.slice(0, eqIdx)), decode(part.slice(eqIdx + 1)));
			} else {
				this.params.set(decode(part), "");
			}
		}
		for (const [k, v] of Object.entries(init.form ?? {})) {
			this.params.set(k, v);
		}
		for (const [k, v] of Object.entries(init.headers ?? {})) {
			this.lowerHeaders.set(k.toLowerCase(), v);
		}

		this.fallbackHost = init.host ?? "";
		this.session = init.session;
	}

	/** Host header without its port. */
	get host(): string {
		const raw = this.header("host");
		if (raw === null) return this.fallbackHost;
		return raw.replace(/:\d+$/, "");
	}

	header(name: string): string | null {
		return this.lowerHeaders.get(name.toLowerCase()) ?? null;
	}

	param(name: string): string | null {
		return this.params.get(name) ?? null;
	}

	is(method: string): boolean {
		return this.method === method.toUpperCase();
	}
}

function decode(component: string): string {
	const spaced = component.replace(/\+/g, " ");
	try {
		return decodeURIComponent(spaced);
	} catch {
		// malformed escapes are kept as written
		return spaced;
	}
}
