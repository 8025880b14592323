import type { App } from "./context.ts";
import { Request, type RequestInit } from "./http/request.ts";
import type { Outcome } from "./http/response.ts";

/** Build a request and run it through `app`, in place of a real server. */
export function serve(app: App, method: string, rawPath: string, init: RequestInit = {}): Outcome {
	return app.call(new Request(method, rawPath, init));
}

/** The outcome's body chunks joined into one string. */
export function bodyText(outcome: Outcome): string {
	return outcome.body.join("");
}
