export { Request } from "./request.ts";
export type { RequestInit, Session } from "./request.ts";
export { Response } from "./response.ts";
export type { Outcome } from "./response.ts";
