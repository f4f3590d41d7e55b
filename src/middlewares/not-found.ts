import type { RequestHandler } from "express";
import type { ResponseGate } from "../gate/response-gate.js";
import { renderNotFound, type RouteEntry } from "../lib/debug-pages.js";
import { respond } from "../lib/typed-router.js";

// Last in the chain: nothing matched, so answer 404 (through the gate like everything else).
export function notFound(gate: ResponseGate, routes: readonly RouteEntry[], showExceptions: boolean): RequestHandler {
    return respond(gate, ({ req }) => renderNotFound(req, routes, showExceptions));
}
