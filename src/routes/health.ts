import type { ResponseGate } from "../gate/response-gate.js";
import { createRouter, jsonResponse, respond, type ExpressRouter } from "../lib/typed-router.js";

export function healthRoutes(gate: ResponseGate): ExpressRouter {
    const router = createRouter();

    router.get("/", respond(gate, () => jsonResponse(200, { status: "ok", time: new Date().toISOString() })));

    return router;
}
