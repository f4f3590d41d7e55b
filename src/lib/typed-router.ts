import type { Request, RequestHandler, Response, Router as ExpressRouter } from "express";
import { Router } from "express";
import type { ResponseGate } from "../gate/response-gate.js";
import type { DownstreamHandler, GateResponse, RequestContext } from "../gate/types.js";

export const createRouter = (): ExpressRouter => Router();

export type { ExpressRouter };

export interface RouteContext extends RequestContext {
    readonly req: Request;
}

export type RouteHandler = DownstreamHandler<RouteContext>;

// res.locals is untyped, so narrow what the identity middleware left there
export function contextOf(req: Request, res: Response): RouteContext {
    const identity: unknown = res.locals.identity;
    return { identity: typeof identity === "string" ? identity : undefined, req };
}

export function sendGateResponse(res: Response, response: GateResponse): void {
    res.status(response.status).set(response.headers).send(response.body);
}

// Route handlers return a response value instead of writing to res,
// so every one of them goes through the gate before anything is sent.
// A throwing handler is left to Express 5, which hands the rejection to the error middleware.
export function respond(gate: ResponseGate, handler: RouteHandler): RequestHandler {
    return async (req, res) => {
        const response = await gate.handle(contextOf(req, res), handler);
        sendGateResponse(res, response);
    };
}

export function jsonResponse(status: number, value: unknown): GateResponse {
    return {
        status,
        headers: { "Content-Type": "application/json; charset=utf-8" },
        body: JSON.stringify(value),
    };
}
