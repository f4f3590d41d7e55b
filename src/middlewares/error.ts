// Turns an error into an exception page, then lets the gate decide who may see it.

import type { ErrorRequestHandler } from "express";
import type { ResponseGate } from "../gate/response-gate.js";
import { renderException } from "../lib/debug-pages.js";
import { statusOf } from "../lib/http-error.js";
import { contextOf, sendGateResponse } from "../lib/typed-router.js";

export function errorHandler(gate: ResponseGate, showExceptions: boolean): ErrorRequestHandler {
    return async (err, req, res, next) => {
        req.log.error({ err }, "request failed");

        // too late to replace anything; let Express close the connection
        if (res.headersSent) {
            next(err);
            return;
        }

        const status = statusOf(err);
        const response = await gate.handle(contextOf(req, res), () =>
            renderException(req, err, status, showExceptions),
        );
        sendGateResponse(res, response);
    };
}
