// Routes that fail on purpose, so a staging box can show what its error pages look like.
// Only mounted while exception pages are enabled.

import { z } from "zod";
import type { ResponseGate } from "../gate/response-gate.js";
import { HttpError } from "../lib/http-error.js";
import { createRouter, respond, type ExpressRouter } from "../lib/typed-router.js";

const ErrorStatus = z.coerce.number().int().min(400).max(599);

export function debugRoutes(gate: ResponseGate): ExpressRouter {
    const router = createRouter();

    router.get("/boom", respond(gate, () => {
        throw new Error("Kaboom");
    }));

    router.get("/status/:code", respond(gate, ({ req }) => {
        const code = ErrorStatus.safeParse(req.params.code);
        if (!code.success) {
            throw new HttpError(400, `Not an error status: ${req.params.code}`);
        }
        throw new HttpError(code.data, `Requested failure with status ${code.data}`);
    }));

    return router;
}
