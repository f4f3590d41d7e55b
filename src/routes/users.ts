// No database here: the route validates the body and echoes back a mock user.

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { ResponseGate } from "../gate/response-gate.js";
import { createRouter, jsonResponse, respond, type ExpressRouter } from "../lib/typed-router.js";

export const CreateUserSchema = z.object({
    email: z.email(),
    name: z.string().min(1),
});

export type CreateUser = z.infer<typeof CreateUserSchema>;

export function usersRoutes(gate: ResponseGate): ExpressRouter {
    const router = createRouter();

    router.post("/", respond(gate, ({ req }) => {
        const parsed = CreateUserSchema.safeParse(req.body);

        if (!parsed.success) {
            const tree = z.treeifyError(parsed.error);
            return jsonResponse(400, { error: "ValidationError", issues: tree });
        }

        return jsonResponse(201, { id: randomUUID(), ...parsed.data });
    }));

    return router;
}
