// Mounts the route modules. The table below feeds the "known routes" list on the debug 404 page.

import type { ResponseGate } from "../gate/response-gate.js";
import type { RouteEntry } from "../lib/debug-pages.js";
import { createRouter, jsonResponse, respond, type ExpressRouter } from "../lib/typed-router.js";
import { debugRoutes } from "./debug.js";
import { healthRoutes } from "./health.js";
import { usersRoutes } from "./users.js";

export interface RoutesOptions {
    gate: ResponseGate;
    showExceptions: boolean;
}

export interface MountedRoutes {
    router: ExpressRouter;
    table: RouteEntry[];
}

export function createRoutes({ gate, showExceptions }: RoutesOptions): MountedRoutes {
    const router = createRouter();
    const table: RouteEntry[] = [
        { method: "GET", path: "/" },
        { method: "GET", path: "/health" },
        { method: "POST", path: "/users" },
    ];

    router.get("/", respond(gate, () => jsonResponse(200, { ok: true, name: "staging-gate" })));

    router.use("/health", healthRoutes(gate));
    router.use("/users", usersRoutes(gate));

    if (showExceptions) {
        router.use("/debug", debugRoutes(gate));
        table.push({ method: "GET", path: "/debug/boom" }, { method: "GET", path: "/debug/status/:code" });
    }

    return { router, table };
}
