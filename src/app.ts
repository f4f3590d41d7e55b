// Builds the Express app. Nothing here listens; server.ts and the supertest suites do that.

import express from "express";
import type { Express } from "express";
import helmet from "helmet";
import cors from "cors";
import { ResponseGate } from "./gate/index.js";
import { env as processEnv, gateOptionsFromEnv, type Env } from "./lib/env.js";
import { httpLogger } from "./lib/http-logger.js";
import { createLogger, type Logger } from "./lib/logger.js";
import { identityFromHeader } from "./middlewares/identity.js";
import { notFound } from "./middlewares/not-found.js";
import { errorHandler } from "./middlewares/error.js";
import { createRoutes } from "./routes/index.js";

export interface AppOptions {
    env?: Env;
    logger?: Logger;
    // built from env when omitted
    gate?: ResponseGate;
}

export function createApp(options: AppOptions = {}): Express {
    const env = options.env ?? processEnv;
    const logger = options.logger ?? createLogger(env);
    const gate = options.gate ?? new ResponseGate(gateOptionsFromEnv(env), { logger });
    const app = express();

    // 1) helmet headers go on every response, substitutes too
    app.use(helmet());

    // 2) cors
    app.use(cors());

    // 3) req.log exists from here on, so the error handler can rely on it
    app.use(httpLogger({ logger }));

    // 4) identity before parsing, so a malformed body is judged with the caller known
    app.use(identityFromHeader(env.IDENTITY_HEADER));

    // 5) json bodies
    app.use(express.json());

    // 6) routes, each one wrapped by respond()
    const routes = createRoutes({ gate, showExceptions: env.SHOW_EXCEPTIONS });
    app.use("/", routes.router);

    // 7) unmatched paths
    app.use(notFound(gate, routes.table, env.SHOW_EXCEPTIONS));

    // 8) error handler, registered last
    app.use(errorHandler(gate, env.SHOW_EXCEPTIONS));

    return app;
}
