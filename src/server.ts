// Process entry: env, logger, app, port.

import { createServer } from "node:http";
import { createApp } from "./app.js";
import { env } from "./lib/env.js";
import { createLogger } from "./lib/logger.js";

const logger = createLogger(env);
const app = createApp({ env, logger });
const server = createServer(app);

server.listen(env.PORT, () => {
    logger.info({ port: env.PORT, showExceptions: env.SHOW_EXCEPTIONS }, "server is listening");
});

// stop accepting connections; in-flight requests finish
const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    server.close((err) => {
        if (err) {
            logger.error({ err }, "server close failed");
            process.exitCode = 1;
        }
    });
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
