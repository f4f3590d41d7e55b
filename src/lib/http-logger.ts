import pinoHttpModule from "pino-http";
import type { Options as PinoHttpOptions } from "pino-http";
import type { RequestHandler } from "express";

// under NodeNext the default import is typed as the module namespace, not the factory
const _factory = pinoHttpModule as unknown as ( opts?: PinoHttpOptions ) => RequestHandler;

export function httpLogger( opts?: PinoHttpOptions ): RequestHandler {
    return _factory({
        // level follows the status actually sent, substitutes included
        customLogLevel: (_req, res, err) => {
            if (err || res.statusCode >= 500) return "error";
            if (res.statusCode >= 400) return "warn";
            return "info";
        },
        ...opts,
    });
}
