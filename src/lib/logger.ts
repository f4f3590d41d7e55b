import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";
import type { Env } from "./env.js";

export type { Logger };

// silent under NODE_ENV=test whatever LOG_LEVEL says
export function createLogger(config: Pick<Env, "NODE_ENV" | "LOG_LEVEL">): Logger {
    const level: LevelWithSilent = config.NODE_ENV === "test" ? "silent" : config.LOG_LEVEL;
    return pino({
        name: "staging-gate",
        level,
        // credentials stay out of the request logs
        redact: ["req.headers.authorization", "req.headers[\"proxy-authorization\"]", "req.headers.cookie"],
    });
}
