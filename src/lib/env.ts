// Process configuration. loadEnv throws ConfigurationError, so server.ts never reaches listen() with a bad value.

import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../gate/errors.js";
import type { ResponseGateOptions } from "../gate/options.js";

dotenv.config({ quiet: true });

const Env = z
    .object({
        NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
        PORT: z.coerce.number().int().min(0).max(65535).default(3000),
        LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
        // staging servers run with this on; production leaves it unset
        SHOW_EXCEPTIONS: z.stringbool().optional(),
        IDENTITY_HEADER: z.string().trim().toLowerCase().min(1).default("x-user-id"),
        // response gate
        GATE_SENSITIVE_LOW: z.coerce.number().int().optional(),
        GATE_SENSITIVE_HIGH: z.coerce.number().int().optional(),
        GATE_SUBSTITUTE_STATUS: z.coerce.number().int().optional(),
        GATE_SUBSTITUTE_CONTENT_TYPE: z.string().optional(),
        GATE_SUBSTITUTE_BODY: z.string().optional(),
    })
    .transform((raw) => ({
        ...raw,
        SHOW_EXCEPTIONS: raw.SHOW_EXCEPTIONS ?? raw.NODE_ENV !== "production",
    }));

export type Env = z.output<typeof Env>;

export function loadEnv(source: Record<string, string | undefined>): Env {
    const parsed = Env.safeParse(source);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid environment:\n${z.prettifyError(parsed.error)}`, parsed.error.issues);
    }
    return parsed.data;
}

// Maps GATE_* variables onto gate options; unset variables fall back to the gate defaults.
export function gateOptionsFromEnv(config: Env): ResponseGateOptions {
    return {
        sensitiveRangeLow: config.GATE_SENSITIVE_LOW,
        sensitiveRangeHigh: config.GATE_SENSITIVE_HIGH,
        substituteStatus: config.GATE_SUBSTITUTE_STATUS,
        substituteContentType: config.GATE_SUBSTITUTE_CONTENT_TYPE,
        substituteBodyTemplate: config.GATE_SUBSTITUTE_BODY,
    };
}

export const env = loadEnv(process.env);
