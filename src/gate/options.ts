import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const STATUS_PLACEHOLDER = "{{status}}";

export const DEFAULT_SUBSTITUTE_BODY =
    "<!DOCTYPE html><html><head><title>Unauthorized</title></head>" +
    `<body><h1>Unauthorized</h1><p>Request failed with status ${STATUS_PLACEHOLDER}.</p></body></html>`;

const HttpStatus = z.number().int().min(100).max(599);

export const GateOptionsSchema = z
    .object({
        sensitiveRangeLow: z.number().int().default(400),
        sensitiveRangeHigh: z.number().int().default(599),
        substituteStatus: HttpStatus.default(401),
        substituteContentType: z.string().trim().min(1).default("text/html"),
        substituteBodyTemplate: z.string().default(DEFAULT_SUBSTITUTE_BODY),
    })
    .refine((o) => o.sensitiveRangeLow <= o.sensitiveRangeHigh, {
        message: "sensitiveRangeLow must not be greater than sensitiveRangeHigh",
        path: ["sensitiveRangeLow"],
    });

// What callers may pass (everything optional) and what the gate works with.
export type ResponseGateOptions = z.input<typeof GateOptionsSchema>;
export type ResolvedGateOptions = z.output<typeof GateOptionsSchema>;

export function resolveGateOptions(input: unknown = {}): ResolvedGateOptions {
    const parsed = GateOptionsSchema.safeParse(input ?? {});
    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid response gate options:\n${z.prettifyError(parsed.error)}`,
            parsed.error.issues,
        );
    }
    return parsed.data;
}
