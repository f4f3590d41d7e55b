import type { z } from "zod";

// Raised while building a gate or loading the environment, never per request.
export class ConfigurationError extends Error {
    readonly issues: z.core.$ZodIssue[];

    constructor(message: string, issues: z.core.$ZodIssue[] = []) {
        super(message);
        this.name = "ConfigurationError";
        this.issues = issues;
    }
}
