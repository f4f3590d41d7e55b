import type { GateResponse } from "./types.js";
import { STATUS_PLACEHOLDER } from "./options.js";

export interface SubstituteSpec {
    readonly status: number;
    readonly contentType: string;
    readonly bodyTemplate: string;
}

// The downstream status code is the only thing that may leak into the substitute.
export function buildSubstitute(spec: SubstituteSpec, originalStatus: number): GateResponse {
    return {
        status: spec.status,
        headers: { "Content-Type": spec.contentType },
        body: spec.bodyTemplate.replaceAll(STATUS_PLACEHOLDER, String(originalStatus)),
    };
}
