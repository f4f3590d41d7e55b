import type { Logger } from "pino";
import { hasIdentity } from "./identity.js";
import { resolveGateOptions, type ResponseGateOptions } from "./options.js";
import { createStatusRange, statusInRange, type StatusRange } from "./status-range.js";
import { buildSubstitute, type SubstituteSpec } from "./substitute.js";
import type { DownstreamHandler, GateResponse, RequestContext } from "./types.js";

export interface ResponseGateDeps {
    logger?: Pick<Logger, "debug">;
}

/**
 * Sits in front of a downstream handler and hides its error responses from
 * callers without an identity marker.
 *
 * The decision only looks at whether the caller is identified and at the
 * downstream status. When it triggers, the whole response is swapped for the
 * configured substitute; otherwise the downstream object is returned as is.
 * Instances keep no per-request state and can be shared between requests.
 */
export class ResponseGate {
    readonly range: StatusRange;
    private readonly substitute: SubstituteSpec;
    private readonly logger?: Pick<Logger, "debug">;

    constructor(options: ResponseGateOptions = {}, deps: ResponseGateDeps = {}) {
        const resolved = resolveGateOptions(options);
        this.range = createStatusRange(resolved.sensitiveRangeLow, resolved.sensitiveRangeHigh);
        this.substitute = Object.freeze({
            status: resolved.substituteStatus,
            contentType: resolved.substituteContentType,
            bodyTemplate: resolved.substituteBodyTemplate,
        });
        this.logger = deps.logger;
    }

    conceals(identity: string | null | undefined, status: number): boolean {
        return !hasIdentity(identity) && statusInRange(this.range, status);
    }

    async handle<C extends RequestContext>(context: C, downstream: DownstreamHandler<C>): Promise<GateResponse> {
        // errors from downstream propagate untouched
        const response = await downstream(context);

        if (!this.conceals(context.identity, response.status)) {
            return response;
        }

        this.logger?.debug(
            { status: response.status, substituteStatus: this.substitute.status },
            "concealed response from unidentified caller",
        );
        return buildSubstitute(this.substitute, response.status);
    }
}
