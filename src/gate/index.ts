export { ResponseGate, type ResponseGateDeps } from "./response-gate.js";
export {
    GateOptionsSchema,
    resolveGateOptions,
    DEFAULT_SUBSTITUTE_BODY,
    STATUS_PLACEHOLDER,
    type ResponseGateOptions,
    type ResolvedGateOptions,
} from "./options.js";
export { createStatusRange, statusInRange, DEFAULT_STATUS_RANGE, type StatusRange } from "./status-range.js";
export { buildSubstitute, type SubstituteSpec } from "./substitute.js";
export { hasIdentity } from "./identity.js";
export { ConfigurationError } from "./errors.js";
export type { GateResponse, RequestContext, DownstreamHandler, ResponseHeaders, ResponseBody } from "./types.js";
