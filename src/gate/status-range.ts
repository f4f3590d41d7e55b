import { ConfigurationError } from "./errors.js";

/** Closed interval of HTTP status codes. Both bounds are inclusive. */
export interface StatusRange {
    readonly low: number;
    readonly high: number;
}

export const DEFAULT_STATUS_RANGE: StatusRange = Object.freeze({ low: 400, high: 599 });

export function createStatusRange(low: number, high: number): StatusRange {
    if (!Number.isInteger(low) || !Number.isInteger(high)) {
        throw new ConfigurationError(`Status range bounds must be integers (got ${low}..${high})`);
    }
    if (low > high) {
        throw new ConfigurationError(`Status range is empty: low ${low} is greater than high ${high}`);
    }
    return Object.freeze({ low, high });
}

export function statusInRange(range: StatusRange, status: number): boolean {
    return status >= range.low && status <= range.high;
}
