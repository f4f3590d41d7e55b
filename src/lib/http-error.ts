// Thrown from route code to pick the status the error page is rendered with.
export class HttpError extends Error {
    readonly status: number;

    constructor(status: number, message: string) {
        super(message);
        this.name = "HttpError";
        this.status = status;
    }
}

const isErrorStatus = (value: unknown): value is number =>
    typeof value === "number" && Number.isInteger(value) && value >= 400 && value <= 599;

// Reads status (or statusCode, as body-parser sets it); anything else is a 500.
export function statusOf(err: unknown): number {
    if (typeof err === "object" && err !== null) {
        if ("status" in err && isErrorStatus(err.status)) return err.status;
        if ("statusCode" in err && isErrorStatus(err.statusCode)) return err.statusCode;
    }
    return 500;
}
