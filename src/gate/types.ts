// Shapes shared by the gate and whatever hosts it.

export type ResponseHeaders = Readonly<Record<string, string>>;

export type ResponseBody = string | Buffer;

export interface GateResponse {
    readonly status: number;
    readonly headers: ResponseHeaders;
    readonly body: ResponseBody;
}

// The identity marker travels on the context explicitly; the gate never looks it up elsewhere.
export interface RequestContext {
    readonly identity?: string | null;
}

export type DownstreamHandler<C extends RequestContext = RequestContext> =
    (context: C) => GateResponse | Promise<GateResponse>;
