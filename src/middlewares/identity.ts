import type { RequestHandler } from "express";

// Copies the identity marker from a request header into res.locals.
// Whoever sits in front of the app (proxy, auth layer) is trusted to set or strip that header.
export function identityFromHeader(headerName: string): RequestHandler {
    const name = headerName.toLowerCase();
    return (req, res, next) => {
        const raw = req.headers[name];
        const value = Array.isArray(raw) ? raw[0] : raw;
        if (value !== undefined && value.trim() !== "") {
            res.locals.identity = value.trim();
        }
        next();
    };
}
