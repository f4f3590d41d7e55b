// Verbose pages for staging: everything a developer wants to see and a stranger should not.
// Production (showExceptions off) gets one-line bodies instead.

import { STATUS_CODES } from "node:http";
import type { Request } from "express";
import type { GateResponse } from "../gate/types.js";
import { escapeHtml } from "./html.js";

export interface RouteEntry {
    method: string;
    path: string;
}

const HTML = "text/html; charset=utf-8";
const TEXT = "text/plain; charset=utf-8";

function page(title: string, sections: string[]): string {
    return [
        "<!DOCTYPE html>",
        `<html><head><title>${escapeHtml(title)}</title></head><body>`,
        ...sections,
        "</body></html>",
    ].join("\n");
}

// same credentials the request logs redact
const REDACTED_HEADERS = new Set(["authorization", "proxy-authorization", "cookie"]);

function headerTable(req: Request): string {
    const rows = Object.entries(req.headers).map(([name, value]) => {
        const shown = REDACTED_HEADERS.has(name)
            ? "[redacted]"
            : Array.isArray(value) ? value.join(", ") : (value ?? "");
        return `<tr><th>${escapeHtml(name)}</th><td>${escapeHtml(shown)}</td></tr>`;
    });
    return `<h2>Request headers</h2><table>${rows.join("")}</table>`;
}

export function renderNotFound(req: Request, routes: readonly RouteEntry[], showExceptions: boolean): GateResponse {
    // X-Cascade: pass tells an outer router it may try its own routes
    if (!showExceptions) {
        return { status: 404, headers: { "Content-Type": TEXT, "X-Cascade": "pass" }, body: "Not Found" };
    }

    const known = routes.map((r) => `<li><code>${escapeHtml(`${r.method} ${r.path}`)}</code></li>`);
    return {
        status: 404,
        headers: { "Content-Type": HTML, "X-Cascade": "pass" },
        body: page("Not Found", [
            "<h1>Not Found</h1>",
            `<p>No route matches <code>${escapeHtml(`${req.method} ${req.originalUrl}`)}</code>.</p>`,
            `<h2>Known routes</h2><ul>${known.join("")}</ul>`,
            headerTable(req),
        ]),
    };
}

export function renderException(req: Request, err: unknown, status: number, showExceptions: boolean): GateResponse {
    const reason = STATUS_CODES[status] ?? "Error";
    if (!showExceptions) {
        return { status, headers: { "Content-Type": TEXT }, body: reason };
    }

    const error = err instanceof Error ? err : new Error(String(err));
    return {
        status,
        headers: { "Content-Type": HTML },
        body: page(`${status} ${reason}`, [
            `<h1>${escapeHtml(`${error.name}: ${error.message}`)}</h1>`,
            `<p><code>${escapeHtml(`${req.method} ${req.originalUrl}`)}</code></p>`,
            `<h2>Backtrace</h2><pre>${escapeHtml(error.stack ?? "(no stack)")}</pre>`,
            headerTable(req),
        ]),
    };
}
