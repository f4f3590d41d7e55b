import { describe, it, expect } from "vitest";
import request from "supertest";
import { createApp } from "./app.js";
import { DEFAULT_SUBSTITUTE_BODY, ResponseGate } from "./gate/index.js";
import { loadEnv } from "./lib/env.js";

const staging = loadEnv({ NODE_ENV: "test", SHOW_EXCEPTIONS: "true" });
const production = loadEnv({ NODE_ENV: "test", SHOW_EXCEPTIONS: "false" });

const substituteBody = (status: number) => DEFAULT_SUBSTITUTE_BODY.replace("{{status}}", String(status));

describe("app", () => {
    const app = createApp({ env: staging });

    it("GET /health -> 200 ok", async () => {
        const res = await request(app).get("/health");
        expect(res.status).toBe(200);
        expect(res.body.status).toBe("ok");
    });

    it("GET / names the service", async () => {
        const res = await request(app).get("/");
        expect(res.body).toEqual({ ok: true, name: "staging-gate" });
    });

    describe("unknown route", () => {
        it("shows an anonymous caller only the substitute", async () => {
            const res = await request(app).get("/admin/secret");
            expect(res.status).toBe(401);
            expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
            expect(res.headers["x-cascade"]).toBeUndefined();
            expect(res.text).toBe(substituteBody(404));
        });

        it("shows an identified caller the debug page", async () => {
            const res = await request(app).get("/admin/secret").set("X-User-Id", "user123");
            expect(res.status).toBe(404);
            expect(res.headers["x-cascade"]).toBe("pass");
            expect(res.text).toContain("<p>No route matches <code>GET /admin/secret</code>.</p>");
            expect(res.text).toContain("<li><code>POST /users</code></li>");
            expect(res.text).toContain("<tr><th>x-user-id</th><td>user123</td></tr>");
        });

        it("escapes request details echoed into the page", async () => {
            const res = await request(app)
                .get("/<script>x</script>")
                .set("X-User-Id", "user123")
                .set("X-Note", "<script>alert(1)</script>");
            expect(res.status).toBe(404);
            expect(res.text).toContain("<tr><th>x-note</th><td>&lt;script&gt;alert(1)&lt;/script&gt;</td></tr>");
            expect(res.text).not.toContain("<script>");
        });

        it("treats a blank identity header as anonymous", async () => {
            const res = await request(app).get("/admin/secret").set("X-User-Id", "   ");
            expect(res.status).toBe(401);
        });
    });

    describe("exceptions", () => {
        it("hides a crash from an anonymous caller", async () => {
            const res = await request(app).get("/debug/boom");
            expect(res.status).toBe(401);
            expect(res.text).toBe(substituteBody(500));
        });

        it("shows the backtrace to an identified caller", async () => {
            const res = await request(app).get("/debug/boom").set("X-User-Id", "user123");
            expect(res.status).toBe(500);
            expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
            expect(res.text).toContain("<h1>Error: Kaboom</h1>");
            expect(res.text).toContain("<h2>Backtrace</h2><pre>Error: Kaboom");
        });

        it("redacts credentials from the header table", async () => {
            const res = await request(app)
                .get("/debug/boom")
                .set("X-User-Id", "user123")
                .set("Cookie", "sid=test-secret")
                .set("Authorization", "Bearer test-token");
            expect(res.status).toBe(500);
            expect(res.text).toContain("<tr><th>cookie</th><td>[redacted]</td></tr>");
            expect(res.text).toContain("<tr><th>authorization</th><td>[redacted]</td></tr>");
            expect(res.text).not.toContain("test-secret");
            expect(res.text).not.toContain("test-token");
        });

        it("keeps the status an HttpError asks for", async () => {
            const res = await request(app).get("/debug/status/409").set("X-User-Id", "user123");
            expect(res.status).toBe(409);
            expect(res.text).toContain("<h1>HttpError: Requested failure with status 409</h1>");
        });

        it("hides malformed JSON errors from an anonymous caller", async () => {
            const res = await request(app)
                .post("/users")
                .set("Content-Type", "application/json")
                .send("{not json");
            expect(res.status).toBe(401);
            expect(res.text).toBe(substituteBody(400));
        });

        it("shows malformed JSON errors to an identified caller", async () => {
            const res = await request(app)
                .post("/users")
                .set("X-User-Id", "user123")
                .set("Content-Type", "application/json")
                .send("{not json");
            expect(res.status).toBe(400);
            expect(res.text).toContain("<h1>SyntaxError: ");
        });
    });

    describe("POST /users", () => {
        it("400 on bad input for an identified caller", async () => {
            const res = await request(app).post("/users").set("X-User-Id", "user123").send({ email: "bad" });
            expect(res.status).toBe(400);
            expect(res.body.error).toBe("ValidationError");
        });

        it("hides the validation details from an anonymous caller", async () => {
            const res = await request(app).post("/users").send({ email: "bad" });
            expect(res.status).toBe(401);
            expect(res.text).toBe(substituteBody(400));
        });

        it("201 on good input, even anonymously", async () => {
            const res = await request(app).post("/users").send({ email: "ada@example.com", name: "Ada" });
            expect(res.status).toBe(201);
            expect(res.body).toMatchObject({ email: "ada@example.com", name: "Ada" });
            expect(typeof res.body.id).toBe("string");
        });
    });

    describe("with exception pages off", () => {
        const quiet = createApp({ env: production });

        it("does not mount the debug routes", async () => {
            const res = await request(quiet).get("/debug/boom").set("X-User-Id", "user123");
            expect(res.status).toBe(404);
            expect(res.headers["content-type"]).toBe("text/plain; charset=utf-8");
            expect(res.text).toBe("Not Found");
        });

        it("still gates anonymous callers", async () => {
            const res = await request(quiet).get("/nowhere");
            expect(res.status).toBe(401);
            expect(res.text).toBe(substituteBody(404));
        });
    });

    describe("with a custom gate", () => {
        const serverErrorsOnly = createApp({
            env: staging,
            gate: new ResponseGate({ sensitiveRangeLow: 500, sensitiveRangeHigh: 599 }),
        });

        it("lets a 404 through to anonymous callers", async () => {
            const res = await request(serverErrorsOnly).get("/nowhere");
            expect(res.status).toBe(404);
            expect(res.headers["x-cascade"]).toBe("pass");
        });

        it("still hides a 500", async () => {
            const res = await request(serverErrorsOnly).get("/debug/boom");
            expect(res.status).toBe(401);
            expect(res.text).toBe(substituteBody(500));
        });
    });

    it("answers overlapping requests according to each caller", async () => {
        const [anonMissing, userMissing, anonCrash, userCrash, anonHealth] = await Promise.all([
            request(app).get("/missing"),
            request(app).get("/missing").set("X-User-Id", "user123"),
            request(app).get("/debug/boom"),
            request(app).get("/debug/boom").set("X-User-Id", "user456"),
            request(app).get("/health"),
        ]);
        expect(anonMissing.status).toBe(401);
        expect(anonMissing.text).toBe(substituteBody(404));
        expect(userMissing.status).toBe(404);
        expect(anonCrash.status).toBe(401);
        expect(anonCrash.text).toBe(substituteBody(500));
        expect(userCrash.status).toBe(500);
        expect(anonHealth.status).toBe(200);
    });

    it("reads the identity from a configured header", async () => {
        const proxied = createApp({ env: loadEnv({ NODE_ENV: "test", IDENTITY_HEADER: "X-Remote-User" }) });
        const anonymous = await request(proxied).get("/nowhere").set("X-User-Id", "user123");
        const identified = await request(proxied).get("/nowhere").set("X-Remote-User", "user123");
        expect(anonymous.status).toBe(401);
        expect(identified.status).toBe(404);
    });
});
