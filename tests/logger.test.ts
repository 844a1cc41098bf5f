import test from "node:test";
import assert from "node:assert/strict";
import express from "express";
import request from "supertest";

import { scrubPII } from "@shared/utils";
import { StructuredLogger, requestLoggingMiddleware } from "../server/observability/logger";

test("requestLoggingMiddleware echoes incoming X-Request-Id header", async () => {
  const app = express();
  app.use(requestLoggingMiddleware);
  app.get("/api/ping", (_req, res) => {
    res.json({ ok: true });
  });

  const response = await request(app)
    .get("/api/ping")
    .set("X-Request-Id", "external-id-123");

  assert.equal(response.status, 200);
  assert.equal(response.headers["x-request-id"], "external-id-123");
  assert.deepEqual(response.body, { ok: true });
});

test("requestLoggingMiddleware assigns a request id when missing", async () => {
  const app = express();
  app.use(requestLoggingMiddleware);
  app.get("/api/ping", (_req, res) => {
    res.json({ ok: true });
  });

  const response = await request(app).get("/api/ping");

  assert.equal(response.status, 200);
  assert.ok(response.headers["x-request-id"], "request id header should be present");
  assert.match(response.headers["x-request-id"], /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i);
});

test("StructuredLogger writes one JSON line with merged child context", () => {
  const lines: string[] = [];
  const logger = new StructuredLogger({ requestId: "req-1" }, line => lines.push(line)).child({
    userId: "alice",
    event: "erp.listing",
  });

  logger.warn("ERP listing slow", { resource: "/api/resource/Customer", context: { pages: 3 } }, new Error("timeout"));

  assert.equal(lines.length, 1);
  const entry = JSON.parse(lines[0]);
  assert.equal(entry.level, "warn");
  assert.equal(entry.message, "ERP listing slow");
  assert.equal(entry.requestId, "req-1");
  assert.equal(entry.userId, "alice");
  assert.equal(entry.event, "erp.listing");
  assert.equal(entry.resource, "/api/resource/Customer");
  assert.deepEqual(entry.context, { pages: 3 });
  assert.equal(entry.errorMessage, "timeout");
});

test("StructuredLogger masks credentials and contact details in context", () => {
  const lines: string[] = [];
  const logger = new StructuredLogger({}, line => lines.push(line));

  logger.info("ERP login attempt", {
    context: { usr: "alice@example.com", pwd: "test-secret", mobile_no: "+33 6 12 34 56 78", company: "Acme" },
  });

  const entry = JSON.parse(lines[0]);
  assert.deepEqual(entry.context, {
    usr: "a***@example.com",
    pwd: "***",
    mobile_no: "*******5678",
    company: "Acme",
  });
});

test("StructuredLogger masks e-mail user ids and login user fields", () => {
  const lines: string[] = [];
  const logger = new StructuredLogger({}, line => lines.push(line));

  logger.child({ userId: "alice@example.com" }).info("ERP login succeeded", {
    context: { user: "bob@example.com", usr: "carol@example.com" },
  });
  logger.info("ERP login succeeded", { userId: "Administrator" });

  const [masked, plain] = lines.map(line => JSON.parse(line));
  assert.equal(masked.userId, "a***@example.com");
  assert.deepEqual(masked.context, { user: "b***@example.com", usr: "c***@example.com" });
  assert.equal(plain.userId, "Administrator");
});

test("scrubPII walks nested objects and arrays", () => {
  assert.deepEqual(
    scrubPII({
      session: { cookies: "sid=abc", user: "alice" },
      rows: [{ phone: "0612345678" }, "plain"],
    }),
    {
      session: { cookies: "***", user: "alice" },
      rows: [{ phone: "******5678" }, "plain"],
    },
  );
});
