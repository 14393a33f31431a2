/**
 * Tests for the control API error handler.
 *
 * Mounts the handler behind routes that throw, on an ephemeral port.
 */

import type { Server } from "node:http";
import express from "express";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { z } from "zod";
import { NotFoundError, StorageError, ValidationError } from "@devpeace/shared";
import { silentLogger } from "../../__tests__/fakes.js";
import { createErrorHandler, statusForCode } from "../error-handler.js";

describe("statusForCode", () => {
  it.each([
    ["VALIDATION_ISSUE_KEY", 400],
    ["NOT_FOUND_ORPHAN", 404],
    ["CONFIG_INVALID", 500],
    ["GATEWAY_REJECTED", 502],
    ["STORAGE_WRITE_FAILED", 503],
    ["WATCH_FAILED", 500],
    ["SOMETHING_ELSE", 500],
  ])("maps %s to %i", (code, status) => {
    expect(statusForCode(code)).toBe(status);
  });
});

describe("createErrorHandler", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.use(express.json());
    app.get("/validation", () => {
      throw new ValidationError("bad key", "VALIDATION_ISSUE_KEY");
    });
    app.get("/missing", () => {
      throw new NotFoundError("no such orphan", "NOT_FOUND_ORPHAN");
    });
    app.get("/storage", () => {
      throw new StorageError("disk full", "STORAGE_WRITE_FAILED");
    });
    app.get("/zod", () => {
      z.object({ path: z.string() }).parse({});
    });
    app.get("/plain", () => {
      throw new Error("boom");
    });
    app.use(createErrorHandler(silentLogger));

    server = app.listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server is not listening on a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function get(route: string): Promise<{ status: number; body: Record<string, unknown> }> {
    const res = await fetch(`${baseUrl}${route}`);
    const body = z.record(z.unknown()).parse(await res.json());
    return { status: res.status, body };
  }

  it("maps domain errors by code prefix", async () => {
    const validation = await get("/validation");
    expect(validation.status).toBe(400);
    expect(validation.body).toMatchObject({ error: "bad key", code: "VALIDATION_ISSUE_KEY" });

    expect((await get("/missing")).status).toBe(404);
    expect((await get("/storage")).status).toBe(503);
  });

  it("reports schema failures with their issues", async () => {
    const res = await get("/zod");
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Validation failed");
    expect(res.body.details).toEqual([
      expect.objectContaining({ path: ["path"], code: "invalid_type" }),
    ]);
  });

  it("hides the message of unexpected errors", async () => {
    const res = await get("/plain");
    expect(res.status).toBe(500);
    expect(res.body.error).toBe("Internal server error");
  });
});
