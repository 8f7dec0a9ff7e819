import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import { Orchestrator } from "../orchestrator/orchestrator.js";
import { FakeRuntimeClient } from "../test/fake-runtime.js";
import { createApp } from "./app.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe("app", () => {
  let root: string;
  let orchestrator: Orchestrator;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    vi.clearAllMocks();
    root = await mkdtemp(path.join(tmpdir(), "maestro-app-"));
    await mkdir(path.join(root, "demo"));
    const runtime = new FakeRuntimeClient();
    orchestrator = await Orchestrator.bootstrap(
      {
        internalDir: root,
        servers: {
          h1: { protocol: "ssh", host: "build-1.example.internal", username: "builder", identityFile: "/keys/test" },
        },
      },
      { openSession: async () => runtime },
    );
    app = createApp(orchestrator);
  });

  afterEach(async () => {
    await orchestrator.shutdown();
    await rm(root, { recursive: true, force: true });
  });

  it("GET /health reports host and image counts", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", service: "maestro", hosts: 1, images: 1 });
  });

  it("GET /servers lists hosts without credentials", async () => {
    const res = await app.request("/servers");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      servers: [{ name: "h1", protocol: "ssh", host: "build-1.example.internal" }],
    });
  });

  it("allows cross-origin requests from any origin", async () => {
    const res = await app.request("/health", { headers: { Origin: "http://dashboard.example.internal" } });

    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
  });

  it("answers preflight requests", async () => {
    const res = await app.request("/containers", {
      method: "OPTIONS",
      headers: {
        Origin: "http://dashboard.example.internal",
        "Access-Control-Request-Method": "DELETE",
      },
    });

    expect(res.status).toBe(204);
    expect(res.headers.get("Access-Control-Allow-Methods")).toBe("GET,POST,DELETE");
  });

  it("turns unexpected exceptions into a generic 500", async () => {
    vi.spyOn(orchestrator, "listImages").mockImplementation(() => {
      throw new Error("registry exploded");
    });

    const res = await app.request("/containers");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    });
    expect(logger.error).toHaveBeenCalledWith(
      "Unhandled error in request",
      expect.objectContaining({ error: "registry exploded", path: "/containers", method: "GET" }),
    );
  });
});
