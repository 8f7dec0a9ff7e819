import { Hono } from "hono";
import { logger } from "../../config/logger.js";
import type { Orchestrator, UploadedFile } from "../../orchestrator/orchestrator.js";
import { failure } from "../result.js";

/** Image and run endpoints. Images are addressed as "containers" on the wire. */
export function createContainerRoutes(orchestrator: Orchestrator): Hono {
  const routes = new Hono();

  /** GET /containers: every image, keyed by name */
  routes.get("/containers", (c) => {
    const result = orchestrator.listImages();
    if (!result.success) return failure(c, result);
    return c.json(result.data);
  });

  /** POST /container/:name: register an image and create its source directory */
  routes.post("/container/:name", async (c) => {
    const result = await orchestrator.createImage(c.req.param("name"));
    if (!result.success) return failure(c, result);
    return c.json(result.data, 201);
  });

  routes.get("/container/:name", (c) => {
    const result = orchestrator.getImage(c.req.param("name"));
    if (!result.success) return failure(c, result);
    return c.json(result.data);
  });

  /** DELETE /container/:name: forget the image and delete its sources */
  routes.delete("/container/:name", async (c) => {
    const result = await orchestrator.deleteImage(c.req.param("name"));
    if (!result.success) return failure(c, result);
    return c.body(null, 204);
  });

  /** POST /container/:name/files: multipart upload, one or more parts named "files" */
  routes.post("/container/:name/files", async (c) => {
    const name = c.req.param("name");

    const body = await c.req.parseBody({ all: true }).catch((err: unknown) => {
      logger.warn("Rejected malformed upload", { image: name, err });
      return null;
    });
    if (!body) return c.json({ error: "Invalid multipart body" }, 400);

    const parts = body.files;
    const entries = Array.isArray(parts) ? parts : parts === undefined ? [] : [parts];
    const files: UploadedFile[] = [];
    for (const entry of entries) {
      if (typeof entry === "string") continue;
      files.push({ name: entry.name, data: new Uint8Array(await entry.arrayBuffer()) });
    }
    if (files.length === 0) {
      return c.json({ error: "No files uploaded" }, 400);
    }

    const result = await orchestrator.writeFiles(name, files);
    if (!result.success) return failure(c, result);
    return c.json({ files: result.data }, 201);
  });

  routes.get("/container/:name/files", async (c) => {
    const result = await orchestrator.listFiles(c.req.param("name"));
    if (!result.success) return failure(c, result);
    return c.json({ files: result.data });
  });

  /** GET /container/:name/file?f_name=: download one source file */
  routes.get("/container/:name/file", async (c) => {
    const file = c.req.query("f_name");
    if (!file) return c.json({ error: "Missing f_name query parameter" }, 400);

    const result = await orchestrator.readFile(c.req.param("name"), file);
    if (!result.success) return failure(c, result);
    return new Response(result.data.data, {
      status: 200,
      headers: {
        "Content-Type": "application/octet-stream",
        "Content-Disposition": `attachment; filename="${result.data.name}"`,
      },
    });
  });

  routes.delete("/container/:name/file", async (c) => {
    const file = c.req.query("f_name");
    if (!file) return c.json({ error: "Missing f_name query parameter" }, 400);

    const result = await orchestrator.deleteFile(c.req.param("name"), file);
    if (!result.success) return failure(c, result);
    return c.body(null, 204);
  });

  /** POST /container/:name/run?serverName=: queue a run, building first when needed */
  routes.post("/container/:name/run", async (c) => {
    const host = c.req.query("serverName");
    if (!host) return c.json({ error: "Missing serverName query parameter" }, 400);

    const result = await orchestrator.runImage(c.req.param("name"), host);
    if (!result.success) return failure(c, result);
    return c.json(result.data);
  });

  /** POST /container/:name/build?serverName=: rebuild on the named host */
  routes.post("/container/:name/build", async (c) => {
    const host = c.req.query("serverName");
    if (!host) return c.json({ error: "Missing serverName query parameter" }, 400);

    const result = await orchestrator.buildImage(c.req.param("name"), host);
    if (!result.success) return failure(c, result);
    return c.json(result.data, 201);
  });

  routes.post("/container/:name/stop", async (c) => {
    const result = await orchestrator.stopImage(c.req.param("name"));
    if (!result.success) return failure(c, result);
    return c.json(result.data);
  });

  /** GET /container/:name/runs: past containers, newest first */
  routes.get("/container/:name/runs", (c) => {
    const result = orchestrator.runHistory(c.req.param("name"));
    if (!result.success) return failure(c, result);
    return c.json({ runs: result.data });
  });

  return routes;
}
