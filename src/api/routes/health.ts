import { Hono } from "hono";
import type { Orchestrator } from "../../orchestrator/orchestrator.js";

export function createHealthRoutes(orchestrator: Orchestrator): Hono {
  const routes = new Hono();

  routes.get("/", (c) => {
    return c.json({
      status: "ok",
      service: "maestro",
      hosts: orchestrator.connections.len(),
      images: orchestrator.images.len(),
    });
  });

  return routes;
}
