import { Hono } from "hono";
import type { Orchestrator } from "../../orchestrator/orchestrator.js";

export function createServerRoutes(orchestrator: Orchestrator): Hono {
  const routes = new Hono();

  /** GET /servers: configured hosts, without credentials */
  routes.get("/", (c) => {
    const result = orchestrator.listHosts();
    if (!result.success) return c.json({ error: result.error }, 500);
    return c.json({ servers: result.data });
  });

  return routes;
}
