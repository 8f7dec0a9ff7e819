import type { ErrorHandler } from "hono";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import type { Orchestrator } from "../orchestrator/orchestrator.js";
import { createContainerRoutes } from "./routes/containers.js";
import { createHealthRoutes } from "./routes/health.js";
import { createServerRoutes } from "./routes/servers.js";

/**
 * Global error handler: catches anything a route did not turn into a result,
 * logs the details and returns a generic 500.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  // Return a safe error response to the client
  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

export function createApp(orchestrator: Orchestrator): Hono {
  const app = new Hono();

  app.use(
    "/*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "DELETE"],
      allowHeaders: ["Content-Type"],
    }),
  );
  app.use("/*", secureHeaders());

  app.route("/health", createHealthRoutes(orchestrator));
  app.route("/servers", createServerRoutes(orchestrator));
  app.route("/", createContainerRoutes(orchestrator));

  app.onError(errorHandler);
  return app;
}
