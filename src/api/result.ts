import type { Context } from "hono";
import type { OperationResult } from "../orchestrator/types.js";

export type Failure = Extract<OperationResult<never>, { success: false }>;

/** Map a failed operation onto its HTTP status. */
export function failure(c: Context, result: Failure): Response {
  const body = { error: result.error };
  switch (result.code) {
    case "not_found":
      return c.json(body, 404);
    case "conflict":
      return c.json(body, 409);
    case "invalid":
      return c.json(body, 400);
    case "internal":
      return c.json(body, 500);
  }
}
