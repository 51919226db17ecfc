import type { Context, Next } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { GoalError, PartialActivationFailure } from "@waypoint/core";

export function toStatus(status: number): ContentfulStatusCode {
  switch (status) {
    case 400:
      return 400;
    case 404:
      return 404;
    case 409:
      return 409;
    case 422:
      return 422;
    case 423:
      return 423;
    case 502:
      return 502;
    case 503:
      return 503;
    default:
      return 500;
  }
}

export async function errorHandler(c: Context, next: Next) {
  try {
    await next();
  } catch (err: unknown) {
    // JSON parse errors should return 400, not 500
    if (err instanceof SyntaxError) {
      return c.json({ error: "Invalid JSON in request body" }, 400);
    }

    if (err instanceof GoalError) {
      if (err.status >= 500) {
        console.error(`[ERROR] ${c.req.method} ${c.req.path}:`, err.message);
      }
      const body: Record<string, unknown> = { error: err.message, code: err.code };
      if (err instanceof PartialActivationFailure) body.succeeded = err.succeeded;
      return c.json(body, toStatus(err.status));
    }

    const message = err instanceof Error ? err.message : "Internal server error";
    console.error(`[ERROR] ${c.req.method} ${c.req.path}:`, message);
    return c.json({ error: message }, 500);
  }
}
