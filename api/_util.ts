/**
 * @file api/_util.ts
 * @description
 * Shared utilities for API route handlers
 */

import { AppError, UnauthorizedError } from "../src/domain/errors";
import { RoleEnum, type Actor } from "../src/domain/types";
import type { RouteContext } from "../src/server/expressWrap";
import { errorMessage, log } from "../src/util/log";

/**
 * Gate for operator routes. Returns the response to send when the
 * `X-API-Key` header does not match `API_KEY`, or null to proceed.
 */
export function requireKey(req: Request): Response | null {
  const provided = req.headers.get("x-api-key");
  const expected = process.env.API_KEY?.trim();

  if (!expected) {
    log({ level: "error", evt: "config.missing", name: "API_KEY" });
    return error("Server misconfiguration: API_KEY missing", 500);
  }

  if (!provided || provided !== expected) {
    return error("Unauthorized", 401);
  }

  return null;
}

/**
 * Resolve the acting principal from the identity headers set upstream.
 *
 * @throws {UnauthorizedError} when the id or role is missing or unknown
 */
export function requireActor(req: Request): Actor {
  const id = req.headers.get("x-user-id")?.trim();
  const role = RoleEnum.safeParse(req.headers.get("x-user-role")?.trim().toLowerCase());
  if (!id || !role.success) throw new UnauthorizedError("Missing or invalid identity headers");
  const username = req.headers.get("x-user-name")?.trim();
  return username ? { id, role: role.data, username } : { id, role: role.data };
}

export function json(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { ...headers, "Content-Type": "application/json" },
  });
}

/** `{ error, details? }` body used by every failure response */
export function error(message: string, status = 400, details?: unknown): Response {
  const body: Record<string, unknown> = { error: message };
  if (details !== undefined) body.details = details;
  return json(body, status);
}

/**
 * Map a thrown value to a response. Domain errors keep their status and code;
 * anything else is logged and reported as a 500.
 */
export function handleError(err: unknown, route: string): Response {
  if (err instanceof AppError) {
    if (!err.isOperational) {
      log({ level: "error", evt: "request.failed", route, code: err.code, error: err.message });
    }
    return json(err.toJSON(), err.statusCode);
  }
  log({ level: "error", evt: "request.failed", route, error: errorMessage(err) });
  return error("Internal Server Error", 500);
}

/** Request body as JSON, or null when it does not parse */
export async function parseJson(req: Request): Promise<unknown> {
  try {
    return await req.json();
  } catch (err) {
    log({ level: "warn", evt: "request.invalid_json", error: errorMessage(err) });
    return null;
  }
}

/** Query-string parameters as a plain object */
export function queryOf(req: Request): Record<string, string> {
  return Object.fromEntries(new URL(req.url).searchParams.entries());
}

export function allowMethods(req: Request, allowed: string[]): boolean {
  return allowed.includes(req.method.toUpperCase());
}

/** 405 carrying an `Allow` header */
export function methodNotAllowed(allowed: string[]): Response {
  return json({ error: "Method Not Allowed" }, 405, { Allow: allowed.join(", ") });
}

/** `:id` path parameter, or "" when the route has none */
export function pathId(ctx: RouteContext | undefined): string {
  return ctx?.params.id ?? "";
}
