/**
 * @file src/server/expressWrap.ts
 * @description
 * Express adapter for API routes
 */

import type { RequestHandler, Request as ExpressReq, Response as ExpressRes } from "express";
import { maxUploadBytes } from "../util/env";
import { errorMessage, log } from "../util/log";

/** Multipart bodies are passed through raw up to this many bytes beyond the upload cap */
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

class PayloadTooLargeError extends Error {}

function headerValue(req: ExpressReq, name: string): string | undefined {
  const v = req.headers[name];
  return Array.isArray(v) ? v[0] : v;
}

/** Absolute URL honouring the proxy's forwarded scheme and host */
function absoluteUrl(req: ExpressReq): string {
  const proto = headerValue(req, "x-forwarded-proto") || req.protocol || "http";
  const host = headerValue(req, "x-forwarded-host") || req.get("host") || "localhost";
  return `${proto}://${host}${req.originalUrl || req.url || "/"}`;
}

function fetchHeaders(req: ExpressReq): Headers {
  const h = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    for (const v of Array.isArray(value) ? value : value === undefined ? [] : [value]) h.append(name, v);
  }
  return h;
}

/** Buffer an unparsed body, refusing anything over `limit` bytes */
async function readRaw(req: ExpressReq, limit: number): Promise<Uint8Array<ArrayBuffer>> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > limit) throw new PayloadTooLargeError(`Request body exceeds ${limit} bytes`);
    chunks.push(buf);
  }
  return new Uint8Array(Buffer.concat(chunks, size));
}

async function toFetchRequest(req: ExpressReq): Promise<Request> {
  const method = req.method?.toUpperCase() || "GET";
  const url = absoluteUrl(req);
  const headers = fetchHeaders(req);

  let bodyInit: BodyInit | null = null;

  const hasBodyMethod = ["POST", "PUT", "PATCH", "DELETE"].includes(method);
  if (hasBodyMethod) {
    const ct = (headers.get("content-type") || "").toLowerCase();
    const body: unknown = req.body;
    if (ct.startsWith("multipart/form-data")) {
      // Not touched by the JSON parser; hand the raw bytes through
      bodyInit = await readRaw(req, maxUploadBytes() + MULTIPART_OVERHEAD_BYTES);
    } else if (typeof body === "string") {
      bodyInit = body;
    } else if (body !== undefined && body !== null) {
      if (ct.includes("application/x-www-form-urlencoded")) {
        const usp = new URLSearchParams();
        for (const [k, v] of Object.entries(body)) usp.append(k, String(v));
        bodyInit = usp.toString();
      } else if (ct.includes("application/json") || Object.keys(body).length > 0) {
        bodyInit = JSON.stringify(body);
        if (!ct) headers.set("content-type", "application/json");
      }
    }
  }

  return new Request(url, { method, headers, body: bodyInit });
}

/** Context handed to every route handler */
export interface RouteContext {
  params: Record<string, string>;
}

/**
 * Mount a fetch-style route handler on Express. Route params become
 * `ctx.params`; an oversized multipart body is answered with 413 before the
 * handler runs.
 */
export function expressWrap(
  handler: (req: Request, ctx: RouteContext) => Promise<Response>,
  ctxFactory: (req: ExpressReq) => RouteContext = (req) => ({ params: { ...req.params } })
): RequestHandler {
  return async (req: ExpressReq, res: ExpressRes) => {
    try {
      const fReq = await toFetchRequest(req);
      const ctx = ctxFactory(req);
      const fRes = await handler(fReq, ctx);

      res.status(fRes.status);
      fRes.headers.forEach((value, key) => res.setHeader(key, value));
      // Handlers only answer with small JSON bodies
      res.end(Buffer.from(await fRes.arrayBuffer()));
    } catch (err: unknown) {
      if (err instanceof PayloadTooLargeError) {
        res.status(413).json({ error: "Payload Too Large", details: err.message });
        return;
      }
      log({ level: "error", evt: "http.adapter_failed", path: req.originalUrl, error: errorMessage(err) });
      res.status(500).json({ error: "Internal Server Error" });
    }
  };
}
