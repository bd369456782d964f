/**
 * @file tests/handlers.spec.ts
 * @description
 * Route handlers over the in-memory context: identity headers, status codes and error bodies
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import cartHandler from "../api/buyer/cart";
import buyerOrderHandler from "../api/buyer/orders/[id]";
import itemsHandler from "../api/buyer/orders/[id]/items";
import submitHandler from "../api/buyer/orders/[id]/submit";
import sweepHandler from "../api/admin/reservations/sweep";
import notificationsHandler from "../api/notifications";
import markReadHandler from "../api/notifications/mark-read";
import dispatchHandler from "../api/pharmacy/orders/[id]/dispatch";
import verifyHandler from "../api/pharmacy/orders/[id]/verify";
import type { Actor } from "../src/domain/types";
import { setTestContext } from "../src/lib/context";
import { addToCart } from "../src/services/cartService";
import {
  buyer,
  createMemoryContext,
  seedMedicine,
  seller,
  type MemoryContext,
} from "./support/memoryContext";

const BASE = "http://local";
const MISSING_ID = "0000000000000000000000ff";

let ctx: MemoryContext;

beforeEach(() => {
  ctx = createMemoryContext();
  setTestContext(ctx);
});

afterEach(() => {
  setTestContext(null);
  vi.unstubAllEnvs();
});

function identity(actor: Actor): Record<string, string> {
  const headers: Record<string, string> = { "x-user-id": actor.id, "x-user-role": actor.role };
  if (actor.username) headers["x-user-name"] = actor.username;
  return headers;
}

function call(method: string, path: string, actor?: Actor, body?: unknown): Request {
  return new Request(`${BASE}${path}`, {
    method,
    headers: {
      ...(actor ? identity(actor) : {}),
      ...(body === undefined ? {} : { "content-type": "application/json" }),
    },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

const route = (id: string) => ({ params: { id } });

describe("identity", () => {
  it("rejects requests without identity headers", async () => {
    const res = await cartHandler(call("POST", "/buyer/cart", undefined, {}));
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "Missing or invalid identity headers", code: "UNAUTHORIZED" });
  });

  it("accepts the role header in any case", async () => {
    const med = seedMedicine(ctx);
    const req = new Request(`${BASE}/buyer/cart`, {
      method: "POST",
      headers: { "x-user-id": "buyer-1", "x-user-role": "Buyer", "content-type": "application/json" },
      body: JSON.stringify({ medicineId: med.id, quantity: 1 }),
    });
    expect((await cartHandler(req)).status).toBe(201);
  });

  it("maps role violations to 403", async () => {
    const res = await verifyHandler(call("POST", `/pharmacy/orders/${MISSING_ID}/verify`, buyer()), route(MISSING_ID));
    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: "Requires role seller", code: "FORBIDDEN" });
  });
});

describe("cart routes", () => {
  it("responds 201 for a new cart and 200 for a merge", async () => {
    const med = seedMedicine(ctx);

    const first = await cartHandler(call("POST", "/buyer/cart", buyer(), { medicineId: med.id, quantity: 3 }));
    expect(first.status).toBe(201);
    expect(await first.json()).toMatchObject({ merged: false, order: { total: "30.00Ks", itemCount: 3 } });

    const second = await cartHandler(call("POST", "/buyer/cart", buyer(), { medicineId: med.id, quantity: 2 }));
    expect(second.status).toBe(200);
    expect(await second.json()).toMatchObject({ merged: true, order: { total: "50.00Ks", itemCount: 5 } });
  });

  it("rejects malformed JSON and other methods", async () => {
    const bad = new Request(`${BASE}/buyer/cart`, {
      method: "POST",
      headers: { ...identity(buyer()), "content-type": "application/json" },
      body: "{",
    });
    const res = await cartHandler(bad);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON" });

    const get = await cartHandler(call("GET", "/buyer/cart", buyer()));
    expect(get.status).toBe(405);
    expect(get.headers.get("allow")).toBe("POST");
  });

  it("reports validation issues with their paths", async () => {
    const med = seedMedicine(ctx);
    const res = await cartHandler(call("POST", "/buyer/cart", buyer(), { medicineId: med.id, quantity: 0 }));
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      error: "Validation failed",
      code: "VALIDATION_ERROR",
      details: [{ path: "quantity", message: "quantity must be at least 1" }],
    });
  });

  it("reports shortages with the available quantity", async () => {
    const med = seedMedicine(ctx, { stock: 10 });
    const res = await cartHandler(call("POST", "/buyer/cart", buyer(), { medicineId: med.id, quantity: 11 }));
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: 'Only 10 of "Paracetamol 500mg" available, 11 requested',
      code: "OUT_OF_STOCK",
      details: { medicineId: med.id, medicineName: "Paracetamol 500mg", requested: 11, available: 10 },
    });
  });

  it("reports a removed order as deleted", async () => {
    const med = seedMedicine(ctx);
    const { order } = await addToCart(ctx, buyer(), { medicineId: med.id, quantity: 1 });

    const res = await itemsHandler(
      call("PATCH", `/buyer/orders/${order.id}/items`, buyer(), { medicineId: med.id, delta: -1 }),
      route(order.id)
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ deleted: true, order: null });
  });

  it("cancels an open order", async () => {
    const med = seedMedicine(ctx);
    const { order } = await addToCart(ctx, buyer(), { medicineId: med.id, quantity: 1 });

    const res = await buyerOrderHandler(call("DELETE", `/buyer/orders/${order.id}`, buyer()), route(order.id));
    expect(await res.json()).toEqual({ cancelled: order.id, released: [] });

    const missing = await buyerOrderHandler(call("GET", `/buyer/orders/${order.id}`, buyer()), route(order.id));
    expect(missing.status).toBe(404);
    expect(await missing.json()).toMatchObject({ error: `Order not found: ${order.id}`, code: "NOT_FOUND" });
  });
});

describe("payment submission", () => {
  async function cartId(): Promise<string> {
    const med = seedMedicine(ctx);
    const { order } = await addToCart(ctx, buyer(), { medicineId: med.id, quantity: 2 });
    return order.id;
  }

  function form(withFile: boolean): FormData {
    const fd = new FormData();
    fd.set("paymentId", "PAY-9");
    fd.set("addressLine", "2 Sample Street");
    fd.set("city", "Testville");
    if (withFile) fd.set("file", new File([new Uint8Array([1, 2, 3])], "receipt.png", { type: "image/png" }));
    return fd;
  }

  it("accepts a multipart proof", async () => {
    const id = await cartId();
    const req = new Request(`${BASE}/buyer/orders/${id}/submit`, {
      method: "POST",
      headers: identity(buyer()),
      body: form(true),
    });

    const res = await submitHandler(req, route(id));
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      orderStatus: "pending",
      paymentStatus: "proof_uploaded",
      payment: { paymentId: "PAY-9", uploadedAt: "2024-05-01 08:00" },
      shipping: { addressLine: "2 Sample Street", city: "Testville" },
    });
  });

  it("requires the proof file", async () => {
    const id = await cartId();
    const req = new Request(`${BASE}/buyer/orders/${id}/submit`, {
      method: "POST",
      headers: identity(buyer()),
      body: form(false),
    });

    const res = await submitHandler(req, route(id));
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: "Payment proof file is required" });
  });

  it("requires a multipart body", async () => {
    const id = await cartId();
    const res = await submitHandler(call("POST", `/buyer/orders/${id}/submit`, buyer(), {}), route(id));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Expected multipart/form-data body" });
  });
});

describe("pharmacy routes", () => {
  it("404s unknown orders", async () => {
    const res = await verifyHandler(call("POST", `/pharmacy/orders/${MISSING_ID}/verify`, seller()), route(MISSING_ID));
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: `Order not found: ${MISSING_ID}`,
      code: "NOT_FOUND",
      details: { resource: "Order", id: MISSING_ID },
    });
  });

  it("rejects a malformed dispatch body", async () => {
    const req = new Request(`${BASE}/pharmacy/orders/${MISSING_ID}/dispatch`, {
      method: "POST",
      headers: identity(seller()),
      body: "{",
    });
    const res = await dispatchHandler(req, route(MISSING_ID));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON" });
  });
});

describe("notification routes", () => {
  it("validates the limit", async () => {
    const res = await notificationsHandler(call("GET", "/notifications?limit=0", buyer()));
    expect(res.status).toBe(422);

    const ok = await notificationsHandler(call("GET", "/notifications", buyer()));
    expect(await ok.json()).toEqual({ items: [], unread: 0 });
  });

  it("marks everything read when no ids are given", async () => {
    const res = await markReadHandler(call("POST", "/notifications/mark-read", buyer(), {}));
    expect(await res.json()).toEqual({ updated: 0 });
  });
});

describe("reservation sweep route", () => {
  it("requires the operator key", async () => {
    vi.stubEnv("API_KEY", "");
    const misconfigured = await sweepHandler(call("POST", "/admin/reservations/sweep"));
    expect(misconfigured.status).toBe(500);

    vi.stubEnv("API_KEY", "test-secret");
    const denied = await sweepHandler(call("POST", "/admin/reservations/sweep"));
    expect(denied.status).toBe(401);
    expect(await denied.json()).toEqual({ error: "Unauthorized" });
  });

  it("runs with an overridden hold", async () => {
    vi.stubEnv("API_KEY", "test-secret");
    const req = new Request(`${BASE}/admin/reservations/sweep?holdMs=0`, {
      method: "POST",
      headers: { "x-api-key": "test-secret" },
    });

    const res = await sweepHandler(req);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      cutoff: "2024-05-01T08:00:00.000Z",
      scanned: 0,
      cancelled: [],
      skipped: [],
    });
  });

  it("validates holdMs", async () => {
    vi.stubEnv("API_KEY", "test-secret");
    const req = new Request(`${BASE}/admin/reservations/sweep?holdMs=-5`, {
      method: "POST",
      headers: { "x-api-key": "test-secret" },
    });
    expect((await sweepHandler(req)).status).toBe(422);
  });
});
