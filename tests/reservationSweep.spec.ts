/**
 * @file tests/reservationSweep.spec.ts
 * @description
 * Release of stock held by abandoned rejected orders
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { addToCart } from "../src/services/cartService";
import { rejectPayment, submitPayment } from "../src/services/orderService";
import { sweepRejectedOrders } from "../src/services/reservationSweep";
import { metrics } from "../src/util/log";
import {
  SHIPPING,
  buyer,
  createMemoryContext,
  proof,
  seedMedicine,
  seller,
  type MemoryContext,
} from "./support/memoryContext";

const HOUR = 60 * 60 * 1000;

let ctx: MemoryContext;

beforeEach(() => {
  ctx = createMemoryContext();
  metrics.reset();
});

async function rejected(medicineId: string, quantity: number, who = buyer()) {
  const { order } = await addToCart(ctx, who, { medicineId, quantity });
  await submitPayment(ctx, who, order.id, SHIPPING, proof());
  return rejectPayment(ctx, seller(), order.id, { reason: "no transfer found" });
}

describe("sweepRejectedOrders", () => {
  it("cancels stale rejected orders and releases their stock", async () => {
    const med = seedMedicine(ctx, { stock: 10 });
    const order = await rejected(med.id, 3);
    ctx.clock.advance(2 * HOUR);

    const result = await sweepRejectedOrders(ctx, HOUR);

    expect(result).toEqual({
      cutoff: "2024-05-01T09:00:00.000Z",
      scanned: 1,
      cancelled: [order.id],
      skipped: [],
    });
    expect(ctx.orders.rows.has(order.id)).toBe(false);
    expect(ctx.medicines.counters(med.id)).toEqual({ stock: 10, reserved: 0 });
    expect(ctx.notifications.rows.at(-1)).toMatchObject({
      userId: "buyer-1",
      type: "order_expired",
      title: "Order expired",
      orderId: order.id,
    });
    expect(metrics.get("ordersSwept")).toBe(1);
  });

  it("leaves recent rejections and orders under review alone", async () => {
    const med = seedMedicine(ctx, { stock: 10 });
    await rejected(med.id, 2, buyer("buyer-a"));
    const { order } = await addToCart(ctx, buyer("buyer-b"), { medicineId: med.id, quantity: 1 });
    await submitPayment(ctx, buyer("buyer-b"), order.id, SHIPPING, proof());
    ctx.clock.advance(HOUR / 2);

    const result = await sweepRejectedOrders(ctx, HOUR);

    expect(result.scanned).toBe(0);
    expect(ctx.medicines.counters(med.id).reserved).toBe(3);
  });

  it("skips an order resubmitted between the scan and the lock", async () => {
    const med = seedMedicine(ctx, { stock: 10 });
    const order = await rejected(med.id, 3);
    ctx.clock.advance(2 * HOUR);

    const find = ctx.orders.find.bind(ctx.orders);
    vi.spyOn(ctx.orders, "find").mockImplementationOnce(async (query) => {
      const rows = await find(query);
      await submitPayment(ctx, buyer(), order.id, SHIPPING, proof());
      return rows;
    });

    const result = await sweepRejectedOrders(ctx, HOUR);

    expect(result).toMatchObject({ scanned: 1, cancelled: [], skipped: [order.id] });
    expect((await ctx.orders.findById(order.id))?.paymentStatus).toBe("proof_uploaded");
    expect(ctx.medicines.counters(med.id).reserved).toBe(3);
  });
});
