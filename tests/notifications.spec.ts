/**
 * @file tests/notifications.spec.ts
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { ValidationError } from "../src/domain/errors";
import { addToCart } from "../src/services/cartService";
import { listNotifications, markNotificationsRead, notify } from "../src/services/notificationService";
import { submitPayment } from "../src/services/orderService";
import {
  SHIPPING,
  buyer,
  createMemoryContext,
  proof,
  seedMedicine,
  seller,
  type MemoryContext,
} from "./support/memoryContext";

let ctx: MemoryContext;

beforeEach(() => {
  ctx = createMemoryContext();
});

async function send(userId: string, title: string) {
  const n = await notify(ctx, { userId, role: "buyer", type: "payment_verified", title, message: title });
  if (!n) throw new Error("notify failed");
  ctx.clock.advance(1000);
  return n;
}

describe("notify", () => {
  it("stores an unread notification stamped with the clock", async () => {
    const n = await notify(ctx, {
      userId: "buyer-1",
      role: "buyer",
      type: "order_delivered",
      title: "Order delivered",
      message: "done",
    });

    expect(n).toMatchObject({
      userId: "buyer-1",
      orderId: null,
      isRead: false,
      readAt: null,
      createdAt: new Date("2024-05-01T08:00:00.000Z"),
    });
  });

  it("returns null instead of throwing when the insert fails", async () => {
    vi.spyOn(ctx.notifications, "insert").mockRejectedValueOnce(new Error("db down"));
    await expect(
      notify(ctx, { userId: "u", role: "buyer", type: "payment_verified", title: "t", message: "m" })
    ).resolves.toBeNull();
  });

  it("does not undo the order change that triggered it", async () => {
    const med = seedMedicine(ctx);
    const { order } = await addToCart(ctx, buyer(), { medicineId: med.id, quantity: 2 });
    vi.spyOn(ctx.notifications, "insert").mockRejectedValue(new Error("db down"));

    const submitted = await submitPayment(ctx, buyer(), order.id, SHIPPING, proof());

    expect(submitted.paymentStatus).toBe("proof_uploaded");
    expect(ctx.notifications.rows).toHaveLength(0);
  });
});

describe("feed", () => {
  it("lists newest first with the unread count", async () => {
    await send("buyer-1", "first");
    await send("buyer-1", "second");
    await send("buyer-1", "third");
    await send("buyer-2", "elsewhere");

    const feed = await listNotifications(ctx, buyer(), 2);

    expect(feed.items.map((n) => n.title)).toEqual(["third", "second"]);
    expect(feed.unread).toBe(3);
  });

  it("refuses out-of-range limits", async () => {
    await expect(listNotifications(ctx, buyer(), 0)).rejects.toBeInstanceOf(ValidationError);
    await expect(listNotifications(ctx, buyer(), 101)).rejects.toThrow(
      "limit must be an integer between 1 and 100"
    );
  });

  it("marks selected notifications read", async () => {
    const a = await send("buyer-1", "a");
    await send("buyer-1", "b");

    expect(await markNotificationsRead(ctx, buyer(), [a.id])).toBe(1);
    expect(await markNotificationsRead(ctx, buyer(), [a.id])).toBe(0);

    const feed = await listNotifications(ctx, buyer());
    expect(feed.unread).toBe(1);
    expect(feed.items.find((n) => n.id === a.id)?.readAt).toEqual(new Date("2024-05-01T08:00:02.000Z"));
  });

  it("marks everything read for the actor only", async () => {
    await send("buyer-1", "a");
    await send("buyer-1", "b");
    await send("seller-1", "c");

    expect(await markNotificationsRead(ctx, buyer())).toBe(2);
    expect((await listNotifications(ctx, seller())).unread).toBe(1);
  });
});
