/**
 * @file tests/mongoStore.spec.ts
 * @description
 * Conditional-update filters, query translation and the MongoDB repositories
 * over a client that never connects (collection methods are stubbed).
 */

import { Collection, MongoClient, MongoServerError, ObjectId } from "mongodb";
import { describe, expect, it, vi } from "vitest";
import type { NewOrderDoc, TimelineEvent } from "../src/domain/docs";
import { EMPTY_PAYMENT } from "../src/domain/order";
import {
  MongoMedicineRepository,
  MongoNotificationRepository,
  MongoOrderRepository,
  commitFilter,
  orderQueryFilter,
  orderSort,
  parseObjectId,
  releaseFilter,
  reserveFilter,
} from "../src/lib/mongoStore";
import { DuplicateOpenOrderError } from "../src/lib/store";

const OID = new ObjectId("0123456789abcdef01234567");

describe("stock filters", () => {
  it("reserve guards on stock minus reserved", () => {
    expect(reserveFilter(OID, 4)).toEqual({
      _id: OID,
      $expr: { $gte: [{ $subtract: ["$stock", { $ifNull: ["$reserved", 0] }] }, 4] },
    });
  });

  it("release guards on the reserved counter", () => {
    expect(releaseFilter(OID, 2)).toEqual({ _id: OID, reserved: { $gte: 2 } });
  });

  it("commit guards on both counters", () => {
    expect(commitFilter(OID, 3)).toEqual({ _id: OID, reserved: { $gte: 3 }, stock: { $gte: 3 } });
  });
});

describe("orderQueryFilter", () => {
  it("translates scope, statuses and cutoff", () => {
    const cutoff = new Date("2024-05-01T00:00:00.000Z");
    expect(
      orderQueryFilter({
        pharmacyId: "seller-1",
        orderStatus: ["pending"],
        paymentStatus: ["proof_uploaded", "rejected"],
        updatedBefore: cutoff,
      })
    ).toEqual({
      pharmacyId: "seller-1",
      orderStatus: { $in: ["pending"] },
      paymentStatus: { $in: ["proof_uploaded", "rejected"] },
      updatedAt: { $lt: cutoff },
    });
  });

  it("ignores empty status lists", () => {
    expect(orderQueryFilter({ buyerId: "b", orderStatus: [], paymentStatus: [] })).toEqual({ buyerId: "b" });
  });

  it("searches pharmacy and medicine names with an escaped, case-insensitive pattern", () => {
    const rx = { $regex: "vit\\.C\\+", $options: "i" };
    expect(orderQueryFilter({ text: "vit.C+" })).toEqual({
      $or: [{ pharmacyName: rx }, { "items.medicineName": rx }],
    });
  });
});

describe("orderSort", () => {
  it.each([
    [undefined, { createdAt: -1 }],
    ["created_desc", { createdAt: -1 }],
    ["created_asc", { createdAt: 1 }],
    ["total_desc", { totalAmount: -1, createdAt: -1 }],
    ["total_asc", { totalAmount: 1, createdAt: -1 }],
    ["updated_desc", { updatedAt: -1 }],
  ] as const)("%s", (sort, expected) => {
    expect(orderSort(sort)).toEqual(expected);
  });
});

describe("parseObjectId", () => {
  it("accepts 24 hex characters only", () => {
    expect(parseObjectId("0123456789ABCDEF01234567")?.toHexString()).toBe("0123456789abcdef01234567");
    expect(parseObjectId("not-an-id")).toBeNull();
    expect(parseObjectId("0123456789abcdef0123456")).toBeNull();
  });
});

const db = new MongoClient("mongodb://127.0.0.1:27017").db("pharmacy-test");
const HEX = OID.toHexString();
const TS = new Date("2024-05-01T08:00:00.000Z");

function updateResult(matched: number, modified = matched) {
  return { acknowledged: true, matchedCount: matched, modifiedCount: modified, upsertedCount: 0, upsertedId: null };
}

const duplicateKey = () => new MongoServerError({ message: "E11000 duplicate key error", code: 11000 });

describe("MongoMedicineRepository", () => {
  const repo = new MongoMedicineRepository(db);

  it("reports a reservation only when the guarded update matched", async () => {
    const updateOne = vi
      .spyOn(Collection.prototype, "updateOne")
      .mockResolvedValueOnce(updateResult(1))
      .mockResolvedValueOnce(updateResult(0));

    expect(await repo.tryReserve(HEX, 2)).toBe(true);
    expect(await repo.tryReserve(HEX, 2)).toBe(false);
    expect(updateOne).toHaveBeenCalledWith(reserveFilter(OID, 2), {
      $inc: { reserved: 2 },
      $set: { updatedAt: expect.any(Date) },
    });
  });

  it("moves both counters on commit and only reserved on release", async () => {
    const updateOne = vi.spyOn(Collection.prototype, "updateOne").mockResolvedValue(updateResult(1));

    expect(await repo.tryCommit(HEX, 3)).toBe(true);
    expect(await repo.tryRelease(HEX, 1)).toBe(true);

    expect(updateOne).toHaveBeenNthCalledWith(1, commitFilter(OID, 3), {
      $inc: { stock: -3, reserved: -3 },
      $set: { updatedAt: expect.any(Date) },
    });
    expect(updateOne).toHaveBeenNthCalledWith(2, releaseFilter(OID, 1), {
      $inc: { reserved: -1 },
      $set: { updatedAt: expect.any(Date) },
    });
  });

  it("treats a malformed id as no match without querying", async () => {
    const updateOne = vi.spyOn(Collection.prototype, "updateOne");

    expect(await repo.tryReserve("not-an-id", 1)).toBe(false);
    expect(await repo.tryRelease("not-an-id", 1)).toBe(false);
    expect(updateOne).not.toHaveBeenCalled();
  });
});

describe("MongoOrderRepository", () => {
  const repo = new MongoOrderRepository(db);
  const event: TimelineEvent = { ts: TS, actor: "seller", action: "verify_payment", meta: {} };

  const newCart: NewOrderDoc = {
    buyerId: "buyer-1",
    pharmacyId: "seller-1",
    pharmacyName: "Green Cross",
    items: [],
    totalAmount: 0,
    orderStatus: "cart",
    paymentStatus: "unpaid",
    isOpen: true,
    payment: { ...EMPTY_PAYMENT },
    shipping: null,
    dispatch: null,
    delivered: null,
    timeline: [],
    version: 0,
    createdAt: TS,
    updatedAt: TS,
  };

  it("maps a duplicate key on insert to DuplicateOpenOrderError", async () => {
    vi.spyOn(Collection.prototype, "insertOne").mockRejectedValueOnce(duplicateKey());

    const err = await repo.insert(newCart).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DuplicateOpenOrderError);
    expect(err).toHaveProperty("message", "Open order already exists for buyer buyer-1 at pharmacy seller-1");
  });

  it("passes other insert failures through", async () => {
    vi.spyOn(Collection.prototype, "insertOne").mockRejectedValueOnce(new Error("socket closed"));
    await expect(repo.insert(newCart)).rejects.toThrow("socket closed");
  });

  it("writes only at the expected version and bumps it", async () => {
    const findOneAndUpdate = vi
      .spyOn(Collection.prototype, "findOneAndUpdate")
      .mockResolvedValueOnce({ _id: OID, buyerId: "buyer-1", version: 5 });

    const updated = await repo.update(HEX, 4, { orderStatus: "confirmed", paymentStatus: "paid" }, event);

    expect(updated).toEqual({ id: HEX, buyerId: "buyer-1", version: 5 });
    expect(findOneAndUpdate).toHaveBeenCalledWith(
      { _id: OID, version: 4 },
      {
        $set: { orderStatus: "confirmed", paymentStatus: "paid", isOpen: false, updatedAt: TS },
        $push: { timeline: event },
        $inc: { version: 1 },
      },
      { returnDocument: "after" }
    );
  });

  it("returns null on a version mismatch", async () => {
    vi.spyOn(Collection.prototype, "findOneAndUpdate").mockResolvedValueOnce(null);
    expect(await repo.update(HEX, 4, { orderStatus: "pending", paymentStatus: "rejected" }, event)).toBeNull();
  });

  it("maps a duplicate key on reopen to DuplicateOpenOrderError for the order's pair", async () => {
    vi.spyOn(Collection.prototype, "findOneAndUpdate").mockRejectedValueOnce(duplicateKey());
    vi.spyOn(Collection.prototype, "findOne").mockResolvedValueOnce({
      _id: OID,
      buyerId: "buyer-1",
      pharmacyId: "seller-1",
    });

    await expect(
      repo.update(HEX, 2, { orderStatus: "pending", paymentStatus: "rejected" }, event)
    ).rejects.toThrow(new DuplicateOpenOrderError("buyer-1", "seller-1"));
  });

  it("deletes only at the expected version", async () => {
    const deleteOne = vi
      .spyOn(Collection.prototype, "deleteOne")
      .mockResolvedValueOnce({ acknowledged: true, deletedCount: 1 })
      .mockResolvedValueOnce({ acknowledged: true, deletedCount: 0 });

    expect(await repo.delete(HEX, 7)).toBe(true);
    expect(await repo.delete(HEX, 7)).toBe(false);
    expect(deleteOne).toHaveBeenCalledWith({ _id: OID, version: 7 });
  });
});

describe("MongoNotificationRepository", () => {
  const repo = new MongoNotificationRepository(db);

  it("marks the listed unread notifications and reports how many changed", async () => {
    const updateMany = vi.spyOn(Collection.prototype, "updateMany").mockResolvedValueOnce(updateResult(2, 1));

    expect(await repo.markRead("buyer-1", [HEX, "bogus"], TS)).toBe(1);
    expect(updateMany).toHaveBeenCalledWith(
      { userId: "buyer-1", isRead: false, _id: { $in: [OID] } },
      { $set: { isRead: true, readAt: TS } }
    );
  });
});
