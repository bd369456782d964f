/**
 * @file src/lib/mongoStore.ts
 * @description
 * MongoDB implementations of the repository interfaces. Stock counters and order
 * versions are only ever changed through single-document conditional updates.
 */

import { MongoServerError, ObjectId } from "mongodb";
import type { Db, Filter, Sort } from "mongodb";
import type {
  MedicineDoc,
  NewNotificationDoc,
  NewOrderDoc,
  NotificationDoc,
  OrderDoc,
  OrderPatch,
  PharmacyProfileDoc,
  TimelineEvent,
} from "../domain/docs";
import { isOpenState } from "../domain/stateMachine";
import {
  DuplicateOpenOrderError,
  type MedicineRepository,
  type NotificationRepository,
  type OrderQuery,
  type OrderRepository,
  type PharmacyDirectory,
} from "./store";

/** Collection names */
export const COLLECTIONS = {
  medicines: "medicines",
  orders: "orders",
  notifications: "notifications",
  pharmacies: "pharmacy_profiles",
} as const;

type Row<T extends { id: string }> = Omit<T, "id"> & { _id: ObjectId };
export type MedicineRow = Row<MedicineDoc>;
export type OrderRow = Row<OrderDoc>;
export type NotificationRow = Row<NotificationDoc>;

/**
 * Parse a hex id; returns null for anything ObjectId would reject.
 */
export function parseObjectId(id: string): ObjectId | null {
  return /^[a-f0-9]{24}$/i.test(id) ? new ObjectId(id) : null;
}

function fromRow<T extends { _id: ObjectId }>(row: T): Omit<T, "_id"> & { id: string } {
  const { _id, ...rest } = row;
  return { id: _id.toHexString(), ...rest };
}

function isDuplicateKey(err: unknown): boolean {
  return err instanceof MongoServerError && err.code === 11000;
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// ---------------------------------------------------------------------------
// Filter builders (pure, unit-tested)
// ---------------------------------------------------------------------------

/** Matches only while `stock - reserved >= qty` */
export function reserveFilter(id: ObjectId, qty: number): Filter<MedicineRow> {
  return {
    _id: id,
    $expr: { $gte: [{ $subtract: ["$stock", { $ifNull: ["$reserved", 0] }] }, qty] },
  };
}

/** Matches only while `reserved >= qty` */
export function releaseFilter(id: ObjectId, qty: number): Filter<MedicineRow> {
  return { _id: id, reserved: { $gte: qty } };
}

/** Matches only while both counters can absorb the deduction */
export function commitFilter(id: ObjectId, qty: number): Filter<MedicineRow> {
  return { _id: id, reserved: { $gte: qty }, stock: { $gte: qty } };
}

export function orderQueryFilter(q: OrderQuery): Filter<OrderRow> {
  const filter: Filter<OrderRow> = {};
  if (q.buyerId !== undefined) filter.buyerId = q.buyerId;
  if (q.pharmacyId !== undefined) filter.pharmacyId = q.pharmacyId;
  if (q.orderStatus?.length) filter.orderStatus = { $in: [...q.orderStatus] };
  if (q.paymentStatus?.length) filter.paymentStatus = { $in: [...q.paymentStatus] };
  if (q.updatedBefore) filter.updatedAt = { $lt: q.updatedBefore };
  if (q.text) {
    const rx = { $regex: escapeRegex(q.text), $options: "i" };
    filter.$or = [{ pharmacyName: rx }, { "items.medicineName": rx }];
  }
  return filter;
}

export function orderSort(sort: OrderQuery["sort"]): Sort {
  switch (sort) {
    case "created_asc":
      return { createdAt: 1 };
    case "total_desc":
      return { totalAmount: -1, createdAt: -1 };
    case "total_asc":
      return { totalAmount: 1, createdAt: -1 };
    case "updated_desc":
      return { updatedAt: -1 };
    default:
      return { createdAt: -1 };
  }
}

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

export class MongoMedicineRepository implements MedicineRepository {
  constructor(private readonly db: Db) {}

  private get col() {
    return this.db.collection<MedicineRow>(COLLECTIONS.medicines);
  }

  async findById(id: string): Promise<MedicineDoc | null> {
    const oid = parseObjectId(id);
    if (!oid) return null;
    const row = await this.col.findOne({ _id: oid });
    return row ? { ...fromRow(row), reserved: row.reserved ?? 0 } : null;
  }

  async tryReserve(id: string, qty: number): Promise<boolean> {
    const oid = parseObjectId(id);
    if (!oid) return false;
    const res = await this.col.updateOne(reserveFilter(oid, qty), {
      $inc: { reserved: qty },
      $set: { updatedAt: new Date() },
    });
    return res.matchedCount === 1;
  }

  async tryRelease(id: string, qty: number): Promise<boolean> {
    const oid = parseObjectId(id);
    if (!oid) return false;
    const res = await this.col.updateOne(releaseFilter(oid, qty), {
      $inc: { reserved: -qty },
      $set: { updatedAt: new Date() },
    });
    return res.matchedCount === 1;
  }

  async tryCommit(id: string, qty: number): Promise<boolean> {
    const oid = parseObjectId(id);
    if (!oid) return false;
    const res = await this.col.updateOne(commitFilter(oid, qty), {
      $inc: { stock: -qty, reserved: -qty },
      $set: { updatedAt: new Date() },
    });
    return res.matchedCount === 1;
  }

  async revertCommit(id: string, qty: number): Promise<void> {
    const oid = parseObjectId(id);
    if (!oid) return;
    await this.col.updateOne(
      { _id: oid },
      { $inc: { stock: qty, reserved: qty }, $set: { updatedAt: new Date() } }
    );
  }
}

export class MongoOrderRepository implements OrderRepository {
  constructor(private readonly db: Db) {}

  private get col() {
    return this.db.collection<OrderRow>(COLLECTIONS.orders);
  }

  async findById(id: string): Promise<OrderDoc | null> {
    const oid = parseObjectId(id);
    if (!oid) return null;
    const row = await this.col.findOne({ _id: oid });
    return row ? fromRow(row) : null;
  }

  async findOpen(buyerId: string, pharmacyId: string): Promise<OrderDoc | null> {
    const row = await this.col.findOne({ buyerId, pharmacyId, isOpen: true });
    return row ? fromRow(row) : null;
  }

  async find(query: OrderQuery): Promise<OrderDoc[]> {
    const rows = await this.col.find(orderQueryFilter(query)).sort(orderSort(query.sort)).toArray();
    return rows.map((r) => fromRow(r));
  }

  async count(query: OrderQuery): Promise<number> {
    return this.col.countDocuments(orderQueryFilter(query));
  }

  async insert(doc: NewOrderDoc): Promise<OrderDoc> {
    const _id = new ObjectId();
    try {
      await this.col.insertOne({ _id, ...doc });
    } catch (err) {
      if (isDuplicateKey(err)) throw new DuplicateOpenOrderError(doc.buyerId, doc.pharmacyId);
      throw err;
    }
    return { id: _id.toHexString(), ...doc };
  }

  async update(
    id: string,
    expectedVersion: number,
    patch: OrderPatch,
    event: TimelineEvent
  ): Promise<OrderDoc | null> {
    const oid = parseObjectId(id);
    if (!oid) return null;
    try {
      const row = await this.col.findOneAndUpdate(
        { _id: oid, version: expectedVersion },
        {
          $set: { ...patch, isOpen: isOpenState(patch), updatedAt: event.ts },
          $push: { timeline: event },
          $inc: { version: 1 },
        },
        { returnDocument: "after" }
      );
      return row ? fromRow(row) : null;
    } catch (err) {
      if (isDuplicateKey(err)) {
        const current = await this.findById(id);
        throw new DuplicateOpenOrderError(current?.buyerId ?? "?", current?.pharmacyId ?? "?");
      }
      throw err;
    }
  }

  async appendEvent(id: string, event: TimelineEvent): Promise<boolean> {
    const oid = parseObjectId(id);
    if (!oid) return false;
    const res = await this.col.updateOne(
      { _id: oid },
      { $push: { timeline: event }, $set: { updatedAt: event.ts }, $inc: { version: 1 } }
    );
    return res.matchedCount === 1;
  }

  async delete(id: string, expectedVersion: number): Promise<boolean> {
    const oid = parseObjectId(id);
    if (!oid) return false;
    const res = await this.col.deleteOne({ _id: oid, version: expectedVersion });
    return res.deletedCount === 1;
  }
}

export class MongoNotificationRepository implements NotificationRepository {
  constructor(private readonly db: Db) {}

  private get col() {
    return this.db.collection<NotificationRow>(COLLECTIONS.notifications);
  }

  async insert(doc: NewNotificationDoc): Promise<NotificationDoc> {
    const _id = new ObjectId();
    await this.col.insertOne({ _id, ...doc });
    return { id: _id.toHexString(), ...doc };
  }

  async listForUser(userId: string, limit: number): Promise<NotificationDoc[]> {
    const rows = await this.col.find({ userId }).sort({ createdAt: -1 }).limit(limit).toArray();
    return rows.map((r) => fromRow(r));
  }

  async countUnread(userId: string): Promise<number> {
    return this.col.countDocuments({ userId, isRead: false });
  }

  async markRead(userId: string, ids: ReadonlyArray<string> | undefined, at: Date): Promise<number> {
    const filter: Filter<NotificationRow> = { userId, isRead: false };
    if (ids?.length) {
      const oids: ObjectId[] = [];
      for (const id of ids) {
        const oid = parseObjectId(id);
        if (oid) oids.push(oid);
      }
      filter._id = { $in: oids };
    }
    const res = await this.col.updateMany(filter, { $set: { isRead: true, readAt: at } });
    return res.modifiedCount;
  }
}

export class MongoPharmacyDirectory implements PharmacyDirectory {
  constructor(private readonly db: Db) {}

  async displayName(sellerId: string): Promise<string | null> {
    const profile = await this.db
      .collection<PharmacyProfileDoc>(COLLECTIONS.pharmacies)
      .findOne({ userId: sellerId });
    return profile?.pharmacyName ?? null;
  }
}
