/**
 * @file src/lib/store.ts
 * @description
 * Persistence seams used by the services. `mongoStore.ts` implements them over MongoDB.
 */

import type {
  MedicineDoc,
  NewNotificationDoc,
  NewOrderDoc,
  NotificationDoc,
  OrderDoc,
  OrderPatch,
  TimelineEvent,
} from "../domain/docs";
import type { BuyerOrderSort, OrderStatus, PaymentStatus } from "../domain/types";
import { KeyedMutex } from "./keyedMutex";

/**
 * Catalog access plus the conditional updates behind the stock ledger.
 * Each `try*` method is a single atomic test-and-set and reports whether it matched.
 */
export interface MedicineRepository {
  findById(id: string): Promise<MedicineDoc | null>;
  /** reserved += qty where stock - reserved >= qty */
  tryReserve(id: string, qty: number): Promise<boolean>;
  /** reserved -= qty where reserved >= qty */
  tryRelease(id: string, qty: number): Promise<boolean>;
  /** stock -= qty, reserved -= qty where reserved >= qty */
  tryCommit(id: string, qty: number): Promise<boolean>;
  /** Undo a commit: stock += qty, reserved += qty */
  revertCommit(id: string, qty: number): Promise<void>;
}

export interface OrderQuery {
  buyerId?: string;
  pharmacyId?: string;
  orderStatus?: ReadonlyArray<OrderStatus>;
  paymentStatus?: ReadonlyArray<PaymentStatus>;
  /** Case-insensitive match on pharmacy name or any line's medicine name */
  text?: string;
  updatedBefore?: Date;
  sort?: BuyerOrderSort | "updated_desc";
}

/** Thrown by `insert` when the buyer already has an open order for the pharmacy */
export class DuplicateOpenOrderError extends Error {
  constructor(buyerId: string, pharmacyId: string) {
    super(`Open order already exists for buyer ${buyerId} at pharmacy ${pharmacyId}`);
    this.name = "DuplicateOpenOrderError";
  }
}

export interface OrderRepository {
  findById(id: string): Promise<OrderDoc | null>;
  findOpen(buyerId: string, pharmacyId: string): Promise<OrderDoc | null>;
  find(query: OrderQuery): Promise<OrderDoc[]>;
  count(query: OrderQuery): Promise<number>;
  /** @throws {DuplicateOpenOrderError} when the open-order slot is taken */
  insert(doc: NewOrderDoc): Promise<OrderDoc>;
  /**
   * Apply `patch`, append `event` and bump the version in one write, only if the
   * stored version still equals `expectedVersion`.
   *
   * @returns the updated document, or null on a version mismatch
   * @throws {DuplicateOpenOrderError} when the write would reopen a second order
   */
  update(id: string, expectedVersion: number, patch: OrderPatch, event: TimelineEvent): Promise<OrderDoc | null>;
  /** Append an event without other changes */
  appendEvent(id: string, event: TimelineEvent): Promise<boolean>;
  /** @returns false on a version mismatch */
  delete(id: string, expectedVersion: number): Promise<boolean>;
}

export interface NotificationRepository {
  insert(doc: NewNotificationDoc): Promise<NotificationDoc>;
  listForUser(userId: string, limit: number): Promise<NotificationDoc[]>;
  countUnread(userId: string): Promise<number>;
  /** Mark the given (or all) unread notifications read; returns how many changed */
  markRead(userId: string, ids: ReadonlyArray<string> | undefined, at: Date): Promise<number>;
}

export interface PharmacyDirectory {
  /** Display name of the seller's pharmacy, or null when no profile exists */
  displayName(sellerId: string): Promise<string | null>;
}

/**
 * Byte storage for payment proofs and seller vouchers.
 */
export interface FileStorage {
  /** Store `data` under `<folder>/<name>` and return its public path */
  save(folder: string, name: string, data: Uint8Array): Promise<string>;
  /** Delete a file by the path `save` returned; a missing file is not an error */
  remove(ref: string): Promise<void>;
}

/**
 * Everything a service needs, passed as the first argument the way a `Db` would be.
 */
export interface AppContext {
  medicines: MedicineRepository;
  orders: OrderRepository;
  notifications: NotificationRepository;
  pharmacies: PharmacyDirectory;
  files: FileStorage;
  locks: KeyedMutex;
  /** Clock seam */
  now(): Date;
}
