/**
 * @file src/lib/context.ts
 * @description
 * Builds the service context over the shared MongoDB connection.
 */

import { getDb } from "./mongo";
import {
  MongoMedicineRepository,
  MongoNotificationRepository,
  MongoOrderRepository,
  MongoPharmacyDirectory,
} from "./mongoStore";
import { DiskFileStorage } from "./fileStorage";
import { KeyedMutex } from "./keyedMutex";
import type { AppContext } from "./store";
import { envString } from "../util/env";

let __ctx: AppContext | null = null;
let __testCtx: AppContext | null = null;

/** Route handlers resolve this context instead of the database while set */
export function setTestContext(ctx: AppContext | null): void {
  __testCtx = ctx;
}

/**
 * Acquire the process-wide context. Locks are shared so that every request in
 * this process serializes on the same order keys.
 */
export async function getContext(): Promise<AppContext> {
  if (__testCtx) return __testCtx;
  if (__ctx) return __ctx;

  const db = await getDb();
  __ctx = {
    medicines: new MongoMedicineRepository(db),
    orders: new MongoOrderRepository(db),
    notifications: new MongoNotificationRepository(db),
    pharmacies: new MongoPharmacyDirectory(db),
    files: new DiskFileStorage(envString("RECEIPTS_DIR", "static/receipts")),
    locks: new KeyedMutex(),
    now: () => new Date(),
  };
  return __ctx;
}
