/**
 * @file src/lib/mongo.ts
 * @description
 * Shared MongoDB connection and the index plan the order core relies on. The
 * partial unique index on `orders` is what makes "one open order per buyer and
 * pharmacy" hold across processes.
 */

import { MongoClient, ServerApiVersion } from "mongodb";
import type { Db, IndexDescription } from "mongodb";
import { envString } from "../util/env";
import { errorMessage, log } from "../util/log";
import { COLLECTIONS } from "./mongoStore";

/** Survives module reloads in dev servers */
type MongoGlobal = {
  _pharmacyMongo?: { client: MongoClient; db: Db } | null;
  _pharmacyIndexesReady?: boolean;
};

const g = globalThis as unknown as MongoGlobal;

const CONNECT_ATTEMPTS = 4;
const CONNECT_BACKOFF_MS = 200;

interface MongoConfig {
  uri: string;
  dbName: string;
}

/**
 * @throws {Error} naming the variable when MONGODB_URI is missing or malformed
 */
function readConfig(): MongoConfig {
  const uri = envString("MONGODB_URI", "");
  if (!uri) throw new Error("MONGODB_URI is required");
  if (!/^mongodb(\+srv)?:\/\//.test(uri)) {
    throw new Error(`MONGODB_URI must start with mongodb:// or mongodb+srv:// (got ${uri.slice(0, 12)}...)`);
  }
  return { uri, dbName: envString("DB_NAME", "pharmacy") };
}

/**
 * Connect and ping, backing off exponentially between failed attempts.
 */
async function connect(cfg: MongoConfig): Promise<MongoClient> {
  for (let attempt = 1; ; attempt++) {
    const client = new MongoClient(cfg.uri, {
      maxPoolSize: 50,
      serverSelectionTimeoutMS: 5_000,
      serverApi: { version: ServerApiVersion.v1, strict: true, deprecationErrors: true },
      retryWrites: true,
    });
    try {
      await client.connect();
      await client.db(cfg.dbName).command({ ping: 1 });
      return client;
    } catch (err) {
      const error = errorMessage(err);
      await client.close().catch((closeErr: unknown) =>
        log({
          level: "warn",
          evt: "mongo.close_failed",
          error: errorMessage(closeErr),
        })
      );
      if (attempt >= CONNECT_ATTEMPTS) {
        throw new Error(`Mongo connection failed after ${attempt} attempts: ${error}`);
      }
      log({ level: "warn", evt: "mongo.connect_retry", attempt, error });
      await new Promise((resolve) => setTimeout(resolve, CONNECT_BACKOFF_MS * 2 ** (attempt - 1)));
    }
  }
}

/** Index plan per collection */
export const INDEXES: Record<string, IndexDescription[]> = {
  [COLLECTIONS.medicines]: [{ key: { sellerId: 1 }, name: "by_seller" }],
  [COLLECTIONS.orders]: [
    {
      key: { buyerId: 1, pharmacyId: 1 },
      name: "uniq_open_order",
      unique: true,
      partialFilterExpression: { isOpen: true },
    },
    { key: { buyerId: 1, createdAt: -1 }, name: "by_buyer_time" },
    { key: { pharmacyId: 1, paymentStatus: 1, updatedAt: -1 }, name: "review_queue" },
  ],
  [COLLECTIONS.notifications]: [{ key: { userId: 1, isRead: 1, createdAt: -1 }, name: "by_user_unread" }],
  [COLLECTIONS.pharmacies]: [{ key: { userId: 1 }, unique: true, name: "uniq_pharmacy_user" }],
};

/**
 * Create the planned indexes once per process.
 */
export async function ensureIndexes(db: Db): Promise<void> {
  if (g._pharmacyIndexesReady) return;
  for (const [collection, specs] of Object.entries(INDEXES)) {
    await db.collection(collection).createIndexes(specs);
    log({ evt: "mongo.indexes_ready", collection, count: specs.length });
  }
  g._pharmacyIndexesReady = true;
}

/**
 * Connected database, created on first use.
 */
export async function getDb(): Promise<Db> {
  if (g._pharmacyMongo) return g._pharmacyMongo.db;

  const cfg = readConfig();
  const client = await connect(cfg);
  const db = client.db(cfg.dbName);
  g._pharmacyMongo = { client, db };

  await ensureIndexes(db);
  return db;
}

export async function closeMongo(): Promise<void> {
  const current = g._pharmacyMongo;
  g._pharmacyMongo = null;
  g._pharmacyIndexesReady = false;
  if (current) await current.client.close();
}

/**
 * Ping the database; false on any failure.
 */
export async function isMongoHealthy(): Promise<boolean> {
  try {
    const db = await getDb();
    await db.command({ ping: 1 });
    return true;
  } catch (err) {
    log({ level: "warn", evt: "mongo.unhealthy", error: errorMessage(err) });
    return false;
  }
}
