#!/usr/bin/env tsx
/**
 * @file scripts/seed.ts
 * @description Seeds demo pharmacies and medicines for manual testing
 */

import { readFile } from "node:fs/promises";
import { MongoClient, ObjectId } from "mongodb";
import dotenv from "dotenv";
import type { PharmacyProfileDoc } from "../src/domain/docs";
import { COLLECTIONS, type MedicineRow } from "../src/lib/mongoStore";
import { SeedSchema, medicineUpsert } from "./seedPlan";
dotenv.config();

async function main() {
  const uri = process.env.MONGODB_URI || "mongodb://127.0.0.1:27017/pharmacy";
  const client = new MongoClient(uri);
  await client.connect();

  const db = client.db(process.env.DB_NAME?.trim() || "pharmacy");
  const now = new Date();

  const raw: unknown = JSON.parse(await readFile(new URL("./seed-data.json", import.meta.url), "utf8"));
  const seed = SeedSchema.parse(raw);

  let medicineCount = 0;
  for (const p of seed.pharmacies) {
    await db.collection<PharmacyProfileDoc>(COLLECTIONS.pharmacies).updateOne(
      { userId: p.userId },
      { $set: { userId: p.userId, pharmacyName: p.pharmacyName, address: p.address } },
      { upsert: true }
    );

    for (const m of p.medicines) {
      await db
        .collection<MedicineRow>(COLLECTIONS.medicines)
        .updateOne({ _id: new ObjectId(m.id) }, medicineUpsert(p.userId, m, now), { upsert: true });
      medicineCount++;
    }
  }

  console.log(`Seeded ${seed.pharmacies.length} pharmacies, ${medicineCount} medicines:`);
  for (const p of seed.pharmacies) console.log(`   - ${p.pharmacyName} (${p.userId})`);

  await client.close();
}

main().catch((err) => {
  console.error("Seed failed:", err);
  process.exit(1);
});
