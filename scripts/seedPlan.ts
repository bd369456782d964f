/**
 * @file scripts/seedPlan.ts
 * @description Shape of seed-data.json and the upserts built from it
 */

import type { Document } from "mongodb";
import { z } from "zod";

export const SeedMedicineSchema = z.object({
  id: z.string().regex(/^[a-f0-9]{24}$/),
  name: z.string().min(1),
  sellingPrice: z.number().nonnegative(),
  buyingPrice: z.number().nonnegative(),
  stock: z.number().int().nonnegative(),
  expirationDate: z.coerce.date().optional(),
});

export type SeedMedicine = z.infer<typeof SeedMedicineSchema>;

export const SeedSchema = z.object({
  pharmacies: z.array(
    z.object({
      userId: z.string().min(1),
      pharmacyName: z.string().min(1),
      address: z.string().optional(),
      medicines: z.array(SeedMedicineSchema),
    })
  ),
});

/**
 * Update pipeline for one catalog record. Re-seeding a live database keeps the
 * `reserved` counter and never sets `stock` below it.
 */
export function medicineUpsert(sellerId: string, m: SeedMedicine, now: Date): Document[] {
  const reserved = { $ifNull: ["$reserved", 0] };
  return [
    {
      $set: {
        sellerId: { $literal: sellerId },
        name: { $literal: m.name },
        sellingPrice: m.sellingPrice,
        buyingPrice: m.buyingPrice,
        ...(m.expirationDate ? { expirationDate: m.expirationDate } : {}),
        stock: { $max: [m.stock, reserved] },
        reserved,
        createdAt: { $ifNull: ["$createdAt", now] },
        updatedAt: now,
      },
    },
  ];
}
