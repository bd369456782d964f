/**
 * @file src/domain/order.ts
 * @description
 * Pure line-item arithmetic for the order aggregate. Totals are always derived
 * from the lines, never patched incrementally.
 */

import type { LineItem, MedicineDoc, PaymentRecord } from "./docs";
import { lineTotal, sumLines } from "./types";

export const EMPTY_PAYMENT: PaymentRecord = {
  paymentId: null,
  receiptPath: null,
  rejectedReason: null,
  uploadedAt: null,
  sellerReceiptPath: null,
  sellerReceiptSentAt: null,
};

/** Snapshot a catalog record into a new line */
export function makeLine(
  med: Pick<MedicineDoc, "id" | "name" | "sellingPrice" | "buyingPrice">,
  quantity: number,
  reservedQty = 0
): LineItem {
  return {
    medicineId: med.id,
    medicineName: med.name,
    quantity,
    price: med.sellingPrice,
    buyingPrice: med.buyingPrice,
    reservedQty,
    total: lineTotal(quantity, med.sellingPrice),
  };
}

/**
 * Copy of `line` with a new quantity and reservation, total recomputed.
 */
export function resizeLine(line: LineItem, quantity: number, reservedQty: number): LineItem {
  return { ...line, quantity, reservedQty, total: lineTotal(quantity, line.price) };
}

/**
 * Copy of `line` re-priced from the catalog record. Only carts take new prices.
 */
export function repriceLine(line: LineItem, med: Pick<MedicineDoc, "sellingPrice" | "buyingPrice">): LineItem {
  return {
    ...line,
    price: med.sellingPrice,
    buyingPrice: med.buyingPrice,
    total: lineTotal(line.quantity, med.sellingPrice),
  };
}

export function findLine(items: ReadonlyArray<LineItem>, medicineId: string): LineItem | undefined {
  return items.find((l) => l.medicineId === medicineId);
}

/** Replace the line for `medicineId`, or append when absent */
export function upsertLine(items: ReadonlyArray<LineItem>, line: LineItem): LineItem[] {
  const idx = items.findIndex((l) => l.medicineId === line.medicineId);
  if (idx === -1) return [...items, line];
  return items.map((l, i) => (i === idx ? line : l));
}

export function removeLine(items: ReadonlyArray<LineItem>, medicineId: string): LineItem[] {
  return items.filter((l) => l.medicineId !== medicineId);
}

/**
 * Fold `extra` lines into `base`. Matching medicines add quantities and
 * reservations and keep the base price; the rest are appended in order.
 */
export function foldLines(base: ReadonlyArray<LineItem>, extra: ReadonlyArray<LineItem>): LineItem[] {
  let items = [...base];
  for (const add of extra) {
    const existing = findLine(items, add.medicineId);
    items = existing
      ? upsertLine(
          items,
          resizeLine(existing, existing.quantity + add.quantity, existing.reservedQty + add.reservedQty)
        )
      : [...items, add];
  }
  return items;
}

/** Units each line still needs reserved before it is fully held */
export function reservationShortfall(items: ReadonlyArray<LineItem>): Array<{ line: LineItem; missing: number }> {
  return items
    .map((line) => ({ line, missing: line.quantity - line.reservedQty }))
    .filter((s) => s.missing > 0);
}

export function orderTotal(items: ReadonlyArray<LineItem>): number {
  return sumLines(items);
}
