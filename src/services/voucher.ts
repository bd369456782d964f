/**
 * @file src/services/voucher.ts
 * @description
 * Plain-text seller receipt issued once a payment is verified.
 */

import type { OrderDoc } from "../domain/docs";
import { formatCurrency, formatTimestamp } from "../domain/types";

export function voucherFileName(orderId: string): string {
  return `voucher-${orderId}.txt`;
}

/**
 * Render the voucher body. One line per item: `<qty> x <name> @ <price> = <total>`.
 */
export function renderVoucher(order: OrderDoc, issuedAt: Date): string {
  const lines = [
    "SELLER RECEIPT",
    `Order: ${order.id}`,
    `Pharmacy: ${order.pharmacyName}`,
    `Buyer: ${order.buyerId}`,
    `Payment reference: ${order.payment.paymentId ?? "—"}`,
    `Issued: ${formatTimestamp(issuedAt)}`,
    "",
    ...order.items.map(
      (l) => `${l.quantity} x ${l.medicineName} @ ${formatCurrency(l.price)} = ${formatCurrency(l.total)}`
    ),
    "",
    `Total: ${formatCurrency(order.totalAmount)}`,
  ];
  if (order.shipping) lines.push(`Ship to: ${order.shipping.addressLine}, ${order.shipping.city}`);
  return lines.join("\n") + "\n";
}
