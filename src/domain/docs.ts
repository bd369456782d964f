/**
 * @file src/domain/docs.ts
 * @description
 * Document types
 */
import type { OrderStatus, PaymentStatus, Role, TimelineActor } from "./types";

/**
 * Catalog record. `stock` and `reserved` move only through the stock ledger.
 */
export interface MedicineDoc {
  id: string;
  sellerId: string;
  name: string;
  sellingPrice: number;
  buyingPrice: number;
  stock: number;
  reserved: number;
  expirationDate?: Date;
  imageFilename?: string;
  createdAt: Date;
  updatedAt?: Date;
}

export interface PharmacyProfileDoc {
  userId: string;
  pharmacyName: string;
  address?: string;
}

export interface LineItem {
  medicineId: string;
  medicineName: string;
  quantity: number;
  /** Selling price snapshot taken when the line was last grown */
  price: number;
  buyingPrice: number;
  /** Units currently held in the catalog's `reserved` counter for this line */
  reservedQty: number;
  total: number;
}

export interface TimelineEvent {
  ts: Date;
  actor: TimelineActor;
  action: string;
  meta: Record<string, unknown>;
}

export interface PaymentRecord {
  paymentId: string | null;
  receiptPath: string | null;
  rejectedReason: string | null;
  uploadedAt: Date | null;
  sellerReceiptPath: string | null;
  sellerReceiptSentAt: Date | null;
}

export interface ShippingInfo {
  addressLine: string;
  city: string;
}

export interface DispatchInfo {
  trackingNo: string | null;
  ts: Date;
}

export interface OrderDoc {
  id: string;
  buyerId: string;
  pharmacyId: string;
  pharmacyName: string;
  items: LineItem[];
  totalAmount: number;
  orderStatus: OrderStatus;
  paymentStatus: PaymentStatus;
  /** Materialized OPEN predicate, backed by a unique partial index per buyer/pharmacy */
  isOpen: boolean;
  payment: PaymentRecord;
  shipping: ShippingInfo | null;
  dispatch: DispatchInfo | null;
  delivered: { ts: Date } | null;
  timeline: TimelineEvent[];
  /** Optimistic concurrency token, incremented on every write */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/** Fields an order write may replace. Both statuses are always given so `isOpen` can be derived. */
export type OrderPatch = Partial<
  Pick<OrderDoc, "items" | "totalAmount" | "payment" | "shipping" | "dispatch" | "delivered">
> &
  Pick<OrderDoc, "orderStatus" | "paymentStatus">;

export type NewOrderDoc = Omit<OrderDoc, "id">;

export type NotificationType =
  | "proof_uploaded"
  | "payment_verified"
  | "payment_rejected"
  | "order_delivered"
  | "order_expired";

export interface NotificationDoc {
  id: string;
  userId: string;
  role: Role;
  type: NotificationType;
  title: string;
  message: string;
  orderId: string | null;
  isRead: boolean;
  readAt: Date | null;
  createdAt: Date;
}

export type NewNotificationDoc = Omit<NotificationDoc, "id">;
