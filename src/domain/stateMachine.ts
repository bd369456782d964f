/**
 * @file src/domain/stateMachine.ts
 * @description
 * Finite state machine over the (orderStatus, paymentStatus) pair and validation helpers.
 */

import type { OrderStatus, PaymentStatus } from "./types";
import { InvalidStateError } from "./errors";

/** One point of the order x payment cross-product */
export interface OrderState {
  orderStatus: OrderStatus;
  paymentStatus: PaymentStatus;
}

/** Seller and buyer actions that move an order between states */
export type OrderAction =
  | "submit_payment"
  | "verify_payment"
  | "reject_payment"
  | "dispatch"
  | "deliver"
  | "send_seller_receipt";

/**
 * Canonical transition rule.
 */
export interface TransitionRule {
  name: OrderAction;
  /** States the action may start from */
  from: ReadonlyArray<OrderState>;
  /** Fields set by the transition; omitted fields are left unchanged */
  to: Partial<OrderState>;
}

/** Statuses making up the OPEN predicate */
export const OPEN_ORDER_STATUSES: ReadonlyArray<OrderStatus> = ["cart", "pending"];
export const OPEN_PAYMENT_STATUSES: ReadonlyArray<PaymentStatus> = ["unpaid", "rejected"];

/**
 * Pairs an order can actually occupy.
 */
export const VALID_STATES: ReadonlyArray<OrderState> = [
  { orderStatus: "cart", paymentStatus: "unpaid" },
  { orderStatus: "pending", paymentStatus: "unpaid" },
  { orderStatus: "pending", paymentStatus: "proof_uploaded" },
  { orderStatus: "pending", paymentStatus: "rejected" },
  { orderStatus: "confirmed", paymentStatus: "paid" },
  { orderStatus: "dispatched", paymentStatus: "paid" },
  { orderStatus: "delivered", paymentStatus: "paid" },
];

/**
 * Exhaustive transition table.
 * Single source of truth.
 */
export const RULES: Record<OrderAction, TransitionRule> = {
  submit_payment: {
    name: "submit_payment",
    from: [
      { orderStatus: "cart", paymentStatus: "unpaid" },
      { orderStatus: "pending", paymentStatus: "unpaid" },
      { orderStatus: "pending", paymentStatus: "rejected" },
    ],
    to: { orderStatus: "pending", paymentStatus: "proof_uploaded" },
  },
  verify_payment: {
    name: "verify_payment",
    from: [{ orderStatus: "pending", paymentStatus: "proof_uploaded" }],
    to: { orderStatus: "confirmed", paymentStatus: "paid" },
  },
  reject_payment: {
    name: "reject_payment",
    from: [{ orderStatus: "pending", paymentStatus: "proof_uploaded" }],
    to: { paymentStatus: "rejected" },
  },
  dispatch: {
    name: "dispatch",
    from: [{ orderStatus: "confirmed", paymentStatus: "paid" }],
    to: { orderStatus: "dispatched" },
  },
  deliver: {
    name: "deliver",
    from: [
      { orderStatus: "confirmed", paymentStatus: "paid" },
      { orderStatus: "dispatched", paymentStatus: "paid" },
    ],
    to: { orderStatus: "delivered" },
  },
  send_seller_receipt: {
    name: "send_seller_receipt",
    from: [
      { orderStatus: "confirmed", paymentStatus: "paid" },
      { orderStatus: "dispatched", paymentStatus: "paid" },
    ],
    to: {},
  },
} as const;

export function describeState(s: OrderState): string {
  return `${s.orderStatus}/${s.paymentStatus}`;
}

function sameState(a: OrderState, b: OrderState): boolean {
  return a.orderStatus === b.orderStatus && a.paymentStatus === b.paymentStatus;
}

export function isValidState(s: OrderState): boolean {
  return VALID_STATES.some((v) => sameState(v, s));
}

/**
 * OPEN: still editable by the buyer.
 */
export function isOpenState(s: OrderState): boolean {
  return OPEN_ORDER_STATUSES.includes(s.orderStatus) && OPEN_PAYMENT_STATUSES.includes(s.paymentStatus);
}

export function canApply(action: OrderAction, current: OrderState): boolean {
  return RULES[action].from.some((f) => sameState(f, current));
}

/**
 * Validate an action against the current state and return the resulting state.
 *
 * @throws {InvalidStateError} naming the expected prior state(s).
 */
export function nextState(action: OrderAction, current: OrderState): OrderState {
  const rule = RULES[action];
  if (!canApply(action, current)) {
    throw new InvalidStateError(
      action.replace(/_/g, " "),
      rule.from.map(describeState).join(" or "),
      current
    );
  }
  return {
    orderStatus: rule.to.orderStatus ?? current.orderStatus,
    paymentStatus: rule.to.paymentStatus ?? current.paymentStatus,
  };
}

/**
 * Guard for buyer edits (add, change quantity, cancel).
 *
 * @throws {InvalidStateError} when the order is no longer open.
 */
export function assertOpen(action: string, current: OrderState): void {
  if (!isOpenState(current)) {
    throw new InvalidStateError(action, "open (cart or pending with payment unpaid/rejected)", current);
  }
}
