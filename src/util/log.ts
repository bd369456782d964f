/**
 * @file src/util/log.ts
 * @description
 * Lightweight structured logging and in-memory metrics counters
 */

export type LogLevel = "info" | "warn" | "error";

/** One JSON line; `evt` is a dotted event name such as `order.verified` */
export interface LogRecord {
  evt: string;
  level?: LogLevel;
  ts?: string;
  [field: string]: unknown;
}

/**
 * Write `fields` as a single JSON line. Errors go to stderr, warnings to
 * `console.warn`, everything else to stdout.
 */
export function log(fields: LogRecord): void {
  const record: LogRecord = { ts: new Date().toISOString(), level: fields.level ?? "info", ...fields };

  try {
    const line = JSON.stringify(record);
    if (record.level === "error") console.error(line);
    else if (record.level === "warn") console.warn(line);
    else console.log(line);
  } catch (err) {
    // e.g. a BigInt or a cycle in the fields
    console.error(
      JSON.stringify({ ts: record.ts, level: "error", evt: "log.serialization_failed", error: errorMessage(err) })
    );
  }
}

/** Message of a thrown value, for the `error` field of a log record */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Counter names tracked in memory (reset on cold start) */
const COUNTER_NAMES = [
  "cartMutations",
  "reserveOk",
  "reserveFail",
  "commitOk",
  "commitFail",
  "ordersSubmitted",
  "paymentsVerified",
  "paymentsRejected",
  "ordersDelivered",
  "ordersSwept",
] as const;

type Counter = (typeof COUNTER_NAMES)[number];

const counters: Record<Counter, number> = {
  cartMutations: 0,
  reserveOk: 0,
  reserveFail: 0,
  commitOk: 0,
  commitFail: 0,
  ordersSubmitted: 0,
  paymentsVerified: 0,
  paymentsRejected: 0,
  ordersDelivered: 0,
  ordersSwept: 0,
};

/**
 * Named metric increment functions for consistent usage
 */
export const metrics = {
  inc(name: Counter, by = 1): void {
    counters[name] += by;
  },

  get(name: Counter): number {
    return counters[name];
  },

  /**
   * Produce a snapshot of current metric counters
   *
   * @returns An object suitable for JSON serialization
   */
  snapshot(): Record<string, unknown> {
    return {
      cart_mutations_total: counters.cartMutations,
      stock_reservations_total: { ok: counters.reserveOk, fail: counters.reserveFail },
      stock_commits_total: { ok: counters.commitOk, fail: counters.commitFail },
      order_transitions_total: {
        submitted: counters.ordersSubmitted,
        verified: counters.paymentsVerified,
        rejected: counters.paymentsRejected,
        delivered: counters.ordersDelivered,
        swept: counters.ordersSwept,
      },
    };
  },

  /**
   * Reset all counters to zero
   */
  reset(): void {
    for (const k of COUNTER_NAMES) counters[k] = 0;
  },
};

/**
 * Build a minimal health report combining DB connectivity and metric state
 *
 * @param opts - Values for db connection and order queue stats
 *
 * @returns JSON-serializable health object
 */
export function buildHealthReport(opts: {
  dbConnected: boolean;
  openOrders?: number;
  awaitingReview?: number;
}): Record<string, unknown> {
  return {
    dbConnected: opts.dbConnected,
    openOrders: opts.openOrders ?? 0,
    awaitingReview: opts.awaitingReview ?? 0,
    metrics: metrics.snapshot(),
    timestamp: new Date().toISOString(),
  };
}
