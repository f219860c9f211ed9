import {
  NEVER_PURCHASED,
  type AuthorizedPurchase,
  type BatchPurchaseEntry,
  type Schedule,
} from "./contracts";
import { DcaError } from "./errors";
import type { ScheduleStore } from "./schedule-store";

export type PurchaseState = "new" | "due" | "cooling-down";

export interface PurchaseStateView {
  state: PurchaseState;
  /** Balance cannot cover one more purchase. Independent of timing. */
  depleted: boolean;
  /** Earliest timestamp a purchase is accepted; `now` when already allowed. */
  nextPurchaseAt: number;
  timeRemaining: number;
}

/**
 * Timestamp recorded after a purchase at `now`.
 *
 * A first purchase anchors the schedule at `now`. Later purchases snap to the
 * latest period boundary not after `now`, counted from the previous
 * timestamp, so a schedule that sat depleted for several periods keeps its
 * initial phase instead of drifting.
 */
export function nextPurchaseTimestamp(
  lastPurchaseTimestamp: number,
  purchasePeriod: number,
  now: number,
): number {
  if (lastPurchaseTimestamp === NEVER_PURCHASED) return now;
  const periodsElapsed = Math.floor((now - lastPurchaseTimestamp) / purchasePeriod);
  return lastPurchaseTimestamp + periodsElapsed * purchasePeriod;
}

export function describePurchaseState(schedule: Schedule, now: number): PurchaseStateView {
  const depleted = schedule.purchaseAmount > schedule.tokenBalance;

  if (schedule.lastPurchaseTimestamp === NEVER_PURCHASED) {
    return { state: "new", depleted, nextPurchaseAt: now, timeRemaining: 0 };
  }

  const dueAt = schedule.lastPurchaseTimestamp + schedule.purchasePeriod;
  if (now < dueAt) {
    return {
      state: "cooling-down",
      depleted,
      nextPurchaseAt: dueAt,
      timeRemaining: dueAt - now,
    };
  }

  return { state: "due", depleted, nextPurchaseAt: now, timeRemaining: 0 };
}

/**
 * Checks a purchase request against its schedule and applies the resulting
 * balance and timestamp to the store.
 *
 * The authorizer never moves funds. Callers get back the amount and lending
 * venue to settle, which lets a batch run every check before the first
 * external call.
 */
export class PurchaseAuthorizer {
  constructor(private readonly store: ScheduleStore) {}

  authorize(
    buyer: string,
    token: string,
    scheduleIndex: number,
    scheduleId: string,
    now: number,
  ): AuthorizedPurchase {
    const ref = { owner: buyer, token, scheduleIndex, scheduleId };
    const schedule = this.store.assertIdentity(ref);

    const view = describePurchaseState(schedule, now);
    if (view.state === "cooling-down") {
      throw new DcaError("CannotBuyIfPurchasePeriodHasNotElapsed", {
        scheduleIndex,
        scheduleId,
        timeRemaining: view.timeRemaining,
      });
    }

    if (schedule.purchaseAmount > schedule.tokenBalance) {
      throw new DcaError("ScheduleBalanceNotEnoughForPurchase", {
        scheduleIndex,
        scheduleId,
        token,
        tokenBalance: schedule.tokenBalance,
      });
    }

    const tokenBalance = schedule.tokenBalance - schedule.purchaseAmount;
    this.store.writePurchaseBalance(ref, tokenBalance);

    const lastPurchaseTimestamp = nextPurchaseTimestamp(
      schedule.lastPurchaseTimestamp,
      schedule.purchasePeriod,
      now,
    );
    this.store.writePurchaseTimestamp(ref, lastPurchaseTimestamp);

    return {
      buyer,
      token,
      scheduleIndex,
      scheduleId,
      purchaseAmount: schedule.purchaseAmount,
      lendingProtocolIndex: schedule.lendingProtocolIndex,
      tokenBalance,
      lastPurchaseTimestamp,
    };
  }

  /**
   * Authorizes every entry in order. The first entry whose schedule amount
   * differs from the declared one aborts the batch; entries already applied
   * are left to the enclosing transaction to roll back.
   *
   * Entries are expected to share the token and lending venue of the batch.
   * That is a contract of the caller and is not checked per entry.
   */
  authorizeBatch(
    token: string,
    entries: readonly BatchPurchaseEntry[],
    now: number,
  ): AuthorizedPurchase[] {
    if (entries.length === 0) {
      throw new DcaError("EmptyBatchPurchaseArrays");
    }

    return entries.map((entry, position) => {
      const purchase = this.authorize(
        entry.buyer,
        token,
        entry.scheduleIndex,
        entry.scheduleId,
        now,
      );
      if (purchase.purchaseAmount !== entry.purchaseAmount) {
        throw new DcaError("PurchaseAmountMismatch", {
          position,
          buyer: entry.buyer,
          scheduleId: entry.scheduleId,
          expected: purchase.purchaseAmount,
          declared: entry.purchaseAmount,
        });
      }
      return purchase;
    });
  }
}

/**
 * Zips the parallel arrays a swapper submits into batch entries.
 */
export function zipBatchEntries(input: {
  buyers: readonly string[];
  scheduleIndexes: readonly number[];
  scheduleIds: readonly string[];
  purchaseAmounts: readonly bigint[];
}): BatchPurchaseEntry[] {
  const { buyers, scheduleIndexes, scheduleIds, purchaseAmounts } = input;
  if (buyers.length === 0) {
    throw new DcaError("EmptyBatchPurchaseArrays");
  }
  if (
    scheduleIndexes.length !== buyers.length ||
    scheduleIds.length !== buyers.length ||
    purchaseAmounts.length !== buyers.length
  ) {
    throw new DcaError("BatchPurchaseArraysLengthMismatch", {
      buyers: buyers.length,
      scheduleIndexes: scheduleIndexes.length,
      scheduleIds: scheduleIds.length,
      purchaseAmounts: purchaseAmounts.length,
    });
  }

  return buyers.map((buyer, i) => ({
    buyer,
    scheduleIndex: scheduleIndexes[i],
    scheduleId: scheduleIds[i],
    purchaseAmount: purchaseAmounts[i],
  }));
}
