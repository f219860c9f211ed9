import type { Role } from "./types";

/**
 * Custody of one stablecoin on one lending venue. Calls either move exactly
 * the requested amount or throw; no hidden fees are taken here.
 */
export interface TokenHandler {
  depositToken(user: string, amount: bigint): void;
  withdrawToken(user: string, amount: bigint): void;
}

/**
 * Handler able to swap custody into the base asset. Purchased asset
 * accumulates per user until withdrawn.
 */
export interface PurchaseExecutor extends TokenHandler {
  /** Returns the asset amount credited to the buyer. */
  buyAsset(buyer: string, scheduleId: string, amount: bigint): bigint;
  /** Returns the asset amount credited to each buyer, in input order. */
  batchBuyAsset(
    buyers: readonly string[],
    scheduleIds: readonly string[],
    amounts: readonly bigint[],
  ): bigint[];
  getAccumulatedAssetBalance(user: string): bigint;
  /** Returns the amount released to the user. */
  withdrawAccumulatedAsset(user: string): bigint;
}

/**
 * Handler that keeps idle custody in a yield-bearing venue.
 *
 * `lockedPrincipal` is the sum of the user's schedule balances on this venue;
 * everything the venue holds for the user above it is interest.
 */
export interface LendingAdapter extends TokenHandler {
  getAccruedInterest(user: string, lockedPrincipal: bigint): bigint;
  /** Returns the interest released to the user. */
  withdrawInterest(user: string, lockedPrincipal: bigint): bigint;
}

/**
 * Role and routing lookups the manager depends on. Administration of roles
 * and handler assignment happens elsewhere.
 */
export interface RoleAdmin {
  hasRole(role: Role, caller: string): boolean;
  getTokenHandler(token: string, lendingProtocolIndex: number): TokenHandler | undefined;
  /** Empty string when the index denotes no lending venue. */
  getLendingProtocolName(lendingProtocolIndex: number): string;
}

export function isPurchaseExecutor(handler: TokenHandler): handler is PurchaseExecutor {
  return (
    "buyAsset" in handler &&
    typeof handler.buyAsset === "function" &&
    "batchBuyAsset" in handler &&
    typeof handler.batchBuyAsset === "function"
  );
}

export function isLendingAdapter(handler: TokenHandler): handler is LendingAdapter {
  return (
    "withdrawInterest" in handler &&
    typeof handler.withdrawInterest === "function" &&
    "getAccruedInterest" in handler &&
    typeof handler.getAccruedInterest === "function"
  );
}
