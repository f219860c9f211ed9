/**
 * Closed catalogue of rejection reasons. Every code aborts the enclosing
 * transaction; none of them is retried inside the protocol.
 */
export type DcaErrorCode =
  // identity
  | "InexistentScheduleIndex"
  | "ScheduleIdAndIndexMismatch"
  // timing
  | "CannotBuyIfPurchasePeriodHasNotElapsed"
  // balance
  | "ScheduleBalanceNotEnoughForPurchase"
  | "ScheduleBalanceNotEnoughForWithdrawal"
  // validation
  | "DepositAmountMustBeGreaterThanZero"
  | "WithdrawalAmountMustBeGreaterThanZero"
  | "PurchaseAmountMustBeGreaterThanMinimum"
  | "PurchaseAmountMustBeLowerThanHalfOfBalance"
  | "PurchasePeriodMustBeGreaterThanMinimum"
  | "InvalidFeeRates"
  | "InvalidPurchaseBounds"
  | "InvalidConfiguration"
  // authorization
  | "UnauthorizedSwapper"
  | "UnauthorizedOwner"
  // batch consistency
  | "EmptyBatchPurchaseArrays"
  | "BatchPurchaseArraysLengthMismatch"
  | "PurchaseAmountMismatch"
  // routing
  | "TokenNotAccepted"
  | "TokenDoesNotYieldInterest"
  | "HandlerDoesNotSupportOperation"
  // lifecycle
  | "MaxSchedulesReached"
  | "ReentrantCall";

export type DcaErrorDetails = Record<string, string | number | bigint | boolean>;

export class DcaError extends Error {
  readonly code: DcaErrorCode;
  readonly details: DcaErrorDetails;

  constructor(code: DcaErrorCode, details: DcaErrorDetails = {}) {
    super(formatMessage(code, details));
    this.name = "DcaError";
    this.code = code;
    this.details = details;
  }
}

function formatMessage(code: DcaErrorCode, details: DcaErrorDetails): string {
  const entries = Object.entries(details);
  if (entries.length === 0) return code;
  const rendered = entries.map(([key, value]) => `${key}=${String(value)}`);
  return `${code} (${rendered.join(", ")})`;
}

export function isDcaError(value: unknown, code?: DcaErrorCode): value is DcaError {
  if (!(value instanceof DcaError)) return false;
  return code === undefined || value.code === code;
}
