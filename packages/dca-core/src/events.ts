import { z } from "zod";
import {
  AmountSchema,
  IdentitySchema,
  LendingProtocolIndexSchema,
  TimestampSchema,
} from "./contracts";

/**
 * Domain fact catalogue. A committed operation emits one fact per state
 * change; an aborted one emits nothing.
 */
export const DcaEventTypeSchema = z.enum([
  "schedule.created",
  "schedule.updated",
  "schedule.deleted",
  "schedule.balance.updated",
  "schedule.timestamp.updated",
  "token.deposited",
  "token.withdrawn",
  "purchase.executed",
  "purchase.batch.executed",
  "interest.withdrawn",
  "asset.withdrawn",
  "config.updated",
  "fees.updated",
]);
export type DcaEventType = z.infer<typeof DcaEventTypeSchema>;

const scheduleRefShape = {
  owner: IdentitySchema,
  token: IdentitySchema,
  scheduleIndex: z.number().int().nonnegative(),
  scheduleId: z.string().min(1),
};

const base = { occurredAt: TimestampSchema };

export const ScheduleCreatedEventSchema = z.object({
  ...base,
  type: z.literal("schedule.created"),
  ...scheduleRefShape,
  depositAmount: AmountSchema,
  purchaseAmount: AmountSchema,
  purchasePeriod: z.number().int().positive(),
  lendingProtocolIndex: LendingProtocolIndexSchema,
});

export const ScheduleUpdatedEventSchema = z.object({
  ...base,
  type: z.literal("schedule.updated"),
  ...scheduleRefShape,
  tokenBalance: AmountSchema,
  purchaseAmount: AmountSchema,
  purchasePeriod: z.number().int().positive(),
});

export const ScheduleDeletedEventSchema = z.object({
  ...base,
  type: z.literal("schedule.deleted"),
  ...scheduleRefShape,
  refundedAmount: AmountSchema,
});

export const ScheduleBalanceUpdatedEventSchema = z.object({
  ...base,
  type: z.literal("schedule.balance.updated"),
  ...scheduleRefShape,
  tokenBalance: AmountSchema,
});

export const ScheduleTimestampUpdatedEventSchema = z.object({
  ...base,
  type: z.literal("schedule.timestamp.updated"),
  ...scheduleRefShape,
  lastPurchaseTimestamp: TimestampSchema,
});

export const TokenDepositedEventSchema = z.object({
  ...base,
  type: z.literal("token.deposited"),
  ...scheduleRefShape,
  amount: AmountSchema,
});

export const TokenWithdrawnEventSchema = z.object({
  ...base,
  type: z.literal("token.withdrawn"),
  ...scheduleRefShape,
  amount: AmountSchema,
});

export const PurchaseExecutedEventSchema = z.object({
  ...base,
  type: z.literal("purchase.executed"),
  buyer: IdentitySchema,
  token: IdentitySchema,
  scheduleId: z.string().min(1),
  lendingProtocolIndex: LendingProtocolIndexSchema,
  amount: AmountSchema,
  purchasedAmount: AmountSchema,
});

export const BatchPurchaseExecutedEventSchema = z.object({
  ...base,
  type: z.literal("purchase.batch.executed"),
  token: IdentitySchema,
  lendingProtocolIndex: LendingProtocolIndexSchema,
  purchaseCount: z.number().int().positive(),
  totalAmount: AmountSchema,
});

export const InterestWithdrawnEventSchema = z.object({
  ...base,
  type: z.literal("interest.withdrawn"),
  owner: IdentitySchema,
  token: IdentitySchema,
  lendingProtocolIndex: LendingProtocolIndexSchema,
  lockedPrincipal: AmountSchema,
  amount: AmountSchema,
});

export const AssetWithdrawnEventSchema = z.object({
  ...base,
  type: z.literal("asset.withdrawn"),
  owner: IdentitySchema,
  token: IdentitySchema,
  lendingProtocolIndex: LendingProtocolIndexSchema,
  amount: AmountSchema,
});

export const ConfigKeySchema = z.enum([
  "minPurchasePeriod",
  "maxSchedulesPerToken",
  "defaultMinPurchaseAmount",
  "tokenMinPurchaseAmount",
]);
export type ConfigKey = z.infer<typeof ConfigKeySchema>;

export const ConfigUpdatedEventSchema = z.object({
  ...base,
  type: z.literal("config.updated"),
  key: ConfigKeySchema,
  /** Only set for per-token overrides. */
  token: IdentitySchema.optional(),
  value: z.union([z.number(), z.bigint()]),
});

export const FeesUpdatedEventSchema = z.object({
  ...base,
  type: z.literal("fees.updated"),
  minFeeRate: AmountSchema,
  maxFeeRate: AmountSchema,
  purchaseLowerBound: AmountSchema,
  purchaseUpperBound: AmountSchema,
  feeCollector: IdentitySchema,
});

export const DcaEventSchema = z.discriminatedUnion("type", [
  ScheduleCreatedEventSchema,
  ScheduleUpdatedEventSchema,
  ScheduleDeletedEventSchema,
  ScheduleBalanceUpdatedEventSchema,
  ScheduleTimestampUpdatedEventSchema,
  TokenDepositedEventSchema,
  TokenWithdrawnEventSchema,
  PurchaseExecutedEventSchema,
  BatchPurchaseExecutedEventSchema,
  InterestWithdrawnEventSchema,
  AssetWithdrawnEventSchema,
  ConfigUpdatedEventSchema,
  FeesUpdatedEventSchema,
]);
export type DcaEvent = z.infer<typeof DcaEventSchema>;

/**
 * Event payload before the transaction time is stamped on it.
 */
type WithoutTime<E> = E extends unknown ? Omit<E, "occurredAt"> : never;
export type DcaEventInput = WithoutTime<DcaEvent>;

/**
 * Validates a fact so partially built payloads never reach publishers.
 */
export function createDcaEvent(input: DcaEventInput, occurredAt: number): DcaEvent {
  return DcaEventSchema.parse({ ...input, occurredAt });
}

export interface EventPublisher {
  publish(event: DcaEvent): void;
}

/**
 * Collects the facts of one transaction. Facts only leave the buffer through
 * `drain`, which the transaction owner calls on commit; `discard` drops them
 * when the transaction aborts.
 */
export class EventBuffer {
  private pending: DcaEvent[] = [];
  private at = 0;

  begin(now: number) {
    this.pending = [];
    this.at = now;
  }

  record(input: DcaEventInput): DcaEvent {
    const event = createDcaEvent(input, this.at);
    this.pending.push(event);
    return event;
  }

  size() {
    return this.pending.length;
  }

  drain(): DcaEvent[] {
    const events = this.pending;
    this.pending = [];
    return events;
  }

  discard() {
    this.pending = [];
  }
}

/**
 * Publisher that keeps every fact in memory, useful for audits and tests.
 */
export class MemoryEventPublisher implements EventPublisher {
  readonly events: DcaEvent[] = [];

  publish(event: DcaEvent) {
    this.events.push(event);
  }

  ofType<T extends DcaEventType>(type: T): Array<Extract<DcaEvent, { type: T }>> {
    return this.events.filter(
      (event): event is Extract<DcaEvent, { type: T }> => event.type === type,
    );
  }

  clear() {
    this.events.length = 0;
  }
}
