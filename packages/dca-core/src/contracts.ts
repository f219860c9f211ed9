import { z } from "zod";

/**
 * Fixed divisor fee rates are expressed over. A rate of `100` is 1%.
 */
export const FEE_PERCENTAGE_DIVISOR = 10_000n;

/**
 * Sentinel stored in `lastPurchaseTimestamp` for schedules that never bought.
 */
export const NEVER_PURCHASED = 0;

/**
 * Lending protocol index that denotes "idle funds stay in custody, no yield".
 */
export const NO_LENDING_PROTOCOL = 0;

const ONE_TOKEN = 10n ** 18n;

export const IdentitySchema = z.string().min(1);

export const AmountSchema = z.bigint().nonnegative();

export const TimestampSchema = z.number().int().nonnegative();

export const LendingProtocolIndexSchema = z.number().int().nonnegative();

/**
 * A user's recurring-purchase configuration and remaining balance for one
 * token.
 *
 * Schedules live in an unordered per-(owner, token) list, so the position of
 * a schedule may change after a deletion. `scheduleId` never changes and is
 * what callers re-validate every mutation against.
 */
export const ScheduleSchema = z.object({
  owner: IdentitySchema,
  token: IdentitySchema,
  scheduleId: z.string().min(1),
  tokenBalance: AmountSchema,
  purchaseAmount: AmountSchema,
  /** Minimum seconds between two purchases. */
  purchasePeriod: z.number().int().positive(),
  /** `0` until the first purchase. */
  lastPurchaseTimestamp: TimestampSchema,
  lendingProtocolIndex: LendingProtocolIndexSchema,
});
export type Schedule = z.infer<typeof ScheduleSchema>;

/**
 * Protocol-wide limits enforced when schedules are created or changed.
 */
export const ProtocolConfigSchema = z.object({
  minPurchasePeriod: z.number().int().positive().default(86_400),
  maxSchedulesPerToken: z.number().int().positive().default(10),
  defaultMinPurchaseAmount: AmountSchema.default(25n * ONE_TOKEN),
  /** Per-token overrides of `defaultMinPurchaseAmount`. */
  minPurchaseAmountByToken: z.record(z.string(), AmountSchema).default(() => ({})),
});
export type ProtocolConfig = z.infer<typeof ProtocolConfigSchema>;

/**
 * Parameters of the piecewise-linear fee curve. Purchases at or below
 * `purchaseLowerBound` pay `maxFeeRate`, purchases at or above
 * `purchaseUpperBound` pay `minFeeRate`.
 */
export const FeeSettingsSchema = z
  .object({
    minFeeRate: AmountSchema.default(100n),
    maxFeeRate: AmountSchema.default(200n),
    purchaseLowerBound: AmountSchema.default(1_000n * ONE_TOKEN),
    purchaseUpperBound: AmountSchema.default(100_000n * ONE_TOKEN),
    feeCollector: IdentitySchema.default("fee-collector"),
  })
  .refine((settings) => settings.minFeeRate <= settings.maxFeeRate, {
    message: "minFeeRate must not exceed maxFeeRate",
    path: ["minFeeRate"],
  })
  .refine(
    (settings) => settings.purchaseLowerBound < settings.purchaseUpperBound,
    {
      message: "purchaseLowerBound must be below purchaseUpperBound",
      path: ["purchaseLowerBound"],
    },
  );
export type FeeSettings = z.infer<typeof FeeSettingsSchema>;

export const CreateScheduleInputSchema = z.object({
  token: IdentitySchema,
  depositAmount: AmountSchema,
  purchaseAmount: AmountSchema,
  purchasePeriod: z.number().int().nonnegative(),
  lendingProtocolIndex: LendingProtocolIndexSchema.default(NO_LENDING_PROTOCOL),
});
export type CreateScheduleInput = z.input<typeof CreateScheduleInputSchema>;

/**
 * Changes applied by an update. A zero value means "leave unchanged".
 */
export const ScheduleChangesSchema = z.object({
  depositAmount: AmountSchema.default(0n),
  purchaseAmount: AmountSchema.default(0n),
  purchasePeriod: z.number().int().nonnegative().default(0),
});
export type ScheduleChanges = z.input<typeof ScheduleChangesSchema>;

/**
 * Stable pointer to one schedule. Index and id travel together because the
 * index alone may point at a different schedule after a deletion.
 */
export interface ScheduleRef {
  owner: string;
  token: string;
  scheduleIndex: number;
  scheduleId: string;
}

export interface BatchPurchaseEntry {
  buyer: string;
  scheduleIndex: number;
  scheduleId: string;
  purchaseAmount: bigint;
}

export interface AuthorizedPurchase {
  buyer: string;
  token: string;
  scheduleIndex: number;
  scheduleId: string;
  purchaseAmount: bigint;
  lendingProtocolIndex: number;
  tokenBalance: bigint;
  lastPurchaseTimestamp: number;
}

export const defaultProtocolConfig: ProtocolConfig = ProtocolConfigSchema.parse({});

export const defaultFeeSettings: FeeSettings = FeeSettingsSchema.parse({});

/**
 * Fields left `undefined` fall back to their defaults.
 */
export function createProtocolConfig(
  overrides?: Partial<ProtocolConfig>,
): ProtocolConfig {
  return ProtocolConfigSchema.parse({ ...overrides });
}

export function createFeeSettings(overrides?: Partial<FeeSettings>): FeeSettings {
  return FeeSettingsSchema.parse({ ...overrides });
}
