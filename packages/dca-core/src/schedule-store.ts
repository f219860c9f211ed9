import { createHash } from "node:crypto";
import {
  CreateScheduleInputSchema,
  NEVER_PURCHASED,
  ScheduleChangesSchema,
  createProtocolConfig,
  type CreateScheduleInput,
  type ProtocolConfig,
  type Schedule,
  type ScheduleChanges,
  type ScheduleRef,
} from "./contracts";
import { DcaError } from "./errors";
import { EventBuffer } from "./events";

interface StoreState {
  /** owner -> token -> schedules */
  table: Map<string, Map<string, Schedule[]>>;
  users: string[];
  depositedTokens: Map<string, string[]>;
  config: ProtocolConfig;
  nonce: number;
}

/**
 * Opaque copy of the whole store, taken at the start of a transaction.
 */
export interface StoreCheckpoint {
  readonly state: StoreState;
}

export interface CreatedSchedule {
  scheduleIndex: number;
  schedule: Schedule;
}

/**
 * Authoritative table of DCA schedules.
 *
 * Deletion swap-removes, so indices are only meaningful together with the
 * schedule id; every mutating method takes a full {@link ScheduleRef} and
 * checks both before touching anything.
 */
export class ScheduleStore {
  private state: StoreState;

  constructor(
    config?: Partial<ProtocolConfig>,
    readonly events: EventBuffer = new EventBuffer(),
  ) {
    this.state = {
      table: new Map(),
      users: [],
      depositedTokens: new Map(),
      config: structuredClone(createProtocolConfig(config)),
      nonce: 0,
    };
  }

  // ---------- reads ----------

  getConfig(): ProtocolConfig {
    const { config } = this.state;
    return { ...config, minPurchaseAmountByToken: { ...config.minPurchaseAmountByToken } };
  }

  minPurchaseAmount(token: string): bigint {
    const { config } = this.state;
    return config.minPurchaseAmountByToken[token] ?? config.defaultMinPurchaseAmount;
  }

  count(owner: string, token: string): number {
    return this.schedulesOf(owner, token)?.length ?? 0;
  }

  list(owner: string, token: string): Schedule[] {
    return (this.schedulesOf(owner, token) ?? []).map((schedule) => ({ ...schedule }));
  }

  get(owner: string, token: string, scheduleIndex: number): Schedule {
    return { ...this.at(owner, token, scheduleIndex) };
  }

  /**
   * Resolves a reference, failing on an out-of-range index before comparing
   * ids.
   */
  assertIdentity(ref: ScheduleRef): Schedule {
    return { ...this.locate(ref) };
  }

  /**
   * Sum of the balances the owner keeps in schedules routed to one lending
   * venue. Interest is released in proportion to this principal.
   */
  lockedPrincipal(owner: string, token: string, lendingProtocolIndex: number): bigint {
    let total = 0n;
    for (const schedule of this.schedulesOf(owner, token) ?? []) {
      if (schedule.lendingProtocolIndex === lendingProtocolIndex) {
        total += schedule.tokenBalance;
      }
    }
    return total;
  }

  /** Every owner that ever created a schedule, in registration order. */
  users(): string[] {
    return [...this.state.users];
  }

  depositedTokens(owner: string): string[] {
    return [...(this.state.depositedTokens.get(owner) ?? [])];
  }

  // ---------- validation ----------

  validatePurchaseAmount(token: string, purchaseAmount: bigint, tokenBalance: bigint) {
    const minimum = this.minPurchaseAmount(token);
    if (purchaseAmount < minimum) {
      throw new DcaError("PurchaseAmountMustBeGreaterThanMinimum", {
        token,
        purchaseAmount,
        minimum,
      });
    }
    if (purchaseAmount > tokenBalance / 2n) {
      throw new DcaError("PurchaseAmountMustBeLowerThanHalfOfBalance", {
        purchaseAmount,
        tokenBalance,
      });
    }
  }

  validatePurchasePeriod(purchasePeriod: number) {
    const minimum = this.state.config.minPurchasePeriod;
    if (purchasePeriod < minimum) {
      throw new DcaError("PurchasePeriodMustBeGreaterThanMinimum", {
        purchasePeriod,
        minimum,
      });
    }
  }

  // ---------- schedule lifecycle ----------

  create(owner: string, input: CreateScheduleInput, now: number): CreatedSchedule {
    const parsed = CreateScheduleInputSchema.parse(input);
    const { token, depositAmount, purchaseAmount, purchasePeriod } = parsed;

    if (depositAmount <= 0n) {
      throw new DcaError("DepositAmountMustBeGreaterThanZero", { token });
    }
    this.validatePurchasePeriod(purchasePeriod);
    this.validatePurchaseAmount(token, purchaseAmount, depositAmount);

    const schedules = this.ensureList(owner, token);
    const limit = this.state.config.maxSchedulesPerToken;
    if (schedules.length >= limit) {
      throw new DcaError("MaxSchedulesReached", { owner, token, limit });
    }

    const scheduleIndex = schedules.length;
    const schedule: Schedule = {
      owner,
      token,
      scheduleId: this.nextScheduleId(owner, token, now, scheduleIndex),
      tokenBalance: depositAmount,
      purchaseAmount,
      purchasePeriod,
      lastPurchaseTimestamp: NEVER_PURCHASED,
      lendingProtocolIndex: parsed.lendingProtocolIndex,
    };
    schedules.push(schedule);
    this.register(owner, token);

    this.events.record({
      type: "schedule.created",
      owner,
      token,
      scheduleIndex,
      scheduleId: schedule.scheduleId,
      depositAmount,
      purchaseAmount,
      purchasePeriod,
      lendingProtocolIndex: schedule.lendingProtocolIndex,
    });

    return { scheduleIndex, schedule: { ...schedule } };
  }

  /**
   * Applies the non-zero fields of `changes`. The purchase amount is checked
   * against the resulting balance whenever the deposit or the amount moves.
   */
  update(ref: ScheduleRef, changes: ScheduleChanges): Schedule {
    const schedule = this.locate(ref);
    const { depositAmount, purchaseAmount, purchasePeriod } =
      ScheduleChangesSchema.parse(changes);

    const nextBalance = schedule.tokenBalance + depositAmount;
    const nextAmount = purchaseAmount > 0n ? purchaseAmount : schedule.purchaseAmount;

    if (purchasePeriod > 0) this.validatePurchasePeriod(purchasePeriod);
    if (depositAmount > 0n || purchaseAmount > 0n) {
      this.validatePurchaseAmount(ref.token, nextAmount, nextBalance);
    }

    schedule.tokenBalance = nextBalance;
    schedule.purchaseAmount = nextAmount;
    if (purchasePeriod > 0) schedule.purchasePeriod = purchasePeriod;

    if (depositAmount > 0n) {
      this.events.record({ type: "token.deposited", ...refOf(ref), amount: depositAmount });
    }
    this.recordUpdated(ref, schedule);
    return { ...schedule };
  }

  setPurchaseAmount(ref: ScheduleRef, purchaseAmount: bigint): Schedule {
    const schedule = this.locate(ref);
    this.validatePurchaseAmount(ref.token, purchaseAmount, schedule.tokenBalance);
    schedule.purchaseAmount = purchaseAmount;
    this.recordUpdated(ref, schedule);
    return { ...schedule };
  }

  setPurchasePeriod(ref: ScheduleRef, purchasePeriod: number): Schedule {
    const schedule = this.locate(ref);
    this.validatePurchasePeriod(purchasePeriod);
    schedule.purchasePeriod = purchasePeriod;
    this.recordUpdated(ref, schedule);
    return { ...schedule };
  }

  deposit(ref: ScheduleRef, amount: bigint): Schedule {
    const schedule = this.locate(ref);
    if (amount <= 0n) {
      throw new DcaError("DepositAmountMustBeGreaterThanZero", { token: ref.token });
    }
    schedule.tokenBalance += amount;
    this.events.record({ type: "token.deposited", ...refOf(ref), amount });
    this.recordBalance(ref, schedule.tokenBalance);
    return { ...schedule };
  }

  withdraw(ref: ScheduleRef, amount: bigint): Schedule {
    const schedule = this.locate(ref);
    if (amount <= 0n) {
      throw new DcaError("WithdrawalAmountMustBeGreaterThanZero", { token: ref.token });
    }
    if (amount > schedule.tokenBalance) {
      throw new DcaError("ScheduleBalanceNotEnoughForWithdrawal", {
        scheduleIndex: ref.scheduleIndex,
        scheduleId: ref.scheduleId,
        token: ref.token,
        tokenBalance: schedule.tokenBalance,
      });
    }
    schedule.tokenBalance -= amount;
    this.events.record({ type: "token.withdrawn", ...refOf(ref), amount });
    this.recordBalance(ref, schedule.tokenBalance);
    return { ...schedule };
  }

  /**
   * Swap-removes the schedule: the last schedule of the list takes the freed
   * slot. Returns the removed schedule so its balance can be refunded.
   */
  remove(ref: ScheduleRef): Schedule {
    const removed = { ...this.locate(ref) };
    const schedules = this.ensureList(ref.owner, ref.token);
    const last = schedules.pop();
    if (last && ref.scheduleIndex < schedules.length) {
      schedules[ref.scheduleIndex] = last;
    }

    this.events.record({
      type: "schedule.deleted",
      ...refOf(ref),
      refundedAmount: removed.tokenBalance,
    });
    return removed;
  }

  // ---------- purchase writes ----------

  /**
   * Low-level balance write used by the purchase authorizer once every
   * check passed.
   */
  writePurchaseBalance(ref: ScheduleRef, tokenBalance: bigint) {
    const schedule = this.locate(ref);
    schedule.tokenBalance = tokenBalance;
    this.recordBalance(ref, tokenBalance);
  }

  writePurchaseTimestamp(ref: ScheduleRef, lastPurchaseTimestamp: number) {
    const schedule = this.locate(ref);
    schedule.lastPurchaseTimestamp = lastPurchaseTimestamp;
    this.events.record({
      type: "schedule.timestamp.updated",
      ...refOf(ref),
      lastPurchaseTimestamp,
    });
  }

  // ---------- configuration ----------

  setMinPurchasePeriod(minPurchasePeriod: number) {
    assertPositiveInteger("minPurchasePeriod", minPurchasePeriod);
    this.state.config.minPurchasePeriod = minPurchasePeriod;
    this.events.record({ type: "config.updated", key: "minPurchasePeriod", value: minPurchasePeriod });
  }

  setMaxSchedulesPerToken(maxSchedulesPerToken: number) {
    assertPositiveInteger("maxSchedulesPerToken", maxSchedulesPerToken);
    this.state.config.maxSchedulesPerToken = maxSchedulesPerToken;
    this.events.record({
      type: "config.updated",
      key: "maxSchedulesPerToken",
      value: maxSchedulesPerToken,
    });
  }

  setDefaultMinPurchaseAmount(amount: bigint) {
    assertPositiveAmount("defaultMinPurchaseAmount", amount);
    this.state.config.defaultMinPurchaseAmount = amount;
    this.events.record({ type: "config.updated", key: "defaultMinPurchaseAmount", value: amount });
  }

  setTokenMinPurchaseAmount(token: string, amount: bigint) {
    assertPositiveAmount("tokenMinPurchaseAmount", amount);
    this.state.config.minPurchaseAmountByToken[token] = amount;
    this.events.record({
      type: "config.updated",
      key: "tokenMinPurchaseAmount",
      token,
      value: amount,
    });
  }

  // ---------- transactions ----------

  checkpoint(): StoreCheckpoint {
    return { state: structuredClone(this.state) };
  }

  restore(checkpoint: StoreCheckpoint) {
    this.state = structuredClone(checkpoint.state);
  }

  // ---------- internals ----------

  private schedulesOf(owner: string, token: string): Schedule[] | undefined {
    return this.state.table.get(owner)?.get(token);
  }

  private ensureList(owner: string, token: string): Schedule[] {
    let byToken = this.state.table.get(owner);
    if (!byToken) {
      byToken = new Map();
      this.state.table.set(owner, byToken);
    }
    let schedules = byToken.get(token);
    if (!schedules) {
      schedules = [];
      byToken.set(token, schedules);
    }
    return schedules;
  }

  private at(owner: string, token: string, scheduleIndex: number): Schedule {
    const schedule = this.schedulesOf(owner, token)?.[scheduleIndex];
    if (!Number.isInteger(scheduleIndex) || !schedule) {
      throw new DcaError("InexistentScheduleIndex", { owner, token, scheduleIndex });
    }
    return schedule;
  }

  private locate(ref: ScheduleRef): Schedule {
    const schedule = this.at(ref.owner, ref.token, ref.scheduleIndex);
    if (schedule.scheduleId !== ref.scheduleId) {
      throw new DcaError("ScheduleIdAndIndexMismatch", {
        scheduleIndex: ref.scheduleIndex,
        scheduleId: ref.scheduleId,
        storedScheduleId: schedule.scheduleId,
      });
    }
    return schedule;
  }

  private register(owner: string, token: string) {
    if (!this.state.users.includes(owner)) this.state.users.push(owner);
    const tokens = this.state.depositedTokens.get(owner) ?? [];
    if (!tokens.includes(token)) tokens.push(token);
    this.state.depositedTokens.set(owner, tokens);
  }

  private nextScheduleId(owner: string, token: string, now: number, position: number) {
    this.state.nonce += 1;
    const digest = createHash("sha256")
      .update([owner, token, now, position, this.state.nonce].join(":"))
      .digest("hex");
    return `0x${digest}`;
  }

  private recordBalance(ref: ScheduleRef, tokenBalance: bigint) {
    this.events.record({ type: "schedule.balance.updated", ...refOf(ref), tokenBalance });
  }

  private recordUpdated(ref: ScheduleRef, schedule: Schedule) {
    this.events.record({
      type: "schedule.updated",
      ...refOf(ref),
      tokenBalance: schedule.tokenBalance,
      purchaseAmount: schedule.purchaseAmount,
      purchasePeriod: schedule.purchasePeriod,
    });
  }
}

function refOf(ref: ScheduleRef): ScheduleRef {
  return {
    owner: ref.owner,
    token: ref.token,
    scheduleIndex: ref.scheduleIndex,
    scheduleId: ref.scheduleId,
  };
}

function assertPositiveInteger(field: string, value: number) {
  if (!Number.isInteger(value) || value <= 0) {
    throw new DcaError("InvalidConfiguration", { field, value });
  }
}

function assertPositiveAmount(field: string, value: bigint) {
  if (value <= 0n) {
    throw new DcaError("InvalidConfiguration", { field, value });
  }
}
