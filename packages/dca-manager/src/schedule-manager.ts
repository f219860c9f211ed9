import {
  DcaError,
  EventBuffer,
  PurchaseAuthorizer,
  ScheduleStore,
  createDcaEvent,
  describePurchaseState,
  isDcaError,
  zipBatchEntries,
  type AuthorizedPurchase,
  type CreateScheduleInput,
  type CreatedSchedule,
  type DcaEvent,
  type EventPublisher,
  type FeeCalculator,
  type FeeSettings,
  type ProtocolConfig,
  type PurchaseStateView,
  type Schedule,
  type ScheduleRef,
} from "@repo/dca-core";
import { consoleLogger, systemClock } from "./adapters";
import {
  isLendingAdapter,
  isPurchaseExecutor,
  type LendingAdapter,
  type PurchaseExecutor,
  type RoleAdmin,
  type TokenHandler,
} from "./handlers";
import { Roles, type Clock, type Logger } from "./types";

export interface ScheduleManagerDeps {
  /** Account allowed to change protocol limits. */
  owner: string;
  roles: RoleAdmin;
  config?: Partial<ProtocolConfig>;
  clock?: Clock;
  logger?: Logger;
  publisher?: EventPublisher;
  /** Fee curve whose changes are published as `fees.updated`. */
  fees?: FeeCalculator;
}

export interface ScheduleTarget {
  token: string;
  scheduleIndex: number;
  scheduleId: string;
}

export interface UpdateScheduleInput extends ScheduleTarget {
  depositAmount?: bigint;
  purchaseAmount?: bigint;
  purchasePeriod?: number;
}

export interface BuyInput extends ScheduleTarget {
  buyer: string;
}

export interface BatchBuyInput {
  token: string;
  lendingProtocolIndex: number;
  buyers: readonly string[];
  scheduleIndexes: readonly number[];
  scheduleIds: readonly string[];
  purchaseAmounts: readonly bigint[];
}

export interface PurchaseResult extends AuthorizedPurchase {
  purchasedAmount: bigint;
}

export interface HandlerSelection {
  token: string;
  lendingProtocolIndex: number;
}

export interface WithdrawAllInput {
  tokens: readonly string[];
  lendingProtocolIndexes: readonly number[];
}

export interface WithdrawalResult extends HandlerSelection {
  amount: bigint;
}

interface WithdrawalStep<H> {
  selection: HandlerSelection;
  handler: H;
}

const nullPublisher: EventPublisher = { publish: () => undefined };
const noop = () => undefined;

/**
 * Public entry point of the protocol.
 *
 * Each mutating call is one transaction over a snapshot of the schedule
 * table. A call made while another is in flight, including one made back
 * into the manager by a handler, is refused. Any error restores the snapshot
 * and drops the facts produced so far; facts are published only on commit.
 *
 * Funds a handler already moved are not compensated. The "withdraw all"
 * calls look up every pair before releasing anything, and a release that
 * throws midway logs the pairs already paid out at `error`.
 */
export class ScheduleManager {
  private readonly owner: string;
  private readonly roles: RoleAdmin;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly publisher: EventPublisher;
  private readonly events = new EventBuffer();
  private readonly store: ScheduleStore;
  private readonly authorizer: PurchaseAuthorizer;
  private entered = false;
  private readonly unsubscribeFees: () => void;

  constructor(deps: ScheduleManagerDeps) {
    const {
      owner,
      roles,
      config,
      clock = systemClock,
      logger = consoleLogger,
      publisher = nullPublisher,
      fees,
    } = deps;

    this.owner = owner;
    this.roles = roles;
    this.clock = clock;
    this.logger = logger;
    this.publisher = publisher;
    this.store = new ScheduleStore(config, this.events);
    this.authorizer = new PurchaseAuthorizer(this.store);

    this.unsubscribeFees = fees?.onChange((settings) => this.recordFeeChange(settings)) ?? noop;
  }

  /** Stops publishing changes of the fee curve. */
  dispose() {
    this.unsubscribeFees();
  }

  // ---------- schedules ----------

  createDcaSchedule(caller: string, input: CreateScheduleInput): CreatedSchedule {
    return this.transact("createDcaSchedule", caller, (now) => {
      const created = this.store.create(caller, input, now);
      const { token, lendingProtocolIndex, tokenBalance } = created.schedule;
      this.handlerFor(token, lendingProtocolIndex).depositToken(caller, tokenBalance);
      return created;
    });
  }

  updateDcaSchedule(caller: string, input: UpdateScheduleInput): Schedule {
    return this.transact("updateDcaSchedule", caller, () => {
      const schedule = this.store.update(refOf(caller, input), {
        depositAmount: input.depositAmount,
        purchaseAmount: input.purchaseAmount,
        purchasePeriod: input.purchasePeriod,
      });
      const depositAmount = input.depositAmount ?? 0n;
      if (depositAmount > 0n) {
        this.handlerFor(schedule.token, schedule.lendingProtocolIndex).depositToken(
          caller,
          depositAmount,
        );
      }
      return schedule;
    });
  }

  /**
   * Removes the schedule and returns its whole remaining balance to the
   * owner. The last schedule of the list moves into the freed index.
   */
  deleteDcaSchedule(caller: string, target: ScheduleTarget): Schedule {
    return this.transact("deleteDcaSchedule", caller, () => {
      const removed = this.store.remove(refOf(caller, target));
      if (removed.tokenBalance > 0n) {
        this.handlerFor(removed.token, removed.lendingProtocolIndex).withdrawToken(
          caller,
          removed.tokenBalance,
        );
      }
      return removed;
    });
  }

  depositToken(caller: string, input: ScheduleTarget & { amount: bigint }): Schedule {
    return this.transact("depositToken", caller, () => {
      const schedule = this.store.deposit(refOf(caller, input), input.amount);
      this.handlerFor(schedule.token, schedule.lendingProtocolIndex).depositToken(
        caller,
        input.amount,
      );
      return schedule;
    });
  }

  withdrawToken(caller: string, input: ScheduleTarget & { amount: bigint }): Schedule {
    return this.transact("withdrawToken", caller, () => {
      const schedule = this.store.withdraw(refOf(caller, input), input.amount);
      this.handlerFor(schedule.token, schedule.lendingProtocolIndex).withdrawToken(
        caller,
        input.amount,
      );
      return schedule;
    });
  }

  setPurchaseAmount(
    caller: string,
    input: ScheduleTarget & { purchaseAmount: bigint },
  ): Schedule {
    return this.transact("setPurchaseAmount", caller, () =>
      this.store.setPurchaseAmount(refOf(caller, input), input.purchaseAmount),
    );
  }

  setPurchasePeriod(
    caller: string,
    input: ScheduleTarget & { purchasePeriod: number },
  ): Schedule {
    return this.transact("setPurchasePeriod", caller, () =>
      this.store.setPurchasePeriod(refOf(caller, input), input.purchasePeriod),
    );
  }

  // ---------- purchases ----------

  buyRbtc(caller: string, input: BuyInput): PurchaseResult {
    return this.transact("buyRbtc", caller, (now) => {
      this.assertSwapper(caller);
      const purchase = this.authorizer.authorize(
        input.buyer,
        input.token,
        input.scheduleIndex,
        input.scheduleId,
        now,
      );
      const executor = this.purchaseExecutorFor(input.token, purchase.lendingProtocolIndex);
      const purchasedAmount = executor.buyAsset(
        purchase.buyer,
        purchase.scheduleId,
        purchase.purchaseAmount,
      );
      this.recordPurchase(purchase, purchasedAmount);
      return { ...purchase, purchasedAmount };
    });
  }

  /**
   * Authorizes every entry, then settles the whole batch with one executor
   * call. Any failing entry aborts the batch before the executor is reached.
   *
   * Callers must only group schedules that share `token` and
   * `lendingProtocolIndex`; entries are not checked against the batch venue.
   */
  batchBuyRbtc(caller: string, input: BatchBuyInput): PurchaseResult[] {
    return this.transact("batchBuyRbtc", caller, (now) => {
      this.assertSwapper(caller);
      const entries = zipBatchEntries(input);
      const purchases = this.authorizer.authorizeBatch(input.token, entries, now);

      const executor = this.purchaseExecutorFor(input.token, input.lendingProtocolIndex);
      const purchased = executor.batchBuyAsset(
        purchases.map((purchase) => purchase.buyer),
        purchases.map((purchase) => purchase.scheduleId),
        purchases.map((purchase) => purchase.purchaseAmount),
      );
      if (purchased.length !== purchases.length) {
        throw new DcaError("BatchPurchaseArraysLengthMismatch", {
          purchases: purchases.length,
          purchasedAmounts: purchased.length,
        });
      }

      const results = purchases.map((purchase, i) => ({
        ...purchase,
        lendingProtocolIndex: input.lendingProtocolIndex,
        purchasedAmount: purchased[i],
      }));
      for (const result of results) this.recordPurchase(result, result.purchasedAmount);

      this.events.record({
        type: "purchase.batch.executed",
        token: input.token,
        lendingProtocolIndex: input.lendingProtocolIndex,
        purchaseCount: results.length,
        totalAmount: results.reduce((sum, result) => sum + result.purchaseAmount, 0n),
      });
      return results;
    });
  }

  // ---------- interest and purchased asset ----------

  withdrawInterestFromTokenHandler(caller: string, selection: HandlerSelection): bigint {
    return this.transact("withdrawInterestFromTokenHandler", caller, () => {
      const adapter = this.lendingAdapterFor(selection.token, selection.lendingProtocolIndex);
      return this.withdrawInterestFrom(caller, selection, adapter);
    });
  }

  /**
   * Walks every token × venue pair. Pairs without a lending handler, without
   * locked principal or without accrued interest are skipped.
   */
  withdrawAllAccumulatedInterest(caller: string, input: WithdrawAllInput): WithdrawalResult[] {
    const operation = "withdrawAllAccumulatedInterest";
    return this.transact(operation, caller, () => {
      const steps: WithdrawalStep<LendingAdapter>[] = [];
      for (const token of input.tokens) {
        for (const lendingProtocolIndex of input.lendingProtocolIndexes) {
          if (this.roles.getLendingProtocolName(lendingProtocolIndex) === "") continue;
          const handler = this.roles.getTokenHandler(token, lendingProtocolIndex);
          if (!handler || !isLendingAdapter(handler)) continue;

          const principal = this.store.lockedPrincipal(caller, token, lendingProtocolIndex);
          if (principal === 0n) continue;
          if (handler.getAccruedInterest(caller, principal) === 0n) continue;

          steps.push({ selection: { token, lendingProtocolIndex }, handler });
        }
      }
      return this.releaseEach(operation, caller, steps, ({ selection, handler }) =>
        this.withdrawInterestFrom(caller, selection, handler),
      );
    });
  }

  withdrawRbtcFromTokenHandler(caller: string, selection: HandlerSelection): bigint {
    return this.transact("withdrawRbtcFromTokenHandler", caller, () => {
      const executor = this.purchaseExecutorFor(selection.token, selection.lendingProtocolIndex);
      return this.withdrawAssetFrom(caller, selection, executor);
    });
  }

  /**
   * Walks every token × venue pair, skipping pairs without a purchase
   * executor or without accumulated asset.
   */
  withdrawAllAccumulatedRbtc(caller: string, input: WithdrawAllInput): WithdrawalResult[] {
    const operation = "withdrawAllAccumulatedRbtc";
    return this.transact(operation, caller, () => {
      const steps: WithdrawalStep<PurchaseExecutor>[] = [];
      for (const token of input.tokens) {
        for (const lendingProtocolIndex of input.lendingProtocolIndexes) {
          const handler = this.roles.getTokenHandler(token, lendingProtocolIndex);
          if (!handler || !isPurchaseExecutor(handler)) continue;
          if (handler.getAccumulatedAssetBalance(caller) === 0n) continue;

          steps.push({ selection: { token, lendingProtocolIndex }, handler });
        }
      }
      return this.releaseEach(operation, caller, steps, ({ selection, handler }) =>
        this.withdrawAssetFrom(caller, selection, handler),
      );
    });
  }

  // ---------- admin ----------

  setMinPurchasePeriod(caller: string, minPurchasePeriod: number) {
    this.transact("setMinPurchasePeriod", caller, () => {
      this.assertOwner(caller);
      this.store.setMinPurchasePeriod(minPurchasePeriod);
    });
  }

  setMaxSchedulesPerToken(caller: string, maxSchedulesPerToken: number) {
    this.transact("setMaxSchedulesPerToken", caller, () => {
      this.assertOwner(caller);
      this.store.setMaxSchedulesPerToken(maxSchedulesPerToken);
    });
  }

  setDefaultMinPurchaseAmount(caller: string, amount: bigint) {
    this.transact("setDefaultMinPurchaseAmount", caller, () => {
      this.assertOwner(caller);
      this.store.setDefaultMinPurchaseAmount(amount);
    });
  }

  setTokenMinPurchaseAmount(caller: string, token: string, amount: bigint) {
    this.transact("setTokenMinPurchaseAmount", caller, () => {
      this.assertOwner(caller);
      this.store.setTokenMinPurchaseAmount(token, amount);
    });
  }

  // ---------- reads ----------

  getMyDcaSchedules(caller: string, token: string): Schedule[] {
    return this.store.list(caller, token);
  }

  getDcaSchedule(owner: string, token: string, scheduleIndex: number): Schedule {
    return this.store.get(owner, token, scheduleIndex);
  }

  getScheduleTokenBalance(caller: string, token: string, scheduleIndex: number): bigint {
    return this.store.get(caller, token, scheduleIndex).tokenBalance;
  }

  getSchedulePurchaseAmount(caller: string, token: string, scheduleIndex: number): bigint {
    return this.store.get(caller, token, scheduleIndex).purchaseAmount;
  }

  getSchedulePurchasePeriod(caller: string, token: string, scheduleIndex: number): number {
    return this.store.get(caller, token, scheduleIndex).purchasePeriod;
  }

  getScheduleId(caller: string, token: string, scheduleIndex: number): string {
    return this.store.get(caller, token, scheduleIndex).scheduleId;
  }

  getPurchaseState(owner: string, token: string, scheduleIndex: number): PurchaseStateView {
    return describePurchaseState(this.store.get(owner, token, scheduleIndex), this.clock());
  }

  getInterestAccrued(caller: string, selection: HandlerSelection): bigint {
    const adapter = this.lendingAdapterFor(selection.token, selection.lendingProtocolIndex);
    const principal = this.store.lockedPrincipal(
      caller,
      selection.token,
      selection.lendingProtocolIndex,
    );
    return adapter.getAccruedInterest(caller, principal);
  }

  getAccumulatedRbtcBalance(caller: string, selection: HandlerSelection): bigint {
    return this.purchaseExecutorFor(
      selection.token,
      selection.lendingProtocolIndex,
    ).getAccumulatedAssetBalance(caller);
  }

  getUsers(caller: string): string[] {
    this.assertOwner(caller);
    return this.store.users();
  }

  getUsersDepositedTokens(user: string): string[] {
    return this.store.depositedTokens(user);
  }

  getMinPurchasePeriod(): number {
    return this.store.getConfig().minPurchasePeriod;
  }

  getMaxSchedulesPerToken(): number {
    return this.store.getConfig().maxSchedulesPerToken;
  }

  getMinPurchaseAmount(token: string): bigint {
    return this.store.minPurchaseAmount(token);
  }

  // ---------- internals ----------

  private transact<T>(operation: string, caller: string, work: (now: number) => T): T {
    const { result, committed } = this.runGuarded(operation, caller, work);
    this.logger.info(`${operation} committed`, { caller, events: committed.length });
    for (const event of committed) this.publisher.publish(event);
    return result;
  }

  private runGuarded<T>(
    operation: string,
    caller: string,
    work: (now: number) => T,
  ): { result: T; committed: DcaEvent[] } {
    if (this.entered) {
      throw new DcaError("ReentrantCall", { operation, caller });
    }
    this.entered = true;

    const now = this.clock();
    const checkpoint = this.store.checkpoint();
    this.events.begin(now);

    try {
      const result = work(now);
      return { result, committed: this.events.drain() };
    } catch (error) {
      this.store.restore(checkpoint);
      this.events.discard();
      this.logger.warn(`${operation} aborted`, {
        caller,
        code: isDcaError(error) ? error.code : "UnexpectedError",
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      this.entered = false;
    }
  }

  private recordFeeChange(settings: FeeSettings) {
    if (this.entered) {
      this.events.record({ type: "fees.updated", ...settings });
      return;
    }
    this.publisher.publish(createDcaEvent({ type: "fees.updated", ...settings }, this.clock()));
  }

  private releaseEach<H>(
    operation: string,
    caller: string,
    steps: readonly WithdrawalStep<H>[],
    release: (step: WithdrawalStep<H>) => bigint,
  ): WithdrawalResult[] {
    const results: WithdrawalResult[] = [];
    for (const step of steps) {
      try {
        results.push({ ...step.selection, amount: release(step) });
      } catch (error) {
        if (results.length > 0) {
          this.logger.error(`${operation} failed after releasing funds`, {
            caller,
            failed: step.selection,
            released: results,
          });
        }
        throw error;
      }
    }
    return results;
  }

  private assertSwapper(caller: string) {
    if (!this.roles.hasRole(Roles.SWAPPER, caller)) {
      throw new DcaError("UnauthorizedSwapper", { caller });
    }
  }

  private assertOwner(caller: string) {
    if (caller !== this.owner) {
      throw new DcaError("UnauthorizedOwner", { caller });
    }
  }

  private handlerFor(token: string, lendingProtocolIndex: number): TokenHandler {
    const handler = this.roles.getTokenHandler(token, lendingProtocolIndex);
    if (!handler) {
      throw new DcaError("TokenNotAccepted", { token, lendingProtocolIndex });
    }
    return handler;
  }

  private purchaseExecutorFor(token: string, lendingProtocolIndex: number): PurchaseExecutor {
    const handler = this.handlerFor(token, lendingProtocolIndex);
    if (!isPurchaseExecutor(handler)) {
      throw new DcaError("HandlerDoesNotSupportOperation", {
        token,
        lendingProtocolIndex,
        operation: "purchase",
      });
    }
    return handler;
  }

  private lendingAdapterFor(token: string, lendingProtocolIndex: number): LendingAdapter {
    if (this.roles.getLendingProtocolName(lendingProtocolIndex) === "") {
      throw new DcaError("TokenDoesNotYieldInterest", { token, lendingProtocolIndex });
    }
    const handler = this.handlerFor(token, lendingProtocolIndex);
    if (!isLendingAdapter(handler)) {
      throw new DcaError("HandlerDoesNotSupportOperation", {
        token,
        lendingProtocolIndex,
        operation: "interest",
      });
    }
    return handler;
  }

  private withdrawInterestFrom(
    caller: string,
    selection: HandlerSelection,
    adapter: LendingAdapter,
  ): bigint {
    const lockedPrincipal = this.store.lockedPrincipal(
      caller,
      selection.token,
      selection.lendingProtocolIndex,
    );
    const amount = adapter.withdrawInterest(caller, lockedPrincipal);
    this.events.record({
      type: "interest.withdrawn",
      owner: caller,
      ...selection,
      lockedPrincipal,
      amount,
    });
    return amount;
  }

  private withdrawAssetFrom(
    caller: string,
    selection: HandlerSelection,
    executor: PurchaseExecutor,
  ): bigint {
    const amount = executor.withdrawAccumulatedAsset(caller);
    if (amount > 0n) {
      this.events.record({ type: "asset.withdrawn", owner: caller, ...selection, amount });
    }
    return amount;
  }

  private recordPurchase(purchase: AuthorizedPurchase, purchasedAmount: bigint) {
    this.events.record({
      type: "purchase.executed",
      buyer: purchase.buyer,
      token: purchase.token,
      scheduleId: purchase.scheduleId,
      lendingProtocolIndex: purchase.lendingProtocolIndex,
      amount: purchase.purchaseAmount,
      purchasedAmount,
    });
  }
}

function refOf(owner: string, target: ScheduleTarget): ScheduleRef {
  return {
    owner,
    token: target.token,
    scheduleIndex: target.scheduleIndex,
    scheduleId: target.scheduleId,
  };
}
