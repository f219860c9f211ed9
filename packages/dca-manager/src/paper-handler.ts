import { DcaError, FeeCalculator } from "@repo/dca-core";
import { silentLogger } from "./adapters";
import type { LendingAdapter, PurchaseExecutor } from "./handlers";
import type { Logger } from "./types";

const WAD = 10n ** 18n;
const BPS = 10_000n;

export type PaperOperation =
  | "depositToken"
  | "withdrawToken"
  | "buyAsset"
  | "batchBuyAsset"
  | "withdrawAccumulatedAsset"
  | "withdrawInterest";

export interface PaperHandlerOptions {
  token: string;
  /** Asset units credited per token unit, 18-decimal fixed point. */
  assetPerToken?: bigint;
  fees?: FeeCalculator;
  logger?: Logger;
}

function ceilDiv(a: bigint, b: bigint) {
  return (a + b - 1n) / b;
}

/**
 * Simulated handler for one token: custody, a lending venue that grows
 * through an exchange rate, and swaps at a fixed price with the fee curve
 * applied. Used for dry runs and in tests.
 *
 * Custody is held as venue shares next to the principal deposited in token
 * units. Accrued interest is the value of the shares held above those the
 * locked principal needs; rounding always favors the venue.
 */
export class PaperHandler implements PurchaseExecutor, LendingAdapter {
  readonly token: string;
  readonly fees: FeeCalculator;

  private readonly wallets = new Map<string, bigint>();
  private readonly shares = new Map<string, bigint>();
  private readonly principal = new Map<string, bigint>();
  private readonly accumulated = new Map<string, bigint>();
  private readonly assetWallets = new Map<string, bigint>();
  private exchangeRate = WAD;
  private assetPerToken: bigint;
  private readonly logger: Logger;
  private hook: ((operation: PaperOperation) => void) | undefined;
  private readonly unsubscribe: () => void;

  constructor(options: PaperHandlerOptions) {
    this.token = options.token;
    this.fees = options.fees ?? new FeeCalculator();
    this.assetPerToken = options.assetPerToken ?? WAD;
    this.logger = options.logger ?? silentLogger;

    this.unsubscribe = this.fees.onChange((settings) => {
      this.logger.info("Fee settings updated", { token: this.token, ...settings });
    });
  }

  /** Stops listening to the fee curve. */
  dispose() {
    this.unsubscribe();
  }

  // ---------- simulation controls ----------

  /** Credits tokens to a user's wallet outside custody. */
  fund(user: string, amount: bigint) {
    this.wallets.set(user, this.walletBalance(user) + amount);
  }

  walletBalance(user: string): bigint {
    return this.wallets.get(user) ?? 0n;
  }

  assetWalletBalance(user: string): bigint {
    return this.assetWallets.get(user) ?? 0n;
  }

  /** Tokens deposited and not yet redeemed, interest excluded. */
  principalBalance(user: string): bigint {
    return this.principal.get(user) ?? 0n;
  }

  /** Underlying value of the user's venue shares. */
  custodyBalance(user: string): bigint {
    return ((this.shares.get(user) ?? 0n) * this.exchangeRate) / WAD;
  }

  accrueInterest(bps: bigint) {
    this.exchangeRate = (this.exchangeRate * (BPS + bps)) / BPS;
  }

  setAssetPerToken(assetPerToken: bigint) {
    this.assetPerToken = assetPerToken;
  }

  /**
   * Runs before every state-changing call, the way a token callback would.
   */
  onExternalCall(hook: ((operation: PaperOperation) => void) | undefined) {
    this.hook = hook;
  }

  // ---------- TokenHandler ----------

  depositToken(user: string, amount: bigint) {
    this.hook?.("depositToken");
    const wallet = this.walletBalance(user);
    if (wallet < amount) {
      throw new Error(`Paper handler: wallet balance too low for ${user} (${wallet} < ${amount})`);
    }
    this.wallets.set(user, wallet - amount);
    this.principal.set(user, this.principalBalance(user) + amount);
    this.shares.set(user, (this.shares.get(user) ?? 0n) + (amount * WAD) / this.exchangeRate);
  }

  withdrawToken(user: string, amount: bigint) {
    this.hook?.("withdrawToken");
    this.redeem(user, amount);
    this.wallets.set(user, this.walletBalance(user) + amount);
  }

  // ---------- PurchaseExecutor ----------

  buyAsset(buyer: string, scheduleId: string, amount: bigint): bigint {
    this.hook?.("buyAsset");
    this.redeem(buyer, amount);
    const fee = this.fees.calculateFee(amount);
    this.collect(fee);
    const bought = this.credit(buyer, amount - fee);

    this.logger.info("Paper purchase filled", {
      token: this.token,
      buyer,
      scheduleId,
      amount,
      fee,
      bought,
    });
    return bought;
  }

  batchBuyAsset(
    buyers: readonly string[],
    scheduleIds: readonly string[],
    amounts: readonly bigint[],
  ): bigint[] {
    this.hook?.("batchBuyAsset");
    if (buyers.length !== scheduleIds.length || buyers.length !== amounts.length) {
      throw new DcaError("BatchPurchaseArraysLengthMismatch", {
        buyers: buyers.length,
        scheduleIds: scheduleIds.length,
        amounts: amounts.length,
      });
    }

    const required = new Map<string, bigint>();
    buyers.forEach((buyer, i) => {
      required.set(buyer, (required.get(buyer) ?? 0n) + amounts[i]);
    });
    for (const [buyer, needed] of required) this.assertPrincipal(buyer, needed);

    buyers.forEach((buyer, i) => this.redeem(buyer, amounts[i]));
    const { aggregatedFee, netAmounts } = this.fees.calculateFeesAndNetAmounts(amounts);
    this.collect(aggregatedFee);
    const bought = buyers.map((buyer, i) => this.credit(buyer, netAmounts[i]));

    this.logger.info("Paper batch purchase filled", {
      token: this.token,
      purchases: buyers.length,
      aggregatedFee,
    });
    return bought;
  }

  getAccumulatedAssetBalance(user: string): bigint {
    return this.accumulated.get(user) ?? 0n;
  }

  withdrawAccumulatedAsset(user: string): bigint {
    this.hook?.("withdrawAccumulatedAsset");
    const amount = this.getAccumulatedAssetBalance(user);
    if (amount === 0n) return 0n;
    this.accumulated.delete(user);
    this.assetWallets.set(user, this.assetWalletBalance(user) + amount);
    return amount;
  }

  // ---------- LendingAdapter ----------

  getAccruedInterest(user: string, lockedPrincipal: bigint): bigint {
    return (this.excessShares(user, lockedPrincipal) * this.exchangeRate) / WAD;
  }

  withdrawInterest(user: string, lockedPrincipal: bigint): bigint {
    this.hook?.("withdrawInterest");
    const excess = this.excessShares(user, lockedPrincipal);
    const interest = (excess * this.exchangeRate) / WAD;
    if (interest === 0n) return 0n;
    this.shares.set(user, (this.shares.get(user) ?? 0n) - excess);
    this.wallets.set(user, this.walletBalance(user) + interest);
    return interest;
  }

  // ---------- internals ----------

  private sharesFor(amount: bigint) {
    return ceilDiv(amount * WAD, this.exchangeRate);
  }

  /** Shares held beyond those that cover `lockedPrincipal` at the current rate. */
  private excessShares(user: string, lockedPrincipal: bigint) {
    const held = this.shares.get(user) ?? 0n;
    const covering = this.sharesFor(lockedPrincipal);
    return held > covering ? held - covering : 0n;
  }

  private assertPrincipal(user: string, needed: bigint) {
    const principal = this.principalBalance(user);
    if (principal < needed) {
      throw new Error(`Paper handler: custody too low for ${user} (${principal} < ${needed})`);
    }
  }

  // Deposits mint shares rounded down, so redeeming a whole principal can
  // need one share more than is held. The burn is capped at the holding.
  private redeem(user: string, amount: bigint) {
    this.assertPrincipal(user, amount);
    const held = this.shares.get(user) ?? 0n;
    const needed = this.sharesFor(amount);
    this.principal.set(user, this.principalBalance(user) - amount);
    this.shares.set(user, needed < held ? held - needed : 0n);
  }

  private collect(fee: bigint) {
    if (fee === 0n) return;
    const { feeCollector } = this.fees.getSettings();
    this.wallets.set(feeCollector, this.walletBalance(feeCollector) + fee);
  }

  private credit(buyer: string, netAmount: bigint): bigint {
    const bought = (netAmount * this.assetPerToken) / WAD;
    this.accumulated.set(buyer, this.getAccumulatedAssetBalance(buyer) + bought);
    return bought;
  }
}
