import {
  FEE_PERCENTAGE_DIVISOR,
  createFeeSettings,
  type FeeSettings,
} from "./contracts";
import { DcaError } from "./errors";

export type FeeSettingsListener = (settings: FeeSettings) => void;

export interface FeeBreakdown {
  aggregatedFee: bigint;
  netAmounts: bigint[];
  totalNetAmount: bigint;
}

/**
 * Maps a purchase amount to the fee charged on it.
 *
 * The rate falls linearly from `maxFeeRate` at `purchaseLowerBound` to
 * `minFeeRate` at `purchaseUpperBound` and is flat outside that window, so
 * the effective rate never increases with purchase size.
 */
export class FeeCalculator {
  private settings: FeeSettings;
  private readonly listeners = new Set<FeeSettingsListener>();

  constructor(settings?: Partial<FeeSettings>) {
    this.settings = createFeeSettings(settings);
  }

  getSettings(): FeeSettings {
    return { ...this.settings };
  }

  onChange(listener: FeeSettingsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Rate applied to `amount`, in units of `FEE_PERCENTAGE_DIVISOR`.
   */
  effectiveFeeRate(amount: bigint): bigint {
    const { minFeeRate, maxFeeRate, purchaseLowerBound, purchaseUpperBound } =
      this.settings;

    if (minFeeRate === maxFeeRate || amount >= purchaseUpperBound) {
      return minFeeRate;
    }
    if (amount <= purchaseLowerBound) {
      return maxFeeRate;
    }

    return (
      maxFeeRate -
      ((amount - purchaseLowerBound) * (maxFeeRate - minFeeRate)) /
        (purchaseUpperBound - purchaseLowerBound)
    );
  }

  calculateFee(amount: bigint): bigint {
    return (amount * this.effectiveFeeRate(amount)) / FEE_PERCENTAGE_DIVISOR;
  }

  /**
   * Per-entry fees summed up. Each entry is rounded on its own so a batch
   * never charges differently from the same purchases made one by one.
   */
  calculateFeesAndNetAmounts(amounts: readonly bigint[]): FeeBreakdown {
    let aggregatedFee = 0n;
    let totalNetAmount = 0n;
    const netAmounts = amounts.map((amount) => {
      const fee = this.calculateFee(amount);
      const net = amount - fee;
      aggregatedFee += fee;
      totalNetAmount += net;
      return net;
    });

    return { aggregatedFee, netAmounts, totalNetAmount };
  }

  setFeeRateParams(params: {
    minFeeRate: bigint;
    maxFeeRate: bigint;
    purchaseLowerBound: bigint;
    purchaseUpperBound: bigint;
  }) {
    assertRates(params.minFeeRate, params.maxFeeRate);
    assertBounds(params.purchaseLowerBound, params.purchaseUpperBound);
    this.apply(params);
  }

  setMinFeeRate(minFeeRate: bigint) {
    assertRates(minFeeRate, this.settings.maxFeeRate);
    this.apply({ minFeeRate });
  }

  setMaxFeeRate(maxFeeRate: bigint) {
    assertRates(this.settings.minFeeRate, maxFeeRate);
    this.apply({ maxFeeRate });
  }

  setPurchaseLowerBound(purchaseLowerBound: bigint) {
    assertBounds(purchaseLowerBound, this.settings.purchaseUpperBound);
    this.apply({ purchaseLowerBound });
  }

  setPurchaseUpperBound(purchaseUpperBound: bigint) {
    assertBounds(this.settings.purchaseLowerBound, purchaseUpperBound);
    this.apply({ purchaseUpperBound });
  }

  setFeeCollector(feeCollector: string) {
    if (feeCollector.length === 0) {
      throw new DcaError("InvalidConfiguration", { field: "feeCollector" });
    }
    this.apply({ feeCollector });
  }

  private apply(patch: Partial<FeeSettings>) {
    this.settings = { ...this.settings, ...patch };
    const snapshot = this.getSettings();
    for (const listener of this.listeners) listener(snapshot);
  }
}

function assertRates(minFeeRate: bigint, maxFeeRate: bigint) {
  if (minFeeRate < 0n || minFeeRate > maxFeeRate) {
    throw new DcaError("InvalidFeeRates", { minFeeRate, maxFeeRate });
  }
}

function assertBounds(lowerBound: bigint, upperBound: bigint) {
  if (lowerBound < 0n || lowerBound >= upperBound) {
    throw new DcaError("InvalidPurchaseBounds", { lowerBound, upperBound });
  }
}
