import { describe, expect, it } from "vitest";
import { FeeCalculator } from "../src/fees";
import type { FeeSettings } from "../src/contracts";
import { E, catchDcaError } from "./helpers";

const createCalculator = () =>
  new FeeCalculator({
    minFeeRate: 100n,
    maxFeeRate: 200n,
    purchaseLowerBound: 100n * E,
    purchaseUpperBound: 1_000n * E,
    feeCollector: "collector",
  });

describe("FeeCalculator", () => {
  it("interpolates the rate between the purchase bounds", () => {
    const fees = createCalculator();

    expect(fees.effectiveFeeRate(550n * E)).toBe(150n);
    expect(fees.calculateFee(550n * E)).toBe(8_250_000_000_000_000_000n);
  });

  it("charges the max rate at or below the lower bound", () => {
    const fees = createCalculator();

    expect(fees.calculateFee(100n * E)).toBe(2n * E);
    expect(fees.calculateFee(50n * E)).toBe(1n * E);
    expect(fees.effectiveFeeRate(0n)).toBe(200n);
    expect(fees.calculateFee(0n)).toBe(0n);
  });

  it("charges the min rate at or above the upper bound", () => {
    const fees = createCalculator();

    expect(fees.calculateFee(1_000n * E)).toBe(10n * E);
    expect(fees.calculateFee(2_000n * E)).toBe(20n * E);
  });

  it("truncates the interpolated rate toward zero", () => {
    const fees = createCalculator();

    // 200 - (1e18 * 100) / 900e18 rounds down to a zero step
    expect(fees.effectiveFeeRate(101n * E)).toBe(200n);
    expect(fees.effectiveFeeRate(333n * E)).toBe(175n);
  });

  it("keeps the rate within bounds and never increasing with size", () => {
    const fees = createCalculator();
    const amounts = [1n, 50n, 100n, 101n, 333n, 550n, 999n, 1_000n, 5_000n].map(
      (units) => units * E,
    );
    const rates = amounts.map((amount) => fees.effectiveFeeRate(amount));

    for (const rate of rates) {
      expect(rate).toBeGreaterThanOrEqual(100n);
      expect(rate).toBeLessThanOrEqual(200n);
    }
    for (let i = 1; i < amounts.length; i++) {
      expect(rates[i]).toBeLessThanOrEqual(rates[i - 1]);
      // fee_i / amount_i <= fee_{i-1} / amount_{i-1}
      const current = fees.calculateFee(amounts[i]) * amounts[i - 1];
      const previous = fees.calculateFee(amounts[i - 1]) * amounts[i];
      expect(current).toBeLessThanOrEqual(previous);
    }
  });

  it("uses a flat rate when min and max rates are equal", () => {
    const fees = createCalculator();
    fees.setFeeRateParams({
      minFeeRate: 150n,
      maxFeeRate: 150n,
      purchaseLowerBound: 100n * E,
      purchaseUpperBound: 1_000n * E,
    });

    expect(fees.effectiveFeeRate(1n * E)).toBe(150n);
    expect(fees.effectiveFeeRate(550n * E)).toBe(150n);
    expect(fees.effectiveFeeRate(5_000n * E)).toBe(150n);
  });

  it("aggregates batch fees exactly as the single purchases would", () => {
    const fees = createCalculator();
    const amounts = [50n * E, 550n * E, 2_000n * E];

    const breakdown = fees.calculateFeesAndNetAmounts(amounts);

    expect(breakdown.aggregatedFee).toBe(29_250_000_000_000_000_000n);
    expect(breakdown.netAmounts).toEqual([
      49n * E,
      541_750_000_000_000_000_000n,
      1_980n * E,
    ]);
    expect(breakdown.totalNetAmount).toBe(2_570_750_000_000_000_000_000n);
    expect(breakdown.aggregatedFee).toBe(
      amounts.reduce((sum, amount) => sum + fees.calculateFee(amount), 0n),
    );
  });

  it("returns an empty breakdown for no purchases", () => {
    expect(createCalculator().calculateFeesAndNetAmounts([])).toEqual({
      aggregatedFee: 0n,
      netAmounts: [],
      totalNetAmount: 0n,
    });
  });

  it("rejects inconsistent rates and bounds", () => {
    const fees = createCalculator();

    expect(catchDcaError(() => fees.setMinFeeRate(201n)).code).toBe("InvalidFeeRates");
    expect(catchDcaError(() => fees.setMaxFeeRate(99n)).code).toBe("InvalidFeeRates");
    expect(catchDcaError(() => fees.setPurchaseLowerBound(1_000n * E)).code).toBe(
      "InvalidPurchaseBounds",
    );
    expect(catchDcaError(() => fees.setPurchaseUpperBound(100n * E)).code).toBe(
      "InvalidPurchaseBounds",
    );
    expect(catchDcaError(() => fees.setFeeCollector("")).code).toBe("InvalidConfiguration");
    expect(fees.getSettings()).toMatchObject({
      minFeeRate: 100n,
      maxFeeRate: 200n,
      purchaseLowerBound: 100n * E,
      purchaseUpperBound: 1_000n * E,
    });
  });

  it("rejects inverted rates at construction", () => {
    expect(() => new FeeCalculator({ minFeeRate: 300n })).toThrow();
  });

  it("notifies listeners after each accepted change", () => {
    const fees = createCalculator();
    const seen: FeeSettings[] = [];
    const unsubscribe = fees.onChange((settings) => seen.push(settings));

    fees.setMaxFeeRate(250n);
    expect(() => fees.setMinFeeRate(300n)).toThrow();
    fees.setFeeCollector("treasury");
    unsubscribe();
    fees.setMinFeeRate(50n);

    expect(seen).toHaveLength(2);
    expect(seen[0].maxFeeRate).toBe(250n);
    expect(seen[1]).toMatchObject({ maxFeeRate: 250n, feeCollector: "treasury" });
    expect(fees.getSettings().minFeeRate).toBe(50n);
  });
});
