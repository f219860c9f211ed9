import {
  createFeeSettings,
  createProtocolConfig,
  defaultFeeSettings,
  defaultProtocolConfig,
  type FeeSettings,
  type ProtocolConfig,
} from "@repo/dca-core";

export interface RuntimeSettings {
  owner: string;
  protocol: ProtocolConfig;
  fees: FeeSettings;
}

type Env = Record<string, string | undefined>;

const DEFAULT_OWNER = "protocol-owner";

function readString(envValue: string | undefined, fallback: string): string {
  if (typeof envValue === "string" && envValue.trim().length > 0) {
    return envValue.trim();
  }
  return fallback;
}

function readInteger(envValue: string | undefined, fallback: number): number {
  const parsed = Number(envValue);
  if (envValue !== undefined && envValue.trim() !== "" && Number.isInteger(parsed) && parsed > 0) {
    return parsed;
  }
  return fallback;
}

function readAmount(envValue: string | undefined, fallback: bigint): bigint {
  const raw = envValue?.trim();
  if (!raw || !/^\d+$/.test(raw)) return fallback;
  return BigInt(raw);
}

/**
 * Reads `DCA_*` variables. Blank or malformed values fall back to the
 * defaults; the merged result is validated by the domain schemas, so an
 * inconsistent combination (for example inverted fee rates) still throws.
 */
export function loadRuntimeSettings(env: Env = process.env): RuntimeSettings {
  const protocol = createProtocolConfig({
    minPurchasePeriod: readInteger(
      env.DCA_MIN_PURCHASE_PERIOD,
      defaultProtocolConfig.minPurchasePeriod,
    ),
    maxSchedulesPerToken: readInteger(
      env.DCA_MAX_SCHEDULES_PER_TOKEN,
      defaultProtocolConfig.maxSchedulesPerToken,
    ),
    defaultMinPurchaseAmount: readAmount(
      env.DCA_DEFAULT_MIN_PURCHASE_AMOUNT,
      defaultProtocolConfig.defaultMinPurchaseAmount,
    ),
  });

  const fees = createFeeSettings({
    minFeeRate: readAmount(env.DCA_MIN_FEE_RATE, defaultFeeSettings.minFeeRate),
    maxFeeRate: readAmount(env.DCA_MAX_FEE_RATE, defaultFeeSettings.maxFeeRate),
    purchaseLowerBound: readAmount(
      env.DCA_FEE_LOWER_BOUND,
      defaultFeeSettings.purchaseLowerBound,
    ),
    purchaseUpperBound: readAmount(
      env.DCA_FEE_UPPER_BOUND,
      defaultFeeSettings.purchaseUpperBound,
    ),
    feeCollector: readString(env.DCA_FEE_COLLECTOR, defaultFeeSettings.feeCollector),
  });

  return {
    owner: readString(env.DCA_OWNER, DEFAULT_OWNER),
    protocol,
    fees,
  };
}
