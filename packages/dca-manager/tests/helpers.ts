import { FeeCalculator, MemoryEventPublisher, isDcaError, type DcaError } from "@repo/dca-core";
import { silentLogger } from "../src/adapters";
import { PaperHandler } from "../src/paper-handler";
import { HandlerRegistry } from "../src/registry";
import { ScheduleManager } from "../src/schedule-manager";
import { Roles, type Logger } from "../src/types";

export const E = 10n ** 18n;
export const HOUR = 3_600;
export const T0 = 1_700_000_000;

export const OWNER = "protocol-owner";
export const SWAPPER = "swapper-bot";
export const DOC = "DOC";
export const LENDING = 1;
export const IDLE = 0;

/** 1 DOC buys 0.00002 rBTC. */
export const ASSET_PER_TOKEN = 20_000_000_000_000n;

export function catchDcaError(fn: () => unknown): DcaError {
  try {
    fn();
  } catch (error) {
    if (isDcaError(error)) return error;
    throw error;
  }
  throw new Error("expected the call to throw a DcaError");
}

export function createHarness(options: { logger?: Logger } = {}) {
  let now = T0;
  const clock = () => now;
  const advance = (seconds: number) => {
    now += seconds;
  };

  const fees = new FeeCalculator({
    minFeeRate: 100n,
    maxFeeRate: 200n,
    purchaseLowerBound: 100n * E,
    purchaseUpperBound: 1_000n * E,
    feeCollector: "collector",
  });

  const registry = new HandlerRegistry();
  registry.addOrUpdateLendingProtocol(LENDING, "tropykus");
  registry.grantRole(Roles.SWAPPER, SWAPPER);

  const lending = new PaperHandler({ token: DOC, assetPerToken: ASSET_PER_TOKEN, fees });
  const idle = new PaperHandler({ token: DOC, assetPerToken: ASSET_PER_TOKEN, fees });
  registry.assignOrUpdateTokenHandler(DOC, LENDING, lending);
  registry.assignOrUpdateTokenHandler(DOC, IDLE, idle);

  for (const user of ["alice", "bob", "u1", "u2", "u3", "u4", "u5"]) {
    lending.fund(user, 10_000n * E);
    idle.fund(user, 10_000n * E);
  }

  const publisher = new MemoryEventPublisher();
  const manager = new ScheduleManager({
    owner: OWNER,
    roles: registry,
    config: {
      minPurchasePeriod: HOUR,
      maxSchedulesPerToken: 5,
      defaultMinPurchaseAmount: 10n * E,
    },
    clock,
    logger: options.logger ?? silentLogger,
    publisher,
    fees,
  });

  return { manager, registry, lending, idle, fees, publisher, clock, advance };
}

export type Harness = ReturnType<typeof createHarness>;

/** Creates a lending-routed DOC schedule: 1000 DOC, 200 DOC per purchase. */
export function createSchedule(
  harness: Harness,
  user = "alice",
  overrides: { depositAmount?: bigint; purchaseAmount?: bigint; lendingProtocolIndex?: number } = {},
) {
  return harness.manager.createDcaSchedule(user, {
    token: DOC,
    depositAmount: overrides.depositAmount ?? 1_000n * E,
    purchaseAmount: overrides.purchaseAmount ?? 200n * E,
    purchasePeriod: HOUR,
    lendingProtocolIndex: overrides.lendingProtocolIndex ?? LENDING,
  });
}
