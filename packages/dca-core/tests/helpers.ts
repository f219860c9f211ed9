import { isDcaError, type DcaError } from "../src/errors";
import type { CreateScheduleInput } from "../src/contracts";
import { ScheduleStore } from "../src/schedule-store";

export const E = 10n ** 18n;
export const T0 = 1_700_000_000;
export const HOUR = 3_600;

export function catchDcaError(fn: () => unknown): DcaError {
  try {
    fn();
  } catch (error) {
    if (isDcaError(error)) return error;
    throw error;
  }
  throw new Error("expected the call to throw a DcaError");
}

export function scheduleInput(overrides: Partial<CreateScheduleInput> = {}): CreateScheduleInput {
  return {
    token: "DOC",
    depositAmount: 100n * E,
    purchaseAmount: 20n * E,
    purchasePeriod: HOUR,
    lendingProtocolIndex: 0,
    ...overrides,
  };
}

export function createStore() {
  const store = new ScheduleStore({
    minPurchasePeriod: HOUR,
    maxSchedulesPerToken: 3,
    defaultMinPurchaseAmount: 10n * E,
  });
  store.events.begin(T0);
  return store;
}
