import { describe, expect, it } from "vitest";
import { EventBuffer, MemoryEventPublisher, createDcaEvent } from "../src/events";

describe("dca-core events", () => {
  it("stamps recorded facts with the transaction time", () => {
    const buffer = new EventBuffer();
    buffer.begin(1_700_000_000);

    buffer.record({ type: "config.updated", key: "minPurchasePeriod", value: 3_600 });

    expect(buffer.drain()).toEqual([
      {
        type: "config.updated",
        key: "minPurchasePeriod",
        value: 3_600,
        occurredAt: 1_700_000_000,
      },
    ]);
    expect(buffer.size()).toBe(0);
  });

  it("drops pending facts on discard and on a new transaction", () => {
    const buffer = new EventBuffer();
    buffer.begin(1);
    buffer.record({ type: "config.updated", key: "maxSchedulesPerToken", value: 4 });
    buffer.discard();
    expect(buffer.size()).toBe(0);

    buffer.record({ type: "config.updated", key: "maxSchedulesPerToken", value: 5 });
    buffer.begin(2);
    expect(buffer.drain()).toEqual([]);
  });

  it("refuses malformed facts", () => {
    expect(() =>
      createDcaEvent(
        {
          type: "token.deposited",
          owner: "alice",
          token: "DOC",
          scheduleIndex: 0,
          scheduleId: "0xabc",
          amount: -1n,
        },
        1,
      ),
    ).toThrow();
  });

  it("filters published facts by type", () => {
    const publisher = new MemoryEventPublisher();
    publisher.publish(
      createDcaEvent({ type: "config.updated", key: "minPurchasePeriod", value: 60 }, 1),
    );
    publisher.publish(
      createDcaEvent(
        {
          type: "asset.withdrawn",
          owner: "alice",
          token: "DOC",
          lendingProtocolIndex: 1,
          amount: 5n,
        },
        2,
      ),
    );

    const withdrawals = publisher.ofType("asset.withdrawn");
    expect(withdrawals).toHaveLength(1);
    expect(withdrawals[0].amount).toBe(5n);

    publisher.clear();
    expect(publisher.events).toEqual([]);
  });
});
