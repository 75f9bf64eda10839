import { describe, test } from "node:test";
import assert from "node:assert";
import { BasketExecutor } from "../../src/core/basket-executor";
import { ManualClock } from "../../src/core/clock";
import { BUY, SELL, invertSide, type Basket } from "../../src/domain/trade.types";
import { StrikeSelector } from "../../src/strategies/strike-selector";
import { FakeBroker, NEAREST_EXPIRY } from "../helpers/fake-broker";
import { RecordingLogger } from "../helpers/recording-logger";
import { strategyConfig } from "../helpers/strategy-config";

const START = new Date("2025-01-13T04:15:00Z");

const LOW = "NSE:NIFTY2511622250CE";
const MID = "NSE:NIFTY2511622450CE";
const HIGH = "NSE:NIFTY2511622650CE";

function ladder(): Basket {
  return new StrikeSelector(strategyConfig()).buildBasket("ladder", 22050, NEAREST_EXPIRY);
}

function createExecutor(broker: FakeBroker, logger = new RecordingLogger()) {
  const clock = new ManualClock(START);
  const executor = new BasketExecutor({
    broker,
    clock,
    productType: "INTRADAY",
    orderPacingMs: 500,
    logger,
  });
  return { executor, clock, logger };
}

describe("BasketExecutor.execute", () => {
  test("places every leg in order with pacing between them", async () => {
    const broker = new FakeBroker();
    const { executor, clock, logger } = createExecutor(broker);

    const result = await executor.execute(ladder());

    assert.strictEqual(result.status, "complete");
    assert.deepStrictEqual(
      broker.orders.map((o) => [o.symbol, o.side, o.quantity, o.productType, o.tag]),
      [
        [LOW, BUY, 75, "INTRADAY", "BUY_OTM_CE"],
        [MID, SELL, 225, "INTRADAY", "SELL_CE"],
        [HIGH, BUY, 150, "INTRADAY", "BUY_HEDGE_CE"],
      ],
    );
    assert.deepStrictEqual(clock.sleeps, [500, 500]);
    assert.deepStrictEqual(result.legs.map((leg) => leg.orderId), ["ORD-1", "ORD-2", "ORD-3"]);
    assert.deepStrictEqual(logger.messages("info"), [
      `[ladder] leg 1/3 BUY_OTM_CE BUY 75 ${LOW} -> order ORD-1`,
      `[ladder] leg 2/3 SELL_CE SELL 225 ${MID} -> order ORD-2`,
      `[ladder] leg 3/3 BUY_HEDGE_CE BUY 150 ${HIGH} -> order ORD-3`,
    ]);
  });

  for (const rejected of [0, 1, 2]) {
    test(`stops at a rejection on leg ${rejected + 1}`, async () => {
      const broker = new FakeBroker();
      broker.rejectOrders.add(rejected);
      const { executor, clock } = createExecutor(broker);

      const result = await executor.execute(ladder());

      assert.strictEqual(result.status, "partial");
      assert.strictEqual(broker.orders.length, rejected + 1);
      assert.strictEqual(result.legs.length, rejected + 1);
      assert.deepStrictEqual(
        result.legs.map((leg) => leg.accepted),
        [...Array<boolean>(rejected).fill(true), false],
      );
      assert.strictEqual(result.legs[rejected].errorDetail, "rejected (code -50): margin shortfall");
      assert.strictEqual(clock.sleeps.length, rejected);
    });
  }

  test("logs the rejection and the legs left unsent", async () => {
    const broker = new FakeBroker();
    broker.rejectOrders.add(1);
    const { executor, logger } = createExecutor(broker);

    await executor.execute(ladder());

    assert.deepStrictEqual(logger.messages("error"), [
      `[ladder] leg 2/3 SELL_CE SELL 225 ${MID} -> rejected: rejected (code -50): margin shortfall`,
    ]);
    assert.deepStrictEqual(logger.messages("warn"), ["[ladder] stopped after leg 2/3; 1 leg(s) not sent"]);
  });

  test("a thrown placement counts as a rejection", async () => {
    const broker = new FakeBroker();
    broker.placeOrder = async () => {
      throw new Error("socket closed");
    };
    const { executor } = createExecutor(broker);

    const result = await executor.execute(ladder());

    assert.strictEqual(result.status, "partial");
    assert.deepStrictEqual(result.legs, [
      {
        role: "BUY_OTM_CE",
        symbol: LOW,
        side: BUY,
        quantity: 75,
        orderId: null,
        accepted: false,
        errorDetail: "socket closed",
      },
    ]);
  });

  test("applies the side transform", async () => {
    const broker = new FakeBroker();
    const { executor } = createExecutor(broker);

    await executor.execute(ladder(), invertSide);

    assert.deepStrictEqual(broker.orders.map((o) => o.side), [SELL, BUY, SELL]);
  });

  test("an empty basket is complete without orders", async () => {
    const broker = new FakeBroker();
    const { executor, clock } = createExecutor(broker);

    const result = await executor.execute({ id: "empty", legs: [] });

    assert.deepStrictEqual(result, { basketId: "empty", status: "complete", legs: [] });
    assert.strictEqual(broker.orders.length, 0);
    assert.deepStrictEqual(clock.sleeps, []);
  });
});

describe("BasketExecutor.buildExitBasket", () => {
  test("closes each open basket symbol with the opposite side", () => {
    const { executor } = createExecutor(new FakeBroker());

    const exit = executor.buildExitBasket(
      [
        { symbol: HIGH, netQty: 150, pnl: 0 },
        { symbol: LOW, netQty: 75, pnl: 0 },
        { symbol: MID, netQty: -225, pnl: 0 },
        { symbol: "NSE:OTHER25116100CE", netQty: 50, pnl: 0 },
      ],
      ladder(),
    );

    assert.strictEqual(exit.id, "ladder-exit");
    assert.deepStrictEqual(
      exit.legs.map((leg) => [leg.role, leg.symbol, leg.side, leg.quantity]),
      [
        ["BUY_OTM_CE", LOW, SELL, 75],
        ["SELL_CE", MID, BUY, 225],
        ["BUY_HEDGE_CE", HIGH, SELL, 150],
      ],
    );
  });

  test("skips flat symbols and sums duplicate rows", () => {
    const { executor } = createExecutor(new FakeBroker());

    const exit = executor.buildExitBasket(
      [
        { symbol: LOW, netQty: 0, pnl: 120 },
        { symbol: MID, netQty: -150, pnl: 0 },
        { symbol: MID, netQty: -75, pnl: 0 },
      ],
      ladder(),
      "ladder-exit-2",
    );

    assert.strictEqual(exit.id, "ladder-exit-2");
    assert.deepStrictEqual(
      exit.legs.map((leg) => [leg.symbol, leg.side, leg.quantity]),
      [[MID, BUY, 225]],
    );
  });

  test("returns no legs when nothing is open", () => {
    const { executor } = createExecutor(new FakeBroker());
    assert.deepStrictEqual(executor.buildExitBasket([], ladder()).legs, []);
  });
});
