import { describe, expect, it } from "vitest";
import { PaperBroker } from "./broker.js";

const NOW = Date.parse("2025-03-10T09:30:00Z");

describe("PaperBroker", () => {
  it("simulates market orders with sequential ids", async () => {
    const broker = new PaperBroker({ nowMs: () => NOW });
    const first = await broker.placeOrder({ symbol: "AAA", quantity: 10, side: "BUY", orderType: "MARKET" });
    const second = await broker.placeOrder({ symbol: "BBB", quantity: 4, side: "SELL", orderType: "MARKET" });

    expect(first).toEqual({
      status: "success",
      order_id: "PAPER_AAA_10_1",
      symbol: "AAA",
      quantity: 10,
      side: "BUY",
      order_type: "MARKET",
      paper_trading: true,
      placed_at: "2025-03-10T09:30:00.000Z",
      message: "Order simulated (paper trading mode)",
    });
    expect(second.order_id).toBe("PAPER_BBB_4_2");
    expect(broker.orders).toHaveLength(2);
  });

  it("rejects bad quantities and unpriced limit orders", async () => {
    const broker = new PaperBroker({ nowMs: () => NOW });
    const zero = await broker.placeOrder({ symbol: "AAA", quantity: 0, side: "BUY", orderType: "MARKET" });
    const limit = await broker.placeOrder({ symbol: "AAA", quantity: 1, side: "BUY", orderType: "LIMIT" });

    expect(zero).toMatchObject({ status: "error", error: "Invalid quantity" });
    expect(limit).toMatchObject({ status: "error", error: "Limit order without price" });
    expect(broker.orders).toHaveLength(0);
  });
});
