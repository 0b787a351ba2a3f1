// ---------------------------------------------------------------------------
// Built-in Units – Order Placement
// ---------------------------------------------------------------------------

export type OrderSide = "BUY" | "SELL";

export type OrderRequest = {
  symbol: string;
  quantity: number;
  side: OrderSide;
  orderType: "MARKET" | "LIMIT";
  /** Required for LIMIT orders. */
  price?: number;
};

export type OrderResult = {
  status: "success" | "error";
  order_id?: string;
  symbol: string;
  quantity: number;
  side: OrderSide;
  order_type: "MARKET" | "LIMIT";
  price?: number;
  paper_trading: boolean;
  placed_at: string;
  message?: string;
  error?: string;
};

export interface Broker {
  readonly paperTrading: boolean;
  placeOrder(request: OrderRequest): Promise<OrderResult>;
}

/** Simulated fills; every well-formed order succeeds. */
export class PaperBroker implements Broker {
  readonly paperTrading = true;
  private readonly nowMs: () => number;
  private readonly placed: OrderResult[] = [];

  constructor(opts?: { nowMs?: () => number }) {
    this.nowMs = opts?.nowMs ?? Date.now;
  }

  get orders(): readonly OrderResult[] {
    return this.placed;
  }

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    const base = {
      symbol: request.symbol,
      quantity: request.quantity,
      side: request.side,
      order_type: request.orderType,
      ...(request.price !== undefined ? { price: request.price } : {}),
      paper_trading: true,
      placed_at: new Date(this.nowMs()).toISOString(),
    };
    if (!Number.isInteger(request.quantity) || request.quantity <= 0) {
      return { ...base, status: "error", error: "Invalid quantity" };
    }
    if (request.orderType === "LIMIT" && request.price === undefined) {
      return { ...base, status: "error", error: "Limit order without price" };
    }
    const result: OrderResult = {
      ...base,
      status: "success",
      order_id: `PAPER_${request.symbol}_${request.quantity}_${this.placed.length + 1}`,
      message: "Order simulated (paper trading mode)",
    };
    this.placed.push(result);
    return result;
  }
}
