import type { Bar, OrderFill, OrderRequest, RefusalStatus } from "@downtick/sdk";

/** Order accepted by the engine and waiting for a bar to execute on. */
export interface WorkingOrder {
  readonly request: OrderRequest;
  readonly quantity: number;
  readonly submittedBarIndex: number;
}

export interface AccountView {
  readonly cash: number;
  readonly heldQuantity: number;
}

export type Execution =
  | { readonly kind: "filled"; readonly fill: OrderFill }
  | { readonly kind: "refused"; readonly status: RefusalStatus; readonly reason: string }
  | { readonly kind: "waiting" };

export interface SimulatedBrokerOptions {
  /** Fraction of traded value charged per fill. */
  readonly commission?: number;
  /** Bars after submission an order may try to execute before it is canceled. */
  readonly orderLifetimeBars?: number;
}

/**
 * Executes market orders at the open of the bar they are tried on. A bar
 * with no volume cannot trade, so the order keeps waiting on it.
 */
export class SimulatedBroker {
  public readonly commission: number;
  public readonly orderLifetimeBars: number | null;

  public constructor(options: SimulatedBrokerOptions = {}) {
    this.commission = options.commission ?? 0;
    this.orderLifetimeBars = options.orderLifetimeBars ?? null;
  }

  public feesFor(quantity: number, price: number): number {
    return Math.abs(quantity) * price * this.commission;
  }

  public execute(order: WorkingOrder, bar: Bar, barIndex: number, account: AccountView): Execution {
    const waited = barIndex - order.submittedBarIndex;
    if (this.orderLifetimeBars !== null && waited > this.orderLifetimeBars) {
      return {
        kind: "refused",
        status: "canceled",
        reason: `order expired after ${this.orderLifetimeBars} bar(s)`,
      };
    }
    if (bar.volume <= 0) {
      return { kind: "waiting" };
    }

    const price = bar.open;
    if (!(price > 0)) {
      return { kind: "refused", status: "rejected", reason: `no tradable price (open ${price})` };
    }
    if (order.quantity <= 0) {
      return { kind: "refused", status: "rejected", reason: "order quantity must be positive" };
    }

    if (order.request.side === "buy") {
      const fees = this.feesFor(order.quantity, price);
      const required = order.quantity * price + fees;
      if (account.cash < required) {
        return {
          kind: "refused",
          status: "margin",
          reason: `insufficient cash: need ${required.toFixed(2)}, have ${account.cash.toFixed(2)}`,
        };
      }
      return { kind: "filled", fill: { quantity: order.quantity, price, fees } };
    }

    if (account.heldQuantity <= 0) {
      return { kind: "refused", status: "rejected", reason: "no position to sell" };
    }
    const quantity = Math.min(order.quantity, account.heldQuantity);
    return { kind: "filled", fill: { quantity, price, fees: this.feesFor(quantity, price) } };
  }
}
