import type {
  BacktestSummary,
  Bar,
  ISODate,
  OrderRequest,
  OrderSide,
  OrderStatusEvent,
} from "@downtick/sdk";

import type { PortfolioStats } from "./portfolio.js";

/**
 * Equity snapshot captured after processing a bar.
 */
export interface EquityPoint {
  readonly timestamp: ISODate;
  readonly equity: number;
}

/**
 * Executed order as booked by the portfolio. Quantity is unsigned; the side
 * gives the direction.
 */
export interface Fill {
  readonly orderId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly quantity: number;
  readonly price: number;
  readonly fees: number;
  readonly timestamp: ISODate;
  readonly barIndex: number;
}

/**
 * Everything the engine dispatches during a run, in dispatch order.
 */
export type EngineEvent =
  | { readonly kind: "market"; readonly barIndex: number; readonly bar: Bar }
  | { readonly kind: "order"; readonly barIndex: number; readonly order: OrderRequest }
  | { readonly kind: "status"; readonly barIndex: number; readonly event: OrderStatusEvent };

export type EngineEventHook = (symbol: string, event: EngineEvent) => void;

export interface BacktestResult {
  readonly runId: string;
  readonly symbol: string;
  readonly summary: BacktestSummary;
  readonly fills: ReadonlyArray<Fill>;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  readonly events: ReadonlyArray<EngineEvent>;
  readonly portfolio: PortfolioStats;
}
