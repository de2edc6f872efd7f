import type { Logger } from "@downtick/logger";

import type { ReadonlyPriceHistory } from "../history.js";
import type { OrderRequest, OrderStatusEvent } from "../orders.js";

export interface StrategyContext {
  readonly symbol: string;
  readonly logger: Logger;
  /** Zero-based index of the bar the engine is currently processing. */
  currentBarIndex(): number;
}

/**
 * Contract between a strategy and the engine driving it. Callbacks are
 * dispatched one at a time, in event order; all status events caused by a
 * bar arrive before the next `onBar`.
 */
export interface Strategy {
  readonly name: string;
  readonly params: Record<string, unknown>;
  onInit(context: StrategyContext): void;
  onBar(context: StrategyContext, history: ReadonlyPriceHistory): OrderRequest | null;
  onOrderUpdate(context: StrategyContext, event: OrderStatusEvent): void;
  onStop(context: StrategyContext): void;
}
