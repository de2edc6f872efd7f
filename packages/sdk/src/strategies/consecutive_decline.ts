import { z } from "zod";

import type { ReadonlyPriceHistory } from "../history.js";
import type { OrderRequest, OrderSide, OrderStatusEvent } from "../orders.js";
import { isTerminalStatus } from "../orders.js";
import type { Strategy, StrategyContext } from "./types.js";

export const name = "consecutive_decline" as const;

export const schema = z.object({
  /** Consecutive strictly lower closes required before buying. */
  declineBars: z.number().int().min(1).default(2),
  /** Bars to hold after the entry fill before selling. */
  holdBars: z.number().int().min(1).default(5),
});

export type ConsecutiveDeclineParams = z.infer<typeof schema>;

export interface Position {
  readonly quantity: number;
  readonly entryBarIndex: number;
}

export interface PendingOrder {
  readonly id: string;
  readonly side: OrderSide;
}

/**
 * Strategy state. Only `flat` and `long` carry no pending order, so they are
 * the only phases from which a bar can issue one.
 */
export type DeclineState =
  | { readonly phase: "flat" }
  | { readonly phase: "entering_long"; readonly pending: PendingOrder }
  | { readonly phase: "long"; readonly position: Position }
  | { readonly phase: "exiting_long"; readonly pending: PendingOrder; readonly position: Position };

export const INITIAL_STATE: DeclineState = { phase: "flat" };

export interface BarInput {
  readonly history: ReadonlyPriceHistory;
  readonly currentBarIndex: number;
  /** Id given to the order if this bar issues one. */
  readonly orderId: string;
}

export interface BarStep {
  readonly state: DeclineState;
  readonly order: OrderRequest | null;
}

/**
 * True when each of the last `declineBars` closes is strictly below the one
 * before it. Needs `declineBars + 1` bars; with fewer it is false.
 */
export const isDeclining = (history: ReadonlyPriceHistory, declineBars: number): boolean => {
  if (!history.has(declineBars + 1)) {
    return false;
  }
  for (let offset = 0; offset > -declineBars; offset -= 1) {
    const close = history.close(offset);
    const prior = history.close(offset - 1);
    if (close === null || prior === null || !(close < prior)) {
      return false;
    }
  }
  return true;
};

export const pendingOrderOf = (state: DeclineState): PendingOrder | null => {
  return state.phase === "entering_long" || state.phase === "exiting_long" ? state.pending : null;
};

export const positionQuantityOf = (state: DeclineState): number => {
  return state.phase === "long" || state.phase === "exiting_long" ? state.position.quantity : 0;
};

export const stepOnBar = (
  state: DeclineState,
  input: BarInput,
  params: ConsecutiveDeclineParams,
): BarStep => {
  switch (state.phase) {
    case "flat": {
      if (!isDeclining(input.history, params.declineBars)) {
        return { state, order: null };
      }
      const order: OrderRequest = {
        id: input.orderId,
        side: "buy",
        type: "market",
        reason: "consecutive_decline",
      };
      return { state: { phase: "entering_long", pending: { id: order.id, side: "buy" } }, order };
    }
    case "long": {
      if (input.currentBarIndex < state.position.entryBarIndex + params.holdBars) {
        return { state, order: null };
      }
      const order: OrderRequest = {
        id: input.orderId,
        side: "sell",
        type: "market",
        reason: "hold_period_elapsed",
      };
      return {
        state: {
          phase: "exiting_long",
          pending: { id: order.id, side: "sell" },
          position: state.position,
        },
        order,
      };
    }
    case "entering_long":
    case "exiting_long":
      return { state, order: null };
  }
};

/**
 * Applies an order status notification. Progress statuses, events for an
 * order other than the pending one and completions on the wrong side leave
 * the state as it was.
 */
export const stepOnOrderUpdate = (
  state: DeclineState,
  event: OrderStatusEvent,
  currentBarIndex: number,
): DeclineState => {
  if (!isTerminalStatus(event.status)) {
    return state;
  }
  if (state.phase !== "entering_long" && state.phase !== "exiting_long") {
    return state;
  }
  if (state.pending.id !== event.orderId) {
    return state;
  }

  if (event.status === "completed") {
    if (event.side !== state.pending.side) {
      return state;
    }
    if (state.phase === "entering_long") {
      return {
        phase: "long",
        position: { quantity: event.fill.quantity, entryBarIndex: currentBarIndex },
      };
    }
    return { phase: "flat" };
  }

  // canceled, margin and rejected all fall back to the prior settled phase
  return state.phase === "entering_long"
    ? { phase: "flat" }
    : { phase: "long", position: state.position };
};

export interface ConsecutiveDeclineStrategy extends Strategy {
  readonly params: ConsecutiveDeclineParams;
  snapshot(): DeclineState;
}

const describeClose = (history: ReadonlyPriceHistory): string => {
  const close = history.close(0);
  return close === null ? "n/a" : close.toFixed(2);
};

export const factory = (params: ConsecutiveDeclineParams): ConsecutiveDeclineStrategy => {
  let state: DeclineState = INITIAL_STATE;
  let issued = 0;

  const log = (context: StrategyContext, msg: string, meta: Record<string, unknown> = {}): void => {
    context.logger.info(msg, { symbol: context.symbol, barIndex: context.currentBarIndex(), ...meta });
  };

  return {
    name,
    params,
    onInit() {
      state = INITIAL_STATE;
      issued = 0;
    },
    onBar(context: StrategyContext, history: ReadonlyPriceHistory): OrderRequest | null {
      const timestamp = history.current()?.timestamp;
      log(context, `Close, ${describeClose(history)}`, { timestamp });

      const step = stepOnBar(
        state,
        {
          history,
          currentBarIndex: context.currentBarIndex(),
          orderId: `${context.symbol}-${issued + 1}`,
        },
        params,
      );
      state = step.state;

      if (step.order) {
        issued += 1;
        log(context, `${step.order.side.toUpperCase()} CREATE, ${describeClose(history)}`, {
          timestamp,
          orderId: step.order.id,
        });
      }
      return step.order;
    },
    onOrderUpdate(context: StrategyContext, event: OrderStatusEvent): void {
      const pending = pendingOrderOf(state);
      if (isTerminalStatus(event.status) && pending?.id !== event.orderId) {
        context.logger.warn("Ignoring status for an order that is not pending", {
          symbol: context.symbol,
          orderId: event.orderId,
          status: event.status,
        });
      }

      state = stepOnOrderUpdate(state, event, context.currentBarIndex());

      if (event.status === "completed") {
        log(context, `${event.side.toUpperCase()} EXECUTED, ${event.fill.price.toFixed(2)}`, {
          timestamp: event.timestamp,
          orderId: event.orderId,
        });
      } else if (isTerminalStatus(event.status)) {
        log(context, "Order Canceled/Margin/Rejected", {
          timestamp: event.timestamp,
          orderId: event.orderId,
          status: event.status,
        });
      }
    },
    onStop(context: StrategyContext): void {
      const pending = pendingOrderOf(state);
      if (pending) {
        context.logger.debug("Run ended with a pending order; abandoning it", {
          symbol: context.symbol,
          orderId: pending.id,
        });
      }
    },
    snapshot: () => state,
  };
};
