/** Direction of an order. This strategy family never opens short positions. */
export type OrderSide = "buy" | "sell";

/** Only market orders are issued: filled at the next available price, no limit. */
export type OrderType = "market";

export const ORDER_STATUSES = [
  "submitted",
  "accepted",
  "completed",
  "canceled",
  "margin",
  "rejected",
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

/** Statuses after which an order is no longer pending. */
export type TerminalOrderStatus = Extract<OrderStatus, "completed" | "canceled" | "margin" | "rejected">;

/** Terminal statuses that mean the order did not execute. */
export type RefusalStatus = Extract<OrderStatus, "canceled" | "margin" | "rejected">;

/** Statuses that only report progress and never change strategy state. */
export type ProgressStatus = Extract<OrderStatus, "submitted" | "accepted">;

export const isTerminalStatus = (status: OrderStatus): status is TerminalOrderStatus => {
  return status !== "submitted" && status !== "accepted";
};

export const isRefusalStatus = (status: OrderStatus): status is RefusalStatus => {
  return status === "canceled" || status === "margin" || status === "rejected";
};

/**
 * Order issued by a strategy. The id is assigned by the strategy so it can
 * track the order as pending before the engine reports anything back.
 */
export interface OrderRequest {
  readonly id: string;
  readonly side: OrderSide;
  readonly type: OrderType;
  readonly reason: string;
}

/** Execution details reported with a completed order. Quantity is unsigned. */
export interface OrderFill {
  readonly quantity: number;
  readonly price: number;
  readonly fees: number;
}

interface OrderStatusEventBase {
  readonly orderId: string;
  readonly side: OrderSide;
  /** Index of the bar being processed when the engine emitted the event. */
  readonly barIndex: number;
  readonly timestamp: string;
}

export interface OrderProgressEvent extends OrderStatusEventBase {
  readonly status: ProgressStatus;
}

export interface OrderCompletedEvent extends OrderStatusEventBase {
  readonly status: "completed";
  readonly fill: OrderFill;
}

export interface OrderRefusedEvent extends OrderStatusEventBase {
  readonly status: RefusalStatus;
  readonly reason: string;
}

/** Notification sent by the engine about an order previously requested. */
export type OrderStatusEvent = OrderProgressEvent | OrderCompletedEvent | OrderRefusedEvent;
