import type {
  BacktestRequest,
  BacktestSummary,
  Bar,
  OrderRequest,
  OrderStatusEvent,
  Strategy,
  StrategyContext,
} from "@downtick/sdk";
import { PriceHistory, Schemas, assertValid, strategies } from "@downtick/sdk";
import { createCsvSource, filterBarsForRequest, type IDataSource } from "@downtick/data";
import { createLogger, type Logger } from "@downtick/logger";

import { SimulatedBroker, type Execution, type WorkingOrder } from "./broker.js";
import { Portfolio } from "./portfolio.js";
import type { BacktestResult, EngineEvent, EngineEventHook, EquityPoint, Fill } from "./types.js";

export interface RunBacktestOptions {
  readonly runId?: string;
  /** Used for engine and strategy output. Defaults to module loggers. */
  readonly logger?: Logger;
  readonly onEvent?: EngineEventHook;
  readonly dataSource?: IDataSource;
  readonly now?: () => Date;
}

export class EngineProtocolError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "EngineProtocolError";
  }
}

interface StrategyModule {
  readonly name: string;
  create(params: Record<string, unknown>): Strategy;
}

const STRATEGY_REGISTRY: Record<string, StrategyModule> = {
  [strategies.consecutiveDecline.name]: {
    name: strategies.consecutiveDecline.name,
    create: (params) =>
      strategies.consecutiveDecline.factory(
        assertValid(strategies.consecutiveDecline.schema, params, "consecutive_decline params"),
      ),
  },
};

export const listStrategies = (): string[] => Object.keys(STRATEGY_REGISTRY);

const makeRunId = (request: BacktestRequest, now: Date): string => {
  const slug = request.runName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
  const timestamp = now
    .toISOString()
    .replace(/[^0-9]+/g, "")
    .slice(0, 14);
  const base = slug.length > 0 ? slug : "run";
  return `${base}-${timestamp}`;
};

export const instantiateStrategy = (name: string, params: Record<string, unknown>): Strategy => {
  const module = STRATEGY_REGISTRY[name];
  if (!module) {
    throw new Error(`Unknown strategy "${name}". Available: ${listStrategies().join(", ")}`);
  }
  return module.create(params);
};

const loadBars = async (request: BacktestRequest, dataSource: IDataSource): Promise<ReadonlyArray<Bar>> => {
  if (request.bars) {
    return filterBarsForRequest(request.bars, request.data);
  }
  return dataSource.loadBars(request.data);
};

export interface SimulationInput {
  readonly symbol: string;
  readonly bars: ReadonlyArray<Bar>;
  readonly strategy: Strategy;
  readonly initialCash: number;
  readonly stake: number;
  readonly broker: SimulatedBroker;
  readonly logger: Logger;
  readonly strategyLogger: Logger;
  readonly onEvent?: EngineEventHook;
}

export interface SimulationOutput {
  readonly summary: BacktestSummary;
  readonly fills: ReadonlyArray<Fill>;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  readonly events: ReadonlyArray<EngineEvent>;
  readonly portfolio: Portfolio;
}

/**
 * Drives one strategy over one instrument's bars. For every bar the pending
 * order (if any) is tried at the open and its outcome delivered, the
 * portfolio is marked at the close, then the strategy sees the bar.
 */
export const simulateStrategy = (input: SimulationInput): SimulationOutput => {
  const { symbol, bars, strategy, broker, logger } = input;
  const portfolio = new Portfolio(input.initialCash);
  const history = new PriceHistory();
  const fills: Fill[] = [];
  const equityCurve: EquityPoint[] = [];
  const events: EngineEvent[] = [];

  let barIndex = -1;
  const pending: { order: WorkingOrder | null } = { order: null };
  let numOrders = 0;
  let numRefused = 0;

  const context: StrategyContext = {
    symbol,
    logger: input.strategyLogger,
    currentBarIndex: () => barIndex,
  };

  const emit = (event: EngineEvent): void => {
    events.push(event);
    input.onEvent?.(symbol, event);
  };

  const deliver = (event: OrderStatusEvent): void => {
    emit({ kind: "status", barIndex, event });
    strategy.onOrderUpdate(context, event);
  };

  const settle = (order: WorkingOrder, execution: Execution, bar: Bar): void => {
    const base = {
      orderId: order.request.id,
      side: order.request.side,
      barIndex,
      timestamp: bar.timestamp,
    };
    if (execution.kind === "filled") {
      const fill: Fill = {
        orderId: order.request.id,
        symbol,
        side: order.request.side,
        quantity: execution.fill.quantity,
        price: execution.fill.price,
        fees: execution.fill.fees,
        timestamp: bar.timestamp,
        barIndex,
      };
      portfolio.applyFill(fill);
      fills.push(fill);
      logger.debug("order filled", { orderId: fill.orderId, side: fill.side, price: fill.price });
      deliver({ ...base, status: "completed", fill: execution.fill });
    } else if (execution.kind === "refused") {
      numRefused += 1;
      logger.debug("order refused", { orderId: order.request.id, status: execution.status });
      deliver({ ...base, status: execution.status, reason: execution.reason });
    }
  };

  const register = (request: OrderRequest, bar: Bar): void => {
    if (pending.order) {
      throw new EngineProtocolError(
        `strategy requested order ${request.id} while order ${pending.order.request.id} is still pending`,
      );
    }
    numOrders += 1;
    pending.order = {
      request,
      quantity: request.side === "buy" ? input.stake : portfolio.quantityOf(symbol),
      submittedBarIndex: barIndex,
    };
    emit({ kind: "order", barIndex, order: request });
    const base = { orderId: request.id, side: request.side, barIndex, timestamp: bar.timestamp };
    deliver({ ...base, status: "submitted" });
    deliver({ ...base, status: "accepted" });
  };

  strategy.onInit(context);
  logger.info(`Starting Portfolio Value: ${portfolio.equity().toFixed(2)}`, { symbol });

  for (const [index, bar] of bars.entries()) {
    barIndex = index;
    history.push(bar);
    emit({ kind: "market", barIndex, bar });

    const order = pending.order;
    if (order) {
      const execution = broker.execute(order, bar, barIndex, {
        cash: portfolio.cash,
        heldQuantity: portfolio.quantityOf(symbol),
      });
      if (execution.kind !== "waiting") {
        pending.order = null;
        settle(order, execution, bar);
      }
    }

    portfolio.markToMarket(symbol, bar.close);

    const request = strategy.onBar(context, history);
    if (request) {
      register(request, bar);
    }

    equityCurve.push({ timestamp: bar.timestamp, equity: portfolio.equity() });
  }

  strategy.onStop(context);
  if (pending.order) {
    logger.debug("order still pending at end of data", { orderId: pending.order.request.id });
  }

  const finalValue = portfolio.equity();
  logger.info(`Final Portfolio Value: ${finalValue.toFixed(2)}`, { symbol });

  const pnl = finalValue - input.initialCash;
  return {
    summary: {
      startingValue: input.initialCash,
      finalValue,
      pnl,
      pnlRatio: pnl / input.initialCash,
      cash: portfolio.cash,
      processedBars: bars.length,
      numOrders,
      numFills: fills.length,
      numRefused,
    },
    fills,
    equityCurve,
    events,
    portfolio,
  };
};

/**
 * Validates the request, loads its bars and runs the named strategy over them.
 */
export async function runBacktest(
  request: BacktestRequest,
  options: RunBacktestOptions = {},
): Promise<BacktestResult> {
  const validated = assertValid(Schemas.BacktestRequest, request, "BacktestRequest");

  const runId = options.runId ?? makeRunId(validated, options.now?.() ?? new Date());
  const logger = (options.logger ?? createLogger("engine")).withContext({ runId });
  const strategyLogger = (options.logger ?? createLogger(`strategy:${validated.strategy.name}`)).withContext({
    runId,
  });

  const strategy = instantiateStrategy(validated.strategy.name, validated.strategy.params);
  const bars = await loadBars(validated, options.dataSource ?? createCsvSource());
  const symbol = validated.data.symbol;

  if (bars.length === 0) {
    throw new Error(
      `No bars loaded for ${symbol}` +
        (validated.data.start || validated.data.end
          ? ` between ${validated.data.start ?? "the first bar"} and ${validated.data.end ?? "the last bar"}`
          : ""),
    );
  }

  logger.info("Backtest starting", {
    symbol,
    strategy: strategy.name,
    bars: bars.length,
    from: bars[0]?.timestamp,
    to: bars[bars.length - 1]?.timestamp,
  });

  const simulation = simulateStrategy({
    symbol,
    bars,
    strategy,
    initialCash: validated.initialCash,
    stake: validated.stake ?? 1,
    broker: new SimulatedBroker({
      commission: validated.commission,
      orderLifetimeBars: validated.orderLifetimeBars,
    }),
    logger,
    strategyLogger,
    onEvent: options.onEvent,
  });

  return {
    runId,
    symbol,
    summary: simulation.summary,
    fills: simulation.fills,
    equityCurve: simulation.equityCurve,
    events: simulation.events,
    portfolio: simulation.portfolio.stats(),
  };
}
