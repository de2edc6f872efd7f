export {
  EngineProtocolError,
  instantiateStrategy,
  listStrategies,
  runBacktest,
  simulateStrategy,
  type RunBacktestOptions,
  type SimulationInput,
  type SimulationOutput,
} from "./engine.js";
export {
  SimulatedBroker,
  type AccountView,
  type Execution,
  type SimulatedBrokerOptions,
  type WorkingOrder,
} from "./broker.js";
export {
  InsufficientPositionError,
  Portfolio,
  PositionBook,
  type PortfolioStats,
  type PositionStats,
} from "./portfolio.js";
export type { BacktestResult, EngineEvent, EngineEventHook, EquityPoint, Fill } from "./types.js";
