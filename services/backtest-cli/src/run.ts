import type { BacktestResult, RunBacktestOptions } from "@downtick/engine";
import type { Logger } from "@downtick/logger";
import type { BacktestRequest } from "@downtick/sdk";

import type { BacktestCliConfig } from "./config.js";

export interface BacktestCliDependencies {
  readonly runBacktest: (request: BacktestRequest, options?: RunBacktestOptions) => Promise<BacktestResult>;
  readonly logger: Logger;
}

export const buildBacktestRequest = (config: BacktestCliConfig): BacktestRequest => ({
  runName: `consecutive-decline-${config.symbol}`,
  data: {
    source: "csv",
    symbol: config.symbol,
    path: config.datasetPath,
    start: config.start,
    end: config.end,
  },
  strategy: {
    name: "consecutive_decline",
    params: { holdBars: config.holdBars },
  },
  initialCash: config.initialCash,
  commission: config.commission,
  stake: config.stake,
});

export const runBacktestCli = async (
  config: BacktestCliConfig,
  deps: BacktestCliDependencies,
): Promise<BacktestResult> => {
  const request = buildBacktestRequest(config);
  deps.logger.info("Running backtest", {
    dataset: config.datasetPath,
    symbol: config.symbol,
    start: config.start,
    end: config.end,
  });

  const result = await deps.runBacktest(request);

  deps.logger.info("Backtest finished", { runId: result.runId, ...result.summary });
  return result;
};
