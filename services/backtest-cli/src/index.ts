import { config as loadEnv } from "dotenv";
import { join } from "node:path";

import { REPO_ROOT, loadBacktestCliConfig } from "./config.js";

loadEnv({ path: join(REPO_ROOT, ".env") });
loadEnv();

import { runBacktest } from "@downtick/engine";
import { createLogger } from "@downtick/logger";

import { runBacktestCli } from "./run.js";

const logger = createLogger("services/backtest-cli");

const main = async (): Promise<void> => {
  const config = loadBacktestCliConfig();
  await runBacktestCli(config, { runBacktest, logger });
};

void main().catch((error) => {
  logger.error("Backtest failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
