import { config as loadEnv } from "dotenv";
import { join } from "node:path";

import { REPO_ROOT, loadDownloaderConfig } from "./config.js";

loadEnv({ path: join(REPO_ROOT, ".env") });
loadEnv();

import { createTushareClient, downloadAll } from "@downtick/data";
import { createLogger } from "@downtick/logger";

const logger = createLogger("services/downloader");

const main = async (): Promise<void> => {
  const config = loadDownloaderConfig();
  logger.info("Downloading daily bars", {
    outDir: config.outDir,
    start: config.start,
    end: config.end,
    adjust: config.adjust,
  });

  const summary = await downloadAll({
    client: createTushareClient({ token: config.token }),
    outDir: config.outDir,
    start: config.start,
    end: config.end,
    adjust: config.adjust,
    delayMs: config.delayMs,
    logger,
  });

  if (summary.failed.length > 0) {
    logger.warn("Some instruments were not downloaded", {
      failed: summary.failed.map((failure) => failure.tsCode),
    });
  }
};

void main().catch((error) => {
  logger.error("Download failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
