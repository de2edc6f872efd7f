import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { createLogger, type Logger } from "@downtick/logger";

import type { DailyBar, DailyBarsQuery, Instrument } from "./TushareClient.js";

const DEFAULT_DELAY_MS = 1000;

export const DAILY_CSV_COLUMNS = ["trade_date", "open", "high", "low", "close", "vol", "amount"] as const;

/** The slice of the market-data API the bulk downloader needs. */
export interface MarketDataClient {
  listInstruments(): Promise<Instrument[]>;
  loadDailyBars(tsCode: string, query: DailyBarsQuery): Promise<DailyBar[]>;
}

export interface DownloadOptions extends DailyBarsQuery {
  readonly client: MarketDataClient;
  readonly outDir: string;
  /** Pause between instruments to stay under the API's rate limit. */
  readonly delayMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: Logger;
}

export interface DownloadFailure {
  readonly tsCode: string;
  readonly error: string;
}

export interface DownloadSummary {
  readonly succeeded: ReadonlyArray<string>;
  readonly failed: ReadonlyArray<DownloadFailure>;
}

export const formatDailyCsv = (bars: ReadonlyArray<DailyBar>): string => {
  const lines = [DAILY_CSV_COLUMNS.join(",")];
  for (const bar of bars) {
    lines.push(
      [bar.tradeDate, bar.open, bar.high, bar.low, bar.close, bar.vol, bar.amount].map(String).join(","),
    );
  }
  return `${lines.join("\n")}\n`;
};

const defaultSleep = (ms: number): Promise<void> => {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};

/**
 * Writes one `<ts_code>.csv` per listed instrument. A failing instrument is
 * logged and skipped; listing failures propagate.
 */
export const downloadAll = async (options: DownloadOptions): Promise<DownloadSummary> => {
  const logger = options.logger ?? createLogger("data:downloader");
  const sleep = options.sleep ?? defaultSleep;
  const delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
  const query: DailyBarsQuery = { start: options.start, end: options.end, adjust: options.adjust };

  await mkdir(options.outDir, { recursive: true });
  const instruments = await options.client.listInstruments();
  logger.info("instruments listed", { count: instruments.length });

  const succeeded: string[] = [];
  const failed: DownloadFailure[] = [];

  for (const [index, instrument] of instruments.entries()) {
    try {
      const bars = await options.client.loadDailyBars(instrument.tsCode, query);
      const path = join(options.outDir, `${instrument.tsCode}.csv`);
      await writeFile(path, formatDailyCsv(bars), { encoding: "utf-8" });
      succeeded.push(instrument.tsCode);
      logger.info("instrument saved", { tsCode: instrument.tsCode, rows: bars.length, path });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      failed.push({ tsCode: instrument.tsCode, error: message });
      logger.error("instrument download failed", { tsCode: instrument.tsCode, error: message });
    }

    if (index < instruments.length - 1 && delayMs > 0) {
      await sleep(delayMs);
    }
  }

  logger.info("download finished", { succeeded: succeeded.length, failed: failed.length });
  return { succeeded, failed };
};
