import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";

import { BarSchema, type DataRequest } from "@downtick/sdk";
import { z } from "zod";

import type { Bar, IDataSource } from "./IDataSource.js";
import {
  filterBarsForRequest,
  normalizeTimestamp,
  slugify,
  sortBarsChronologically,
} from "./internalUtils.js";

const DEFAULT_DATASETS_DIR = join(process.cwd(), "storage", "datasets");

type BarField = keyof Bar;

const COLUMN_ALIASES: Record<BarField, ReadonlyArray<string>> = {
  timestamp: ["timestamp", "date", "datetime", "time", "trade_date"],
  open: ["open"],
  high: ["high"],
  low: ["low"],
  close: ["close"],
  volume: ["volume", "vol"],
};

const BAR_FIELDS: ReadonlyArray<BarField> = ["timestamp", "open", "high", "low", "close", "volume"];

type ColumnMap = Record<BarField, number>;

const CsvCachePayloadSchema = z.object({
  mtimeMs: z.number(),
  bars: z.array(BarSchema),
});

type CsvCachePayload = z.infer<typeof CsvCachePayloadSchema>;

export class DatasetNotFoundError extends Error {
  public readonly path: string;

  public constructor(path: string) {
    super(`Dataset not found at ${path}`);
    this.name = "DatasetNotFoundError";
    this.path = path;
  }
}

export class CsvFormatError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "CsvFormatError";
  }
}

export interface CsvSourceOptions {
  readonly datasetsDir?: string;
  /** Parsed datasets are cached here as JSON keyed by file mtime. No caching when omitted. */
  readonly cacheDir?: string;
}

/**
 * CSV-backed data source. Columns are located by header name, so exports
 * with extra columns (adjusted close, turnover, instrument code) load as-is.
 */
export class CsvSource implements IDataSource {
  public readonly id = "csv";

  private readonly datasetsDir: string;
  private readonly cacheDir: string | null;

  public constructor(options: CsvSourceOptions = {}) {
    this.datasetsDir = options.datasetsDir ?? DEFAULT_DATASETS_DIR;
    this.cacheDir = options.cacheDir ?? null;
  }

  public async loadBars(request: DataRequest): Promise<ReadonlyArray<Bar>> {
    const datasetPath = this.resolveDatasetPath(request);

    let datasetStat: Awaited<ReturnType<typeof stat>>;
    try {
      datasetStat = await stat(datasetPath);
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new DatasetNotFoundError(datasetPath);
      }
      throw error;
    }

    const cachePath = this.resolveCachePath(datasetPath);
    const cached = cachePath ? await this.readCache(cachePath, datasetStat.mtimeMs) : null;
    if (cached) {
      return filterBarsForRequest(cached, request);
    }

    const content = await readFile(datasetPath, { encoding: "utf-8" });
    const parsed = parseBarsCsv(content);

    if (cachePath) {
      await this.writeCache(cachePath, { mtimeMs: datasetStat.mtimeMs, bars: parsed });
    }

    return filterBarsForRequest(parsed, request);
  }

  public resolveDatasetPath(request: DataRequest): string {
    if (request.path) {
      return isAbsolute(request.path) ? request.path : resolve(request.path);
    }
    return join(this.datasetsDir, `${slugify(request.symbol)}.csv`);
  }

  private resolveCachePath(datasetPath: string): string | null {
    if (!this.cacheDir) {
      return null;
    }
    return join(this.cacheDir, `${slugify(datasetPath)}.json`);
  }

  private async readCache(
    cachePath: string,
    expectedMtimeMs: number,
  ): Promise<ReadonlyArray<Bar> | null> {
    let payload: unknown;
    try {
      payload = JSON.parse(await readFile(cachePath, { encoding: "utf-8" }));
    } catch {
      // absent or unreadable cache is a miss
      return null;
    }
    const parsed = CsvCachePayloadSchema.safeParse(payload);
    if (parsed.success && parsed.data.mtimeMs === expectedMtimeMs) {
      return parsed.data.bars;
    }
    return null;
  }

  private async writeCache(cachePath: string, payload: CsvCachePayload): Promise<void> {
    if (!this.cacheDir) {
      return;
    }
    await mkdir(this.cacheDir, { recursive: true });
    await writeFile(cachePath, JSON.stringify(payload), { encoding: "utf-8" });
  }
}

const isMissingFileError = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
};

const resolveColumns = (headerLine: string): ColumnMap => {
  const names = headerLine.split(",").map((name) => name.trim().toLowerCase());
  const missing: BarField[] = [];
  const columns: Partial<ColumnMap> = {};

  for (const field of BAR_FIELDS) {
    const index = names.findIndex((name) => COLUMN_ALIASES[field].includes(name));
    if (index === -1) {
      missing.push(field);
    } else {
      columns[field] = index;
    }
  }

  const { timestamp, open, high, low, close, volume } = columns;
  if (
    timestamp === undefined ||
    open === undefined ||
    high === undefined ||
    low === undefined ||
    close === undefined ||
    volume === undefined
  ) {
    throw new CsvFormatError(`CSV header is missing column(s): ${missing.join(", ")}`);
  }
  return { timestamp, open, high, low, close, volume };
};

const parseNumber = (cell: string | undefined): number | null => {
  if (cell === undefined || cell.length === 0) {
    return null;
  }
  const value = Number(cell);
  return Number.isFinite(value) ? value : null;
};

const toBar = (row: string, columns: ColumnMap): Bar | null => {
  const cells = row.split(",").map((part) => part.trim());
  const timestamp = normalizeTimestamp(cells[columns.timestamp] ?? "");
  if (!timestamp) {
    return null;
  }

  const open = parseNumber(cells[columns.open]);
  const high = parseNumber(cells[columns.high]);
  const low = parseNumber(cells[columns.low]);
  const close = parseNumber(cells[columns.close]);
  const volume = parseNumber(cells[columns.volume]);
  if (open === null || high === null || low === null || close === null || volume === null) {
    return null;
  }

  return { timestamp, open, high, low, close, volume };
};

/**
 * Parses CSV text into bars sorted oldest first. Rows without a usable date
 * or with non-numeric prices are skipped; duplicated dates keep the last row.
 */
export const parseBarsCsv = (content: string): Bar[] => {
  const lines = content
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const [header, ...rows] = lines;
  if (header === undefined) {
    return [];
  }

  const columns = resolveColumns(header);
  const bars: Bar[] = [];
  for (const row of rows) {
    const bar = toBar(row, columns);
    if (bar) {
      bars.push(bar);
    }
  }
  return sortBarsChronologically(bars);
};

/** Default data source for backtests that name a CSV file. */
export const createCsvSource = (options?: CsvSourceOptions): CsvSource => {
  return new CsvSource(options);
};
