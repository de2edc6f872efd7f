import { z } from "zod";

import { createHttpClient, HttpStatusError, isSuccessStatus, type HttpClient } from "./httpClient.js";

const DEFAULT_BASE_URL = "http://api.tushare.pro";
const DEFAULT_PAGE_SIZE = 5000;
const DEFAULT_TIMEOUT_MS = 30_000;

const INSTRUMENT_FIELDS = ["ts_code", "symbol", "name", "area", "industry", "list_date"] as const;
const DAILY_FIELDS = ["ts_code", "trade_date", "open", "high", "low", "close", "vol", "amount"] as const;
const ADJ_FACTOR_FIELDS = ["ts_code", "trade_date", "adj_factor"] as const;

const TushareResponseSchema = z.object({
  code: z.number(),
  msg: z.string().nullish(),
  data: z
    .object({
      fields: z.array(z.string()),
      items: z.array(z.array(z.union([z.string(), z.number(), z.null()]))),
    })
    .nullish(),
});

export type TushareCell = string | number | null;
export type TushareRecord = Record<string, TushareCell>;

/** Back-adjusted (`hfq`), forward-adjusted (`qfq`) or raw (`none`) prices. */
export const PRICE_ADJUSTMENTS = ["hfq", "qfq", "none"] as const;

export type PriceAdjustment = (typeof PRICE_ADJUSTMENTS)[number];

export interface Instrument {
  readonly tsCode: string;
  readonly symbol: string;
  readonly name: string;
  readonly area: string | null;
  readonly industry: string | null;
  readonly listDate: string | null;
}

/** Daily row as the API reports it; `tradeDate` is `YYYYMMDD`. */
export interface DailyBar {
  readonly tsCode: string;
  readonly tradeDate: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly vol: number;
  readonly amount: number;
}

export interface DailyBarsQuery {
  /** `YYYYMMDD`, inclusive. */
  readonly start: string;
  /** `YYYYMMDD`, inclusive. */
  readonly end: string;
  readonly adjust: PriceAdjustment;
}

export class TushareApiError extends Error {
  public readonly code: number;
  public readonly apiName: string;

  public constructor(apiName: string, code: number, message: string) {
    super(`Tushare ${apiName} failed with code ${code}: ${message}`);
    this.name = "TushareApiError";
    this.code = code;
    this.apiName = apiName;
  }
}

export interface TushareClientOptions {
  readonly token: string;
  readonly baseUrl?: string;
  readonly httpClient?: HttpClient;
  readonly pageSize?: number;
  readonly timeoutMs?: number;
}

/**
 * Client for the Tushare Pro HTTP API. Every call is a JSON POST naming the
 * endpoint; responses come back as a field list plus rows of cells.
 */
export class TushareClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly httpClient: HttpClient;
  private readonly pageSize: number;
  private readonly timeoutMs: number;

  public constructor(options: TushareClientOptions) {
    if (options.token.trim().length === 0) {
      throw new Error("Tushare token missing. Set TUSHARE_TOKEN environment variable.");
    }
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/u, "");
    this.httpClient = options.httpClient ?? createHttpClient();
    this.pageSize = Math.max(1, options.pageSize ?? DEFAULT_PAGE_SIZE);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  public async query(
    apiName: string,
    params: Record<string, string | number>,
    fields: ReadonlyArray<string>,
  ): Promise<TushareRecord[]> {
    const body = JSON.stringify({
      api_name: apiName,
      token: this.token,
      params,
      fields: fields.join(","),
    });

    const response = await this.httpClient.post(this.baseUrl, body, {
      headers: { "Content-Type": "application/json" },
      timeoutMs: this.timeoutMs,
    });
    if (!isSuccessStatus(response.statusCode)) {
      throw new HttpStatusError(response.statusCode, this.baseUrl, response.body);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TushareApiError(apiName, -1, `response is not JSON (${reason})`);
    }
    const parsed = TushareResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TushareApiError(apiName, -1, "unexpected response shape");
    }
    if (parsed.data.code !== 0) {
      throw new TushareApiError(apiName, parsed.data.code, parsed.data.msg ?? "no message");
    }

    const data = parsed.data.data;
    if (!data) {
      return [];
    }
    return data.items.map((item) => {
      const record: TushareRecord = {};
      data.fields.forEach((field, index) => {
        record[field] = item[index] ?? null;
      });
      return record;
    });
  }

  /** Pages through `apiName` with `limit`/`offset` until a page comes back short. */
  public async queryPaged(
    apiName: string,
    params: Record<string, string | number>,
    fields: ReadonlyArray<string>,
  ): Promise<TushareRecord[]> {
    const records: TushareRecord[] = [];
    for (let offset = 0; ; offset += this.pageSize) {
      const page = await this.query(apiName, { ...params, limit: this.pageSize, offset }, fields);
      records.push(...page);
      if (page.length < this.pageSize) {
        return records;
      }
    }
  }

  /** Instruments currently listed on any exchange. */
  public async listInstruments(): Promise<Instrument[]> {
    const records = await this.query("stock_basic", { exchange: "", list_status: "L" }, INSTRUMENT_FIELDS);
    const instruments: Instrument[] = [];
    for (const record of records) {
      const tsCode = textCell(record, "ts_code");
      if (!tsCode) {
        continue;
      }
      instruments.push({
        tsCode,
        symbol: textCell(record, "symbol") ?? tsCode,
        name: textCell(record, "name") ?? tsCode,
        area: textCell(record, "area"),
        industry: textCell(record, "industry"),
        listDate: textCell(record, "list_date"),
      });
    }
    return instruments;
  }

  /**
   * Daily bars for one instrument in the order the API returns them (newest
   * first). A day with no adjustment factor of its own takes the factor of
   * the closest earlier day, or of the closest later day when none precedes
   * it. Adjusted queries fail with `TushareApiError` when no factors exist.
   */
  public async loadDailyBars(tsCode: string, query: DailyBarsQuery): Promise<DailyBar[]> {
    const params = { ts_code: tsCode, start_date: query.start, end_date: query.end };
    const raw = (await this.queryPaged("daily", params, DAILY_FIELDS))
      .map(toDailyBar)
      .filter((bar): bar is DailyBar => bar !== null);

    if (query.adjust === "none" || raw.length === 0) {
      return raw;
    }

    const factors: AdjustmentFactor[] = [];
    for (const record of await this.queryPaged("adj_factor", params, ADJ_FACTOR_FIELDS)) {
      const date = textCell(record, "trade_date");
      const factor = numberCell(record, "adj_factor");
      if (date && factor !== null) {
        factors.push({ date, factor });
      }
    }
    factors.sort((left, right) => left.date.localeCompare(right.date));
    const latest = factors[factors.length - 1];
    if (!latest) {
      throw new TushareApiError("adj_factor", -1, `no adjustment factors for ${tsCode}`);
    }

    const adjusted: DailyBar[] = [];
    for (const bar of raw) {
      const factor = factorOn(factors, bar.tradeDate);
      const scale = query.adjust === "hfq" ? factor : factor / latest.factor;
      adjusted.push({
        ...bar,
        open: roundPrice(bar.open * scale),
        high: roundPrice(bar.high * scale),
        low: roundPrice(bar.low * scale),
        close: roundPrice(bar.close * scale),
      });
    }
    return adjusted;
  }
}

interface AdjustmentFactor {
  readonly date: string;
  readonly factor: number;
}

// `factors` is sorted by date and not empty
const factorOn = (factors: ReadonlyArray<AdjustmentFactor>, date: string): number => {
  let found = factors[0]?.factor ?? 1;
  for (const entry of factors) {
    if (entry.date > date) {
      break;
    }
    found = entry.factor;
  }
  return found;
};

const roundPrice = (value: number): number => Math.round(value * 100) / 100;

const textCell = (record: TushareRecord, field: string): string | null => {
  const value = record[field];
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).trim();
  return text.length > 0 ? text : null;
};

const numberCell = (record: TushareRecord, field: string): number | null => {
  const value = record[field];
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const toDailyBar = (record: TushareRecord): DailyBar | null => {
  const tsCode = textCell(record, "ts_code");
  const tradeDate = textCell(record, "trade_date");
  const open = numberCell(record, "open");
  const high = numberCell(record, "high");
  const low = numberCell(record, "low");
  const close = numberCell(record, "close");
  if (!tsCode || !tradeDate || open === null || high === null || low === null || close === null) {
    return null;
  }
  return {
    tsCode,
    tradeDate,
    open,
    high,
    low,
    close,
    vol: numberCell(record, "vol") ?? 0,
    amount: numberCell(record, "amount") ?? 0,
  };
};

export const createTushareClient = (options: TushareClientOptions): TushareClient => {
  return new TushareClient(options);
};
