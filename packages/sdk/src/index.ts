// Request/response shapes and runtime validators shared by the engine, data
// loaders and command-line services.

import { z } from "zod";

import { BarSchema, type Bar, type ISODate } from "./market.js";

/** -----------------------------------------------------------------------
 *  DataRequest
 *  -------------------------------------------------------------------- */

/**
 * Request for a single instrument's bar series read from a CSV file.
 * `start` and `end` are inclusive; either may be omitted.
 */
export interface DataRequest {
  /** Only CSV datasets are loaded by the engine. */
  source: "csv";
  /** Instrument symbol (e.g., "ORCL"). Used to locate the dataset when `path` is absent. */
  symbol: string;
  /** Explicit dataset path; overrides the `<datasetsDir>/<symbol>.csv` lookup. */
  path?: string;
  start?: ISODate;
  end?: ISODate;
}

/** Runtime validator for {@link DataRequest}. */
export const DataRequestSchema = z.object({
  source: z.literal("csv"),
  symbol: z.string().min(1),
  path: z.string().min(1).optional(),
  start: z.string().min(1).optional(),
  end: z.string().min(1).optional(),
});

/** -----------------------------------------------------------------------
 *  BacktestRequest
 *  -------------------------------------------------------------------- */

/**
 * Full definition of a single-instrument backtest run.
 * - `bars` supplies the series inline and skips CSV loading.
 * - `strategy.params` stays opaque here; the strategy module validates it.
 */
export interface BacktestRequest {
  /** Human readable name; slugged into the run id. */
  runName: string;
  data: DataRequest;
  strategy: {
    /** Strategy slug (e.g., "consecutive_decline"). */
    name: string;
    params: Record<string, unknown>;
  };
  /** Starting cash for the simulated account. */
  initialCash: number;
  /** Commission as a fraction of traded value (0.001 = 0.1%). Defaults to 0. */
  commission?: number;
  /** Shares bought per entry order. Defaults to 1. */
  stake?: number;
  /** Bars an order may wait for a tradable bar before it is canceled. Unlimited when absent. */
  orderLifetimeBars?: number;
  /** Inline bar series, oldest first. */
  bars?: ReadonlyArray<Bar>;
}

/** Runtime validator for {@link BacktestRequest}. */
export const BacktestRequestSchema = z.object({
  runName: z.string().min(1),
  data: DataRequestSchema,
  strategy: z.object({
    name: z.string().min(1),
    params: z.record(z.unknown()),
  }),
  initialCash: z.number().positive(),
  commission: z.number().nonnegative().optional(),
  stake: z.number().int().min(1).optional(),
  orderLifetimeBars: z.number().int().min(1).optional(),
  bars: z.array(BarSchema).optional(),
});

/** -----------------------------------------------------------------------
 *  BacktestSummary
 *  -------------------------------------------------------------------- */

/** Headline numbers of a finished run. */
export interface BacktestSummary {
  readonly startingValue: number;
  readonly finalValue: number;
  readonly pnl: number;
  /** pnl / startingValue */
  readonly pnlRatio: number;
  readonly cash: number;
  readonly processedBars: number;
  readonly numOrders: number;
  readonly numFills: number;
  /** Orders that ended canceled, margin or rejected. */
  readonly numRefused: number;
}

/** -----------------------------------------------------------------------
 *  Helper: runtime assertion using zod
 *  -------------------------------------------------------------------- */

export class ValidationError extends Error {
  public readonly issues: ReadonlyArray<string>;

  public constructor(label: string, issues: ReadonlyArray<string>) {
    super(`Invalid ${label}: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param label - Descriptive label for error reporting.
 * @returns The parsed payload, with schema defaults applied.
 * @throws ValidationError when validation fails.
 */
export function assertValid<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  label = "payload",
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ValidationError(label, issues);
  }
  return parsed.data;
}

/** Namespaced access to the primary schemas. */
export const Schemas = {
  Bar: BarSchema,
  DataRequest: DataRequestSchema,
  BacktestRequest: BacktestRequestSchema,
};

export { BarSchema, type Bar, type ISODate } from "./market.js";
export * from "./orders.js";
export * from "./history.js";
export * from "./strategies/types.js";
export * as strategies from "./strategies/index.js";
