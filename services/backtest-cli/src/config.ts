import { isAbsolute, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { assertValid } from "@downtick/sdk";
import { z } from "zod";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
export const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
export const DEFAULT_DATASET = join(REPO_ROOT, "storage", "datasets", "sample_daily.csv");

// unset and blank variables both fall back to the default
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);

const EnvSchema = z.object({
  DOWNTICK_DATASET: optional(z.string().min(1).optional()),
  DOWNTICK_SYMBOL: optional(z.string().min(1).default("ORCL")),
  DOWNTICK_START: optional(z.string().min(1).default("2000-01-01")),
  DOWNTICK_END: optional(z.string().min(1).default("2001-01-01")),
  DOWNTICK_CASH: optional(z.coerce.number().positive().default(100_000)),
  DOWNTICK_COMMISSION: optional(z.coerce.number().nonnegative().default(0)),
  DOWNTICK_STAKE: optional(z.coerce.number().int().min(1).default(1)),
  DOWNTICK_HOLD_BARS: optional(z.coerce.number().int().min(1).default(5)),
});

export interface BacktestCliConfig {
  readonly datasetPath: string;
  readonly symbol: string;
  readonly start: string;
  readonly end: string;
  readonly initialCash: number;
  readonly commission: number;
  readonly stake: number;
  readonly holdBars: number;
}

/**
 * Reads the run settings from the environment. The first positional
 * argument, when present, names the dataset file and is taken relative to
 * the working directory; a relative `DOWNTICK_DATASET` is taken relative to
 * the repository root, where `.env` lives.
 */
export const loadBacktestCliConfig = (
  env: NodeJS.ProcessEnv = process.env,
  argv: ReadonlyArray<string> = process.argv.slice(2),
): BacktestCliConfig => {
  const parsed = assertValid(EnvSchema, env, "environment");
  const fromArgv = argv.find((arg) => !arg.startsWith("-"));
  const fromEnv = parsed.DOWNTICK_DATASET;
  let datasetPath = DEFAULT_DATASET;
  if (fromArgv !== undefined) {
    datasetPath = resolve(fromArgv);
  } else if (fromEnv !== undefined) {
    datasetPath = isAbsolute(fromEnv) ? fromEnv : resolve(REPO_ROOT, fromEnv);
  }

  return {
    datasetPath,
    symbol: parsed.DOWNTICK_SYMBOL,
    start: parsed.DOWNTICK_START,
    end: parsed.DOWNTICK_END,
    initialCash: parsed.DOWNTICK_CASH,
    commission: parsed.DOWNTICK_COMMISSION,
    stake: parsed.DOWNTICK_STAKE,
    holdBars: parsed.DOWNTICK_HOLD_BARS,
  };
};
