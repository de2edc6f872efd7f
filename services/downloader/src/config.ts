import { isAbsolute, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { PRICE_ADJUSTMENTS, type PriceAdjustment } from "@downtick/data";
import { assertValid } from "@downtick/sdk";
import { z } from "zod";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
export const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
export const DEFAULT_DATA_DIR = join(REPO_ROOT, "storage", "datasets", "a-shares");

const COMPACT_DATE = /^\d{8}$/u;

const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);

const EnvSchema = z.object({
  TUSHARE_TOKEN: z
    .string({ required_error: "TUSHARE_TOKEN is required" })
    .trim()
    .min(1, "TUSHARE_TOKEN is required"),
  DOWNTICK_DATA_DIR: optional(z.string().min(1).default(DEFAULT_DATA_DIR)),
  DOWNTICK_DOWNLOAD_START: optional(z.string().regex(COMPACT_DATE, "expected YYYYMMDD").default("20000101")),
  DOWNTICK_DOWNLOAD_END: optional(z.string().regex(COMPACT_DATE, "expected YYYYMMDD").default("20230201")),
  DOWNTICK_ADJUST: optional(z.enum(PRICE_ADJUSTMENTS).default("hfq")),
  DOWNTICK_DOWNLOAD_DELAY_MS: optional(z.coerce.number().int().nonnegative().default(1000)),
});

export interface DownloaderConfig {
  readonly token: string;
  readonly outDir: string;
  readonly start: string;
  readonly end: string;
  readonly adjust: PriceAdjustment;
  readonly delayMs: number;
}

export const loadDownloaderConfig = (env: NodeJS.ProcessEnv = process.env): DownloaderConfig => {
  const parsed = assertValid(EnvSchema, env, "environment");

  return {
    token: parsed.TUSHARE_TOKEN,
    outDir: isAbsolute(parsed.DOWNTICK_DATA_DIR) ? parsed.DOWNTICK_DATA_DIR : resolve(parsed.DOWNTICK_DATA_DIR),
    start: parsed.DOWNTICK_DOWNLOAD_START,
    end: parsed.DOWNTICK_DOWNLOAD_END,
    adjust: parsed.DOWNTICK_ADJUST,
    delayMs: parsed.DOWNTICK_DOWNLOAD_DELAY_MS,
  };
};
