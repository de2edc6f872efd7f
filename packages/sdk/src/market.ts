import { z } from "zod";

/** ISO-8601 date string (UTC). */
export type ISODate = string;

/**
 * One OHLCV sample for a fixed interval of one instrument.
 */
export interface Bar {
  readonly timestamp: ISODate;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/** Runtime validator for {@link Bar}. */
export const BarSchema = z.object({
  timestamp: z.string().min(1),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().finite().nonnegative(),
});
