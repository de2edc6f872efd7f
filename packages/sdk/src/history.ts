import type { Bar } from "./market.js";

export class HistoryAccessError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "HistoryAccessError";
  }
}

export class HistoryOrderError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "HistoryOrderError";
  }
}

/**
 * Read-only view of the bars seen so far in a run.
 *
 * Offsets are relative to the latest bar: `0` is the current bar, `-1` the
 * previous one and so on. Look-backs past the start of the run return `null`;
 * looking forward is a programming error and throws.
 */
export interface ReadonlyPriceHistory {
  readonly length: number;
  has(depth: number): boolean;
  bar(offset?: number): Bar | null;
  close(offset?: number): number | null;
  current(): Bar | null;
}

/**
 * Append-only bar series owned by the engine. Timestamps must be strictly
 * increasing.
 */
export class PriceHistory implements ReadonlyPriceHistory {
  private readonly bars: Bar[] = [];

  public get length(): number {
    return this.bars.length;
  }

  public push(bar: Bar): void {
    const last = this.bars[this.bars.length - 1];
    if (last && bar.timestamp <= last.timestamp) {
      throw new HistoryOrderError(
        `bar ${bar.timestamp} does not follow ${last.timestamp}; bars must arrive in increasing timestamp order`,
      );
    }
    this.bars.push(bar);
  }

  public has(depth: number): boolean {
    return this.bars.length >= depth;
  }

  public bar(offset = 0): Bar | null {
    if (!Number.isInteger(offset)) {
      throw new HistoryAccessError(`offset must be an integer, received ${offset}`);
    }
    if (offset > 0) {
      throw new HistoryAccessError(`cannot look ${offset} bar(s) into the future`);
    }
    return this.bars[this.bars.length - 1 + offset] ?? null;
  }

  public close(offset = 0): number | null {
    return this.bar(offset)?.close ?? null;
  }

  public current(): Bar | null {
    return this.bar(0);
  }

  public toArray(): ReadonlyArray<Bar> {
    return [...this.bars];
  }
}
