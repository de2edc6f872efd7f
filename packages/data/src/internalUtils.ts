import type { Bar } from "./IDataSource.js";

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/u;
const PLAIN_DATE = /^\d{4}-\d{2}-\d{2}$/u;

/**
 * Shared helpers used across data sources to enforce consistent behaviour.
 */
export const slugify = (value: string): string => {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/gu, "_")
    .replace(/^_+|_+$/gu, "");
};

/**
 * Converts `YYYYMMDD`, `YYYY-MM-DD` or any ISO-8601 string to a UTC ISO
 * timestamp. Returns null when the value is not a date.
 */
export const normalizeTimestamp = (value: string): string | null => {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const compact = COMPACT_DATE.exec(trimmed);
  let candidate = trimmed;
  if (compact) {
    candidate = `${compact[1]}-${compact[2]}-${compact[3]}T00:00:00.000Z`;
  } else if (PLAIN_DATE.test(trimmed)) {
    candidate = `${trimmed}T00:00:00.000Z`;
  }

  const epoch = Date.parse(candidate);
  if (Number.isNaN(epoch)) {
    return null;
  }
  return new Date(epoch).toISOString();
};

const parseBoundary = (value: string | undefined): number | null => {
  if (!value) {
    return null;
  }
  const normalized = normalizeTimestamp(value);
  return normalized === null ? null : Date.parse(normalized);
};

export interface DateRange {
  readonly start?: string;
  readonly end?: string;
}

/**
 * Keeps bars inside the inclusive `[start, end]` range. Missing or
 * unparseable boundaries leave that side open.
 */
export const filterBarsForRequest = (bars: ReadonlyArray<Bar>, range: DateRange): Bar[] => {
  const startEpoch = parseBoundary(range.start);
  const endEpoch = parseBoundary(range.end);

  return bars.filter((bar) => {
    const barEpoch = Date.parse(bar.timestamp);
    if (Number.isNaN(barEpoch)) {
      return false;
    }
    const afterStart = startEpoch === null ? true : barEpoch >= startEpoch;
    const beforeEnd = endEpoch === null ? true : barEpoch <= endEpoch;
    return afterStart && beforeEnd;
  });
};

/**
 * Sorts bars oldest first, keeping the last occurrence of a repeated timestamp.
 */
export const sortBarsChronologically = (bars: ReadonlyArray<Bar>): Bar[] => {
  const byTimestamp = new Map<string, Bar>();
  for (const bar of bars) {
    byTimestamp.set(bar.timestamp, bar);
  }
  return Array.from(byTimestamp.values()).sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
};
