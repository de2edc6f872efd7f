export type { Bar, IDataSource } from "./IDataSource.js";
export {
  CsvFormatError,
  CsvSource,
  DatasetNotFoundError,
  createCsvSource,
  parseBarsCsv,
  type CsvSourceOptions,
} from "./CsvSource.js";
export {
  HttpStatusError,
  createHttpClient,
  isSuccessStatus,
  type HttpClient,
  type HttpRequestOptions,
  type HttpResponse,
} from "./httpClient.js";
export {
  PRICE_ADJUSTMENTS,
  TushareApiError,
  TushareClient,
  createTushareClient,
  type DailyBar,
  type DailyBarsQuery,
  type Instrument,
  type PriceAdjustment,
  type TushareClientOptions,
  type TushareRecord,
} from "./TushareClient.js";
export {
  DAILY_CSV_COLUMNS,
  downloadAll,
  formatDailyCsv,
  type DownloadFailure,
  type DownloadOptions,
  type DownloadSummary,
  type MarketDataClient,
} from "./downloader.js";
export { filterBarsForRequest, normalizeTimestamp, sortBarsChronologically } from "./internalUtils.js";
