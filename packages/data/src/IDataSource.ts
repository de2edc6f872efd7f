import type { Bar, DataRequest } from "@downtick/sdk";

export type { Bar };

/**
 * Generic contract for loading a single instrument's bar series.
 */
export interface IDataSource {
  readonly id: string;
  loadBars(request: DataRequest): Promise<ReadonlyArray<Bar>>;
}
