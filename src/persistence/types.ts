import type { KnownNotice, Notice } from '../types/notice';

/**
 * Storage seam for the pipeline. Implementations raise PersistenceError.
 */
export interface PersistenceGateway {
  /** Title/link pairs for the source published within the lookback window */
  getRecent(sourceId: string, lookbackDays: number): Promise<KnownNotice[]>;
  /** Returns the number of rows written; an empty list performs no I/O */
  saveMany(sourceId: string, notices: readonly Notice[]): Promise<number>;
  countNotices(sourceId: string): Promise<number>;
}

export interface CategoryRow {
  name: string;
  korean_name: string;
  source_ids: string[];
}

export interface SourceRow {
  id: string;
  name: string;
  url: string;
  category: string;
  fetch_mode: string;
  adapter_name: string;
}

export interface CatalogStore {
  upsertCategories(rows: readonly CategoryRow[]): Promise<void>;
  upsertSources(rows: readonly SourceRow[]): Promise<void>;
}
