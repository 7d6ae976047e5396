/**
 * Supabase-backed persistence for notices and the source catalog
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { EnvironmentConfig } from '../config/environment';
import type { KnownNotice, Notice } from '../types/notice';
import { PersistenceError } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { daysAgo, toSeoulIso } from '../utils/time';
import type { CatalogStore, CategoryRow, PersistenceGateway, SourceRow } from './types';

export interface SupabaseTables {
  notices: string;
  sources: string;
  categories: string;
}

const knownNoticeRows = z.array(z.object({ title: z.string(), link: z.string() }));

interface NoticeRow {
  source_id: string;
  title: string;
  link: string;
  published: string;
  created_at: string;
}

export class SupabasePersistenceGateway implements PersistenceGateway, CatalogStore {
  private readonly logger: Logger;

  constructor(
    private readonly client: SupabaseClient,
    private readonly tables: SupabaseTables,
    private readonly clock: () => Date = () => new Date(),
    logger?: Logger
  ) {
    this.logger = logger ?? rootLogger.child('[supabase]');
  }

  static fromConfig(config: EnvironmentConfig): SupabasePersistenceGateway {
    const client = createClient(config.supabase.url, config.supabase.key, {
      auth: { persistSession: false },
    });
    return new SupabasePersistenceGateway(client, {
      notices: config.supabase.noticesTable,
      sources: config.supabase.sourcesTable,
      categories: config.supabase.categoriesTable,
    });
  }

  async getRecent(sourceId: string, lookbackDays: number): Promise<KnownNotice[]> {
    const since = daysAgo(this.clock(), lookbackDays);
    const { data, error } = await this.client
      .from(this.tables.notices)
      .select('title, link')
      .eq('source_id', sourceId)
      .gte('published', toSeoulIso(since));

    if (error) {
      throw new PersistenceError(`Failed to read recent notices for ${sourceId}: ${error.message}`, 'getRecent', error);
    }

    const rows = knownNoticeRows.safeParse(data ?? []);
    if (!rows.success) {
      throw new PersistenceError(`Unexpected notice rows for ${sourceId}`, 'getRecent', rows.error);
    }
    return rows.data;
  }

  async saveMany(sourceId: string, notices: readonly Notice[]): Promise<number> {
    if (notices.length === 0) {
      return 0;
    }

    const createdAt = toSeoulIso(this.clock());
    const rows: NoticeRow[] = notices.map(notice => ({
      source_id: sourceId,
      title: notice.title,
      link: notice.link,
      published: toSeoulIso(notice.published),
      created_at: createdAt,
    }));

    const { error } = await this.client.from(this.tables.notices).insert(rows);
    if (error) {
      throw new PersistenceError(`Failed to save ${rows.length} notices for ${sourceId}: ${error.message}`, 'saveMany', error);
    }

    this.logger.info(`Saved ${rows.length} notices for ${sourceId}`);
    return rows.length;
  }

  async countNotices(sourceId: string): Promise<number> {
    const { count, error } = await this.client
      .from(this.tables.notices)
      .select('link', { count: 'exact', head: true })
      .eq('source_id', sourceId);

    if (error) {
      throw new PersistenceError(`Failed to count notices for ${sourceId}: ${error.message}`, 'countNotices', error);
    }
    return count ?? 0;
  }

  async upsertCategories(rows: readonly CategoryRow[]): Promise<void> {
    const { error } = await this.client.from(this.tables.categories).upsert([...rows], { onConflict: 'name' });
    if (error) {
      throw new PersistenceError(`Failed to upsert categories: ${error.message}`, 'upsertCategories', error);
    }
  }

  async upsertSources(rows: readonly SourceRow[]): Promise<void> {
    const { error } = await this.client.from(this.tables.sources).upsert([...rows], { onConflict: 'id' });
    if (error) {
      throw new PersistenceError(`Failed to upsert sources: ${error.message}`, 'upsertSources', error);
    }
  }
}
