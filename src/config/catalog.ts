/**
 * Source catalog: category metadata from categories.json plus the registered
 * sources, synced to the categories/sources tables.
 */

import { z } from 'zod';
import type { NoticeSource } from '../adapters/common/base';
import type { CatalogStore, CategoryRow, PersistenceGateway, SourceRow } from '../persistence/types';
import { toErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import categoriesJson from './categories.json';

const categorySchema = z.object({
  name: z.string().min(1),
  koreanName: z.string().min(1),
  sourceIds: z.array(z.string().min(1)),
});

export type Category = z.infer<typeof categorySchema>;

export function loadCategories(raw: unknown = categoriesJson): Category[] {
  return z.array(categorySchema).parse(raw);
}

export interface CatalogPlan {
  categories: CategoryRow[];
  sources: SourceRow[];
  /** Active sources no category lists */
  uncategorized: string[];
  /** Ids listed in categories.json that no adapter registers */
  unknown: string[];
}

export function buildCatalog(sources: readonly NoticeSource[], categories: readonly Category[]): CatalogPlan {
  const registered = new Set(sources.map(source => source.definition.id));
  const listed = new Set(categories.flatMap(category => category.sourceIds));

  return {
    categories: categories.map(category => ({
      name: category.name,
      korean_name: category.koreanName,
      source_ids: category.sourceIds.filter(id => registered.has(id)),
    })),
    sources: sources.map(({ definition, constructor }) => ({
      id: definition.id,
      name: definition.name,
      url: definition.url,
      category: definition.category,
      fetch_mode: definition.fetchMode,
      adapter_name: constructor.name,
    })),
    uncategorized: [...registered].filter(id => !listed.has(id)),
    unknown: [...listed].filter(id => !registered.has(id)),
  };
}

export async function syncSourceCatalog(
  store: CatalogStore,
  sources: readonly NoticeSource[],
  categories: readonly Category[] = loadCategories()
): Promise<CatalogPlan> {
  const plan = buildCatalog(sources, categories);

  await store.upsertCategories(plan.categories);
  await store.upsertSources(plan.sources);
  logger.info(`Synced ${plan.categories.length} categories and ${plan.sources.length} sources`);

  if (plan.uncategorized.length > 0) {
    logger.warn(`Sources without a category: ${plan.uncategorized.join(', ')}`);
  }
  if (plan.unknown.length > 0) {
    logger.warn(`Categories reference unknown sources: ${plan.unknown.join(', ')}`);
  }
  return plan;
}

/**
 * Active sources with no stored notices yet, typically boards added since the
 * last deployment. Count failures are logged and the source is skipped.
 */
export async function findEmptySources(
  gateway: PersistenceGateway,
  sources: readonly NoticeSource[]
): Promise<string[]> {
  const empty: string[] = [];
  for (const { definition } of sources) {
    try {
      if ((await gateway.countNotices(definition.id)) === 0) {
        empty.push(definition.id);
      }
    } catch (error) {
      logger.warn(`Could not count notices for ${definition.id}: ${toErrorMessage(error)}`);
    }
  }
  return empty;
}
