#!/usr/bin/env tsx

/**
 * Upserts categories and source metadata, then lists sources with no notices.
 */

import './env';

import { findEmptySources, syncSourceCatalog } from '../src/config/catalog';
import { loadEnvironmentConfig } from '../src/config/environment';
import { createRuntime } from '../src/runtime';
import { toErrorMessage } from '../src/utils/errors';

async function main(): Promise<void> {
  const runtime = createRuntime(loadEnvironmentConfig());
  const active = runtime.registry.active(runtime.disabledSources);

  const plan = await syncSourceCatalog(runtime.store, active);
  console.log(`✅ ${plan.categories.length} categories, ${plan.sources.length} sources synced`);

  const empty = await findEmptySources(runtime.gateway, active);
  console.log(empty.length > 0 ? `📭 Empty sources: ${empty.join(', ')}` : '📬 Every source has notices');
  process.exit(0);
}

main().catch(error => {
  console.error('💥 Catalog sync failed:', toErrorMessage(error));
  process.exit(1);
});
