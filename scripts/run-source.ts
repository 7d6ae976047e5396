#!/usr/bin/env tsx

/**
 * Runs a single source and prints the handler response.
 * Usage: tsx scripts/run-source.ts <source_id>
 *        tsx scripts/run-source.ts --list
 */

import './env';

import { sourceRegistry } from '../src/adapters';
import { loadEnvironmentConfig } from '../src/config/environment';
import { handleSourceInvocation } from '../src/handlers';
import { createRuntime } from '../src/runtime';
import { toErrorMessage } from '../src/utils/errors';

async function main(): Promise<void> {
  const [sourceId] = process.argv.slice(2);

  if (!sourceId || sourceId === '--list') {
    for (const { definition } of sourceRegistry.all()) {
      console.log(`${definition.id.padEnd(48)} ${definition.fetchMode.padEnd(8)} ${definition.name}`);
    }
    process.exit(sourceId ? 0 : 1);
  }

  const runtime = createRuntime(loadEnvironmentConfig());
  const response = await handleSourceInvocation({ sourceId }, runtime);
  console.log(JSON.stringify(JSON.parse(response.body), null, 2));
  process.exit(response.statusCode === 200 ? 0 : 1);
}

main().catch(error => {
  console.error('💥 Source run failed:', toErrorMessage(error));
  process.exit(1);
});
