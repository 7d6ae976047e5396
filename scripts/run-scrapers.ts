#!/usr/bin/env tsx

/**
 * Runs every active source once, or on a fixed interval with --watch.
 *
 *   tsx scripts/run-scrapers.ts            one sequential pass
 *   tsx scripts/run-scrapers.ts --dispatch one pass through the batch dispatcher
 *   tsx scripts/run-scrapers.ts --watch    loop (10 min in production, 2 min otherwise)
 */

import './env';

import { setTimeout as sleep } from 'timers/promises';
import { findEmptySources } from '../src/config/catalog';
import { loadEnvironmentConfig } from '../src/config/environment';
import { createDispatcher, handleMasterInvocation } from '../src/handlers';
import { runAll } from '../src/pipeline/orchestrator';
import { intervalMinutes, shouldRunCycle } from '../src/pipeline/schedule';
import { createRuntime, type Runtime } from '../src/runtime';
import { toErrorMessage } from '../src/utils/errors';
import { logger } from '../src/utils/logger';
import { formatSeoulTimestamp } from '../src/utils/time';

async function runCycle(runtime: Runtime, useDispatcher: boolean): Promise<boolean> {
  if (useDispatcher) {
    const dispatcher = createDispatcher(runtime);
    const response = await handleMasterInvocation(runtime, dispatcher);
    await dispatcher.idle();
    console.log(`Dispatch finished (${response.statusCode}): ${response.body}`);
    return response.statusCode === 200;
  }

  const { summary } = await runAll(runtime.registry.active(runtime.disabledSources), runtime);
  console.log('═'.repeat(60));
  console.log(`📊 ${formatSeoulTimestamp(new Date())} KST`);
  console.log(`   • Sources: ${summary.total} (${summary.succeeded} ok, ${summary.failed} failed)`);
  console.log(`   • New notices: ${summary.newNotices}`);
  console.log(`   • Saved: ${summary.saved}`);
  if (summary.failedSources.length > 0) {
    console.log(`   • Failed: ${summary.failedSources.join(', ')}`);
  }
  return summary.failed === 0;
}

async function watch(runtime: Runtime, useDispatcher: boolean): Promise<void> {
  const minutes = intervalMinutes(runtime.config.isProd);
  const stop = new AbortController();
  process.once('SIGINT', () => stop.abort());
  process.once('SIGTERM', () => stop.abort());

  const empty = await findEmptySources(runtime.gateway, runtime.registry.active(runtime.disabledSources));
  if (empty.length > 0) {
    logger.warn(`Sources with no stored notices: ${empty.join(', ')}`);
  }

  logger.info(`Watching every ${minutes} minutes (production: ${runtime.config.isProd})`);
  while (!stop.signal.aborted) {
    if (shouldRunCycle(new Date(), runtime.config.isProd)) {
      await runCycle(runtime, useDispatcher);
    } else {
      logger.info('Outside working hours, skipping cycle');
    }

    try {
      await sleep(minutes * 60_000, undefined, { signal: stop.signal });
    } catch (error) {
      if (!stop.signal.aborted) {
        throw error;
      }
    }
  }
  logger.info('Stopped');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const runtime = createRuntime(loadEnvironmentConfig());
  const useDispatcher = args.includes('--dispatch');

  if (args.includes('--watch')) {
    await watch(runtime, useDispatcher);
    process.exit(0);
  }

  const ok = await runCycle(runtime, useDispatcher);
  process.exit(ok ? 0 : 1);
}

main().catch(error => {
  console.error('💥 Scraper run failed:', toErrorMessage(error));
  process.exit(1);
});
