/**
 * Wires configuration into the concrete fetcher, gateway and notifier.
 */

import { SourceRegistry, sourceRegistry } from './adapters';
import type { EnvironmentConfig } from './config/environment';
import { BrowserPageFetcher } from './fetcher/browser';
import { HttpPageFetcher } from './fetcher/http';
import { StrategyPageFetcher } from './fetcher/strategy';
import { createNotificationSink } from './notifications';
import { SupabasePersistenceGateway } from './persistence/supabase';
import type { BatchDispatcherOptions } from './pipeline/batch-dispatcher';
import type { PipelineDependencies } from './pipeline/run-source';
import { logger } from './utils/logger';

export interface RuntimeDependencies extends PipelineDependencies {
  registry: SourceRegistry;
  disabledSources: readonly string[];
  dispatch: BatchDispatcherOptions;
}

export interface Runtime extends RuntimeDependencies {
  store: SupabasePersistenceGateway;
  config: EnvironmentConfig;
}

export function createRuntime(config: EnvironmentConfig, registry: SourceRegistry = sourceRegistry): Runtime {
  logger.setLevel(config.logging.level);

  const fetcher = new StrategyPageFetcher(
    new HttpPageFetcher({
      timeoutMs: config.fetch.timeoutMs,
      maxBytes: config.fetch.maxBytes,
      retries: config.fetch.retries,
    }),
    new BrowserPageFetcher({
      navigationTimeoutMs: config.fetch.timeoutMs,
      waitTimeoutMs: config.fetch.browserWaitMs,
      settleMs: config.fetch.browserSettleMs,
      executablePath: config.fetch.browserExecutablePath,
    })
  );
  const store = SupabasePersistenceGateway.fromConfig(config);

  return {
    config,
    registry,
    fetcher,
    store,
    gateway: store,
    notifier: createNotificationSink(config),
    settings: {
      recencyWindowDays: config.pipeline.recencyWindowDays,
      windowOverrides: config.pipeline.windowOverrides,
      snapshotLookbackDays: config.pipeline.snapshotLookbackDays,
    },
    disabledSources: config.pipeline.disabledSources,
    dispatch: {
      batchSize: config.dispatch.batchSize,
      mode: config.dispatch.mode,
    },
    logger,
  };
}
