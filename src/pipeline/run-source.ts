/**
 * Per-source pipeline: fetch, collect, recency filter, diff against the
 * stored snapshot, save. Never throws; failures become results plus an alert.
 */

import type { NoticeSource } from '../adapters/common/base';
import type { PageFetcher } from '../fetcher/types';
import { formatFailureAlert } from '../notifications/alert';
import type { NotificationSink } from '../notifications/types';
import type { PersistenceGateway } from '../persistence/types';
import type { SourceRunResult } from '../types/notice';
import { toErrorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { buildSnapshot, diffNotices } from './dedup';
import { isRecent, windowFor, type RecencySettings } from './recency';

export interface PipelineSettings extends RecencySettings {
  snapshotLookbackDays: number;
}

export interface PipelineDependencies {
  fetcher: PageFetcher;
  gateway: PersistenceGateway;
  notifier: NotificationSink;
  settings: PipelineSettings;
  clock?: () => Date;
  logger?: Logger;
}

export async function runSource(source: NoticeSource, deps: PipelineDependencies): Promise<SourceRunResult> {
  const { definition } = source;
  const clock = deps.clock ?? (() => new Date());
  const logger = (deps.logger ?? rootLogger).child(`[${definition.id}]`);

  try {
    logger.info(`Fetching ${definition.url}`);
    const page = await deps.fetcher.fetch(definition.url, {
      fetchMode: definition.fetchMode,
      waitSelector: definition.waitSelector,
    });

    const { totalFound, notices } = await source.collect(page, {
      now: clock(),
      fetcher: deps.fetcher,
      logger,
    });

    const windowDays = windowFor(definition, deps.settings);
    const now = clock();
    const recent = notices.filter(notice => isRecent(notice, windowDays, now));

    const known = await deps.gateway.getRecent(definition.id, deps.settings.snapshotLookbackDays);
    const snapshot = buildSnapshot(known);
    const newNotices = diffNotices(recent, snapshot.links, snapshot.titles);
    const savedCount = await deps.gateway.saveMany(definition.id, newNotices);

    logger.info(
      `Found ${totalFound}, recent ${recent.length} (window ${windowDays}d), new ${newNotices.length}, saved ${savedCount}`
    );

    return {
      sourceId: definition.id,
      success: true,
      totalFound,
      newNoticesCount: newNotices.length,
      savedCount,
      newNotices,
    };
  } catch (error) {
    const message = toErrorMessage(error);
    logger.error('Source run failed', message);

    const delivered = await deps.notifier
      .notify(formatFailureAlert(definition.id, message, clock()), definition.id)
      .catch((notifyError: unknown) => {
        logger.error('Notifier threw', toErrorMessage(notifyError));
        return false;
      });
    if (!delivered) {
      logger.warn('Failure alert was not delivered');
    }

    return {
      sourceId: definition.id,
      success: false,
      totalFound: 0,
      newNoticesCount: 0,
      savedCount: 0,
      newNotices: [],
      error: message,
    };
  }
}
