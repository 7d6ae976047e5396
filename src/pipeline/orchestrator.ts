import type { NoticeSource } from '../adapters/common/base';
import type { SourceRunResult } from '../types/notice';
import { logger as rootLogger } from '../utils/logger';
import { runSource, type PipelineDependencies } from './run-source';

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  newNotices: number;
  saved: number;
  failedSources: string[];
}

export interface RunAllResult {
  results: SourceRunResult[];
  summary: RunSummary;
}

export function summarize(results: readonly SourceRunResult[]): RunSummary {
  const failed = results.filter(result => !result.success);
  return {
    total: results.length,
    succeeded: results.length - failed.length,
    failed: failed.length,
    newNotices: results.reduce((sum, result) => sum + result.newNoticesCount, 0),
    saved: results.reduce((sum, result) => sum + result.savedCount, 0),
    failedSources: failed.map(result => result.sourceId),
  };
}

/**
 * Runs sources one at a time. A failing source never stops the ones after it.
 */
export async function runAll(sources: readonly NoticeSource[], deps: PipelineDependencies): Promise<RunAllResult> {
  const logger = deps.logger ?? rootLogger;
  const results: SourceRunResult[] = [];

  logger.info(`Starting run for ${sources.length} sources`);
  for (const source of sources) {
    results.push(await runSource(source, deps));
  }

  const summary = summarize(results);
  logger.info('Run complete', summary);
  return { results, summary };
}
