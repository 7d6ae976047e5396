/**
 * Fans out per-source invocations in fixed-size batches.
 *
 * `wait` awaits each batch before starting the next one. `fire-and-forget`
 * queues every batch without waiting; outcomes are only logged, and `idle()`
 * resolves once the background work has settled. Both modes share one
 * concurrency limit.
 */

import pLimit from 'p-limit';
import type { DispatchMode } from '../config/environment';
import type { SourceRunResult } from '../types/notice';
import { toErrorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';

export type Invoke = (sourceId: string) => Promise<SourceRunResult>;

export interface BatchDispatcherOptions {
  batchSize?: number;
  mode?: DispatchMode;
  /** Parallel invocations across all batches; defaults to the batch size */
  concurrency?: number;
  logger?: Logger;
}

export interface DispatchFailure {
  sourceId: string;
  error: string;
}

export interface DispatchReport {
  total: number;
  invoked: string[];
  failed: DispatchFailure[];
  /** Empty in fire-and-forget mode */
  results: SourceRunResult[];
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export class BatchDispatcher {
  private readonly batchSize: number;
  private readonly mode: DispatchMode;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly logger: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly invoke: Invoke,
    options: BatchDispatcherOptions = {}
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? 10);
    this.mode = options.mode ?? 'wait';
    // Shared by every batch so fire-and-forget batches cannot stack up
    this.limit = pLimit(Math.max(1, options.concurrency ?? this.batchSize));
    this.logger = options.logger ?? rootLogger.child('[dispatch]');
  }

  async dispatch(sourceIds: readonly string[]): Promise<DispatchReport> {
    const report: DispatchReport = { total: sourceIds.length, invoked: [], failed: [], results: [] };
    const batches = chunk(sourceIds, this.batchSize);

    for (const [index, batch] of batches.entries()) {
      this.logger.info(`Dispatching batch ${index + 1}/${batches.length} (${batch.length} sources, ${this.mode})`);

      if (this.mode === 'wait') {
        await this.runBatch(batch, report);
      } else {
        this.startBatch(batch, report);
      }
    }

    return report;
  }

  /** Resolves when every fire-and-forget invocation has settled */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async runBatch(batch: readonly string[], report: DispatchReport): Promise<void> {
    const outcomes = await Promise.allSettled(batch.map(sourceId => this.limit(() => this.invoke(sourceId))));

    outcomes.forEach((outcome, i) => {
      const sourceId = batch[i];
      if (outcome.status === 'fulfilled') {
        report.invoked.push(sourceId);
        report.results.push(outcome.value);
      } else {
        const error = toErrorMessage(outcome.reason);
        this.logger.error(`Invocation failed for ${sourceId}`, error);
        report.failed.push({ sourceId, error });
      }
    });
  }

  private startBatch(batch: readonly string[], report: DispatchReport): void {
    for (const sourceId of batch) {
      report.invoked.push(sourceId);

      const tracked: Promise<void> = this.limit(() => this.invoke(sourceId))
        .then(result => {
          if (!result.success) {
            this.logger.warn(`${sourceId} finished with error: ${result.error ?? 'unknown'}`);
          }
        })
        .catch((error: unknown) => {
          this.logger.error(`Background invocation failed for ${sourceId}`, toErrorMessage(error));
        })
        .finally(() => {
          this.pending.delete(tracked);
        });
      this.pending.add(tracked);
    }
  }
}
