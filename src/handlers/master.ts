import { BatchDispatcher, type DispatchFailure } from '../pipeline/batch-dispatcher';
import { runSource } from '../pipeline/run-source';
import { toErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { HandlerDependencies, HandlerResponse } from './types';

export interface MasterInvocationBody {
  success: boolean;
  total_scrapers: number;
  invoked_successfully: number;
  invocation_failed: number;
  scraper_ids: string[];
  failures?: DispatchFailure[];
  error?: string;
}

export function createDispatcher(deps: HandlerDependencies): BatchDispatcher {
  return new BatchDispatcher(sourceId => runSource(deps.registry.get(sourceId), deps), deps.dispatch);
}

/**
 * Dispatches every active source through the batch dispatcher.
 * Pass a dispatcher to await fire-and-forget work afterwards with `idle()`.
 */
export async function handleMasterInvocation(
  deps: HandlerDependencies,
  dispatcher: BatchDispatcher = createDispatcher(deps)
): Promise<HandlerResponse> {
  try {
    const sourceIds = deps.registry.active(deps.disabledSources).map(source => source.definition.id);
    logger.info(`Master invocation for ${sourceIds.length} sources`);

    const report = await dispatcher.dispatch(sourceIds);
    const body: MasterInvocationBody = {
      success: report.failed.length === 0,
      total_scrapers: report.total,
      invoked_successfully: report.invoked.length,
      invocation_failed: report.failed.length,
      scraper_ids: report.invoked,
      ...(report.failed.length > 0 ? { failures: report.failed } : {}),
    };

    return { statusCode: 200, body: JSON.stringify(body) };
  } catch (error) {
    logger.error('Master invocation failed', toErrorMessage(error));
    const body: MasterInvocationBody = {
      success: false,
      total_scrapers: 0,
      invoked_successfully: 0,
      invocation_failed: 0,
      scraper_ids: [],
      error: toErrorMessage(error),
    };
    return { statusCode: 500, body: JSON.stringify(body) };
  }
}
