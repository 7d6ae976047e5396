import { z } from 'zod';
import { runSource } from '../pipeline/run-source';
import type { SourceRunResult } from '../types/notice';
import { toErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { toNoticeBody, type HandlerDependencies, type HandlerResponse, type NoticeBody } from './types';

const sourcePayload = z
  .object({
    sourceId: z.string().min(1).optional(),
  })
  .passthrough();

export interface SourceInvocationBody {
  success: boolean;
  source_id: string | null;
  total_found: number;
  new_notices_count: number;
  saved_count: number;
  new_notices: NoticeBody[];
  error?: string;
}

function respond(body: SourceInvocationBody): HandlerResponse {
  return { statusCode: body.success ? 200 : 500, body: JSON.stringify(body) };
}

function failure(sourceId: string | null, error: string): HandlerResponse {
  return respond({
    success: false,
    source_id: sourceId,
    total_found: 0,
    new_notices_count: 0,
    saved_count: 0,
    new_notices: [],
    error,
  });
}

export function toSourceBody(result: SourceRunResult): SourceInvocationBody {
  return {
    success: result.success,
    source_id: result.sourceId,
    total_found: result.totalFound,
    new_notices_count: result.newNoticesCount,
    saved_count: result.savedCount,
    new_notices: result.newNotices.map(toNoticeBody),
    ...(result.error !== undefined ? { error: result.error } : {}),
  };
}

/**
 * Per-source entry point. The source id comes from the caller binding or the
 * payload's `sourceId`. Never throws: every failure is a 500 envelope.
 */
export async function handleSourceInvocation(
  payload: unknown,
  deps: HandlerDependencies,
  boundSourceId?: string
): Promise<HandlerResponse> {
  const parsed = sourcePayload.safeParse(payload ?? {});
  if (!parsed.success) {
    return failure(boundSourceId ?? null, `Invalid payload: ${parsed.error.issues.map(i => i.message).join(', ')}`);
  }

  const sourceId = boundSourceId ?? parsed.data.sourceId;
  if (!sourceId) {
    return failure(null, 'Missing sourceId');
  }

  try {
    const source = deps.registry.get(sourceId);
    const result = await runSource(source, deps);
    return respond(toSourceBody(result));
  } catch (error) {
    logger.error(`Source invocation failed for ${sourceId}`, toErrorMessage(error));
    return failure(sourceId, toErrorMessage(error));
  }
}
