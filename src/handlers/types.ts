import type { SourceRegistry } from '../adapters';
import type { BatchDispatcherOptions } from '../pipeline/batch-dispatcher';
import type { PipelineDependencies } from '../pipeline/run-source';
import type { Notice } from '../types/notice';
import { toSeoulIso } from '../utils/time';

export interface HandlerDependencies extends PipelineDependencies {
  registry: SourceRegistry;
  disabledSources?: readonly string[];
  dispatch?: BatchDispatcherOptions;
}

/** Invocation envelope; `body` is serialized JSON */
export interface HandlerResponse {
  statusCode: number;
  body: string;
}

export interface NoticeBody {
  title: string;
  link: string;
  published: string;
  source_id: string;
}

export function toNoticeBody(notice: Notice): NoticeBody {
  return {
    title: notice.title,
    link: notice.link,
    published: toSeoulIso(notice.published),
    source_id: notice.sourceId,
  };
}
