import type { NoticeSource } from '../common/base';
import type { PageFetcher } from '../../fetcher/types';
import { toSeoulIso } from '../../utils/time';
import { pageFrom, silentLogger, StubFetcher } from '../../__tests__/fakes';

// 2024-05-10 12:00 in Seoul
export const NOW = new Date('2024-05-10T03:00:00Z');

export interface CollectedNotice {
  title: string;
  link: string;
  published: string;
}

export async function collect(
  source: NoticeSource,
  body: string,
  fetcher: PageFetcher = new StubFetcher({})
): Promise<{ totalFound: number; notices: CollectedNotice[] }> {
  const { totalFound, notices } = await source.collect(pageFrom(body, source.definition.url), {
    now: NOW,
    fetcher,
    logger: silentLogger,
  });
  return {
    totalFound,
    notices: notices.map(notice => ({
      title: notice.title,
      link: notice.link,
      published: toSeoulIso(notice.published),
    })),
  };
}
