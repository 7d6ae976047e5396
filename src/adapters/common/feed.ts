import Parser from 'rss-parser';
import type { FetchedPage } from '../../fetcher/types';
import type { Notice, SourceDefinition } from '../../types/notice';
import { BaseSourceAdapter, type ExtractContext } from './base';
import { resolvePublished } from './date';
import { resolveLink } from './link';
import { normalizeTitle } from './title';

type FeedItem = Parser.Item;

/**
 * RSS board: parses the fetched body. Every entry counts towards `totalFound`;
 * only the first `maxExtracted` become notices.
 */
export class FeedSourceAdapter extends BaseSourceAdapter<FeedItem> {
  private readonly parser = new Parser();

  constructor(
    definition: SourceDefinition,
    protected readonly maxExtracted = 20
  ) {
    super(definition);
  }

  async selectCandidates(page: FetchedPage): Promise<FeedItem[]> {
    const feed = await this.parser.parseString(page.body);
    return feed.items ?? [];
  }

  extract(item: FeedItem, context: ExtractContext): Notice | null {
    return this.notice({
      title: normalizeTitle(item.title),
      link: resolveLink(item.link, context.page.url),
      published: resolvePublished(item.pubDate ?? item.isoDate, context.now),
    });
  }
}
