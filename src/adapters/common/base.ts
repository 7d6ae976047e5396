import type { Cheerio } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import type { FetchedPage, PageFetcher } from '../../fetcher/types';
import { createNotice, type Notice, type SourceDefinition } from '../../types/notice';
import { toErrorMessage } from '../../utils/errors';
import type { Logger } from '../../utils/logger';

export interface CollectContext {
  now: Date;
  /** Used for secondary lookups such as detail pages */
  fetcher: PageFetcher;
  logger: Logger;
}

export interface ExtractContext extends CollectContext {
  page: FetchedPage;
}

export interface CollectResult {
  /** Candidates seen on the page, including ones that failed or were past the extraction cap */
  totalFound: number;
  notices: Notice[];
}

/** What the registry and orchestrator see of a source */
export interface NoticeSource {
  readonly definition: SourceDefinition;
  collect(page: FetchedPage, context: CollectContext): Promise<CollectResult>;
}

export interface SourceAdapter<TCandidate> extends NoticeSource {
  selectCandidates(page: FetchedPage): TCandidate[] | Promise<TCandidate[]>;
  /** Null when a required field (title or link) is missing */
  extract(candidate: TCandidate, context: ExtractContext): Notice | null | Promise<Notice | null>;
}

export abstract class BaseSourceAdapter<TCandidate> implements SourceAdapter<TCandidate> {
  constructor(readonly definition: SourceDefinition) {}

  abstract selectCandidates(page: FetchedPage): TCandidate[] | Promise<TCandidate[]>;

  abstract extract(candidate: TCandidate, context: ExtractContext): Notice | null | Promise<Notice | null>;

  /** Only the first `maxExtracted` candidates are extracted; all are counted */
  protected readonly maxExtracted?: number;

  async collect(page: FetchedPage, context: CollectContext): Promise<CollectResult> {
    const candidates = await this.selectCandidates(page);
    const extractContext: ExtractContext = { ...context, page };
    const notices: Notice[] = [];
    const extracted = candidates.slice(0, this.maxExtracted ?? candidates.length);

    // Document order; detail lookups run one at a time
    for (const [index, candidate] of extracted.entries()) {
      try {
        const notice = await this.extract(candidate, extractContext);
        if (notice) {
          notices.push(notice);
        } else {
          context.logger.debug(`Skipped element ${index + 1}: missing title or link`);
        }
      } catch (error) {
        context.logger.warn(`Failed to extract element ${index + 1}: ${toErrorMessage(error)}`);
      }
    }

    context.logger.info(`Parsed ${notices.length}/${candidates.length} notices from ${page.url}`);
    return { totalFound: candidates.length, notices };
  }

  protected notice(fields: { title: string; link: string | null; published: Date }): Notice | null {
    if (!fields.title || !fields.link) {
      return null;
    }
    return createNotice({
      title: fields.title,
      link: fields.link,
      published: fields.published,
      sourceId: this.definition.id,
    });
  }
}

/**
 * Adapter over listing rows. Candidates are the concatenated matches of
 * `rowSelectors`, so pinned rows can be listed ahead of regular ones.
 */
export abstract class HtmlSourceAdapter extends BaseSourceAdapter<Element> {
  protected abstract readonly rowSelectors: readonly string[];

  selectCandidates(page: FetchedPage): Element[] {
    return this.rowSelectors.flatMap(selector => page.$(selector).toArray().filter(isTag));
  }

  extract(candidate: Element, context: ExtractContext): Notice | null | Promise<Notice | null> {
    return this.extractRow(context.page.$(candidate), context);
  }

  protected abstract extractRow(
    row: Cheerio<Element>,
    context: ExtractContext
  ): Notice | null | Promise<Notice | null>;
}
