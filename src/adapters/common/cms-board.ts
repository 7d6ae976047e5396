import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Notice, SourceDefinition } from '../../types/notice';
import { HtmlSourceAdapter, type ExtractContext } from './base';
import { resolvePublished } from './date';
import { articleLink, resolveLink } from './link';
import { normalizeTitle, titleFor } from './title';

type Row = Cheerio<Element>;

/**
 * Board markup shared by the university CMS sites: `table.board-table`,
 * `.b-title-box a`, `.b-date`, `.b-num-box.num-notice` and `tr.b-top-box`.
 */
export interface CmsBoardLayout {
  rows?: readonly string[];
  title?: string;
  /** Text that holds the date for a row */
  date?: (row: Row) => string;
  pinned?: (row: Row) => boolean;
  /** `articleNo` rebuilds `?mode=view&articleNo=N` links from the href */
  link?: 'href' | 'articleNo';
  skipRow?: (row: Row) => boolean;
}

export const isCmsPinned = (row: Row): boolean =>
  row.hasClass('b-top-box') || row.find('.b-num-box.num-notice').length > 0;

/** Pinned when the number cell reads 공지 instead of a sequence number */
export const numberCellSays =
  (selector: string, marker = '공지') =>
  (row: Row): boolean =>
    row.find(selector).text().includes(marker);

/** First selector with non-empty text wins */
export const dateBySelector =
  (...selectors: string[]) =>
  (row: Row): string => {
    for (const selector of selectors) {
      const text = row.find(selector).first().text().trim();
      if (text) {
        return text;
      }
    }
    return '';
  };

/** Zero-based `td` index; negative counts from the end (-1 is the last cell) */
export const dateByColumn =
  (index: number) =>
  (row: Row): string =>
    row.children('td').eq(index).text().trim();

export class CmsBoardAdapter extends HtmlSourceAdapter {
  protected readonly rowSelectors: readonly string[];
  private readonly layout: Required<Omit<CmsBoardLayout, 'rows' | 'skipRow'>> & Pick<CmsBoardLayout, 'skipRow'>;

  constructor(definition: SourceDefinition, layout: CmsBoardLayout = {}) {
    super(definition);
    this.rowSelectors = layout.rows ?? ['table.board-table tbody tr'];
    this.layout = {
      title: layout.title ?? '.b-title-box a',
      date: layout.date ?? dateBySelector('.b-date'),
      pinned: layout.pinned ?? isCmsPinned,
      link: layout.link ?? 'href',
      skipRow: layout.skipRow,
    };
  }

  protected extractRow(row: Row, context: ExtractContext): Notice | null {
    if (this.layout.skipRow?.(row)) {
      return null;
    }

    const anchor = row.find(this.layout.title).first();
    const title = normalizeTitle(anchor.text(), anchor.attr('title'));
    const href = anchor.attr('href');
    const link =
      this.layout.link === 'articleNo'
        ? articleLink(href, context.page.url) ?? resolveLink(href, context.page.url)
        : resolveLink(href, context.page.url);

    return this.notice({
      title: title ? titleFor(title, this.layout.pinned(row)) : '',
      link,
      published: resolvePublished(this.layout.date(row), context.now),
    });
  }
}
