import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Notice } from '../types/notice';
import { seoulDateTime, seoulParts } from '../utils/time';
import { HtmlSourceAdapter, type ExtractContext } from './common/base';
import { resolvePublished } from './common/date';
import { normalizeTitle } from './common/title';

/**
 * "오후 3:05" style stamps are posts from today.
 */
export function parseClockToday(text: string, now: Date): Date | null {
  const match = text.match(/(오전|오후)\s*(\d{1,2}):(\d{2})/);
  if (!match) {
    return null;
  }
  let hour = Number(match[2]) % 12;
  if (match[1] === '오후') {
    hour += 12;
  }
  const today = seoulParts(now);
  return seoulDateTime(today.year, today.month, today.day, hour, Number(match[3]));
}

/**
 * Angular-rendered bulletin table; needs the browser fetcher.
 * Rows have no per-notice URL, so the link is the board URL with the row index as fragment.
 */
export class LibraryAdapter extends HtmlSourceAdapter {
  protected readonly rowSelectors = ['table.ikc-bulletins tbody tr.ng-star-inserted'];

  protected extractRow(row: Cheerio<Element>, context: ExtractContext): Notice | null {
    const index = row.find('.ikc-bulletins-index span').first().text().trim();
    const title = normalizeTitle(row.find('.ikc-bulletins-title span').first().text());
    const dateText = row.find('.ikc-bulletins-properties li span').eq(1).text().trim();

    return this.notice({
      title,
      link: index ? `${this.definition.url}#${index}` : null,
      published: parseClockToday(dateText, context.now) ?? resolvePublished(dateText, context.now),
    });
  }
}

export const libraryGeneral = new LibraryAdapter({
  id: 'library_general',
  name: '성곡도서관 공지사항',
  url: 'https://lib.kookmin.ac.kr/library-guide/notice',
  category: 'library',
  fetchMode: 'browser',
  waitSelector: 'table.ikc-bulletins',
});
