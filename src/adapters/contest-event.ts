import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Notice } from '../types/notice';
import { HtmlSourceAdapter, type ExtractContext } from './common/base';
import { parseNoticeDate } from './common/date';
import { lookupDetailDate } from './common/detail-date';
import { resolveLink } from './common/link';
import { normalizeTitle, titleFor } from './common/title';

const DETAIL_DATE_SELECTOR = 'div.view_top div.board_etc span:first-child';

/**
 * Pinned rows hide the date in the listing, so it is read from the detail page.
 */
export class ContestEventAdapter extends HtmlSourceAdapter {
  protected readonly rowSelectors = ['div.board_list > ul > li'];

  protected async extractRow(row: Cheerio<Element>, context: ExtractContext): Promise<Notice | null> {
    const pinned = row.hasClass('notice');
    const anchor = row.find('a').first();
    const heading = pinned ? anchor.find('p.title') : anchor.find('div.board_txt p.title');
    const title = normalizeTitle(heading.first().text());
    const link = resolveLink(anchor.attr('href'), context.page.url);

    if (!title || !link) {
      return null;
    }

    const listed = pinned ? null : parseNoticeDate(row.find('div.board_etc span:first-child').text(), context.now);
    const published = listed ?? (await lookupDetailDate(link, DETAIL_DATE_SELECTOR, context));

    return this.notice({ title: titleFor(title, pinned), link, published });
  }
}

export const universityContestEvent = new ContestEventAdapter({
  id: 'university_contestevent',
  name: '공모행사공지',
  url: 'https://www.kookmin.ac.kr/user/kmuNews/notice/9/index.do',
  category: 'university',
  fetchMode: 'http',
});
