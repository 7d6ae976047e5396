import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Notice } from '../types/notice';
import { HtmlSourceAdapter, type ExtractContext } from './common/base';
import { resolvePublished } from './common/date';
import { normalizeTitle, titleFor } from './common/title';

const MENU_URL = 'https://linc.kookmin.ac.kr/main/menu';

/** Board hrefs are relative to the menu endpoint, not to the page */
export function lincLink(href: string | undefined): string | null {
  const value = href?.trim();
  if (!value) {
    return null;
  }
  if (value.startsWith('https://') || value.startsWith('http://')) {
    return value;
  }
  return value.startsWith('/') ? `${MENU_URL}${value.slice(1)}` : `${MENU_URL}${value}`;
}

export class LincAdapter extends HtmlSourceAdapter {
  protected readonly rowSelectors = ['.board_list .content_wrap li'];

  protected extractRow(row: Cheerio<Element>, context: ExtractContext): Notice | null {
    const anchor = row.find('a').first();
    const title = normalizeTitle(anchor.find('.tit0').first().text());
    const pinned = row.find('.icon_notice').length > 0;

    return this.notice({
      title: title ? titleFor(title, pinned) : '',
      link: lincLink(anchor.attr('href')),
      published: resolvePublished(row.find('.date').first().text(), context.now),
    });
  }
}

export const lincAcademic = new LincAdapter({
  id: 'linc_academic',
  name: 'LINC 3.0 사업단 공지사항',
  url: 'https://linc.kookmin.ac.kr/main/menu?gc=605XOAS',
  category: 'university',
  fetchMode: 'http',
});
