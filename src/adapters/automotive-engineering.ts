import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Notice } from '../types/notice';
import { HtmlSourceAdapter, type ExtractContext } from './common/base';
import { resolvePublished } from './common/date';
import { resolveLink } from './common/link';
import { normalizeTitle } from './common/title';

/**
 * Main list plus the "important" aside list; the two use different markup.
 */
export class AutomotiveEngineeringAdapter extends HtmlSourceAdapter {
  protected readonly rowSelectors = [
    'div.list-type01.list-l > ul > li',
    'div.aside-list-area ul li.aside-list',
  ];

  protected extractRow(row: Cheerio<Element>, context: ExtractContext): Notice | null {
    const aside = row.hasClass('aside-list');
    const anchor = row.find('a').first();
    const title = aside ? anchor.find('strong').first() : row.find('strong.list01-tit').first();
    const date = aside ? anchor.find('span').first() : row.find('span.list01-date').first();

    return this.notice({
      title: normalizeTitle(title.text()),
      link: resolveLink(anchor.attr('href'), context.page.url),
      published: resolvePublished(date.text(), context.now),
    });
  }
}

export const automotiveEngineeringAcademic = new AutomotiveEngineeringAdapter({
  id: 'automativeengineering_academic',
  name: '자동차공학과 공지사항',
  url: 'https://auto.kookmin.ac.kr/board/notice/?&pn=0',
  category: 'automotive',
  fetchMode: 'http',
});
