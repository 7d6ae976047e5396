import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Notice } from '../types/notice';
import { HtmlSourceAdapter, type ExtractContext } from './common/base';
import { resolvePublished } from './common/date';
import { resolveLink } from './common/link';
import { normalizeTitle } from './common/title';

export class ArchitectureAdapter extends HtmlSourceAdapter {
  protected readonly rowSelectors = ['.board-list-type01 li'];

  protected extractRow(row: Cheerio<Element>, context: ExtractContext): Notice | null {
    // The site's stylesheet spells the class "borad"
    const heading = row.find('.borad-list-tit').first();

    return this.notice({
      title: normalizeTitle(heading.text(), heading.attr('title')),
      link: resolveLink(row.find('a').first().attr('href'), context.page.url),
      published: resolvePublished(row.find('.board-list-date').first().text(), context.now),
    });
  }
}

export const architectureAcademic = new ArchitectureAdapter({
  id: 'architecture_academic',
  name: '건축대학 공지사항',
  url: 'https://archi.kookmin.ac.kr/life/notice/',
  category: 'architecture',
  fetchMode: 'http',
});
