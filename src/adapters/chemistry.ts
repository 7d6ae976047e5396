import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Notice } from '../types/notice';
import { HtmlSourceAdapter, type ExtractContext } from './common/base';
import { resolvePublished } from './common/date';
import { resolveLink } from './common/link';
import { normalizeTitle } from './common/title';

export class ChemistryAdapter extends HtmlSourceAdapter {
  protected readonly rowSelectors = ['div#ezsBBS table tr'];

  protected extractRow(row: Cheerio<Element>, context: ExtractContext): Notice | null {
    if (row.find('th').length > 0) {
      return null;
    }

    const anchor = row.find('td ul li a.Board').first();
    const cells = row.find('td.txtc.txtN');
    const dateText = cells.length >= 3 ? cells.eq(1).text() : '';

    return this.notice({
      title: normalizeTitle(anchor.text(), anchor.attr('title')),
      link: resolveLink(anchor.attr('href'), context.page.url),
      published: resolvePublished(dateText, context.now),
    });
  }
}

export const chemistryAcademic = new ChemistryAdapter({
  id: 'sciencetechnology_chemistry_academic',
  name: '응용화학부 공지사항',
  url: 'http://chem.kookmin.ac.kr/sub6/menu1.php',
  category: 'science_technology',
  fetchMode: 'http',
});
