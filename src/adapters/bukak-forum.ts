import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Notice } from '../types/notice';
import { HtmlSourceAdapter, type ExtractContext } from './common/base';
import { resolvePublished } from './common/date';
import { normalizeTitle } from './common/title';

const WRITE_CALL = /global\.write\(\s*'([^']+)'/;

/**
 * Forum rows open posts through `onclick="global.write('ID', ...)"`.
 * Titles carry the speaker and category: `[category] [speaker] title`.
 */
export class BukakForumAdapter extends HtmlSourceAdapter {
  protected readonly rowSelectors = ['.board_list ul li'];

  protected extractRow(row: Cheerio<Element>, context: ExtractContext): Notice | null {
    const anchor = row.find('a').first();
    let title = normalizeTitle(anchor.find('p.title').first().text());
    if (!title) {
      return null;
    }

    const speaker = normalizeTitle(row.find('p.desc').first().text());
    const category = normalizeTitle(row.find('.ctg_name em').first().text());
    if (speaker) title = `[${speaker}] ${title}`;
    if (category) title = `[${category}] ${title}`;

    const dateText = row.find('.board_etc span').first().text();
    const dataSeq = anchor.attr('onclick')?.match(WRITE_CALL)?.[1];
    const link = dataSeq
      ? new URL(`view.do?dataSeq=${encodeURIComponent(dataSeq)}`, context.page.url).toString()
      : this.definition.url;

    return this.notice({
      title,
      link,
      published: resolvePublished(dateText, context.now),
    });
  }
}

export const bukakPoliticalForum = new BukakForumAdapter({
  id: 'university_bukakpoliticalforum',
  name: '북악정치포럼',
  url: 'https://www.kookmin.ac.kr/user/kmuNews/specBbs/bugAgForum/index.do',
  category: 'university',
  fetchMode: 'http',
});
