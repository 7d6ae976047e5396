import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Notice, SourceDefinition } from '../types/notice';
import { HtmlSourceAdapter, type ExtractContext } from './common/base';
import { resolvePublished } from './common/date';
import { resolveLink } from './common/link';
import { normalizeTitle, titleFor } from './common/title';

type Row = Cheerio<Element>;

interface ListBoardLayout {
  rows: readonly string[];
  pinned: (row: Row) => boolean;
  title?: string;
  date?: string;
}

/**
 * `div.list-tbody` boards (department sites built on the same template):
 * each row is an element with `.subject a` and `.date` children.
 */
export class ListBoardAdapter extends HtmlSourceAdapter {
  protected readonly rowSelectors: readonly string[];
  private readonly pinned: (row: Row) => boolean;
  private readonly titleSelector: string;
  private readonly dateSelector: string;

  constructor(definition: SourceDefinition, layout: ListBoardLayout) {
    super(definition);
    this.rowSelectors = layout.rows;
    this.pinned = layout.pinned;
    this.titleSelector = layout.title ?? '.subject a';
    this.dateSelector = layout.date ?? '.date';
  }

  protected extractRow(row: Row, context: ExtractContext): Notice | null {
    const anchor = row.find(this.titleSelector).first();
    const title = normalizeTitle(anchor.text(), anchor.attr('title'));

    return this.notice({
      title: title ? titleFor(title, this.pinned(row)) : '',
      link: resolveLink(anchor.attr('href'), context.page.url),
      published: resolvePublished(row.find(this.dateSelector).first().text(), context.now),
    });
  }
}

const hasNoticeBackground = (row: Row): boolean => row.hasClass('notice-bg');
const hasNoticeCell = (selector: string) => (row: Row): boolean => row.find(selector).length > 0;

export const universityAcademic = new ListBoardAdapter(
  {
    id: 'university_academic',
    name: '학사공지',
    url: 'https://cs.kookmin.ac.kr/news/kookmin/academic/',
    category: 'university',
    fetchMode: 'http',
  },
  { rows: ['.list-tbody .normal-bg, .list-tbody .notice-bg'], pinned: hasNoticeBackground }
);

export const universitySpecialLecture = new ListBoardAdapter(
  {
    id: 'university_speciallecture',
    name: '특강공지',
    url: 'https://cs.kookmin.ac.kr/news/kookmin/special_lecture/',
    category: 'university',
    fetchMode: 'http',
  },
  { rows: ['.list-tbody .normal-bg, .list-tbody .notice-bg'], pinned: hasNoticeBackground }
);

export const universityScholarship = new ListBoardAdapter(
  {
    id: 'university_scholarship',
    name: '장학공지',
    url: 'https://cs.kookmin.ac.kr/news/kookmin/scholarship/',
    category: 'university',
    fetchMode: 'http',
  },
  { rows: ['.list-tbody ul'], pinned: hasNoticeCell('.notice') }
);

export const artsAcademic = new ListBoardAdapter(
  {
    id: 'arts_academic',
    name: '예술대학 공지사항',
    url: 'https://art.kookmin.ac.kr/community/notice/',
    category: 'arts',
    fetchMode: 'http',
  },
  { rows: ['div.list-tbody > ul'], pinned: hasNoticeCell('li.notice'), title: 'li.subject a', date: 'li.date' }
);
