import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Notice, SourceDefinition } from '../types/notice';
import { HtmlSourceAdapter, type ExtractContext } from './common/base';
import { resolvePublished } from './common/date';
import { resolveLink } from './common/link';
import { normalizeTitle, titleFor } from './common/title';

type Row = Cheerio<Element>;

interface KBoardLayout {
  rows: readonly string[];
  /** Container of the title text; a `span.category1` inside it becomes a `[category]` prefix */
  title: string;
}

/**
 * WordPress KBoard lists: `td.kboard-list-title`, `td.kboard-list-date`,
 * pinned rows carry `kboard-list-notice`.
 */
export class KBoardAdapter extends HtmlSourceAdapter {
  protected readonly rowSelectors: readonly string[];
  private readonly titleSelector: string;

  constructor(definition: SourceDefinition, layout: KBoardLayout) {
    super(definition);
    this.rowSelectors = layout.rows;
    this.titleSelector = layout.title;
  }

  protected extractRow(row: Row, context: ExtractContext): Notice | null {
    const cell = row.find('.kboard-list-title').first();
    const container = cell.find(this.titleSelector).first().clone();
    const category = normalizeTitle(container.find('span.category1').text());
    container.find('span.category1').remove();

    const text = normalizeTitle(container.text());
    const title = text && category ? `[${category}] ${text}` : text;
    const href = cell.find('a').first().attr('href');

    return this.notice({
      title: title ? titleFor(title, row.hasClass('kboard-list-notice')) : '',
      link: resolveLink(href, context.page.url),
      published: resolvePublished(row.find('.kboard-list-date').first().text(), context.now),
    });
  }
}

export const designCeramicsAcademic = new KBoardAdapter(
  {
    id: 'design_ceramics_academic',
    name: '도자공예학과 공지사항',
    url: 'https://kmuceramics.com/news/',
    category: 'design',
    fetchMode: 'http',
  },
  { rows: ['div.kboard-list table tbody tr'], title: 'div.kboard-default-cut-strings' }
);

export const designMetalworkAcademic = new KBoardAdapter(
  {
    id: 'design_metalwork_academic',
    name: '금속공예학과 공지사항',
    url: 'http://mcraft.kookmin.ac.kr/?page_id=516',
    category: 'design',
    fetchMode: 'http',
  },
  { rows: ['#kboard-default-list .kboard-list tbody tr'], title: 'div.cut_strings a' }
);
