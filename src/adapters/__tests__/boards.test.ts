import { architectureAcademic } from '../architecture';
import { automotiveEngineeringAcademic } from '../automotive-engineering';
import { bukakPoliticalForum } from '../bukak-forum';
import { chemistryAcademic } from '../chemistry';
import { universityContestEvent } from '../contest-event';
import { designCeramicsAcademic } from '../kboard';
import { lincAcademic, lincLink } from '../linc';
import { StubFetcher } from '../../__tests__/fakes';
import { collect } from './helpers';

describe('KBoard lists', () => {
  it('prefixes the category and marks pinned rows', async () => {
    const html = `
      <div class="kboard-list"><table><tbody>
        <tr class="kboard-list-notice">
          <td class="kboard-list-title"><a href="/news/?uid=12&amp;mod=document">
            <div class="kboard-default-cut-strings"><span class="category1">학사</span> 수강 정정 안내</div>
          </a></td>
          <td class="kboard-list-date">2024.05.03</td>
        </tr>
        <tr>
          <td class="kboard-list-title"><a href="/news/?uid=11&amp;mod=document">
            <div class="kboard-default-cut-strings">작품 반출 일정</div>
          </a></td>
          <td class="kboard-list-date">2024.04.20</td>
        </tr>
      </tbody></table></div>`;

    const { notices } = await collect(designCeramicsAcademic, html);

    expect(notices).toEqual([
      {
        title: '[공지] [학사] 수강 정정 안내',
        link: 'https://kmuceramics.com/news/?uid=12&mod=document',
        published: '2024-05-03T00:00:00+09:00',
      },
      {
        title: '작품 반출 일정',
        link: 'https://kmuceramics.com/news/?uid=11&mod=document',
        published: '2024-04-20T00:00:00+09:00',
      },
    ]);
  });
});

describe('Bukak political forum', () => {
  it('builds view links from the onclick handler and tags speaker and category', async () => {
    const html = `
      <div class="board_list"><ul>
        <li><a href="#" onclick="global.write('1234', 'view'); return false;">
          <div class="ctg_name"><em>특강</em></div>
          <p class="title">민주주의의 미래</p>
          <p class="desc">홍길동</p>
          <div class="board_etc"><span>2024.05.08</span><span>조회 15</span></div>
        </a></li>
        <li><a href="#">
          <p class="title">포럼 일정 변경</p>
          <div class="board_etc"><span>2024.05.01</span></div>
        </a></li>
      </ul></div>`;

    const { notices } = await collect(bukakPoliticalForum, html);

    expect(notices).toEqual([
      {
        title: '[특강] [홍길동] 민주주의의 미래',
        link: 'https://www.kookmin.ac.kr/user/kmuNews/specBbs/bugAgForum/view.do?dataSeq=1234',
        published: '2024-05-08T00:00:00+09:00',
      },
      {
        title: '포럼 일정 변경',
        link: 'https://www.kookmin.ac.kr/user/kmuNews/specBbs/bugAgForum/index.do',
        published: '2024-05-01T00:00:00+09:00',
      },
    ]);
  });
});

describe('contest and event notices', () => {
  const base = 'https://www.kookmin.ac.kr/user/kmuNews/notice/9';

  it('reads pinned and undated rows from their detail pages', async () => {
    const html = `
      <div class="board_list"><ul>
        <li class="notice"><a href="view.do?dataSeq=1"><p class="title">창업경진대회</p></a></li>
        <li>
          <a href="view.do?dataSeq=2"><div class="board_txt"><p class="title">사진 공모전</p></div></a>
          <div class="board_etc"><span>2024.05.06</span><span>조회 3</span></div>
        </li>
        <li>
          <a href="view.do?dataSeq=3"><div class="board_txt"><p class="title">봉사단 모집</p></div></a>
          <div class="board_etc"><span></span></div>
        </li>
      </ul></div>`;
    const fetcher = new StubFetcher({
      [`${base}/view.do?dataSeq=1`]: '<div class="view_top"><div class="board_etc"><span>2024.05.02</span><span>조회 40</span></div></div>',
    });

    const { notices } = await collect(universityContestEvent, html, fetcher);

    expect(notices).toEqual([
      { title: '[공지] 창업경진대회', link: `${base}/view.do?dataSeq=1`, published: '2024-05-02T00:00:00+09:00' },
      { title: '사진 공모전', link: `${base}/view.do?dataSeq=2`, published: '2024-05-06T00:00:00+09:00' },
      // detail page missing: falls back to now
      { title: '봉사단 모집', link: `${base}/view.do?dataSeq=3`, published: '2024-05-10T12:00:00+09:00' },
    ]);
    expect(fetcher.requests.map(request => request.url)).toEqual([
      `${base}/view.do?dataSeq=1`,
      `${base}/view.do?dataSeq=3`,
    ]);
  });
});

describe('LINC board', () => {
  it('resolves hrefs against the menu endpoint', () => {
    expect(lincLink('?gc=605XOAS&sa=view&idx=42')).toBe('https://linc.kookmin.ac.kr/main/menu?gc=605XOAS&sa=view&idx=42');
    expect(lincLink('https://linc.kookmin.ac.kr/board/1')).toBe('https://linc.kookmin.ac.kr/board/1');
    expect(lincLink('  ')).toBeNull();
    expect(lincLink(undefined)).toBeNull();
  });

  it('collects pinned rows with the notice icon', async () => {
    const html = `
      <div class="board_list"><ul class="content_wrap">
        <li>
          <a href="?gc=605XOAS&amp;sa=view&amp;idx=42"><span class="icon_notice">공지</span><p class="tit0">산학협력 프로그램 모집</p></a>
          <span class="date">2024-05-03</span>
        </li>
      </ul></div>`;

    const { notices } = await collect(lincAcademic, html);

    expect(notices).toEqual([
      {
        title: '[공지] 산학협력 프로그램 모집',
        link: 'https://linc.kookmin.ac.kr/main/menu?gc=605XOAS&sa=view&idx=42',
        published: '2024-05-03T00:00:00+09:00',
      },
    ]);
  });
});

describe('applied chemistry board', () => {
  it('skips the header row and reads the date from the second info cell', async () => {
    const html = `
      <div id="ezsBBS"><table>
        <tr><th>번호</th><th>제목</th><th>작성자</th><th>날짜</th><th>조회</th></tr>
        <tr>
          <td class="txtc">3</td>
          <td><ul><li><a class="Board" href="view.php?no=3">화학 세미나 개최</a></li></ul></td>
          <td class="txtc txtN">홍길동</td>
          <td class="txtc txtN">2024-05-05</td>
          <td class="txtc txtN">12</td>
        </tr>
      </table></div>`;

    const { totalFound, notices } = await collect(chemistryAcademic, html);

    expect(totalFound).toBe(2);
    expect(notices).toEqual([
      {
        title: '화학 세미나 개최',
        link: 'http://chem.kookmin.ac.kr/sub6/view.php?no=3',
        published: '2024-05-05T00:00:00+09:00',
      },
    ]);
  });
});

describe('automotive engineering board', () => {
  it('collects the main list followed by the aside list', async () => {
    const html = `
      <div class="list-type01 list-l"><ul>
        <li><a href="/board/notice/?idx=5"><strong class="list01-tit">현장실습 안내</strong><span class="list01-date">2024.05.06</span></a></li>
      </ul></div>
      <div class="aside-list-area"><ul>
        <li class="aside-list"><a href="?idx=6"><strong>중요 공지</strong><span>2024-05-01</span></a></li>
      </ul></div>`;

    const { notices } = await collect(automotiveEngineeringAcademic, html);

    expect(notices).toEqual([
      {
        title: '현장실습 안내',
        link: 'https://auto.kookmin.ac.kr/board/notice/?idx=5',
        published: '2024-05-06T00:00:00+09:00',
      },
      {
        title: '중요 공지',
        link: 'https://auto.kookmin.ac.kr/board/notice/?idx=6',
        published: '2024-05-01T00:00:00+09:00',
      },
    ]);
  });
});

describe('architecture board', () => {
  it('reads the misspelled title class', async () => {
    const html = `
      <ul class="board-list-type01">
        <li><a href="view.do?id=1"><p class="borad-list-tit">설계 스튜디오 발표</p><span class="board-list-date">2024.05.02</span></a></li>
      </ul>`;

    const { notices } = await collect(architectureAcademic, html);

    expect(notices).toEqual([
      {
        title: '설계 스튜디오 발표',
        link: 'https://archi.kookmin.ac.kr/life/notice/view.do?id=1',
        published: '2024-05-02T00:00:00+09:00',
      },
    ]);
  });
});
