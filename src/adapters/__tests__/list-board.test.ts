import { artsAcademic, universityAcademic, universityScholarship } from '../list-board';
import { collect } from './helpers';

describe('list-tbody boards', () => {
  it('reads pinned and regular rows in document order', async () => {
    const html = `
      <div class="list-tbody">
        <ul class="notice-bg">
          <li class="subject"><a href="?mode=view&amp;idx=10">2024학년도 수강신청 안내</a></li>
          <li class="date">2024-05-02</li>
        </ul>
        <ul class="normal-bg">
          <li class="subject"><a href="https://cs.kookmin.ac.kr/news/kookmin/academic/?idx=9">졸업논문 제출</a></li>
          <li class="date">2024-04-28</li>
        </ul>
      </div>`;

    const { totalFound, notices } = await collect(universityAcademic, html);

    expect(totalFound).toBe(2);
    expect(notices).toEqual([
      {
        title: '[공지] 2024학년도 수강신청 안내',
        link: 'https://cs.kookmin.ac.kr/news/kookmin/academic/?mode=view&idx=10',
        published: '2024-05-02T00:00:00+09:00',
      },
      {
        title: '졸업논문 제출',
        link: 'https://cs.kookmin.ac.kr/news/kookmin/academic/?idx=9',
        published: '2024-04-28T00:00:00+09:00',
      },
    ]);
  });

  it('marks scholarship rows that carry a notice cell', async () => {
    const html = `
      <div class="list-tbody">
        <ul><li class="notice">공지</li><li class="subject"><a href="?idx=3">국가장학금 2차 신청</a></li><li class="date">24.05.07</li></ul>
        <ul><li class="subject"><a href="?idx=2">교외장학금 추천</a></li><li class="date">2024.05.01</li></ul>
      </div>`;

    const { notices } = await collect(universityScholarship, html);

    expect(notices.map(notice => notice.title)).toEqual(['[공지] 국가장학금 2차 신청', '교외장학금 추천']);
    expect(notices[1].published).toBe('2024-05-01T00:00:00+09:00');
  });

  it('resolves dot-relative links on the arts board', async () => {
    const html = `
      <div class="list-tbody">
        <ul><li class="notice">공지</li><li class="subject"><a href="./view.do?id=7">졸업전시 일정</a></li><li class="date">2024.05.03</li></ul>
      </div>`;

    const { notices } = await collect(artsAcademic, html);

    expect(notices).toEqual([
      {
        title: '[공지] 졸업전시 일정',
        link: 'https://art.kookmin.ac.kr/community/notice/view.do?id=7',
        published: '2024-05-03T00:00:00+09:00',
      },
    ]);
  });

  it('skips rows without a link', async () => {
    const html = `
      <div class="list-tbody">
        <ul class="normal-bg"><li class="subject"><a>링크 없음</a></li><li class="date">2024-05-02</li></ul>
      </div>`;

    const { totalFound, notices } = await collect(universityAcademic, html);

    expect(totalFound).toBe(1);
    expect(notices).toEqual([]);
  });
});
