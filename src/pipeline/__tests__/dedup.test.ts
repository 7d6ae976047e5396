import { createNotice } from '../../types/notice';
import { buildSnapshot, diffNotices } from '../dedup';

const notice = (title: string, link: string) =>
  createNotice({ title, link, published: new Date('2024-05-01T00:00:00Z'), sourceId: 'board' });

describe('diffNotices', () => {
  const snapshot = buildSnapshot([{ title: '기존 공지', link: 'https://example.ac.kr/1' }]);

  it('excludes a notice whose link is known', () => {
    expect(diffNotices([notice('제목 변경', 'https://example.ac.kr/1')], snapshot.links, snapshot.titles)).toEqual([]);
  });

  it('excludes a notice whose title is known', () => {
    expect(diffNotices([notice('기존 공지', 'https://example.ac.kr/2')], snapshot.links, snapshot.titles)).toEqual([]);
  });

  it('keeps a notice matching neither, in order', () => {
    const fresh = [notice('새 공지 A', 'https://example.ac.kr/3'), notice('새 공지 B', 'https://example.ac.kr/4')];
    const candidates = [fresh[0], notice('기존 공지', 'https://example.ac.kr/5'), fresh[1]];

    expect(diffNotices(candidates, snapshot.links, snapshot.titles)).toEqual(fresh);
  });

  it('keeps everything against an empty snapshot', () => {
    const empty = buildSnapshot([]);
    const candidates = [notice('a', 'https://example.ac.kr/a')];
    expect(diffNotices(candidates, empty.links, empty.titles)).toEqual(candidates);
  });
});

describe('createNotice', () => {
  it('returns a frozen notice', () => {
    const created = notice('a', 'https://example.ac.kr/a');
    expect(Object.isFrozen(created)).toBe(true);
  });
});
