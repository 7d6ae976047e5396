import { normalizeTitle, titleFor, withPinnedPrefix } from '../title';

describe('normalizeTitle', () => {
  it('collapses whitespace', () => {
    expect(normalizeTitle('  2024학년도 \n\t 수강신청   안내 ')).toBe('2024학년도 수강신청 안내');
  });

  it('strips the trailing detail marker', () => {
    expect(normalizeTitle('2024 수강신청 안내 자세히 보기')).toBe('2024 수강신청 안내');
  });

  it('prefers the full title attribute when the text is cut with an ellipsis', () => {
    expect(normalizeTitle('장학금 신청 ...', '장학금 신청 기간 연장 안내 자세히 보기')).toBe('장학금 신청 기간 연장 안내');
    expect(normalizeTitle('장학금 신청…', '장학금 신청 기간 연장 안내')).toBe('장학금 신청 기간 연장 안내');
  });

  it('keeps the visible text when the attribute is cut as well', () => {
    expect(normalizeTitle('장학금…', '장학금…')).toBe('장학금…');
  });

  it('keeps the visible text when it is complete', () => {
    expect(normalizeTitle('졸업 안내', '다른 제목')).toBe('졸업 안내');
  });

  it('falls back to the attribute when there is no text', () => {
    expect(normalizeTitle('', '휴강 안내')).toBe('휴강 안내');
    expect(normalizeTitle(undefined)).toBe('');
  });
});

describe('withPinnedPrefix', () => {
  it('prepends the marker once', () => {
    const once = withPinnedPrefix('휴강 안내');
    expect(once).toBe('[공지] 휴강 안내');
    expect(withPinnedPrefix(once)).toBe(once);
  });

  it('only applies to pinned rows through titleFor', () => {
    expect(titleFor('휴강 안내', false)).toBe('휴강 안내');
    expect(titleFor('휴강 안내', true)).toBe('[공지] 휴강 안내');
  });
});
