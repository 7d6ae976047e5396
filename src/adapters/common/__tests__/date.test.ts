import { toSeoulIso } from '../../../utils/time';
import { parseNoticeDate, resolvePublished } from '../date';

// 2024-06-15 12:00 in Seoul
const NOW = new Date('2024-06-15T03:00:00Z');

const iso = (text: string): string | null => {
  const parsed = parseNoticeDate(text, NOW);
  return parsed ? toSeoulIso(parsed) : null;
};

describe('parseNoticeDate', () => {
  it.each([
    ['2024-05-01'],
    ['2024.05.01'],
    ['24.05.01'],
    ['2024.5.1'],
    ['작성일 2024.05.01'],
    ['5월 1일'],
  ])('reads %s as midnight of 2024-05-01 in Seoul', text => {
    expect(iso(text)).toBe('2024-05-01T00:00:00+09:00');
  });

  it('keeps the time of an RFC-2822 date', () => {
    expect(iso('Wed, 01 May 2024 09:30:00 +0900')).toBe('2024-05-01T09:30:00+09:00');
    expect(iso('Wed, 01 May 2024 00:30:00 GMT')).toBe('2024-05-01T09:30:00+09:00');
  });

  it('reads an RFC-2822 date without a zone as Seoul time', () => {
    expect(iso('Wed, 01 May 2024 09:30:00')).toBe('2024-05-01T09:30:00+09:00');
    expect(iso('01 May 2024 23:05')).toBe('2024-05-01T23:05:00+09:00');
  });

  it('ignores the time part of a board date', () => {
    expect(iso('2024.05.01 14:30')).toBe('2024-05-01T00:00:00+09:00');
  });

  it('does not read the tail of a four digit year as a two digit one', () => {
    expect(iso('2024.13.01')).toBeNull();
  });

  it('rejects dates that are not on the calendar', () => {
    expect(iso('2024-13-45')).toBeNull();
    expect(iso('2023-02-29')).toBeNull();
  });

  it('returns null for text without a date', () => {
    expect(iso('등록일 없음')).toBeNull();
    expect(parseNoticeDate('', NOW)).toBeNull();
    expect(parseNoticeDate(undefined, NOW)).toBeNull();
  });
});

describe('resolvePublished', () => {
  it('falls back to now', () => {
    expect(resolvePublished('-', NOW).getTime()).toBe(NOW.getTime());
  });

  it('uses the parsed date when there is one', () => {
    expect(toSeoulIso(resolvePublished('24.06.14', NOW))).toBe('2024-06-14T00:00:00+09:00');
  });
});
