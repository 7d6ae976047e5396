import { seoulDateTime, seoulParts } from '../../utils/time';

type DateMatcher = (text: string, now: Date) => Date | null;

const fullYear = (raw: string): number => (raw.length === 2 ? 2000 + Number(raw) : Number(raw));

function civil(pattern: RegExp): DateMatcher {
  return text => {
    const match = text.match(pattern);
    if (!match) {
      return null;
    }
    return seoulDateTime(fullYear(match[1]), Number(match[2]), Number(match[3]));
  };
}

const RFC_2822 =
  /(?:(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun),\s*)?\d{1,2}\s+(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+\d{4}\s+\d{1,2}:\d{2}(?::\d{2})?(\s*(?:[+-]\d{4}|GMT|UT|UTC|[A-Z]{3}))?/;

// A stamp without a zone is Seoul time
const rfc2822: DateMatcher = text => {
  const match = text.match(RFC_2822);
  if (!match) {
    return null;
  }
  const parsed = Date.parse(match[1] ? match[0] : `${match[0]} +0900`);
  return Number.isNaN(parsed) ? null : new Date(parsed);
};

const monthDay: DateMatcher = (text, now) => {
  const match = text.match(/(\d{1,2})\s*월\s*(\d{1,2})\s*일/);
  if (!match) {
    return null;
  }
  return seoulDateTime(seoulParts(now).year, Number(match[1]), Number(match[2]));
};

// First match wins
const MATCHERS: readonly DateMatcher[] = [
  civil(/(\d{4})-(\d{1,2})-(\d{1,2})/),
  civil(/(\d{4})\.\s*(\d{1,2})\.\s*(\d{1,2})/),
  civil(/(?<!\d)(\d{2})\.(\d{1,2})\.(\d{1,2})(?!\d)/),
  rfc2822,
  monthDay,
];

/**
 * Parse a board date into an instant. Date-only forms resolve to 00:00 Seoul time;
 * `N월 N일` takes the current Seoul year.
 */
export function parseNoticeDate(text: string | undefined, now: Date = new Date()): Date | null {
  const value = text?.trim();
  if (!value) {
    return null;
  }
  for (const matcher of MATCHERS) {
    const parsed = matcher(value, now);
    if (parsed) {
      return parsed;
    }
  }
  return null;
}

/** Like `parseNoticeDate`, falling back to `now` */
export function resolvePublished(text: string | undefined, now: Date = new Date()): Date {
  return parseNoticeDate(text, now) ?? new Date(now.getTime());
}
