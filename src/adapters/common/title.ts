export const PINNED_PREFIX = '[공지] ';

const DETAIL_MARKER = /\s*자세히\s*보기$/;
const ELLIPSIS = /(\.\.\.|…)$/;

function clean(text: string | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim().replace(DETAIL_MARKER, '').trim();
}

/**
 * Collapse whitespace and drop the trailing "자세히 보기" marker. When the visible
 * text was cut with an ellipsis, the full title attribute wins if it is complete.
 */
export function normalizeTitle(text: string | undefined, fullTitleAttr?: string): string {
  const visible = clean(text);
  const full = clean(fullTitleAttr);

  if (!visible) {
    return full;
  }
  if (ELLIPSIS.test(visible) && full && !ELLIPSIS.test(full)) {
    return full;
  }
  return visible;
}

/** Prepends the pinned marker once; applying it twice is a no-op */
export function withPinnedPrefix(title: string): string {
  return title.startsWith(PINNED_PREFIX.trim()) ? title : `${PINNED_PREFIX}${title}`;
}

export function titleFor(title: string, pinned: boolean): string {
  return pinned ? withPinnedPrefix(title) : title;
}
