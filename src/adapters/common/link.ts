/**
 * Canonicalize an href found on a listing page into an absolute URL.
 *
 * - `?q`        page URL without its query, plus the query
 * - `//h/p`     page scheme plus the href
 * - `/p`        page origin plus the href
 * - `http(s)://` unchanged
 * - `#f`        page URL without its fragment, plus the fragment
 * - otherwise   resolved against the page URL
 *
 * Returns null for an empty or unresolvable href.
 */
export function resolveLink(href: string | undefined, pageUrl: string): string | null {
  const value = href?.trim();
  if (!value) {
    return null;
  }
  if (/^https?:\/\//i.test(value)) {
    return value;
  }

  let page: URL;
  try {
    page = new URL(pageUrl);
  } catch {
    return null;
  }

  if (value.startsWith('?')) {
    return `${page.origin}${page.pathname}${value}`;
  }
  if (value.startsWith('//')) {
    return `${page.protocol}${value}`;
  }
  if (value.startsWith('/')) {
    return `${page.origin}${value}`;
  }
  if (value.startsWith('#')) {
    return `${page.origin}${page.pathname}${page.search}${value}`;
  }
  if (/^(javascript|mailto|tel):/i.test(value)) {
    return null;
  }

  try {
    return new URL(value, page).toString();
  } catch {
    return null;
  }
}

/** Page URL with query and fragment removed */
export function stripQuery(pageUrl: string): string {
  const page = new URL(pageUrl);
  return `${page.origin}${page.pathname}`;
}

/** `?mode=view&articleNo=N` link built from the article number embedded in an href */
export function articleLink(href: string | undefined, pageUrl: string): string | null {
  const match = href?.match(/articleNo=(\d+)/);
  if (!match) {
    return null;
  }
  return `${stripQuery(pageUrl)}?mode=view&articleNo=${match[1]}`;
}
