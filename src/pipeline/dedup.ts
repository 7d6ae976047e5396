import type { KnownNotice, Notice } from '../types/notice';

export interface DedupSnapshot {
  links: ReadonlySet<string>;
  titles: ReadonlySet<string>;
}

export function buildSnapshot(known: readonly KnownNotice[]): DedupSnapshot {
  return {
    links: new Set(known.map(notice => notice.link)),
    titles: new Set(known.map(notice => notice.title)),
  };
}

/**
 * A notice is known when its link OR its title matches a persisted one.
 * Order of the candidates is preserved.
 */
export function diffNotices(
  candidates: readonly Notice[],
  knownLinks: ReadonlySet<string>,
  knownTitles: ReadonlySet<string>
): Notice[] {
  return candidates.filter(notice => !knownLinks.has(notice.link) && !knownTitles.has(notice.title));
}
