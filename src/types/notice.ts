/**
 * Core domain types shared by adapters, the pipeline and persistence.
 */

export type FetchMode = 'http' | 'browser';

/** A single extracted notice. Instances are frozen by `createNotice`. */
export interface Notice {
  readonly title: string;
  readonly link: string;
  /** Instant of publication; rendered in Asia/Seoul when serialized */
  readonly published: Date;
  readonly sourceId: string;
}

export interface NoticeInput {
  title: string;
  link: string;
  published: Date;
  sourceId: string;
}

/** Title/link pair read back from storage to build the dedup snapshot */
export interface KnownNotice {
  title: string;
  link: string;
}

export interface SourceDefinition {
  id: string;              // Registry key and persistence partition
  name: string;            // Human readable (Korean) board name
  url: string;             // Listing page
  category: string;        // Must match a name in categories.json
  fetchMode: FetchMode;
  waitSelector?: string;   // Browser mode only
  windowDays?: number;     // Overrides the default recency window
}

export interface SourceRunResult {
  sourceId: string;
  success: boolean;
  totalFound: number;
  newNoticesCount: number;
  savedCount: number;
  newNotices: Notice[];
  error?: string;
}

export function createNotice(input: NoticeInput): Notice {
  return Object.freeze({
    title: input.title,
    link: input.link,
    published: new Date(input.published.getTime()),
    sourceId: input.sourceId,
  });
}
