import type { CheerioAPI } from 'cheerio';
import type { FetchMode } from '../types/notice';

export interface FetchedPage {
  /** Final URL after redirects */
  url: string;
  body: string;
  $: CheerioAPI;
}

export interface FetchOptions {
  fetchMode?: FetchMode;
  /** Browser mode: selector to wait for before capturing the DOM */
  waitSelector?: string;
  headers?: Record<string, string>;
}

/**
 * Fetch contract shared by the HTTP and browser strategies.
 * Failures reject with a FetchError; a failed fetch is never an empty page.
 */
export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchedPage>;
}

export const DEFAULT_FETCH_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
};
