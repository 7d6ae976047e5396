import type { FetchOptions, FetchedPage, PageFetcher } from './types';

/**
 * Routes a request to the HTTP or browser fetcher by `fetchMode`.
 * Adapters only ever see the resulting page.
 */
export class StrategyPageFetcher implements PageFetcher {
  constructor(
    private readonly http: PageFetcher,
    private readonly browser: PageFetcher
  ) {}

  fetch(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
    return options.fetchMode === 'browser' ? this.browser.fetch(url, options) : this.http.fetch(url, options);
  }
}
