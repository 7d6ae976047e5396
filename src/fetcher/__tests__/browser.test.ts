import { FetchError } from '../../utils/errors';
import { silentLogger, StubFetcher } from '../../__tests__/fakes';
import { BrowserPageFetcher, type BrowserHandle, type BrowserPage } from '../browser';
import { StrategyPageFetcher } from '../strategy';

function fakeBrowser(page: Partial<BrowserPage>) {
  const fullPage: BrowserPage = {
    goto: jest.fn(async () => null),
    waitForSelector: jest.fn(async () => null),
    waitForTimeout: jest.fn(async () => undefined),
    content: jest.fn(async () => '<table class="ikc-bulletins"><tbody><tr><td>1</td></tr></tbody></table>'),
    url: () => 'https://lib.example.ac.kr/notice',
    ...page,
  };
  const close = jest.fn(async () => undefined);
  const browser: BrowserHandle = {
    newContext: jest.fn(async () => ({ newPage: async () => fullPage })),
    close,
  };
  return { browser, page: fullPage, close };
}

describe('BrowserPageFetcher', () => {
  it('waits for the selector and captures the rendered DOM', async () => {
    const { browser, page, close } = fakeBrowser({});
    const fetcher = new BrowserPageFetcher({
      launch: async () => browser,
      waitTimeoutMs: 10_000,
      settleMs: 0,
      logger: silentLogger,
    });

    const result = await fetcher.fetch('https://lib.example.ac.kr/notice', { waitSelector: 'table.ikc-bulletins' });

    expect(page.waitForSelector).toHaveBeenCalledWith('table.ikc-bulletins', { timeout: 10_000 });
    expect(page.waitForTimeout).not.toHaveBeenCalled();
    expect(result.$('table.ikc-bulletins td').text()).toBe('1');
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('continues when the selector never appears', async () => {
    const { browser } = fakeBrowser({
      waitForSelector: jest.fn(async () => {
        throw new Error('Timeout 10000ms exceeded');
      }),
    });
    const fetcher = new BrowserPageFetcher({ launch: async () => browser, settleMs: 5, logger: silentLogger });

    const result = await fetcher.fetch('https://lib.example.ac.kr/notice', { waitSelector: '.missing' });

    expect(result.body).toContain('ikc-bulletins');
  });

  it('closes the browser when navigation fails', async () => {
    const { browser, close } = fakeBrowser({
      goto: jest.fn(async () => {
        throw new Error('net::ERR_NAME_NOT_RESOLVED');
      }),
    });
    const fetcher = new BrowserPageFetcher({ launch: async () => browser, logger: silentLogger });

    const error = await fetcher.fetch('https://lib.example.ac.kr/notice').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && error.reason).toBe('browser');
    expect(close).toHaveBeenCalledTimes(1);
  });
});

describe('StrategyPageFetcher', () => {
  it('routes by fetch mode', async () => {
    const http = new StubFetcher({ 'https://a.example.ac.kr/': '<p>http</p>' });
    const browser = new StubFetcher({ 'https://a.example.ac.kr/': '<p>browser</p>' });
    const fetcher = new StrategyPageFetcher(http, browser);

    const viaHttp = await fetcher.fetch('https://a.example.ac.kr/');
    const viaBrowser = await fetcher.fetch('https://a.example.ac.kr/', { fetchMode: 'browser' });

    expect(viaHttp.$('p').text()).toBe('http');
    expect(viaBrowser.$('p').text()).toBe('browser');
  });
});
