export * from './types';
export { decodeBody, charsetOf } from './decode';
export { HttpPageFetcher, type HttpPageFetcherOptions } from './http';
export { BrowserPageFetcher, type BrowserPageFetcherOptions } from './browser';
export { StrategyPageFetcher } from './strategy';
