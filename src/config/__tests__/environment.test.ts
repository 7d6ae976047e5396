import { loadEnvironmentConfig, parseSourceList, parseWindowOverrides } from '../environment';
import { ConfigError } from '../../utils/errors';

const required = { SUPABASE_URL: 'http://localhost:54321', SUPABASE_KEY: 'test-key' };

describe('loadEnvironmentConfig', () => {
  it('applies defaults', () => {
    const config = loadEnvironmentConfig(required);

    expect(config.supabase).toEqual({
      url: 'http://localhost:54321',
      key: 'test-key',
      noticesTable: 'notices',
      sourcesTable: 'sources',
      categoriesTable: 'categories',
    });
    expect(config.pipeline).toEqual({
      recencyWindowDays: 30,
      windowOverrides: {},
      snapshotLookbackDays: 90,
      disabledSources: [],
    });
    expect(config.fetch).toMatchObject({ timeoutMs: 30_000, maxBytes: 5 * 1024 * 1024, retries: 2 });
    expect(config.dispatch).toEqual({ batchSize: 10, mode: 'wait' });
    expect(config.isProd).toBe(false);
    expect(config.logging.level).toBe('info');
  });

  it('reads overrides from the environment', () => {
    const config = loadEnvironmentConfig({
      ...required,
      RECENCY_WINDOW_DAYS: '14',
      RECENCY_WINDOW_OVERRIDES: 'law_academic=40, arts_academic=90',
      DISABLED_SOURCES: 'library_general, linc_academic',
      DISPATCH_MODE: 'fire-and-forget',
      FETCH_RETRIES: '0',
      IS_PROD: 'true',
    });

    expect(config.pipeline.recencyWindowDays).toBe(14);
    expect(config.pipeline.windowOverrides).toEqual({ law_academic: 40, arts_academic: 90 });
    expect(config.pipeline.disabledSources).toEqual(['library_general', 'linc_academic']);
    expect(config.dispatch.mode).toBe('fire-and-forget');
    expect(config.fetch.retries).toBe(0);
    expect(config.isProd).toBe(true);
  });

  it('treats blank values as unset', () => {
    const config = loadEnvironmentConfig({ ...required, SLACK_BOT_TOKEN: '   ', SLACK_CHANNEL_ID: '' });

    expect(config.slack).toEqual({ botToken: undefined, channelId: undefined });
  });

  it('rejects a missing Supabase URL', () => {
    expect(() => loadEnvironmentConfig({ SUPABASE_KEY: 'test-key' })).toThrow(ConfigError);
    expect(() => loadEnvironmentConfig({ SUPABASE_KEY: 'test-key' })).toThrow(/SUPABASE_URL/);
  });

  it('rejects an unknown dispatch mode', () => {
    expect(() => loadEnvironmentConfig({ ...required, DISPATCH_MODE: 'later' })).toThrow(/DISPATCH_MODE/);
  });
});

describe('parseWindowOverrides', () => {
  it('parses id=days pairs', () => {
    expect(parseWindowOverrides('law_academic=40')).toEqual({ law_academic: 40 });
    expect(parseWindowOverrides('')).toEqual({});
  });

  it('rejects malformed entries', () => {
    expect(() => parseWindowOverrides('law_academic=forty')).toThrow('Invalid RECENCY_WINDOW_OVERRIDES entry: "law_academic=forty"');
    expect(() => parseWindowOverrides('=10')).toThrow(ConfigError);
    expect(() => parseWindowOverrides('law_academic=0')).toThrow(ConfigError);
  });
});

describe('parseSourceList', () => {
  it('splits and trims', () => {
    expect(parseSourceList(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
  });
});
