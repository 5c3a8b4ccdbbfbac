import { DEFAULT_SITE_SCOPE, DEFAULT_START_URL, loadConfig } from '../../config';
import { ConfigError } from '../../services/crawler/errors';
import { LogLevel } from '../../services/crawler/utils/LoggingUtils';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      crawl: {
        startUrls: [DEFAULT_START_URL],
        maxFiles: 50,
        siteScope: DEFAULT_SITE_SCOPE,
        outputDir: 'data',
        stateFile: 'data/crawl_state.json',
        fetchTimeoutSeconds: 30,
        userAgent: 'WikiFrontierCrawler/1.0',
        maxFetchAttempts: 3,
        dedupeQueue: false,
        emptyPagePolicy: 'write',
      },
      logging: { level: LogLevel.INFO },
    });
  });

  it('should seed from the Turkish Wikipedia article by default', () => {
    expect(loadConfig({}).crawl.startUrls).toEqual(['https://tr.wikipedia.org/wiki/Recep_Tayyip_Erdo%C4%9Fan']);
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      MAX_FILES: '10',
      START_URLS: 'https://tr.wikipedia.org/wiki/Ankara, https://tr.wikipedia.org/wiki/Van ,',
      SITE_SCOPE: 'wikipedia.org',
      FETCH_TIMEOUT_SECONDS: '2.5',
      DEDUPE_QUEUE: 'yes',
      EMPTY_PAGE_POLICY: 'skip',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.crawl).toMatchObject({
      maxFiles: 10,
      startUrls: ['https://tr.wikipedia.org/wiki/Ankara', 'https://tr.wikipedia.org/wiki/Van'],
      siteScope: 'wikipedia.org',
      fetchTimeoutSeconds: 2.5,
      dedupeQueue: true,
      emptyPagePolicy: 'skip',
    });
    expect(config.logging.level).toBe(LogLevel.DEBUG);
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ MAX_FILES: '', START_URLS: '' }).crawl).toMatchObject({
      maxFiles: 50,
      startUrls: [DEFAULT_START_URL],
    });
  });

  it.each([
    [{ MAX_FILES: 'many' }],
    [{ MAX_FILES: '0' }],
    [{ MAX_FILES: '2.5' }],
    [{ DEDUPE_QUEUE: 'maybe' }],
    [{ EMPTY_PAGE_POLICY: 'ignore' }],
    [{ LOG_LEVEL: 'verbose' }],
    [{ START_URLS: ' , ' }],
  ])('should reject %p', env => {
    expect(() => loadConfig(env)).toThrow(ConfigError);
  });
});
