import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import nock from 'nock';
import { ServiceFactory } from '../ServiceFactory';
import { CrawlOptions, StopReason } from '../../interfaces/types';
import {
  FakeFetcher,
  InMemoryArtifactWriter,
  InMemoryStateStore,
  RecordingProgressReporter,
} from '../../test-utils/fakes';
import { linkingPage, wikiPage } from '../../test-utils/wikiPages';

describe('ServiceFactory', () => {
  const origin = 'https://tr.wikipedia.org';
  let dir: string;
  let options: CrawlOptions;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wiki-crawl-'));
    options = {
      startUrls: [`${origin}/wiki/Ankara`],
      maxFiles: 3,
      siteScope: 'tr.wikipedia.org',
      outputDir: path.join(dir, 'data'),
      stateFile: path.join(dir, 'data', 'crawl_state.json'),
      fetchTimeoutSeconds: 5,
      userAgent: 'test-agent',
      maxFetchAttempts: 3,
      dedupeQueue: false,
      emptyPagePolicy: 'write',
    };
  });

  afterEach(async () => {
    nock.cleanAll();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should crawl through the overriding services', async () => {
    const fetcher = new FakeFetcher().page(`${origin}/wiki/Ankara`, linkingPage('Ankara', []));
    const writer = new InMemoryArtifactWriter();
    const stateStore = new InMemoryStateStore();
    const reporter = new RecordingProgressReporter();

    const crawler = await new ServiceFactory(options, { fetcher, writer, stateStore, progressReporter: reporter }).createCrawler();
    await crawler.crawl(options.startUrls);

    expect(fetcher.requests).toEqual([`${origin}/wiki/Ankara`]);
    expect([...writer.files.keys()]).toEqual([path.join(options.outputDir, '001_Ankara.txt')]);
    expect(stateStore.current().fileCount).toBe(1);
    expect(reporter.summary?.fileCount).toBe(1);
  });

  it('should resume from the state the store loads', async () => {
    const fetcher = new FakeFetcher();
    const stateStore = new InMemoryStateStore({
      visited: new Set([`${origin}/wiki/Ankara`]),
      fileCount: 1,
      failedAttempts: new Map(),
    });

    const crawler = await new ServiceFactory(options, { fetcher, stateStore, writer: new InMemoryArtifactWriter() }).createCrawler();
    const summary = await crawler.crawl(options.startUrls);

    expect(fetcher.requests).toEqual([]);
    expect(summary).toMatchObject({ stopReason: StopReason.EXHAUSTED, rejected: 1, fileCount: 1 });
  });

  it('should crawl a site end to end and resume from the saved state', async () => {
    nock(origin)
      .get('/wiki/Ankara')
      .reply(200, wikiPage('Ankara', '<p>Ankara <a href="/wiki/Kale">kale</a> <a href="/wiki/Anitkabir">Anıtkabir</a></p><h2>Tarih</h2><p>Eski şehir.</p>'))
      .get('/wiki/Kale')
      .reply(200, linkingPage('Kale', []))
      .get('/wiki/Anitkabir')
      .reply(404, 'missing');

    const reporter = new RecordingProgressReporter();
    const crawler = await new ServiceFactory(options, { progressReporter: reporter }).createCrawler();
    const summary = await crawler.crawl(options.startUrls);

    expect(summary).toMatchObject({ stopReason: StopReason.EXHAUSTED, succeeded: 2, failed: 1, fileCount: 2 });
    expect((await fs.readdir(options.outputDir)).sort()).toEqual(['001_Ankara.txt', '002_Kale.txt', 'crawl_state.json']);
    expect(await fs.readFile(path.join(options.outputDir, '001_Ankara.txt'), 'utf-8')).toBe(
      `Title: Ankara\n${'='.repeat(50)}\n\nAnkara kale Anıtkabir\n\n## Tarih\n\nEski şehir.\n\n`
    );

    const saved: unknown = JSON.parse(await fs.readFile(options.stateFile, 'utf-8'));
    expect(saved).toEqual({
      visited: [`${origin}/wiki/Ankara`, `${origin}/wiki/Kale`],
      file_count: 2,
      failed_attempts: { [`${origin}/wiki/Anitkabir`]: 1 },
    });

    // Second run: Ankara is skipped, so nothing is requested
    const resumed = await new ServiceFactory(options, { progressReporter: reporter }).createCrawler();
    const second = await resumed.crawl(options.startUrls);

    expect(second).toMatchObject({ stopReason: StopReason.EXHAUSTED, attempted: 0, rejected: 1, fileCount: 2 });
    expect(nock.pendingMocks()).toEqual([]);
  });
});
