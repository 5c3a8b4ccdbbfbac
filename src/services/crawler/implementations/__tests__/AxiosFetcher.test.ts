import nock from 'nock';
import { AxiosFetcher } from '../AxiosFetcher';
import { FetchError } from '../../errors';

describe('AxiosFetcher', () => {
  const origin = 'https://tr.wikipedia.org';
  let fetcher: AxiosFetcher;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    fetcher = new AxiosFetcher({ userAgent: 'test-agent' });
  });

  afterEach(() => {
    nock.cleanAll();
  });

  it('should return the decoded body', async () => {
    nock(origin).get('/wiki/Ankara').reply(200, '<p>Başkent</p>', { 'Content-Type': 'text/html; charset=UTF-8' });

    await expect(fetcher.fetch(`${origin}/wiki/Ankara`, 30)).resolves.toBe('<p>Başkent</p>');
  });

  it('should send the configured user agent', async () => {
    const scope = nock(origin, { reqheaders: { 'User-Agent': 'test-agent' } })
      .get('/wiki/Ankara')
      .reply(200, 'ok');

    await fetcher.fetch(`${origin}/wiki/Ankara`, 30);

    expect(scope.isDone()).toBe(true);
  });

  it('should follow redirects', async () => {
    nock(origin)
      .get('/wiki/Angora')
      .reply(301, '', { Location: `${origin}/wiki/Ankara` })
      .get('/wiki/Ankara')
      .reply(200, 'redirected');

    await expect(fetcher.fetch(`${origin}/wiki/Angora`, 30)).resolves.toBe('redirected');
  });

  it('should fail with an httpStatus error on error responses', async () => {
    nock(origin).get('/wiki/Missing').reply(404, 'not found');

    const error = await fetcher.fetch(`${origin}/wiki/Missing`, 30).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: 'httpStatus', statusCode: 404, url: `${origin}/wiki/Missing` });
  });

  it('should fail with a transport error when the connection fails', async () => {
    nock(origin).get('/wiki/Down').replyWithError({ code: 'ECONNRESET', message: 'socket hang up' });

    await expect(fetcher.fetch(`${origin}/wiki/Down`, 30)).rejects.toMatchObject({
      kind: 'transport',
      statusCode: null,
    });
  });

  it('should fail with a decode error on invalid UTF-8', async () => {
    nock(origin).get('/wiki/Latin5').reply(200, Buffer.from([0x3c, 0x70, 0x3e, 0xfe, 0xfd, 0x3c]));

    await expect(fetcher.fetch(`${origin}/wiki/Latin5`, 30)).rejects.toMatchObject({ kind: 'decode' });
  });
});
