import nock from 'nock';
import { HttpPageFetcher } from '../../../src/scrapers/page-fetcher';

describe('HttpPageFetcher', () => {
  const fetcher = new HttpPageFetcher('https://grants.example.org/grants', {
    retryAttempts: 1,
    retryDelayMs: 0,
  });

  beforeAll(() => {
    nock.disableNetConnect();
  });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => { });
    jest.spyOn(console, 'error').mockImplementation(() => { });
  });

  afterEach(() => {
    nock.cleanAll();
    jest.restoreAllMocks();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('requests the page by index and returns the body', async () => {
    nock('https://grants.example.org')
      .get('/grants')
      .query({ page: '0' })
      .reply(200, '<html><body>page zero</body></html>');

    const outcome = await fetcher.fetch(0);

    expect(outcome).toEqual({ ok: true, status: 200, body: '<html><body>page zero</body></html>' });
  });

  it('sends the configured user agent', async () => {
    const custom = new HttpPageFetcher('https://grants.example.org/grants', {
      headers: { 'User-Agent': 'grant-harvester-test' },
    });
    nock('https://grants.example.org', { reqheaders: { 'user-agent': 'grant-harvester-test' } })
      .get('/grants')
      .query({ page: '2' })
      .reply(200, 'ok');

    await expect(custom.fetch(2)).resolves.toEqual({ ok: true, status: 200, body: 'ok' });
  });

  it('reports a non-200 status as a failed outcome', async () => {
    nock('https://grants.example.org')
      .get('/grants')
      .query({ page: '5' })
      .reply(404, 'Not Found');

    await expect(fetcher.fetch(5)).resolves.toEqual({ ok: false, status: 404 });
  });

  it('retries transport errors before giving up with the error code', async () => {
    const scope = nock('https://grants.example.org')
      .get('/grants')
      .query({ page: '1' })
      .times(2)
      .replyWithError({ code: 'ECONNRESET', message: 'socket hang up' });

    await expect(fetcher.fetch(1)).resolves.toEqual({ ok: false, status: 'ECONNRESET' });
    expect(scope.isDone()).toBe(true);
  });

  it('succeeds when a retry gets through', async () => {
    nock('https://grants.example.org')
      .get('/grants')
      .query({ page: '3' })
      .replyWithError({ code: 'ECONNRESET', message: 'socket hang up' })
      .get('/grants')
      .query({ page: '3' })
      .reply(200, 'third page');

    await expect(fetcher.fetch(3)).resolves.toEqual({ ok: true, status: 200, body: 'third page' });
  });

  it('backs off and retries a throttled request', async () => {
    nock('https://grants.example.org')
      .get('/grants')
      .query({ page: '4' })
      .reply(429, 'Too Many Requests')
      .get('/grants')
      .query({ page: '4' })
      .reply(200, 'fourth page');

    await expect(fetcher.fetch(4)).resolves.toEqual({ ok: true, status: 200, body: 'fourth page' });
    expect(console.log).toHaveBeenCalledWith('Waiting 0ms before retry (throttling detected)');
  });

  it('reports 429 once the retries run out', async () => {
    nock('https://grants.example.org')
      .get('/grants')
      .query({ page: '6' })
      .times(2)
      .reply(429, 'Too Many Requests');

    await expect(fetcher.fetch(6)).resolves.toEqual({ ok: false, status: 429 });
  });
});
