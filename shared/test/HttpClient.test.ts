import { afterEach, describe, it, expect } from 'vitest';
import { HttpClient } from '../infrastructure/HttpClient.js';
import { CrawlError, CrawlNetworkError } from '../domain/errors.js';
import { startFixtureServer, type FixtureServer } from '../../services/crawler/test/fixtures.js';

describe('HttpClient', () => {
  let server: FixtureServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('follows redirects and reports where the body came from', async () => {
    server = await startFixtureServer({
      '/old': { status: 301, headers: { location: '/new' } },
      '/new': { body: '<p>new</p>' }
    });
    const client = new HttpClient({ retries: 0 });

    const response = await client.get(`${server.origin}/old`);

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('<p>new</p>');
    expect(response.effectiveUrl).toBe(`${server.origin}/new`);
    expect(response.redirects).toEqual([`${server.origin}/new`]);
    expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(server.requests).toEqual(['/old', '/new']);
  });

  it('gives up after the redirect limit without retrying', async () => {
    server = await startFixtureServer({
      '/loop': { status: 302, headers: { location: '/loop' } }
    });
    const client = new HttpClient({ retries: 2, retryDelay: 0, maxRedirects: 2 });

    const failure = client.get(`${server.origin}/loop`);

    await expect(failure).rejects.toBeInstanceOf(CrawlError);
    await expect(failure).rejects.toMatchObject({ errorCode: 'CRAWL_REDIRECT_LIMIT' });
    expect(server.requests).toEqual(['/loop', '/loop', '/loop']);
  });

  it('retries server errors', async () => {
    let calls = 0;
    server = await startFixtureServer({
      '/flaky': () => (++calls === 1 ? { status: 503, body: 'busy' } : { body: '<p>ok</p>' })
    });
    const client = new HttpClient({ retries: 2, retryDelay: 0 });

    const response = await client.get(`${server.origin}/flaky`);

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('<p>ok</p>');
    expect(server.requests).toEqual(['/flaky', '/flaky']);
  });

  it('returns client errors without retrying', async () => {
    server = await startFixtureServer({});
    const client = new HttpClient({ retries: 2, retryDelay: 0 });

    const response = await client.get(`${server.origin}/missing`);

    expect(response.statusCode).toBe(404);
    expect(server.requests).toEqual(['/missing']);
  });

  it('sends the configured user agent', async () => {
    let userAgent: string | undefined;
    server = await startFixtureServer({
      '/': request => {
        userAgent = request.headers['user-agent'];
        return { body: '<p>home</p>' };
      }
    });

    await new HttpClient({ userAgent: 'test-agent/1.0', retries: 0 }).get(`${server.origin}/`);

    expect(userAgent).toBe('test-agent/1.0');
  });

  it('reports refused connections as network errors', async () => {
    const closed = await startFixtureServer({});
    const origin = closed.origin;
    await closed.close();

    await expect(new HttpClient({ retries: 0 }).get(`${origin}/`)).rejects.toBeInstanceOf(CrawlNetworkError);
  });

  it('refuses a malformed redirect location without retrying', async () => {
    server = await startFixtureServer({
      '/moved': { status: 301, headers: { location: 'http://[bad' } }
    });
    const client = new HttpClient({ retries: 2, retryDelay: 0 });

    const failure = client.get(`${server.origin}/moved`);

    await expect(failure).rejects.toBeInstanceOf(CrawlError);
    await expect(failure).rejects.toMatchObject({ errorCode: 'CRAWL_BAD_REDIRECT' });
    expect(server.requests).toEqual(['/moved']);
  });

  it('keeps binary bodies as bytes', async () => {
    const pixel = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0xff]);
    server = await startFixtureServer({
      '/pixel.png': { headers: { 'content-type': 'image/png' }, body: pixel }
    });

    const response = await new HttpClient({ retries: 0 }).getBinary(`${server.origin}/pixel.png`);

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('image/png');
    expect(response.data.equals(pixel)).toBe(true);
  });
});
