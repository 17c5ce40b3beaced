/**
 * In-process stand-ins shared by the crawler tests
 */

import http, { type IncomingMessage } from 'http';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { Clock } from '../domain/RateLimiter.js';
import type { CrawlPolicy } from '../../../shared/domain/models/CrawlPolicy.js';
import type { FilterContext } from '../domain/filters/Filter.js';
import { UrlProcessor } from '../domain/UrlProcessor.js';

export interface FixtureResponse {
  status?: number;
  headers?: Record<string, string>;
  body?: string | Buffer;

  /** Hold the response back this many milliseconds */
  delay?: number;

  /** Close the connection instead of answering */
  destroy?: boolean;
}

export type FixtureRoute = FixtureResponse | ((request: IncomingMessage) => FixtureResponse);

export interface FixtureServer {
  /** Origin without a trailing slash, e.g. http://127.0.0.1:50123 */
  origin: string;

  /** Request paths in arrival order */
  requests: string[];

  /** Most requests that were open at the same time */
  peakOpen(): number;

  close(): Promise<void>;
}

/**
 * Serve fixed responses by request path on an ephemeral port; unknown paths get a 404
 */
export async function startFixtureServer(routes: Record<string, FixtureRoute>): Promise<FixtureServer> {
  const requests: string[] = [];
  let open = 0;
  let peak = 0;

  const server = http.createServer((request, response) => {
    const requestPath = request.url ?? '/';
    requests.push(requestPath);
    open++;
    peak = Math.max(peak, open);
    response.on('close', () => {
      open--;
    });

    const route = routes[requestPath];
    const fixture: FixtureResponse = route === undefined
      ? { status: 404, body: '<h1>Not found</h1>' }
      : typeof route === 'function' ? route(request) : route;

    const respond = () => {
      if (fixture.destroy) {
        request.socket.destroy();
        return;
      }
      response.writeHead(fixture.status ?? 200, { 'content-type': 'text/html; charset=utf-8', ...fixture.headers });
      response.end(fixture.body ?? '');
    };

    if (fixture.delay) {
      setTimeout(respond, fixture.delay);
    } else {
      respond();
    }
  });

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Fixture server has no TCP address');
  }

  return {
    origin: `http://127.0.0.1:${address.port}`,
    requests,
    peakOpen: () => peak,
    close: () => new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close(error => (error ? reject(error) : resolve()));
    })
  };
}

/**
 * Clock that advances only when slept on
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public time = 0) {}

  now(): number {
    return this.time;
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
    return Promise.resolve();
  }
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Filter context for a page of a site, as the crawler would build it
 */
export function makeContext(policy: CrawlPolicy, url: string, overrides: Partial<FilterContext> = {}): FilterContext {
  const urls = new UrlProcessor(policy);
  return {
    url,
    path: urls.urlToPath(url),
    baseUrl: policy.baseUrl,
    rootUrl: urls.rootUrl(),
    rootPath: urls.rootPagePath(),
    initialPaths: [urls.rootPagePath()],
    slug: 'test',
    rootTitle: 'Test Docs',
    originalHtml: '',
    html: '',
    title: '',
    content: '',
    additionalEntries: [],
    urls,
    options: {},
    ...overrides
  };
}
