import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { CleanHtmlFilter } from '../domain/filters/CleanHtmlFilter.js';
import { NormalizeUrlsFilter } from '../domain/filters/NormalizeUrlsFilter.js';
import { ImagesFilter } from '../domain/filters/ImagesFilter.js';
import { TitleFilter } from '../domain/filters/TitleFilter.js';
import { EntriesFilter } from '../domain/filters/EntriesFilter.js';
import { AttributionFilter } from '../domain/filters/AttributionFilter.js';
import { makeContext } from './fixtures.js';

const BASE = 'https://docs.example.com/docs/';
const policy = { baseUrl: BASE, trailingSlash: true, mirrorUrls: ['https://mirror.example.com/docs/'] };

function hrefs(html: string): string[] {
  const $ = cheerio.load(html, null, false);
  return $('a').map((_, element) => $(element).attr('href') ?? '').get();
}

describe('CleanHtmlFilter', () => {
  it('keeps the container content and normalizes highlighted code', () => {
    const html = '<html><head><title>T</title><script>boot()</script></head><body><nav>Menu</nav>' +
      '<main class="content" style="color: red"><h1>Hello</h1><!-- note --><script>track()</script>' +
      '<div class="wrap"><p class="lead">Text</p></div>' +
      '<pre class="language-js"><span class="token-line">const a = 1;</span><span class="token-line">a++;</span></pre>' +
      '</main></body></html>';
    const filter = new CleanHtmlFilter({ container: 'main', unwrap: ['.wrap'] });

    expect(filter.apply(html, makeContext(policy, `${BASE}guide/`))).toBe(
      '<h1>Hello</h1><p>Text</p><pre data-language="js"><code data-language="js">const a = 1;\na++;</code></pre>'
    );
  });

  it('falls back to the body and reads the language from the code element', () => {
    const html = '<body><p style="margin: 0">A</p><pre><code class="lang-ts">let x: number;</code></pre></body>';
    const filter = new CleanHtmlFilter({ container: '.missing' });

    expect(filter.apply(html, makeContext(policy, `${BASE}guide/`))).toBe(
      '<p>A</p><pre data-language="ts"><code data-language="ts">let x: number;</code></pre>'
    );
  });

  it('treats a malformed selector as matching nothing', () => {
    const filter = new CleanHtmlFilter({ remove: ['[[['] });
    expect(filter.apply('<body><p>Kept</p></body>', makeContext(policy, `${BASE}guide/`))).toBe('<p>Kept</p>');
  });
});

describe('NormalizeUrlsFilter', () => {
  it('rewrites links onto the primary base URL', () => {
    const html = '<p><a href="../api#opts">API</a><a href="#local">Local</a>' +
      '<a href="https://mirror.example.com/docs/cli">CLI</a><a href="mailto:team@example.com">Mail</a></p>';
    const output = new NormalizeUrlsFilter().apply(html, makeContext(policy, `${BASE}guide/`));

    expect(hrefs(output)).toEqual([
      `${BASE}api/#opts`,
      '#local',
      `${BASE}cli/`,
      'mailto:team@example.com'
    ]);
  });
});

describe('ImagesFilter', () => {
  it('makes image sources absolute and drops srcset', () => {
    const html = '<img src="img/diagram.png" srcset="img/diagram@2x.png 2x"><img src="data:image/png;base64,AAAA">';
    const output = new ImagesFilter().apply(html, makeContext(policy, `${BASE}guide/`));

    const $ = cheerio.load(output, null, false);
    const images = $('img');
    expect(images.eq(0).attr('src')).toBe(`${BASE}guide/img/diagram.png`);
    expect(images.eq(0).attr('srcset')).toBeUndefined();
    expect(images.eq(1).attr('src')).toBe('data:image/png;base64,AAAA');
  });

  it('asks for inlining only when configured to', () => {
    const plain = makeContext(policy, `${BASE}guide/`);
    new ImagesFilter().apply('<img src="a.png">', plain);
    expect(plain.inlineImages).toBeUndefined();

    const inlined = makeContext(policy, `${BASE}guide/`);
    new ImagesFilter({ inline: true, maxSize: 2048 }).apply('<img src="a.png">', inlined);
    expect(inlined.inlineImages).toEqual({ maxSize: 2048 });
  });
});

describe('TitleFilter', () => {
  it('takes the title of a page from its first heading', () => {
    const context = makeContext(policy, `${BASE}guide/`);
    const html = '<h1> Guide </h1><p>Body</p>';

    expect(new TitleFilter().apply(html, context)).toBe(html);
    expect(context.title).toBe('Guide');
  });

  it('gives the root page the root title and a heading', () => {
    const context = makeContext(policy, BASE);

    expect(new TitleFilter().apply('<p>Welcome</p>', context)).toBe('<h1>Test Docs</h1><p>Welcome</p>');
    expect(context.title).toBe('Test Docs');
  });
});

describe('EntriesFilter', () => {
  const filter = new EntriesFilter({
    nameRules: [{ type: 'Tooling', prefixes: ['@scope/core'] }],
    pathRules: [{ type: 'Plugins', contains: ['plugin-'] }],
    additionalSelector: 'h2[id]'
  });

  it('derives the type from the path and adds anchored headings to the context', () => {
    const context = makeContext(policy, `${BASE}plugin-foo/`);
    const html = '<h1>Foo   plugin</h1><h2 id="options">Options</h2><h2>No id</h2>';

    expect(filter.apply(html, context)).toBe(html);
    expect(filter.getEntries(html, context)).toEqual([
      { name: 'Foo plugin', path: 'plugin-foo/', type: 'Plugins' }
    ]);
    expect(context.additionalEntries).toEqual([
      { name: 'Options', path: 'plugin-foo/#options', type: 'Plugins' }
    ]);
  });

  it('checks name rules before path rules', () => {
    const context = makeContext(policy, `${BASE}plugin-core/`);
    expect(filter.getEntries('<h1>@scope/core</h1>', context)).toEqual([
      { name: '@scope/core', path: 'plugin-core/', type: 'Tooling' }
    ]);
  });

  it('names a page without heading after its last path segment', () => {
    const context = makeContext({ baseUrl: BASE }, `${BASE}guides/getting_started`);
    expect(filter.getEntries('<p>Text</p>', context)).toEqual([
      { name: 'getting started', path: 'guides/getting_started', type: 'Miscellaneous' }
    ]);
  });

  it('gives the root page no entry', () => {
    const context = makeContext(policy, BASE);
    filter.apply('<h1>Home</h1><h2 id="intro">Intro</h2>', context);

    expect(filter.getEntries('<h1>Home</h1>', context)).toEqual([]);
    expect(context.additionalEntries).toEqual([]);
  });
});

describe('AttributionFilter', () => {
  it('appends the notice with a link to the page', () => {
    const url = `${BASE}guide/`;
    const context = makeContext(policy, url, { attribution: 'Example authors<br>MIT License' });
    const output = new AttributionFilter().apply('<p>Body</p>', context);

    expect(output).toBe(
      '<p>Body</p><div class="_attribution"><p class="_attribution-p">Example authors<br>MIT License<br>' +
      `<a class="_attribution-link" href="${url}">${url}</a></p></div>`
    );
  });

  it('leaves pages alone when the site has no attribution', () => {
    expect(new AttributionFilter().apply('<p>Body</p>', makeContext(policy, `${BASE}guide/`))).toBe('<p>Body</p>');
  });
});
