import { describe, it, expect } from 'vitest';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import { WebPageReader, htmlToPlainText } from '../src/ingestion/webReader';
import { FetchError } from '../src/lib/errors';
import { silentLogger } from './utils';

// Serves canned pages from memory; unknown URLs fail like a refused connection.
function inMemoryHttp(pages: Record<string, string>, seen: string[] = []) {
  return axios.create({
    responseType: 'text',
    adapter: async (config: InternalAxiosRequestConfig) => {
      const url = config.url ?? '';
      seen.push(url);
      const body = pages[url];
      if (body === undefined) {
        throw new Error(`connect ECONNREFUSED ${url}`);
      }
      return { data: body, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
}

describe('htmlToPlainText', () => {
  it('keeps paragraph text and drops scripts', () => {
    const html =
      '<html><body><script>var x = 1;</script><p>Hello world</p></body></html>';
    expect(htmlToPlainText(html)).toBe('Hello world');
  });

  it('puts adjacent blocks and list items on their own lines', () => {
    const html =
      '<html><body><h1>Title</h1><p>First paragraph.</p><ul><li>one</li><li>two</li></ul></body></html>';
    expect(htmlToPlainText(html)).toBe('Title\nFirst paragraph.\none\ntwo');
  });

  it('keeps at most one blank line between nested blocks', () => {
    const html = '<div><div><h2>A</h2></div></div><div>B</div>';
    expect(htmlToPlainText(html)).toBe('A\n\nB');
  });
});

describe('WebPageReader', () => {
  it('returns one record per url, in request order', async () => {
    const seen: string[] = [];
    const http = inMemoryHttp(
      {
        'https://a.test/': '<p>Alpha</p>',
        'https://b.test/': '<p>Beta</p>',
      },
      seen
    );
    const reader = new WebPageReader(silentLogger(), { http });

    const pages = await reader.load(['https://b.test/', 'https://a.test/']);

    expect(pages).toEqual([
      { id: 'https://b.test/', text: 'Beta' },
      { id: 'https://a.test/', text: 'Alpha' },
    ]);
    expect(seen).toEqual(['https://b.test/', 'https://a.test/']);
  });

  it('returns the raw body when html conversion is off', async () => {
    const http = inMemoryHttp({ 'https://a.test/': '<p>Alpha</p>' });
    const reader = new WebPageReader(silentLogger(), {
      http,
      htmlToText: false,
    });

    expect(await reader.load(['https://a.test/'])).toEqual([
      { id: 'https://a.test/', text: '<p>Alpha</p>' },
    ]);
  });

  it('fails the whole load on the first unreachable page', async () => {
    const seen: string[] = [];
    const http = inMemoryHttp({ 'https://a.test/': '<p>Alpha</p>' }, seen);
    const reader = new WebPageReader(silentLogger(), { http });

    const error = await reader
      .load(['https://a.test/', 'https://down.test/', 'https://c.test/'])
      .catch(e => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error.url).toBe('https://down.test/');
    expect(error.message).toBe(
      'Fetching https://down.test/ failed: connect ECONNREFUSED https://down.test/'
    );
    expect(seen).toEqual(['https://a.test/', 'https://down.test/']);
  });

  it('returns an empty list for no urls', async () => {
    const reader = new WebPageReader(silentLogger(), {
      http: inMemoryHttp({}),
    });
    expect(await reader.load([])).toEqual([]);
  });
});
