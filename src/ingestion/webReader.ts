import axios, { type AxiosInstance } from 'axios';
import type { FastifyBaseLogger } from 'fastify';
import { load } from 'cheerio';
import { FetchError, errorMessage } from '../lib/errors';
import type { PageReader, PageRecord } from './types';

export type WebPageReaderOptions = {
  htmlToText?: boolean;
  timeoutMs?: number;
  http?: AxiosInstance;
};

const BLOCK_ELEMENTS =
  'p, h1, h2, h3, h4, h5, h6, li, div, br, tr, section, article, pre, blockquote, header, footer';

export function htmlToPlainText(html: string): string {
  const $ = load(html);
  $('script, style, noscript, nav, img').remove();
  // Minified markup has no whitespace between blocks.
  $(BLOCK_ELEMENTS).after('\n');
  return $('body')
    .text()
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Loads web pages one at a time. The first page that cannot be fetched
 * fails the whole load; nothing is returned for the pages read before it.
 */
export class WebPageReader implements PageReader {
  private readonly http: AxiosInstance;
  private readonly htmlToText: boolean;
  private readonly logger: FastifyBaseLogger;

  constructor(logger: FastifyBaseLogger, options: WebPageReaderOptions = {}) {
    this.logger = logger;
    this.htmlToText = options.htmlToText ?? true;
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? 15000,
        responseType: 'text',
        headers: { accept: 'text/html,text/plain;q=0.9,*/*;q=0.8' },
      });
  }

  async load(urls: string[]): Promise<PageRecord[]> {
    const pages: PageRecord[] = [];
    for (const url of urls) {
      pages.push(await this.loadOne(url));
    }
    this.logger.info({ count: pages.length }, 'web pages loaded');
    return pages;
  }

  private async loadOne(url: string): Promise<PageRecord> {
    let body: unknown;
    try {
      const res = await this.http.get<string>(url, { responseType: 'text' });
      body = res.data;
    } catch (error) {
      this.logger.error({ url, err: error }, 'web page fetch failed');
      throw new FetchError(
        url,
        `Fetching ${url} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    if (typeof body !== 'string') {
      throw new FetchError(url, `Fetching ${url} returned a non-text body`);
    }
    const text = this.htmlToText ? htmlToPlainText(body) : body;
    this.logger.debug({ url, chars: text.length }, 'web page read');
    return { id: url, text };
  }
}
