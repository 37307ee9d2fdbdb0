/**
 * Wikipedia API client
 *
 * Thin wrapper over the MediaWiki action API: full-text search and rendered
 * page HTML. No retries; a timeout applies only when one is configured.
 */

import { z } from 'zod';
import { DEFAULT_LANG, DEFAULT_USER_AGENT, SEARCH_LIMIT } from '../lib/constants.js';
import { NotFoundError, UpstreamError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { PageSource } from '../extract/extractor.js';

export interface WikipediaClientOptions {
  /** Language edition, used to build the endpoint when `apiUrl` is not set */
  lang?: string | undefined;
  /** MediaWiki action API endpoint */
  apiUrl?: string | undefined;
  userAgent?: string | undefined;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number | undefined;
}

const ApiErrorSchema = z.object({
  code: z.string(),
  info: z.string().optional(),
});

const SearchResponseSchema = z.object({
  error: ApiErrorSchema.optional(),
  query: z
    .object({
      search: z.array(z.object({ title: z.string() })),
    })
    .optional(),
});

const ParseResponseSchema = z.object({
  error: ApiErrorSchema.optional(),
  parse: z
    .object({
      title: z.string(),
      text: z.string(),
    })
    .optional(),
});

type ApiError = z.infer<typeof ApiErrorSchema>;

/**
 * Build the action API URL for a language edition
 */
export function apiUrlForLang(lang: string): string {
  return `https://${lang}.wikipedia.org/w/api.php`;
}

export class WikipediaClient implements PageSource {
  private readonly apiUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number | undefined;

  constructor(options: WikipediaClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? apiUrlForLang(options.lang ?? DEFAULT_LANG);
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Full-text search
   *
   * @returns Page titles in rank order
   */
  async search(query: string, limit = SEARCH_LIMIT): Promise<string[]> {
    const data = SearchResponseSchema.parse(
      await this.request({
        action: 'query',
        list: 'search',
        srsearch: query,
        srlimit: String(limit),
        srprop: '',
      })
    );

    if (data.error) {
      throw apiError(data.error);
    }

    const titles = (data.query?.search ?? []).map((hit) => hit.title);
    loggers.wikipedia.debug('Search complete', { query, hits: titles.length });
    return titles;
  }

  /**
   * Rendered HTML of a page, following redirects
   */
  async fetchHtml(title: string): Promise<string> {
    const data = ParseResponseSchema.parse(
      await this.request({
        action: 'parse',
        page: title,
        prop: 'text',
        redirects: '1',
      })
    );

    if (data.error) {
      throw apiError(data.error);
    }
    if (!data.parse) {
      throw new UpstreamError(`Wikipedia API returned no content for "${title}"`);
    }

    loggers.wikipedia.debug('Page fetched', { title: data.parse.title, bytes: data.parse.text.length });
    return data.parse.text;
  }

  /**
   * HTML of the top search hit for `query`
   *
   * @throws {NotFoundError} If the search has no results
   */
  async getPageHtml(query: string): Promise<string> {
    const [title] = await this.search(query);
    if (title === undefined) {
      throw new NotFoundError(`No Wikipedia results for "${query}"`);
    }
    return this.fetchHtml(title);
  }

  private async request(params: Record<string, string>): Promise<unknown> {
    const search = new URLSearchParams({ ...params, format: 'json', formatversion: '2' });
    const url = `${this.apiUrl}?${search}`;

    const response = await fetch(url, {
      headers: { 'User-Agent': this.userAgent },
      ...(this.timeoutMs !== undefined ? { signal: AbortSignal.timeout(this.timeoutMs) } : {}),
    });

    if (!response.ok) {
      throw new UpstreamError(
        `Wikipedia API error: ${response.status} ${response.statusText}`,
        response.status
      );
    }

    return response.json();
  }
}

function apiError(error: ApiError): Error {
  const detail = error.info ?? error.code;
  if (error.code === 'missingtitle') {
    return new NotFoundError(`Wikipedia page not found: ${detail}`);
  }
  return new UpstreamError(`Wikipedia API error: ${detail}`);
}
