/**
 * arXiv paper lookup over the Atom query API
 */

import axios, { AxiosInstance } from 'axios';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { PaperSearchConfig } from '../config/config-types';
import { FallbackErrorHandler } from '../system/error-handling';
import { AppLogger, createIntegrationLogger, toError } from '../utils/logger';

export interface PaperMatch {
  url: string;
  title: string;

  /** Up to three names joined by ", ", with "..." when there are more */
  authors: string;
}

export interface PaperSearchError {
  error: string;
}

export type PaperSearchResult = PaperMatch | PaperSearchError;

export interface PaperLink extends PaperMatch {
  source: 'arxiv' | 'web';
}

export interface PaperSearch {
  search(query: string): Promise<PaperSearchResult>;
}

export function isPaperMatch(result: PaperSearchResult): result is PaperMatch {
  return !('error' in result);
}

const textSchema = z.union([z.string(), z.object({ '#text': z.string() }).transform(node => node['#text'])]);

const linkSchema = z.object({
  '@_href': z.string().optional(),
  '@_rel': z.string().optional(),
  '@_type': z.string().optional()
});

const entrySchema = z.object({
  title: textSchema.optional(),
  link: z.array(linkSchema).default([]),
  author: z.array(z.object({ name: textSchema.optional() })).default([])
});

const feedSchema = z.object({
  feed: z.object({
    entry: z.array(entrySchema).optional()
  })
});

type FeedEntry = z.infer<typeof entrySchema>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: name => name === 'entry' || name === 'link' || name === 'author'
});

/**
 * First entry of an arXiv Atom feed
 */
export function parseArxivFeed(xml: string): PaperSearchResult {
  const parsed = feedSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    return { error: `Unexpected arXiv response: ${parsed.error.issues[0]?.message ?? 'invalid feed'}` };
  }

  const entry = parsed.data.feed.entry?.[0];
  if (!entry) {
    return { error: 'No results found' };
  }

  const authors = entry.author.map(author => author.name?.trim() ?? '').filter(name => name.length > 0);

  return {
    url: entryUrl(entry),
    title: entry.title ? entry.title.replace(/\s+/g, ' ').trim() || 'Unknown' : 'Unknown',
    authors: authors.slice(0, 3).join(', ') + (authors.length > 3 ? '...' : '')
  };
}

/**
 * The text/html link, else the last rel=alternate link
 */
function entryUrl(entry: FeedEntry): string {
  let url = '';
  for (const link of entry.link) {
    if (link['@_type'] === 'text/html') {
      return link['@_href'] ?? '';
    }
    if (link['@_rel'] === 'alternate') {
      url = link['@_href'] ?? '';
    }
  }
  return url;
}

export function webSearchUrl(query: string): string {
  return `https://www.google.com/search?q=${encodeURIComponent(query)}`;
}

export class ArxivSearchClient implements PaperSearch {
  private readonly http: AxiosInstance;
  private readonly logger: AppLogger;

  constructor(private readonly config: PaperSearchConfig, http?: AxiosInstance, logger?: AppLogger) {
    this.http = http || axios.create();
    this.logger = logger || createIntegrationLogger('arxiv');
  }

  async search(query: string): Promise<PaperSearchResult> {
    const handler = new FallbackErrorHandler<string | PaperSearchError>(
      { module: 'arxiv', operation: 'search', data: { query } },
      error => ({ error: error.message }),
      this.logger
    );

    const body = await handler.handle(
      async () => {
        const response = await this.http.get<string>(this.config.endpoint, {
          params: { search_query: `all:${query}`, max_results: 1 },
          responseType: 'text',
          timeout: this.config.timeoutMs
        });
        return response.data;
      },
      { maxRetries: this.config.retries + 1, retryDelay: this.config.retryDelayMs, backoffFactor: 2 }
    );

    if (typeof body !== 'string') {
      return body;
    }

    try {
      return parseArxivFeed(body);
    } catch (error) {
      const message = toError(error).message;
      this.logger.warn(`Could not parse arXiv response: ${message}`, { query }, 'search');
      return { error: message };
    }
  }

  /**
   * arXiv match, or a web search link titled with the query
   */
  async findLink(query: string): Promise<PaperLink> {
    const result = await this.search(query);
    if (isPaperMatch(result) && result.url) {
      return { ...result, source: 'arxiv' };
    }

    return { url: webSearchUrl(query), title: query, authors: '', source: 'web' };
  }
}
