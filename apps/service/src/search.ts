import { z } from 'zod';

import { ConfigurationError, SearchFailure, describeError } from '@shopscout/core';

import { silentLogger, type ServiceLogger } from './logger.js';

export const SERPAPI_ENDPOINT = 'https://serpapi.com/search';

export interface SearchOptions {
  /** Restricts the search to these domains; entries outside the trusted allowlist are ignored. */
  readonly domains?: readonly string[];
  readonly limit?: number;
}

export interface ProductSearch {
  search(query: string, options?: SearchOptions): Promise<readonly string[]>;
}

const SerpApiResponseSchema = z.object({
  error: z.string().optional(),
  organic_results: z
    .array(
      z.object({
        link: z.string().optional(),
        url: z.string().optional()
      })
    )
    .optional()
});

const LISTING_MARKERS = [
  '/s?k=',
  '/s/',
  '/search',
  '/browse',
  '/category',
  '/categories',
  '/collections',
  '/shop',
  '?s=',
  'results',
  '/filter',
  '/sort',
  'bestsellers',
  'new-arrivals',
  '/all-products',
  '/specials',
  '/b/',
  '/deals',
  '?node=',
  '&node=',
  '/page'
];

const PRODUCT_MARKERS = ['/dp/', '/product/', '/p/', '/item/', '/products/'];

const AMAZON_PRODUCT_ID = /\/b0[a-z0-9]{7,}/;

export const hostMatchesDomain = (host: string, domain: string): boolean => {
  const normalizedHost = host.toLowerCase().replace(/^www\./, '');
  const normalizedDomain = domain.toLowerCase().replace(/^www\./, '');
  return normalizedHost === normalizedDomain || normalizedHost.endsWith(`.${normalizedDomain}`);
};

/**
 * Accepts URLs that look like a single product detail page and rejects
 * search, category and listing pages.
 */
export const looksLikeProductPage = (url: string): boolean => {
  const lowered = url.toLowerCase();
  if (LISTING_MARKERS.some((marker) => lowered.includes(marker))) {
    return false;
  }
  if (PRODUCT_MARKERS.some((marker) => lowered.includes(marker))) {
    return true;
  }
  return /amazon\.[a-z.]+\//.test(lowered) && AMAZON_PRODUCT_ID.test(lowered);
};

export const normalizeResultUrl = (value: string): string | undefined => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return undefined;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return undefined;
  }
  parsed.hash = '';
  return parsed.toString();
};

export interface SerpApiProductSearchOptions {
  readonly apiKey?: string;
  readonly trustedDomains: readonly string[];
  readonly defaultLimit: number;
  readonly endpoint?: string;
  readonly timeoutMs?: number;
  readonly logger?: ServiceLogger;
}

export class SerpApiProductSearch implements ProductSearch {
  private readonly cache = new Map<string, readonly string[]>();
  private readonly logger: ServiceLogger;

  constructor(private readonly options: SerpApiProductSearchOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async search(query: string, options: SearchOptions = {}): Promise<readonly string[]> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new ConfigurationError('SERPAPI_KEY is not configured. Set the key before running a product search.');
    }

    const trimmed = query.trim();
    if (!trimmed) {
      throw new SearchFailure('Search query must not be empty');
    }

    const domains = this.resolveDomains(options.domains);
    if (domains.length === 0) {
      this.logger.warn('No trusted domains left to search', { requested: options.domains });
      return [];
    }

    const limit = Math.max(1, options.limit ?? this.options.defaultLimit);
    const cacheKey = JSON.stringify([trimmed, domains, limit]);
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const links = await this.requestLinks(apiKey, trimmed, domains, limit);
    const urls = this.selectProductUrls(links, domains, limit);
    this.cache.set(cacheKey, urls);
    this.logger.info('Product search completed', { query: trimmed, results: urls.length });
    return urls;
  }

  private resolveDomains(requested: readonly string[] | undefined): string[] {
    const trusted = this.options.trustedDomains;
    if (!requested || requested.length === 0) {
      return [...trusted];
    }
    return trusted.filter((domain) => requested.some((entry) => hostMatchesDomain(entry, domain)));
  }

  private async requestLinks(apiKey: string, query: string, domains: readonly string[], limit: number) {
    const siteFilter = domains.map((domain) => `site:${domain}`).join(' OR ');
    const url = new URL(this.options.endpoint ?? SERPAPI_ENDPOINT);
    url.search = new URLSearchParams({
      engine: 'google',
      q: `${query} ${siteFilter}`,
      // listing pages are dropped afterwards, so ask for extra results
      num: String(limit * 2),
      api_key: apiKey
    }).toString();

    let payload: unknown;
    try {
      const response = await fetch(url, {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 20_000)
      });
      if (!response.ok) {
        throw new SearchFailure(`Search API responded with ${response.status} ${response.statusText}`.trim());
      }
      payload = await response.json();
    } catch (error) {
      if (error instanceof SearchFailure) {
        throw error;
      }
      throw new SearchFailure(`Search request failed: ${describeError(error)}`, { cause: error });
    }

    const parsed = SerpApiResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SearchFailure('Search API returned an unexpected payload', { cause: parsed.error });
    }
    if (parsed.data.error) {
      throw new SearchFailure(`Search API error: ${parsed.data.error}`);
    }

    return (parsed.data.organic_results ?? []).flatMap((result) => {
      const link = result.link ?? result.url;
      return link ? [link] : [];
    });
  }

  private selectProductUrls(links: readonly string[], domains: readonly string[], limit: number): string[] {
    const seen = new Set<string>();
    const urls: string[] = [];

    for (const link of links) {
      const normalized = normalizeResultUrl(link);
      if (!normalized || seen.has(normalized)) {
        continue;
      }
      const host = new URL(normalized).hostname;
      if (!domains.some((domain) => hostMatchesDomain(host, domain)) || !looksLikeProductPage(normalized)) {
        continue;
      }
      seen.add(normalized);
      urls.push(normalized);
      if (urls.length >= limit) {
        break;
      }
    }

    return urls;
  }
}
