import { afterEach, describe, expect, it, vi } from 'vitest';

import { ConfigurationError, SearchFailure } from '@shopscout/core';

import { SerpApiProductSearch, hostMatchesDomain, looksLikeProductPage } from './search.js';

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const createSearch = (apiKey: string | undefined = 'test-secret') =>
  new SerpApiProductSearch({
    apiKey,
    trustedDomains: ['amazon.in', 'flipkart.com'],
    defaultLimit: 5
  });

describe('looksLikeProductPage', () => {
  it('accepts product detail paths and rejects listings', () => {
    expect(looksLikeProductPage('https://www.amazon.in/Acme-Watch/dp/B0ABCDE123')).toBe(true);
    expect(looksLikeProductPage('https://www.amazon.in/B0ABCDE1234')).toBe(true);
    expect(looksLikeProductPage('https://www.flipkart.com/zenbeat-neckband/p/itm123')).toBe(true);
    expect(looksLikeProductPage('https://www.amazon.in/s?k=watch')).toBe(false);
    expect(looksLikeProductPage('https://www.flipkart.com/audio/category/earbuds')).toBe(false);
    expect(looksLikeProductPage('https://www.amazon.in/gp/help')).toBe(false);
  });
});

describe('hostMatchesDomain', () => {
  it('matches the domain itself and its subdomains only', () => {
    expect(hostMatchesDomain('www.amazon.in', 'amazon.in')).toBe(true);
    expect(hostMatchesDomain('dl.flipkart.com', 'flipkart.com')).toBe(true);
    expect(hostMatchesDomain('notflipkart.com', 'flipkart.com')).toBe(false);
  });
});

describe('SerpApiProductSearch', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('restricts results to trusted product pages in result order', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({
        organic_results: [
          { link: 'https://www.flipkart.com/zenbeat-neckband/p/itm123' },
          { link: 'https://www.ebay.com/itm/zenbeat/123' },
          { link: 'https://www.amazon.in/s?k=neckband' },
          { link: 'https://www.flipkart.com/zenbeat-neckband/p/itm123#reviews' },
          { title: 'no link here' },
          { link: 'https://dl.flipkart.com/dl/zenbeat-pro/p/itm999' },
          { link: 'https://www.amazon.in/Zenbeat-Neckband/dp/B0ABCDE123' }
        ]
      })
    );

    const urls = await createSearch().search('bluetooth neckband', { limit: 2 });

    expect(urls).toEqual([
      'https://www.flipkart.com/zenbeat-neckband/p/itm123',
      'https://dl.flipkart.com/dl/zenbeat-pro/p/itm999'
    ]);

    const requested = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(requested.searchParams.get('engine')).toBe('google');
    expect(requested.searchParams.get('q')).toBe('bluetooth neckband site:amazon.in OR site:flipkart.com');
    expect(requested.searchParams.get('num')).toBe('4');
    expect(requested.searchParams.get('api_key')).toBe('test-secret');
  });

  it('narrows the domains to the requested trusted subset and caches results', async () => {
    const fetchMock = vi
      .spyOn(globalThis, 'fetch')
      .mockImplementation(() =>
        Promise.resolve(jsonResponse({ organic_results: [{ link: 'https://www.amazon.in/Kettle/dp/B0KETTLE123' }] }))
      );
    const search = createSearch();

    const first = await search.search('electric kettle', { domains: ['amazon.in', 'example.org'] });
    const second = await search.search('electric kettle', { domains: ['amazon.in', 'example.org'] });

    expect(first).toEqual(['https://www.amazon.in/Kettle/dp/B0KETTLE123']);
    expect(second).toBe(first);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const requested = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(requested.searchParams.get('q')).toBe('electric kettle site:amazon.in');
  });

  it('returns nothing when no requested domain is trusted', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch');

    await expect(createSearch().search('kettle', { domains: ['example.org'] })).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails with a configuration error when the key is missing', async () => {
    await expect(createSearch(undefined).search('kettle')).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('surfaces API errors as search failures', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ error: 'Invalid API key.' }));

    await expect(createSearch().search('kettle')).rejects.toThrow('Search API error: Invalid API key.');
  });

  it('surfaces HTTP failures as search failures', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({}, 500));

    await expect(createSearch().search('kettle')).rejects.toBeInstanceOf(SearchFailure);
  });
});
