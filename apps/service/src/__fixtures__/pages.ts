import { vi } from 'vitest';

import { listProductPageFixtures } from '@shopscout/fixtures';

const PAGES = new Map<string, string>(
  listProductPageFixtures().map((fixture): [string, string] => [fixture.sourceUrl, fixture.html])
);

/**
 * Serves fixture pages from a stubbed global `fetch`. URLs listed in
 * `hanging` never answer until their request is aborted; unknown URLs get 404.
 */
export const stubPages = (hanging: readonly string[] = []) =>
  vi.spyOn(globalThis, 'fetch').mockImplementation((input, init) => {
    const url = String(input);
    if (hanging.includes(url)) {
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
      });
    }
    const html = PAGES.get(url);
    return Promise.resolve(html ? new Response(html, { status: 200 }) : new Response('missing', { status: 404 }));
  });
