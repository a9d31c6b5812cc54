import { createHash } from 'node:crypto';

const MAX_SLUG_LENGTH = 80;

/**
 * File-safe key for a page URL: a readable host+path slug followed by a short
 * SHA-1 of the URL without its fragment, so URLs that slug alike never
 * collide and a page and its record share a key.
 */
export function storageKeyFor(sourceUrl: string): string {
  const url = new URL(sourceUrl);
  url.hash = '';
  const slug = `${url.hostname.replace(/^www\./, '')}${url.pathname}`
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, '');
  const digest = createHash('sha1').update(url.toString()).digest('hex').slice(0, 10);

  return slug ? `${slug}-${digest}` : digest;
}
