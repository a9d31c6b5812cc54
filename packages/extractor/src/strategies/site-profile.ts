import { readFileSync } from 'node:fs';

import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { z } from 'zod';

import type { PriceCandidate, Review } from '@shopscout/core';

import {
  collapseWhitespace,
  firstText,
  imageSource,
  isSecondaryPrice,
  isStruckThrough,
  reviewFromText
} from '../dom.js';
import type { ExtractionContext, ExtractionStrategy, StrategyResult } from '../types.js';

const selectorList = z.array(z.string().min(1)).default([]);

export const SiteProfileSchema = z
  .object({
    id: z.string().min(1),
    hosts: z.array(z.string().min(1)).min(1),
    title: selectorList,
    price: selectorList,
    listPrice: selectorList,
    images: selectorList,
    description: selectorList,
    reviews: selectorList
  })
  .strict();

export type SiteProfile = z.infer<typeof SiteProfileSchema>;

const loadBuiltInProfiles = (): SiteProfile[] => {
  const raw = readFileSync(new URL('./site-profiles.json', import.meta.url), 'utf-8');
  return z.array(SiteProfileSchema).parse(JSON.parse(raw));
};

export const BUILT_IN_SITE_PROFILES: readonly SiteProfile[] = loadBuiltInProfiles();

const matchesHost = (host: string, profileHost: string): boolean =>
  host === profileHost || host.endsWith(`.${profileHost}`);

export const findSiteProfile = (
  host: string,
  profiles: readonly SiteProfile[] = BUILT_IN_SITE_PROFILES
): SiteProfile | undefined => {
  const normalized = host.toLowerCase();
  return profiles.find((profile) => profile.hosts.some((profileHost) => matchesHost(normalized, profileHost)));
};

/** First element of the first selector that yields a price-looking text. */
const firstPriceText = ($: CheerioAPI, selectors: readonly string[], struck: boolean): string | undefined => {
  for (const selector of selectors) {
    for (const element of $<Element, string>(selector).toArray()) {
      const text = collapseWhitespace($(element).text());
      if (!text || !/\d/.test(text) || isSecondaryPrice($, element)) {
        continue;
      }
      if (!struck && isStruckThrough($, element)) {
        continue;
      }
      return text;
    }
  }
  return undefined;
};

const collectReviews = ($: CheerioAPI, selectors: readonly string[]): Review[] => {
  const reviews: Review[] = [];
  for (const selector of selectors) {
    $(selector).each((_, element) => {
      const review = reviewFromText($(element).text());
      if (review) {
        reviews.push(review);
      }
    });
  }
  return reviews;
};

const collectImages = ($: CheerioAPI, selectors: readonly string[]): string[] =>
  selectors.flatMap((selector) =>
    $<Element, string>(selector)
      .toArray()
      .flatMap((element) => {
        const source = imageSource(element);
        return source ? [source] : [];
      })
  );

export const createSiteProfileStrategy = (
  profiles: readonly SiteProfile[] = BUILT_IN_SITE_PROFILES
): ExtractionStrategy => ({
  tag: 'site-profile',
  extract({ $, host }: ExtractionContext): StrategyResult | undefined {
    const profile = findSiteProfile(host, profiles);
    if (!profile) {
      return undefined;
    }

    const priceCandidates: PriceCandidate[] = [];
    const price = firstPriceText($, profile.price, false);
    if (price) {
      priceCandidates.push({ raw: price, source: 'visible-price-element' });
    }
    const listPrice = firstPriceText($, profile.listPrice, true);
    if (listPrice) {
      priceCandidates.push({ raw: listPrice, source: 'list-price' });
    }

    const title = firstText($, undefined, profile.title);

    return {
      strategy: 'site-profile',
      evidence: {
        titles: title ? [title] : [],
        priceCandidates,
        images: collectImages($, profile.images),
        description: firstText($, undefined, profile.description),
        reviews: collectReviews($, profile.reviews)
      },
      consistent: title !== undefined && price !== undefined
    };
  }
});

export const siteProfileStrategy: ExtractionStrategy = createSiteProfileStrategy();
