import type { CheerioAPI } from 'cheerio';

import { findPriceTokens, type PriceCandidate, type Review } from '@shopscout/core';

import {
  collapseWhitespace,
  firstText,
  hintOf,
  imageSource,
  isListPriceMarked,
  isSecondaryPrice,
  isStruckThrough,
  metaContent,
  parseRating,
  reviewFromText
} from '../dom.js';
import type { ExtractionContext, ExtractionStrategy, StrategyResult } from '../types.js';

const PRICE_HINT = /price|amount|offer|deal|selling|mrp/i;
const GALLERY_HINT = /gallery|carousel|slider|zoom|product[-_]?(?:image|img|photo|media)|hero/i;
const NON_PRODUCT_IMAGE = /logo|icon|sprite|pixel|badge|avatar|placeholder|\.svg(?:$|\?)/i;
const REVIEW_CONTAINER = /(?:^|[-_])review(?:[-_](?:item|card|container|block))?$/i;
const MAX_PRICE_TEXT_LENGTH = 60;
const MAX_SCAN_TOKENS = 5;

/** `<title>` text without a trailing ` | Site` or ` - Site` segment. */
export const stripSiteSuffix = (title: string): string => {
  const stripped = title.replace(/\s+[|\-–—:]\s+[^|\-–—:]+$/, '').trim();
  return stripped.length > 0 ? stripped : title;
};

const readTitles = ($: CheerioAPI): string[] => {
  const heading = firstText($, undefined, ['h1']);
  const documentTitle = collapseWhitespace($('title').first().text());
  return [
    heading,
    metaContent($, ['og:title']),
    metaContent($, ['twitter:title']),
    documentTitle ? stripSiteSuffix(documentTitle) : undefined
  ].filter((title): title is string => title !== undefined && title.length > 0);
};

/**
 * Price-like elements, innermost first: a container whose descendant also
 * matches is skipped so a price box does not shadow the figures inside it.
 */
const readPriceElements = ($: CheerioAPI): PriceCandidate[] => {
  const matches = $('body *')
    .toArray()
    .filter((element) => {
      if (element.name === 'script' || element.name === 'style') {
        return false;
      }
      const text = collapseWhitespace($(element).text());
      if (!text || text.length > MAX_PRICE_TEXT_LENGTH || !/\d/.test(text)) {
        return false;
      }
      const hinted = PRICE_HINT.test(hintOf(element)) || element.attribs.itemprop === 'price';
      return hinted || (isListPriceMarked(element) && findPriceTokens(text).length > 0);
    });

  const matched = new Set(matches);
  return matches
    .filter((element) => !$(element).find('*').toArray().some((child) => matched.has(child)))
    .filter((element) => !isSecondaryPrice($, element))
    .map((element) => ({
      raw: collapseWhitespace($(element).text()),
      source: isStruckThrough($, element) ? ('list-price' as const) : ('visible-price-element' as const)
    }));
};

/**
 * Currency-marked figures from the visible body text, with scripts and
 * struck-through prices removed.
 */
const scanBodyText = ($: CheerioAPI): PriceCandidate[] => {
  const body = $('body').clone();
  body.find('script, style, noscript, template').remove();
  body
    .find('*')
    .filter((_, element) => isListPriceMarked(element) || isSecondaryPrice($, element))
    .remove();
  // Keep adjacent inline elements from gluing their figures together.
  body.find('*').after(' ');

  return findPriceTokens(collapseWhitespace(body.text()))
    .slice(0, MAX_SCAN_TOKENS)
    .map((token) => ({ raw: token.raw, source: 'heuristic-text-scan' as const }));
};

const readImages = ($: CheerioAPI): string[] => {
  const meta = [metaContent($, ['og:image', 'og:image:url']), metaContent($, ['twitter:image'])].filter(
    (value): value is string => value !== undefined
  );

  const usable = $('img')
    .toArray()
    .filter((element) => {
      const source = imageSource(element);
      return source !== undefined && !NON_PRODUCT_IMAGE.test(source);
    });
  const gallery = usable.filter((element) =>
    $(element)
      .parents()
      .toArray()
      .some((ancestor) => GALLERY_HINT.test(hintOf(ancestor)))
  );
  const chosen = gallery.length > 0 ? gallery : usable;

  return [
    ...meta,
    ...chosen.flatMap((element) => {
      const source = imageSource(element);
      return source ? [source] : [];
    })
  ];
};

const readDescription = ($: CheerioAPI): string | undefined =>
  firstText($, undefined, ['#productDescription', '[data-testid="product-description"]', '.product-description']) ??
  metaContent($, ['og:description', 'description', 'twitter:description']);

const readReviews = ($: CheerioAPI): Review[] => {
  const reviews: Review[] = [];
  $('body *').each((_, element) => {
    const classes = (element.attribs.class ?? '').split(/\s+/);
    const isContainer =
      element.attribs['data-hook'] === 'review' || classes.some((token) => REVIEW_CONTAINER.test(token));
    if (!isContainer) {
      return;
    }

    const container = $(element);
    const text =
      firstText($, container, ['[data-hook="review-body"]', '.review-text', '.review-body', '.review-content']) ??
      firstText($, container, ['p']);
    const ratingNode = container.find('[data-rating], [class*="rating"], [class*="star"]').first();
    const rating = parseRating(ratingNode.attr('data-rating') ?? ratingNode.text());
    const author = firstText($, container, ['[data-hook="review-author"]', '.review-author', '.author']);
    const review = reviewFromText(text, rating, author);
    if (review) {
      reviews.push(review);
    }
  });
  return reviews;
};

/**
 * Page-agnostic fallbacks: headings and social meta for the title, price-like
 * elements and a text scan for prices, gallery images and review blocks.
 */
export const genericHeuristicStrategy: ExtractionStrategy = {
  tag: 'generic-heuristic',
  extract({ $ }: ExtractionContext): StrategyResult {
    const titles = readTitles($);
    const priceCandidates = [...readPriceElements($), ...scanBodyText($)];

    return {
      strategy: 'generic-heuristic',
      evidence: {
        titles,
        priceCandidates,
        images: readImages($),
        description: readDescription($),
        reviews: readReviews($)
      },
      consistent: titles.length > 0 && priceCandidates.length > 0
    };
  }
};
