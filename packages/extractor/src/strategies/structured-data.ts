import type { CheerioAPI } from 'cheerio';

import type { PriceCandidate, Review } from '@shopscout/core';

import { collapseWhitespace, firstText, imageSource, parseRating, reviewFromText } from '../dom.js';
import type { ExtractionContext, ExtractionStrategy, ProductEvidence, StrategyResult } from '../types.js';

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : value === undefined ? [] : [value]);

const asText = (value: unknown): string | undefined => {
  if (typeof value === 'string') {
    const text = collapseWhitespace(value);
    return text || undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
};

const typesOf = (node: JsonRecord): string[] =>
  asArray(node['@type']).filter((value): value is string => typeof value === 'string');

const isProductNode = (node: JsonRecord): boolean => {
  const types = typesOf(node);
  if (types.length > 0) {
    return types.some((type) => /(^|\/)(Product|ProductGroup|IndividualProduct)$/.test(type));
  }
  // Untyped blocks count when they look like a product summary.
  const titled = asText(node.name) !== undefined || asText(node.title) !== undefined;
  const priced = node.price !== undefined || node.offers !== undefined;
  return titled && priced;
};

/**
 * Walks arrays, `@graph` and `mainEntity` containers and yields every product
 * node in document order.
 */
const collectProductNodes = (value: unknown, into: JsonRecord[], depth = 0): void => {
  if (depth > 6) {
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((entry) => collectProductNodes(entry, into, depth + 1));
    return;
  }
  if (!isRecord(value)) {
    return;
  }
  if (isProductNode(value)) {
    into.push(value);
  }
  collectProductNodes(value['@graph'], into, depth + 1);
  collectProductNodes(value.mainEntity, into, depth + 1);
};

const parseJsonBlock = (content: string): unknown => {
  try {
    return JSON.parse(content);
  } catch {
    // Malformed blocks are common on retail pages and carry nothing usable.
    return undefined;
  }
};

const offerCandidates = (offers: unknown, inheritedCurrency?: string): PriceCandidate[] => {
  const candidates: PriceCandidate[] = [];
  for (const offer of asArray(offers)) {
    if (!isRecord(offer)) {
      continue;
    }
    const specification = asArray(offer.priceSpecification).find(isRecord);
    const currency =
      asText(offer.priceCurrency) ?? asText(specification?.priceCurrency) ?? inheritedCurrency;
    for (const raw of [offer.price, offer.lowPrice, specification?.price]) {
      if (typeof raw === 'string' || typeof raw === 'number') {
        candidates.push({ raw, source: 'structured-metadata', currency });
      }
    }
    candidates.push(...offerCandidates(offer.offers, currency));
  }
  return candidates;
};

const imagesOf = (value: unknown): string[] =>
  asArray(value).flatMap((entry) => {
    if (typeof entry === 'string') {
      return [entry];
    }
    if (isRecord(entry)) {
      const url = asText(entry.url) ?? asText(entry.contentUrl);
      return url ? [url] : [];
    }
    return [];
  });

const nameOf = (value: unknown): string | undefined => {
  const [first] = asArray(value);
  return isRecord(first) ? asText(first.name) : asText(first);
};

const reviewsOf = (value: unknown): Review[] =>
  asArray(value).flatMap((entry) => {
    if (!isRecord(entry)) {
      return [];
    }
    const rating = isRecord(entry.reviewRating) ? parseRating(asText(entry.reviewRating.ratingValue)) : undefined;
    const review = reviewFromText(asText(entry.reviewBody) ?? asText(entry.description), rating, nameOf(entry.author));
    return review ? [review] : [];
  });

const evidenceFromJsonLd = (node: JsonRecord): ProductEvidence => {
  const currency = asText(node.priceCurrency);
  const direct: PriceCandidate[] =
    typeof node.price === 'string' || typeof node.price === 'number'
      ? [{ raw: node.price, source: 'structured-metadata', currency }]
      : [];

  return {
    titles: [asText(node.name), asText(node.title)].filter((title): title is string => title !== undefined),
    priceCandidates: [...offerCandidates(node.offers, currency), ...direct],
    images: imagesOf(node.image),
    description: asText(node.description),
    reviews: reviewsOf(node.review ?? node.reviews),
    brand: nameOf(node.brand),
    sku: asText(node.sku) ?? asText(node.mpn)
  };
};

const readJsonLd = ($: CheerioAPI): ProductEvidence[] => {
  const nodes: JsonRecord[] = [];
  $('script[type="application/ld+json"]').each((_, element) => {
    const content = $(element).html() ?? '';
    if (content.trim()) {
      collectProductNodes(parseJsonBlock(content), nodes);
    }
  });
  return nodes.map(evidenceFromJsonLd);
};

const readMicrodata = ($: CheerioAPI): ProductEvidence | undefined => {
  const scope = $('[itemtype*="schema.org/Product"]').first();
  if (!scope.length) {
    return undefined;
  }

  const currency = firstText($, scope, ['[itemprop="priceCurrency"]']);
  const priceCandidates: PriceCandidate[] = scope
    .find('[itemprop="price"], [itemprop="lowPrice"]')
    .toArray()
    .map((element) => collapseWhitespace($(element).attr('content') ?? $(element).text()))
    .filter(Boolean)
    .map((raw) => ({ raw, source: 'structured-metadata' as const, currency }));

  const images = scope
    .find('[itemprop="image"]')
    .toArray()
    .flatMap((element) => {
      const source = $(element).attr('content') ?? $(element).attr('href') ?? imageSource(element);
      return source ? [source] : [];
    });

  const reviews = scope
    .find('[itemprop="review"]')
    .toArray()
    .flatMap((element) => {
      const review = $(element);
      const text = firstText($, review, ['[itemprop="reviewBody"]', '[itemprop="description"]']);
      const rating = parseRating(firstText($, review, ['[itemprop="ratingValue"]']));
      const author = firstText($, review, ['[itemprop="author"] [itemprop="name"]', '[itemprop="author"]']);
      const parsed = reviewFromText(text, rating, author);
      return parsed ? [parsed] : [];
    });

  const name = scope
    .find('[itemprop="name"]')
    .toArray()
    // Skip names that belong to nested brand, offer or review scopes.
    .find((element) => $(element).closest('[itemscope]').is(scope));

  return {
    titles: name ? [collapseWhitespace($(name).attr('content') ?? $(name).text())].filter(Boolean) : [],
    priceCandidates,
    images,
    description: firstText($, scope, ['[itemprop="description"]']),
    reviews,
    brand: firstText($, scope, ['[itemprop="brand"] [itemprop="name"]', '[itemprop="brand"]']),
    sku: firstText($, scope, ['[itemprop="sku"]', '[itemprop="mpn"]'])
  };
};

const combine = (blocks: readonly ProductEvidence[]): ProductEvidence => ({
  titles: blocks.flatMap((block) => block.titles),
  priceCandidates: blocks.flatMap((block) => block.priceCandidates),
  images: blocks.flatMap((block) => block.images),
  description: blocks.map((block) => block.description).find(Boolean),
  reviews: blocks.flatMap((block) => block.reviews),
  brand: blocks.map((block) => block.brand).find(Boolean),
  sku: blocks.map((block) => block.sku).find(Boolean)
});

/**
 * JSON-LD blocks first, then schema.org microdata. The result is consistent
 * when it names the product and carries at least one price field.
 */
export const structuredDataStrategy: ExtractionStrategy = {
  tag: 'structured-data',
  extract({ $ }: ExtractionContext): StrategyResult | undefined {
    const microdata = readMicrodata($);
    const blocks = [...readJsonLd($), ...(microdata ? [microdata] : [])];
    if (blocks.length === 0) {
      return undefined;
    }

    const evidence = combine(blocks);
    return {
      strategy: 'structured-data',
      evidence,
      consistent: evidence.titles.length > 0 && evidence.priceCandidates.length > 0
    };
  }
};
