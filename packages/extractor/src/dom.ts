import type { Cheerio, CheerioAPI } from 'cheerio';
import { ElementType } from 'domelementtype';
import type { AnyNode, Element } from 'domhandler';

import { applyTransform, findPriceTokens, type Review } from '@shopscout/core';

export const collapseWhitespace = (value: string): string => applyTransform('text.collapse', value);

export const isElementNode = (node: AnyNode | null | undefined): node is Element =>
  node !== null && node !== undefined && node.type === ElementType.Tag;

export const IMAGE_SOURCE_ATTRIBUTES = ['data-old-hires', 'data-zoom-image', 'data-src', 'src'] as const;

const LIST_PRICE_CLASS = /(?:^|[-_])(?:mrp|was|original|list|strike|strikethrough|old|regular|compare)(?:[-_]|$)/i;
const MRP_LABEL = /\bM\.?R\.?P\b/i;
const STRUCK_TAGS = new Set(['del', 's', 'strike']);

const classTokens = (element: Element): string[] => {
  const tokens = `${element.attribs.class ?? ''} ${element.attribs.id ?? ''}`.split(/\s+/);
  return tokens.filter(Boolean);
};

/**
 * True when the element itself is marked as a list/struck-through price, via
 * its tag, an inline `line-through` style or a class such as `price-mrp`.
 */
export const isListPriceMarked = (element: Element): boolean => {
  if (STRUCK_TAGS.has(element.name)) {
    return true;
  }
  if (/line-through/i.test(element.attribs.style ?? '')) {
    return true;
  }
  if (element.attribs['data-a-strike'] === 'true') {
    return true;
  }
  return classTokens(element).some((token) => LIST_PRICE_CLASS.test(token));
};

/**
 * True when the element or any ancestor up to `<body>` is marked as a list
 * price, or its text carries an MRP label.
 */
export const isStruckThrough = ($: CheerioAPI, element: Element): boolean => {
  if (MRP_LABEL.test($(element).text())) {
    return true;
  }

  let current: AnyNode | null = element;
  while (isElementNode(current) && current.name !== 'body') {
    if (isListPriceMarked(current)) {
      return true;
    }
    current = current.parent;
  }
  return false;
};

export const hintOf = (element: Element): string =>
  [element.attribs.class, element.attribs.id, element.attribs['data-testid'], element.attribs['data-test']]
    .filter(Boolean)
    .join(' ');

const SECONDARY_PRICE_HINT =
  /(?:^|[-_\s])(?:emi|instal?ments?|shipping|delivery|savings?|save|coupons?|bank|cashback|exchange)(?:[-_\s]|$)/i;
const SECONDARY_PRICE_TEXT =
  /\bEMI\b|\/\s*(?:mo|month)\b|\bper month\b|\bdeliver(?:y|ed)?\b|\bshipping\b|\bsave\b|\bcoupon\b|\bcashback\b|\bbank offer\b/i;
const SECONDARY_TEXT_LIMIT = 60;
const OTHER_PRODUCTS_HINT =
  /carousel|(?:^|[-_\s])sims|recommend|related|similar|also[-_]?(?:bought|viewed)|upsell|cross[-_]?sell|sponsored/i;

/**
 * True when the figure is not the product's own price: instalment, delivery,
 * savings or offer figures, and prices of other products listed on the page.
 */
export const isSecondaryPrice = ($: CheerioAPI, element: Element): boolean => {
  const text = collapseWhitespace($(element).text());
  if (text.length <= SECONDARY_TEXT_LIMIT && SECONDARY_PRICE_TEXT.test(text)) {
    return true;
  }

  let current: AnyNode | null = element;
  while (isElementNode(current) && current.name !== 'body') {
    const hint = hintOf(current);
    if (SECONDARY_PRICE_HINT.test(hint) || OTHER_PRODUCTS_HINT.test(hint)) {
      return true;
    }
    current = current.parent;
  }
  return false;
};

export const firstText = <T extends AnyNode>(
  $: CheerioAPI,
  root: Cheerio<T> | undefined,
  selectors: readonly string[]
): string | undefined => {
  for (const selector of selectors) {
    const nodes = root ? root.find(selector) : $(selector);
    for (const node of nodes.toArray()) {
      const text = collapseWhitespace($(node).attr('content') ?? $(node).text());
      if (text) {
        return text;
      }
    }
  }
  return undefined;
};

export const metaContent = ($: CheerioAPI, keys: readonly string[]): string | undefined => {
  for (const key of keys) {
    const content = $(`meta[property="${key}"], meta[name="${key}"]`).first().attr('content');
    if (content && collapseWhitespace(content)) {
      return collapseWhitespace(content);
    }
  }
  return undefined;
};

export const imageSource = (element: Element): string | undefined => {
  for (const attribute of IMAGE_SOURCE_ATTRIBUTES) {
    const value = element.attribs[attribute]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
};

export const hasPriceText = (text: string): boolean => findPriceTokens(text).length > 0;

const RATING_PATTERN = /(\d+(?:\.\d+)?)/;

export const parseRating = (value: string | undefined): number | undefined => {
  if (!value) {
    return undefined;
  }
  const match = RATING_PATTERN.exec(value);
  if (!match?.[1]) {
    return undefined;
  }
  const rating = Number.parseFloat(match[1]);
  return Number.isFinite(rating) && rating >= 0 && rating <= 5 ? rating : undefined;
};

export const reviewFromText = (text: string | undefined, rating?: number, author?: string): Review | undefined => {
  const body = text ? collapseWhitespace(text) : '';
  if (!body) {
    return undefined;
  }
  return {
    text: body,
    ...(rating !== undefined ? { rating } : {}),
    ...(author ? { author } : {})
  };
};
