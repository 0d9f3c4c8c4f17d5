import { JSDOM } from 'jsdom';
import type { FetchOptions, ListingDetails, PageFetcher, RawItem, TrackedSource } from './adapter.js';
import { listingKey, normalizeListingUrl, siteDomain } from './dedup.js';
import { FetchEmptyError, FetchError, FetchTimeoutError } from '../shared/errors.js';
import { truncate } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const CARD_SELECTOR = '[data-cy="l-card"]';
const TITLE_SELECTOR = '[data-cy="ad-card-title"] h4, [data-cy="ad-card-title"] h6, h4, h6';
const DESCRIPTION_SELECTOR = '[data-cy="ad_description"]';
const TAG_SELECTORS = ['[data-testid="ad-parameters-container"] p', 'li[data-testid="ad-attributes"]'];
const BREADCRUMB_SELECTOR = '[data-testid="breadcrumb-item"], [data-cy="categories-breadcrumbs"] li';
const DESCRIPTION_MAX = 200;

export interface OlxFetcherOptions {
  userAgent: string;
  acceptLanguage: string;
}

function cleanText(el: Element | null): string | undefined {
  const text = el?.textContent?.replace(/\s+/g, ' ').trim();
  return text ? text : undefined;
}

/**
 * "Warszawa, Mokotów - Dzisiaj o 12:30" → location + posted text.
 * The date is always the last segment.
 */
export function splitLocationDate(text: string): { location?: string; postedText: string } {
  const idx = text.lastIndexOf(' - ');
  if (idx === -1) return { postedText: text.trim() };
  const location = text.slice(0, idx).trim();
  return {
    location: location || undefined,
    postedText: text.slice(idx + 3).trim(),
  };
}

export function pageUrl(baseUrl: string, page: number): string {
  if (page <= 1) return baseUrl;
  const url = new URL(baseUrl);
  url.searchParams.set('page', String(page));
  return url.toString();
}

/**
 * Parse listing cards from a results page, in page order.
 * Cards linking off-site (partner ads) are skipped.
 */
export function parseListingCards(html: string, pageUrlStr: string): RawItem[] {
  const dom = new JSDOM(html, { url: pageUrlStr });
  const doc = dom.window.document;
  const domain = siteDomain(pageUrlStr);
  const items: RawItem[] = [];

  for (const card of Array.from(doc.querySelectorAll(CARD_SELECTOR))) {
    const href = card.querySelector('a[href]')?.getAttribute('href');
    if (!href) continue;

    const url = normalizeListingUrl(href, pageUrlStr);
    if (domain && siteDomain(url) !== domain) {
      logger.debug({ url }, 'Skipping off-site listing link');
      continue;
    }

    const { location, postedText } = splitLocationDate(
      cleanText(card.querySelector('[data-testid="location-date"]')) ?? '',
    );

    const src = card.querySelector('img')?.getAttribute('src') ?? undefined;

    items.push({
      id: listingKey({ url, externalId: card.getAttribute('id') }),
      url,
      title: cleanText(card.querySelector(TITLE_SELECTOR)) ?? 'Untitled',
      postedText,
      price: cleanText(card.querySelector('[data-testid="ad-price"]')),
      location,
      image: src && !src.startsWith('data:') ? new URL(src, pageUrlStr).toString() : undefined,
    });
  }

  return items;
}

/**
 * Read description, parameter tags and category from a listing's own page.
 * The description heading is dropped and the text cut to 200 characters.
 */
export function parseListingDetails(html: string, listingUrl: string): ListingDetails {
  const doc = new JSDOM(html, { url: listingUrl }).window.document;

  const descriptionEl = doc.querySelector(DESCRIPTION_SELECTOR);
  const description = cleanText(descriptionEl?.querySelector('div') ?? descriptionEl);

  let tags: string[] = [];
  for (const selector of TAG_SELECTORS) {
    tags = Array.from(doc.querySelectorAll(selector))
      .map((el) => cleanText(el))
      .filter((t): t is string => t !== undefined);
    if (tags.length > 0) break;
  }

  const crumbs = Array.from(doc.querySelectorAll(BREADCRUMB_SELECTOR))
    .map((el) => cleanText(el))
    .filter((t): t is string => t !== undefined);

  const src = doc
    .querySelector('[data-testid="ad-photo"] img, [data-cy="adPhotos-swiperSlide"] img')
    ?.getAttribute('src');

  return {
    description: description ? truncate(description, DESCRIPTION_MAX) : undefined,
    tags,
    category: crumbs.at(-1),
    image: src && !src.startsWith('data:') ? new URL(src, listingUrl).toString() : undefined,
  };
}

export class OlxPageFetcher implements PageFetcher {
  constructor(private readonly options: OlxFetcherOptions) {}

  async fetch(source: TrackedSource, options: FetchOptions): Promise<RawItem[]> {
    const items: RawItem[] = [];
    const ids = new Set<string>();

    for (let page = 1; page <= options.maxPages && items.length < options.maxItems; page++) {
      const url = pageUrl(source.url, page);
      const html = await this.fetchPage(url, options.signal);
      const cards = parseListingCards(html, url);
      logger.debug({ source: source.url, page, cards: cards.length }, 'Listing page parsed');
      if (cards.length === 0) break;

      for (const card of cards) {
        if (ids.has(card.id)) continue;
        ids.add(card.id);
        items.push(card);
      }
    }

    if (items.length === 0) {
      throw new FetchEmptyError(`No listings found on ${source.url}`, { url: source.url });
    }

    return items.slice(0, options.maxItems);
  }

  async fetchDetails(url: string, signal?: AbortSignal): Promise<ListingDetails> {
    const details = parseListingDetails(await this.fetchPage(url, signal), url);
    logger.debug({ url, tags: details.tags.length, category: details.category }, 'Listing page parsed');
    return details;
  }

  private async fetchPage(url: string, signal?: AbortSignal): Promise<string> {
    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          'Accept-Language': this.options.acceptLanguage,
          Accept: 'text/html,application/xhtml+xml',
        },
        signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new FetchError(`Listing page fetch failed: ${response.status} from ${url}`, {
          url,
          status: response.status,
        });
      }

      return await response.text();
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new FetchTimeoutError(`Listing page fetch aborted: ${url}`, { url });
      }
      throw new FetchError(
        `Listing page fetch failed: ${err instanceof Error ? err.message : String(err)}`,
        { url },
      );
    }
  }
}
