import { load } from 'cheerio';
import { getEnv } from '../config/env.js';
import { getLogger } from '../lib/logger.js';
import { sleep, withRetry, type RetryOptions } from '../lib/retry.js';
import type { ListingRecord, ListingSource } from '../monitor/types.js';

export class MarketplaceFetchError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'MarketplaceFetchError';
  }
}

// Randomized per request so successive searches do not repeat the same URL
const MIN_PRICE_RANGE = [90, 100] as const;
const MAX_PRICE_RANGE = [990, 1000] as const;

// Search-result card markup
const CARD_SELECTOR = 'div.xjp7ctv';
const LINK_SELECTOR = 'a.x1i10hfl';
const PRICE_SELECTOR = 'div.x1gslohp';
const TITLE_SELECTOR = 'span.x1lliihq.x6ikm8r.x10wlt62.x1n2onr6';

const REQUEST_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
};

export interface PriceBounds {
  minPrice: number;
  maxPrice: number;
}

function randomInt(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

export function randomPriceBounds(): PriceBounds {
  return {
    minPrice: randomInt(MIN_PRICE_RANGE[0], MIN_PRICE_RANGE[1]),
    maxPrice: randomInt(MAX_PRICE_RANGE[0], MAX_PRICE_RANGE[1]),
  };
}

/**
 * Newest-first search for listings posted in the last day.
 */
export function buildSearchUrl(baseUrl: string, keyword: string, location: string, bounds: PriceBounds): string {
  const params = new URLSearchParams({
    minPrice: String(bounds.minPrice),
    maxPrice: String(bounds.maxPrice),
    daysSinceListed: '1',
    sortBy: 'creation_time_descend',
    query: keyword,
  });
  return `${baseUrl.replace(/\/$/, '')}/marketplace/${encodeURIComponent(location)}/search?${params.toString()}`;
}

function textOrNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Parse search-result cards in page order. Missing parts come back as null;
 * the poller decides what to skip.
 */
export function parseListingCards(html: string): ListingRecord[] {
  const $ = load(html);

  return $(CARD_SELECTOR)
    .toArray()
    .map((card) => {
      const $card = $(card);
      return {
        link: textOrNull($card.find(LINK_SELECTOR).first().attr('href')),
        price: textOrNull($card.find(PRICE_SELECTOR).first().text()),
        title: textOrNull($card.find(TITLE_SELECTOR).first().text()),
      };
    });
}

export interface MarketplaceClientOptions {
  baseUrl: string;
  searchDelayMs: number;
  detailDelayMs: number;
  retry?: RetryOptions;
}

export class MarketplaceClient implements ListingSource {
  constructor(private readonly options: MarketplaceClientOptions) {}

  absoluteLink(link: string): string {
    if (/^https?:\/\//i.test(link)) return link;
    const base = this.options.baseUrl.replace(/\/$/, '');
    return link.startsWith('/') ? `${base}${link}` : `${base}/${link}`;
  }

  private async fetchHtml(url: string): Promise<string> {
    return withRetry(
      async () => {
        const response = await fetch(url, { headers: REQUEST_HEADERS });
        if (!response.ok) {
          throw new MarketplaceFetchError(
            `Marketplace request failed: ${response.status} ${response.statusText}`,
            response.status,
            url,
          );
        }
        return response.text();
      },
      { ...this.options.retry, context: { url: url.substring(0, 120) } },
    );
  }

  async searchListings(keyword: string, location: string): Promise<ListingRecord[]> {
    const url = buildSearchUrl(this.options.baseUrl, keyword, location, randomPriceBounds());
    const html = await this.fetchHtml(url);
    await sleep(this.options.searchDelayMs);

    const records = parseListingCards(html);
    getLogger().debug({ keyword, location, cards: records.length }, 'Search page parsed');
    return records;
  }

  async fetchListingDetail(link: string): Promise<string> {
    const html = await this.fetchHtml(this.absoluteLink(link));
    await sleep(this.options.detailDelayMs);
    return html;
  }
}

export function createMarketplaceClient(): MarketplaceClient {
  const env = getEnv();
  return new MarketplaceClient({
    baseUrl: env.MARKETPLACE_BASE_URL,
    searchDelayMs: env.SEARCH_PAGE_DELAY_MS,
    detailDelayMs: env.DETAIL_PAGE_DELAY_MS,
  });
}
