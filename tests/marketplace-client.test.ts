import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  MarketplaceClient,
  MarketplaceFetchError,
  buildSearchUrl,
  parseListingCards,
  randomPriceBounds,
} from '../src/api/marketplace-client.js';

const SEARCH_PAGE = `
<html><body>
  <div class="xjp7ctv">
    <a class="x1i10hfl" href="/marketplace/item/111/">
      <div class="x1gslohp"> $450 </div>
      <span class="x1lliihq x6ikm8r x10wlt62 x1n2onr6">Road bike</span>
    </a>
  </div>
  <div class="xjp7ctv">
    <div class="x1gslohp">$20</div>
    <span class="x1lliihq x6ikm8r x10wlt62 x1n2onr6">Bike lock</span>
  </div>
  <div class="xjp7ctv">
    <a class="x1i10hfl" href="/marketplace/item/222/">
      <div class="x1gslohp">Free</div>
      <span class="x1lliihq x6ikm8r x10wlt62 x1n2onr6"></span>
    </a>
  </div>
</body></html>`;

function createClient(): MarketplaceClient {
  return new MarketplaceClient({
    baseUrl: 'https://marketplace.test',
    searchDelayMs: 0,
    detailDelayMs: 0,
    retry: { attempts: 2, sleepFn: async () => undefined },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('buildSearchUrl', () => {
  it('builds a newest-first search for the last day', () => {
    expect(buildSearchUrl('https://marketplace.test/', 'road bike', 'melbourne', { minPrice: 95, maxPrice: 995 })).toBe(
      'https://marketplace.test/marketplace/melbourne/search?minPrice=95&maxPrice=995&daysSinceListed=1&sortBy=creation_time_descend&query=road+bike',
    );
  });
});

describe('randomPriceBounds', () => {
  it('stays inside the configured ranges', () => {
    for (let i = 0; i < 20; i++) {
      const { minPrice, maxPrice } = randomPriceBounds();
      expect(minPrice).toBeGreaterThanOrEqual(90);
      expect(minPrice).toBeLessThanOrEqual(100);
      expect(maxPrice).toBeGreaterThanOrEqual(990);
      expect(maxPrice).toBeLessThanOrEqual(1000);
    }
  });
});

describe('parseListingCards', () => {
  it('returns cards in page order with missing parts as null', () => {
    expect(parseListingCards(SEARCH_PAGE)).toEqual([
      { link: '/marketplace/item/111/', price: '$450', title: 'Road bike' },
      { link: null, price: '$20', title: 'Bike lock' },
      { link: '/marketplace/item/222/', price: 'Free', title: null },
    ]);
  });
});

describe('MarketplaceClient', () => {
  it('resolves relative links against the base url', () => {
    const client = createClient();

    expect(client.absoluteLink('/marketplace/item/111/')).toBe('https://marketplace.test/marketplace/item/111/');
    expect(client.absoluteLink('https://other.test/x')).toBe('https://other.test/x');
  });

  it('fetches and parses a search page', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(SEARCH_PAGE, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const records = await createClient().searchListings('bike', 'melbourne');

    expect(records).toHaveLength(3);
    expect(String(fetchMock.mock.calls[0][0]).startsWith('https://marketplace.test/marketplace/melbourne/search?')).toBe(
      true,
    );
  });

  it('fetches detail pages by absolute link', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('<html>detail</html>', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    expect(await createClient().fetchListingDetail('/marketplace/item/111/')).toBe('<html>detail</html>');
    expect(fetchMock.mock.calls[0][0]).toBe('https://marketplace.test/marketplace/item/111/');
  });

  it('throws once retries are exhausted', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('', { status: 429, statusText: 'Too Many Requests' }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(createClient().fetchListingDetail('/marketplace/item/111/')).rejects.toBeInstanceOf(
      MarketplaceFetchError,
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
