import { getLogger } from '../lib/logger.js';
import { DISTANCE_UNKNOWN, UNKNOWN_ADDRESS } from '../api/geocoder.js';
import { dealLabel, enrichedText, fallbackText, provisionalText } from './messages.js';
import { dumpDetailPage, extractCoordinates, type Coordinates } from './coordinate-extractors.js';
import type {
  CompleteListing,
  FilterModes,
  Geocoder,
  ListingSource,
  Messenger,
  ProductCheck,
  ProductChecker,
  SubscriberConfig,
} from '../monitor/types.js';

export interface PipelineDeps {
  messenger: Messenger;
  checker: ProductChecker;
  source: ListingSource;
  geocoder: Geocoder;
  /** When set, detail pages without a map are written here. */
  debugDumpDir?: string;
}

export interface PendingEntry {
  messageId: number;
  dealLabel: string;
  fixedLat: number;
  fixedLon: number;
}

/** Subscriber chat id → provisional message awaiting enrichment. */
export type PendingEnrichment = Map<number, PendingEntry>;

export interface Enrichment {
  address: string;
  coordinates: Coordinates | null;
}

export interface NotificationOutcome {
  sent: number;
  edited: number;
  fallbacks: number;
  enriched: boolean;
}

export function findExcludedWord(title: string, excludedWords: string[]): string | undefined {
  const lowered = title.toLowerCase();
  return excludedWords.find((word) => word.length > 0 && lowered.includes(word.toLowerCase()));
}

/**
 * Mode conditions, checked in order; every enabled mode must hold.
 */
export function modeRejection(modes: FilterModes, check: ProductCheck): string | null {
  if (modes.modeOnlyPreferred && !check.preferred) return 'not preferred';
  if (modes.nearGoodDeals && !(check.isGoodDeal || check.nearGoodDeal)) return 'neither a good deal nor near good deal';
  if (modes.goodDeals && !check.isGoodDeal) return 'not a good deal';
  return null;
}

/**
 * Filter, classify and send provisional messages, one subscriber at a time
 * in list order.
 */
export async function sendProvisionalMessages(
  listing: CompleteListing,
  subscribers: SubscriberConfig[],
  deps: PipelineDeps,
): Promise<PendingEnrichment> {
  const logger = getLogger();
  const url = deps.source.absoluteLink(listing.link);
  const pending: PendingEnrichment = new Map();

  for (const subscriber of subscribers) {
    const { chatId } = subscriber;

    const excluded = findExcludedWord(listing.title, subscriber.excludedWords);
    if (excluded !== undefined) {
      logger.info({ chatId, title: listing.title, excluded }, 'SKIP: title contains excluded word');
      continue;
    }

    let check: ProductCheck;
    try {
      check = await deps.checker.checkProduct(chatId, listing.title, listing.price);
    } catch (err) {
      logger.error({ err, chatId, title: listing.title }, 'Product classification failed');
      continue;
    }

    const rejection = modeRejection(subscriber.modes, check);
    if (rejection) {
      logger.info({ chatId, product: check.productName, rejection }, `SKIP: product ${rejection}`);
      continue;
    }

    const label = dealLabel(check);
    try {
      const sent = await deps.messenger.sendMessage(provisionalText(label, listing.price, url), chatId);
      if (sent) {
        pending.set(chatId, {
          messageId: sent.messageId,
          dealLabel: label,
          fixedLat: subscriber.fixedLat,
          fixedLon: subscriber.fixedLon,
        });
      } else {
        logger.error({ chatId, link: listing.link }, 'Failed to send initial message');
      }
    } catch (err) {
      logger.error({ err, chatId, link: listing.link }, 'Exception sending initial message');
    }
  }

  return pending;
}

/**
 * Visit the detail page once and resolve coordinates and address.
 * Anything not found degrades to unknown; nothing here throws.
 */
export async function fetchEnrichment(link: string, deps: PipelineDeps): Promise<Enrichment> {
  const logger = getLogger();
  const enrichment: Enrichment = { address: UNKNOWN_ADDRESS, coordinates: null };

  let html: string;
  try {
    html = await deps.source.fetchListingDetail(link);
  } catch (err) {
    logger.error({ err, link }, 'Error fetching detail for listing');
    return enrichment;
  }

  const found = extractCoordinates(html);
  if (!found) {
    logger.warn({ link }, 'No map coordinates on detail page');
    if (deps.debugDumpDir) {
      try {
        await dumpDetailPage(deps.debugDumpDir, link, html);
      } catch (err) {
        logger.warn({ err, link }, 'Failed to dump detail page');
      }
    }
    return enrichment;
  }

  enrichment.coordinates = found.coordinates;
  logger.info({ link, ...found.coordinates, extractor: found.extractor }, 'Extracted coordinates');

  try {
    enrichment.address = await deps.geocoder.reverseGeocode(found.coordinates.latitude, found.coordinates.longitude);
  } catch (err) {
    logger.error({ err, link }, 'Reverse geocode failed');
  }

  return enrichment;
}

/**
 * Edit every provisional message with the enriched text; a failed edit gets
 * one fallback attempt with a reduced message.
 */
export async function applyEnrichment(
  listing: CompleteListing,
  pending: PendingEnrichment,
  enrichment: Enrichment,
  deps: PipelineDeps,
): Promise<Pick<NotificationOutcome, 'edited' | 'fallbacks'>> {
  const logger = getLogger();
  const url = deps.source.absoluteLink(listing.link);
  const { address, coordinates } = enrichment;
  let edited = 0;
  let fallbacks = 0;

  for (const [chatId, entry] of pending) {
    try {
      const distance = coordinates
        ? deps.geocoder.calculateDistance(entry.fixedLat, entry.fixedLon, coordinates.latitude, coordinates.longitude)
        : DISTANCE_UNKNOWN;

      const text = enrichedText(entry.dealLabel, address, distance, listing.price, url);
      if (await deps.messenger.editMessage(chatId, entry.messageId, text)) {
        edited++;
        continue;
      }
      logger.error({ chatId, messageId: entry.messageId }, 'Failed to update message');
    } catch (err) {
      logger.error({ err, chatId, messageId: entry.messageId }, 'Error updating message');
    }

    try {
      fallbacks++;
      await deps.messenger.editMessage(chatId, entry.messageId, fallbackText(entry.dealLabel, listing.price, url));
    } catch (err) {
      logger.error({ err, chatId, messageId: entry.messageId }, 'Failed to send fallback message update');
    }
  }

  return { edited, fallbacks };
}

/**
 * Two-phase notify-then-enrich for one newly seen listing.
 */
export async function notifyListing(
  listing: CompleteListing,
  subscribers: SubscriberConfig[],
  deps: PipelineDeps,
): Promise<NotificationOutcome> {
  const pending = await sendProvisionalMessages(listing, subscribers, deps);
  if (pending.size === 0) {
    return { sent: 0, edited: 0, fallbacks: 0, enriched: false };
  }

  const enrichment = await fetchEnrichment(listing.link, deps);
  const { edited, fallbacks } = await applyEnrichment(listing, pending, enrichment, deps);

  return { sent: pending.size, edited, fallbacks, enriched: enrichment.coordinates !== null };
}
