import { writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { load, type CheerioAPI } from 'cheerio';
import { getLogger } from '../lib/logger.js';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/** One way of finding the listing's map on a detail page. */
export interface CoordinateExtractor {
  name: string;
  extract($: CheerioAPI): Coordinates | null;
}

export interface ExtractionResult {
  coordinates: Coordinates;
  extractor: string;
}

const STYLE_URL_PATTERN = /url\(\s*["']?([^"')]+)["']?\s*\)/;
const CENTER_PATTERN = /center=(-?[0-9.]+)(?:%2C|,)(-?[0-9.]+)/i;

/**
 * Read `center=lat%2Clon` from a static map image URL.
 */
export function parseMapCenter(imageUrl: string): Coordinates | null {
  const match = CENTER_PATTERN.exec(imageUrl);
  if (!match) return null;

  const latitude = Number.parseFloat(match[1]);
  const longitude = Number.parseFloat(match[2]);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;

  return { latitude, longitude };
}

export function backgroundImageUrl(style: string | undefined): string | null {
  if (!style || !style.includes('background-image')) return null;
  return STYLE_URL_PATTERN.exec(style)?.[1] ?? null;
}

function fromStyle(style: string | undefined): Coordinates | null {
  const url = backgroundImageUrl(style);
  return url ? parseMapCenter(url) : null;
}

export const staticMapStyleExtractor: CoordinateExtractor = {
  name: 'static-map-style',
  extract($) {
    const el = $('div[style*="background-image"]')
      .toArray()
      .find((node) => ($(node).attr('style') ?? '').includes('static_map'));
    return el ? fromStyle($(el).attr('style')) : null;
  },
};

export const mapContainerExtractor: CoordinateExtractor = {
  name: 'map-container',
  extract($) {
    return fromStyle($('div.x13vifvy[style]').first().attr('style'));
  },
};

export const DEFAULT_EXTRACTORS: readonly CoordinateExtractor[] = [staticMapStyleExtractor, mapContainerExtractor];

/**
 * Try each extractor in order; the first hit wins.
 */
export function extractCoordinates(
  html: string,
  extractors: readonly CoordinateExtractor[] = DEFAULT_EXTRACTORS,
): ExtractionResult | null {
  const $ = load(html);

  for (const extractor of extractors) {
    const coordinates = extractor.extract($);
    if (coordinates) return { coordinates, extractor: extractor.name };
  }
  return null;
}

/**
 * Diagnostic sink for detail pages where no map was found.
 */
export async function dumpDetailPage(dir: string, link: string, html: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const file = join(dir, `listing_debug_${Date.now()}_${Math.floor(Math.random() * 9000) + 1000}.html`);
  await writeFile(file, `<!-- ${link} -->\n${html}`, 'utf-8');
  getLogger().debug({ file, link }, 'Detail page dumped');
  return file;
}
