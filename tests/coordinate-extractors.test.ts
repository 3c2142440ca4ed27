import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  backgroundImageUrl,
  dumpDetailPage,
  extractCoordinates,
  mapContainerExtractor,
  parseMapCenter,
  type CoordinateExtractor,
} from '../src/pipeline/coordinate-extractors.js';
import { detailPageWithMap } from './helpers/fakes.js';

describe('parseMapCenter', () => {
  it('reads encoded and plain comma separators', () => {
    expect(parseMapCenter('https://maps.test/static_map.php?center=-37.81%2C144.96&zoom=13')).toEqual({
      latitude: -37.81,
      longitude: 144.96,
    });
    expect(parseMapCenter('https://maps.test/tile?center=-33.86,151.2')).toEqual({
      latitude: -33.86,
      longitude: 151.2,
    });
  });

  it('returns null without a centre parameter', () => {
    expect(parseMapCenter('https://maps.test/static_map.php?zoom=13')).toBeNull();
  });
});

describe('backgroundImageUrl', () => {
  it('extracts the url from an inline style', () => {
    expect(backgroundImageUrl('background-image: url("https://maps.test/a.png"); height: 10px')).toBe(
      'https://maps.test/a.png',
    );
  });

  it('ignores styles without a background image', () => {
    expect(backgroundImageUrl('color: red')).toBeNull();
    expect(backgroundImageUrl(undefined)).toBeNull();
  });
});

describe('extractCoordinates', () => {
  it('finds the static map tile', () => {
    expect(extractCoordinates(detailPageWithMap(-37.8, 144.98))).toEqual({
      coordinates: { latitude: -37.8, longitude: 144.98 },
      extractor: 'static-map-style',
    });
  });

  it('falls through to the map container', () => {
    const html =
      '<div class="x13vifvy" style="background-image: url(https://maps.test/tile?center=-33.86,151.2)"></div>';

    expect(extractCoordinates(html)).toEqual({
      coordinates: { latitude: -33.86, longitude: 151.2 },
      extractor: 'map-container',
    });
  });

  it('returns null when no extractor matches', () => {
    expect(extractCoordinates('<p>Pick up only</p>')).toBeNull();
  });

  it('uses the extractors it is given, in order', () => {
    const fixed: CoordinateExtractor = { name: 'fixed', extract: () => ({ latitude: 1, longitude: 2 }) };

    expect(extractCoordinates(detailPageWithMap(-37.8, 144.98), [fixed, mapContainerExtractor])).toEqual({
      coordinates: { latitude: 1, longitude: 2 },
      extractor: 'fixed',
    });
  });
});

describe('dumpDetailPage', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it('writes the page with its link into the dump directory', async () => {
    dir = await mkdtemp(join(tmpdir(), 'detail-dump-'));

    const file = await dumpDetailPage(dir, '/item/1', '<p>x</p>');

    expect(await readdir(dir)).toHaveLength(1);
    expect(file.startsWith(join(dir, 'listing_debug_'))).toBe(true);
    expect(await readFile(file, 'utf-8')).toBe('<!-- /item/1 -->\n<p>x</p>');
  });
});
