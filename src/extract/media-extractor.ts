/**
 * Image discovery, noise filtering and content-signature deduplication.
 *
 * The CDN serves the same photo under many URLs (size variants, crops,
 * different cache hosts). The stable part is the run of long numeric ids in
 * the filename, which becomes the dedup signature.
 */
import { type MediaAsset, MIN_IMAGE_DIMENSION } from './types.js';
import type { DomImage } from './snapshot.js';
import { decodeJsonString } from './utils.js';
import { logger } from '../logger.js';

/**
 * Tile dimensions encoded in CDN URLs: `s40x40`, `p60x60`. Only the path and
 * the `stp` parameter carry them; signed query tokens can look alike.
 */
const TILE_DIMENSIONS = /(?:^|[^a-z0-9])[sp](\d{2,})x(\d{2,})/g;

/** Path fragments of profile pictures, emoji, stickers and static UI resources. */
const NOISE_MARKERS = [
  '/safe_image',
  '/profile',
  '/cp/',
  'emoji',
  'sticker',
  '/rsrc.php',
  'static.xx.fbcdn',
  'icon',
  'logo',
  't39.30808-1/',
];

const IMAGE_EXTENSION = /\.(?:jpe?g|png|webp|gif)(?:$|\?)/i;

/**
 * Inline JSON image URIs: `"uri"` / `"src"` keys, which also covers the
 * `image`, `viewer_image`, `photo_image`, `full_image` and `large_image`
 * wrappers. Quotes may be JSON-escaped.
 */
const EMBEDDED_IMAGE_URI = /\\?"(?:uri|src)\\?"\s*:\s*\\?"(https?:[^"]+?)\\?"/g;

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch (e) {
    logger.debug({ url, error: String(e) }, 'Unparseable media URL');
    return null;
  }
}

/**
 * Content-derived dedup key: long numeric ids in the filename joined with `_`,
 * or the URL without its query string when the filename has none.
 */
export function imageSignature(url: string): string {
  const withoutQuery = url.split('?')[0];
  const parsed = parseUrl(url);
  const pathname = parsed ? parsed.pathname : withoutQuery;
  const filename = pathname.slice(pathname.lastIndexOf('/') + 1);

  const ids = filename.match(/\d{6,}/g);
  return ids ? ids.join('_') : withoutQuery;
}

/** Host and path of a URL, lowercased; the whole URL when it does not parse. */
function hostAndPath(parsed: URL | null, url: string): string {
  return (parsed ? parsed.hostname + parsed.pathname : url).toLowerCase();
}

function tileDimensions(url: string): [number, number][] {
  const parsed = parseUrl(url);
  const parts = parsed ? [parsed.pathname, parsed.searchParams.get('stp') ?? ''] : [url.split('?')[0]];
  return parts.flatMap((part) =>
    [...part.matchAll(TILE_DIMENSIONS)].map((m): [number, number] => [parseInt(m[1], 10), parseInt(m[2], 10)])
  );
}

/**
 * Icons, avatars and other non-content images. A reported natural size
 * decides on its own; otherwise the tile size in the URL does.
 */
export function isNoiseImage(url: string, width?: number, height?: number): boolean {
  if (!/^https?:/i.test(url)) return true;

  const location = hostAndPath(parseUrl(url), url);
  if (NOISE_MARKERS.some((marker) => location.includes(marker))) return true;

  if (width && height) {
    return width < MIN_IMAGE_DIMENSION && height < MIN_IMAGE_DIMENSION;
  }
  return tileDimensions(url).some(([w, h]) => w < MIN_IMAGE_DIMENSION && h < MIN_IMAGE_DIMENSION);
}

/** Largest known dimension: natural size when reported, else the URL tile size. */
function imageQuality(url: string, width?: number, height?: number): number {
  const natural = Math.max(width ?? 0, height ?? 0);
  if (natural > 0) return natural;
  return tileDimensions(url).reduce((best, [w, h]) => Math.max(best, w, h), 0);
}

export function toImageAsset(url: string, width?: number, height?: number): MediaAsset {
  return {
    url,
    signature: imageSignature(url),
    kind: 'image',
    qualityScore: imageQuality(url, width, height),
  };
}

/**
 * Keep the first asset per signature, preserving order. Idempotent.
 */
export function dedupeImages(assets: readonly MediaAsset[]): MediaAsset[] {
  const seen = new Set<string>();
  const result: MediaAsset[] = [];
  for (const asset of assets) {
    if (seen.has(asset.signature)) continue;
    seen.add(asset.signature);
    result.push(asset);
  }
  return result;
}

/**
 * fbcdn image URLs referenced from inline JSON payloads, unescaped, in
 * document order.
 */
export function extractEmbeddedImageUrls(markup: string): string[] {
  const urls: string[] = [];
  for (const match of markup.matchAll(EMBEDDED_IMAGE_URI)) {
    const url = decodeJsonString(match[1]).replace(/&amp;/g, '&');
    const parsed = parseUrl(url);
    if (!parsed || !parsed.hostname.endsWith('fbcdn.net')) continue;
    if (!IMAGE_EXTENSION.test(parsed.pathname)) continue;
    urls.push(url);
  }
  return urls;
}

export interface ImageSources {
  ogImage?: string | null;
  markup?: string;
  domImages?: readonly DomImage[];
}

/**
 * Collect image assets from og:image, embedded payloads and the DOM image
 * list (in that order), dropping noise and duplicate signatures.
 */
export function collectImageAssets(sources: ImageSources): MediaAsset[] {
  const candidates: MediaAsset[] = [];

  if (sources.ogImage && !isNoiseImage(sources.ogImage)) {
    candidates.push(toImageAsset(sources.ogImage));
  }

  for (const url of extractEmbeddedImageUrls(sources.markup ?? '')) {
    if (!isNoiseImage(url)) candidates.push(toImageAsset(url));
  }

  for (const image of sources.domImages ?? []) {
    if (!isNoiseImage(image.src, image.width, image.height)) {
      candidates.push(toImageAsset(image.src, image.width, image.height));
    }
  }

  return dedupeImages(candidates);
}
