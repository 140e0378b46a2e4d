/**
 * Video rendition discovery and quality ranking.
 *
 * CDN video URLs carry their rendition in a plain `tag` parameter or inside
 * `efg`, a base64-encoded JSON blob (`vencode_tag`, `bitrate`, `xpv_asset_id`).
 */
import { type MediaAsset, MAX_VIDEO_ALTERNATES } from './types.js';
import { decodeJsonString } from './utils.js';
import { logger } from '../logger.js';

export type QualityLabel = 'HD' | 'SD';

export interface VideoCandidate {
  url: string;
  /** Quality label from the surrounding payload (`"metadata":{"quality":"HD"}`, `hd_src`). */
  label?: QualityLabel;
}

export interface VideoRankingContext {
  /** og:video or rendered `<video>` source; defines the path family to keep. */
  anchorUrl?: string | null;
  contentId?: string | null;
}

export interface RankedVideos {
  primary: MediaAsset | null;
  /** Runner-up URLs, best first. */
  alternates: string[];
}

const LABEL_RESOLUTION: Readonly<Record<QualityLabel, number>> = { HD: 720, SD: 360 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

/**
 * Decode the `efg` parameter. Returns null when absent or not base64 JSON.
 */
export function decodeEfg(url: string): Record<string, unknown> | null {
  const efg = parseUrl(url)?.searchParams.get('efg');
  if (!efg) return null;
  try {
    const decoded: unknown = JSON.parse(Buffer.from(efg, 'base64').toString('utf-8'));
    return isRecord(decoded) ? decoded : null;
  } catch (e) {
    logger.debug({ url, error: String(e) }, 'Undecodable efg parameter');
    return null;
  }
}

function stringField(record: Record<string, unknown> | null, key: string): string | null {
  const value = record?.[key];
  if (typeof value === 'string' && value) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/** Resolution from a rendition tag: "dash_h264-basic-gen2_720p" → 720, "sve_hd" → 720. */
function tagResolution(tag: string): number | null {
  const resolution = /(\d{3,4})p(?![a-z])/i.exec(tag);
  if (resolution) return parseInt(resolution[1], 10);
  if (/(?:^|[_-])hd(?:$|[_-])/i.test(tag)) return LABEL_RESOLUTION.HD;
  if (/(?:^|[_-])sd(?:$|[_-])/i.test(tag)) return LABEL_RESOLUTION.SD;
  return null;
}

/**
 * Comparable quality score: vertical resolution when known, otherwise a
 * bitrate proxy (kbps / 10), otherwise 0.
 */
export function videoQuality(url: string, label?: QualityLabel): number {
  const parsed = parseUrl(url);
  const efg = decodeEfg(url);

  const tag = parsed?.searchParams.get('tag') ?? stringField(efg, 'vencode_tag');
  const fromTag = tag ? tagResolution(tag) : null;
  if (fromTag !== null) return fromTag;

  if (label) return LABEL_RESOLUTION[label];

  const bitrate = parsed?.searchParams.get('bitrate') ?? stringField(efg, 'bitrate');
  const bps = bitrate ? parseInt(bitrate, 10) : NaN;
  return Number.isFinite(bps) && bps > 0 ? Math.floor(bps / 10_000) : 0;
}

/** Content id of a rendition: `efg.xpv_asset_id`, or an id in the URL path/query. */
export function videoContentId(url: string): string | null {
  const assetId = stringField(decodeEfg(url), 'xpv_asset_id');
  if (assetId) return assetId;
  const match = /\/(?:videos|reel)\/(\d+)/.exec(url) ?? /[?&](?:v|video_id)=(\d+)/.exec(url);
  return match ? match[1] : null;
}

/** Path segments before the filename; renditions of one upload share them. */
export function pathFamily(url: string): string | null {
  const pathname = parseUrl(url)?.pathname;
  if (!pathname) return null;
  const dir = pathname.slice(0, pathname.lastIndexOf('/'));
  return dir || null;
}

export function videoSignature(url: string): string {
  return stringField(decodeEfg(url), 'xpv_asset_id') ?? url.split('?')[0];
}

/** Apply a filter unless it would remove every candidate. */
function softFilter<T>(items: T[], keep: (item: T) => boolean): T[] {
  const filtered = items.filter(keep);
  return filtered.length > 0 ? filtered : items;
}

/**
 * Rank renditions best-first. The top one becomes the primary video asset,
 * up to four runners-up become alternates.
 */
export function rankVideoCandidates(
  candidates: readonly (string | VideoCandidate)[],
  context: VideoRankingContext = {}
): RankedVideos {
  const byUrl = new Map<string, VideoCandidate>();
  for (const candidate of candidates) {
    const entry = typeof candidate === 'string' ? { url: candidate } : candidate;
    if (!entry.url || entry.url.startsWith('blob:') || !parseUrl(entry.url)) continue;
    const existing = byUrl.get(entry.url);
    if (!existing || (!existing.label && entry.label)) byUrl.set(entry.url, entry);
  }

  let pool = [...byUrl.values()];
  const anchor = context.anchorUrl && !context.anchorUrl.startsWith('blob:') ? context.anchorUrl : null;
  const family = anchor ? pathFamily(anchor) : null;

  if (family) {
    pool = softFilter(pool, (c) => pathFamily(c.url) === family);
  } else if (context.contentId) {
    const contentId = context.contentId;
    pool = softFilter(pool, (c) => videoContentId(c.url) === contentId);
  }

  const ranked = pool
    .map((c) => ({ url: c.url, score: videoQuality(c.url, c.label) }))
    .sort((a, b) => b.score - a.score);

  const [best, ...rest] = ranked;
  if (!best) return { primary: null, alternates: [] };

  return {
    primary: {
      url: best.url,
      signature: videoSignature(best.url),
      kind: 'video',
      qualityScore: best.score,
    },
    alternates: rest.slice(0, MAX_VIDEO_ALTERNATES).map((c) => c.url),
  };
}

const Q = String.raw`\\?"`;
const URL_VALUE = String.raw`(https?:[^"]+?)`;

function keyPattern(key: string): RegExp {
  return new RegExp(`${Q}${key}${Q}\\s*:\\s*${Q}${URL_VALUE}${Q}`, 'g');
}

/** Payload keys carrying rendition URLs, with the label the key implies. */
const VIDEO_KEYS: readonly { pattern: RegExp; label?: QualityLabel }[] = [
  { pattern: keyPattern('playable_url_quality_hd'), label: 'HD' },
  { pattern: keyPattern('browser_native_hd_url'), label: 'HD' },
  { pattern: keyPattern('hd_src'), label: 'HD' },
  { pattern: keyPattern('progressive_url') },
  { pattern: keyPattern('playable_url') },
  { pattern: keyPattern('browser_native_sd_url'), label: 'SD' },
  { pattern: keyPattern('sd_src'), label: 'SD' },
  { pattern: keyPattern('base_url') },
];

/** `"progressive_url":"…","failure_reason":null,"metadata":{"quality":"HD"}` */
const PROGRESSIVE_WITH_QUALITY = new RegExp(
  `${Q}progressive_url${Q}\\s*:\\s*${Q}${URL_VALUE}${Q}[^}]{0,160}?${Q}quality${Q}\\s*:\\s*${Q}(HD|SD)${Q}`,
  'g'
);

function cleanVideoUrl(raw: string): string | null {
  const url = decodeJsonString(raw).replace(/&amp;/g, '&');
  return /\.mp4(?:$|\?)/i.test(parseUrl(url)?.pathname ?? '') ? url : null;
}

/**
 * Rendition URLs from inline JSON payloads. Only `.mp4` URLs are kept; DASH
 * manifests and audio tracks are ignored.
 */
export function extractVideoCandidates(markup: string): VideoCandidate[] {
  const candidates: VideoCandidate[] = [];

  for (const match of markup.matchAll(PROGRESSIVE_WITH_QUALITY)) {
    const url = cleanVideoUrl(match[1]);
    if (url && (match[2] === 'HD' || match[2] === 'SD')) {
      candidates.push({ url, label: match[2] });
    }
  }

  for (const { pattern, label } of VIDEO_KEYS) {
    for (const match of markup.matchAll(pattern)) {
      const url = cleanVideoUrl(match[1]);
      if (url) candidates.push(label ? { url, label } : { url });
    }
  }

  return candidates;
}
