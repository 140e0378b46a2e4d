/**
 * Embedded-data miner: engagement counts and metadata from inline JSON
 * payloads in unparsed page markup.
 *
 * The markup is never parsed as JSON. Payloads are frequently truncated,
 * double-encoded (`\"field\":`) or split across script tags, so fields are
 * located by regex adjacency of key and value.
 */
import { extractJsonLdCounts } from './json-ld-extractor.js';
import { normalizeCount } from './count-normalizer.js';
import { decodeJsonString } from './utils.js';
import { type EngagementRecord, type Metric, type RawSignal, METRICS } from './types.js';

/** Quote that may be JSON-escaped when the payload is itself a string. */
const Q = String.raw`\\?"`;

interface FieldSpec {
  field: string;
  /** Key of the count inside a `{ "count": N }` style wrapper. */
  nested?: 'count' | 'total_count';
}

/** Field priority per metric; the first field with a value wins. */
const EMBEDDED_FIELDS: Readonly<Record<Metric, readonly FieldSpec[]>> = {
  reactions: [
    { field: 'reaction_count', nested: 'count' },
    { field: 'i18n_reaction_count' },
    { field: 'reactors', nested: 'count' },
    { field: 'reaction_count' },
    { field: 'reactionCount' },
    { field: 'reactions', nested: 'count' },
  ],
  comments: [
    { field: 'total_comment_count' },
    { field: 'comments', nested: 'total_count' },
    { field: 'comment_count', nested: 'total_count' },
    { field: 'comment_count' },
    { field: 'commentsCount' },
    { field: 'commentCount' },
    { field: 'comment_rendering_instance_count' },
  ],
  shares: [
    { field: 'share_count', nested: 'count' },
    { field: 'share_count' },
    { field: 'reshare_count' },
    { field: 'i18n_share_count' },
  ],
  views: [
    { field: 'play_count' },
    { field: 'video_view_count' },
    { field: 'view_count' },
    { field: 'viewCount' },
    { field: 'videoViewCount' },
    { field: 'playCount' },
    { field: 'videoPlayCount' },
    { field: 'i18n_view_count' },
  ],
};

/**
 * Value forms for one field, tried in order:
 * `{"count":N}` wrapper, bare integer, string-encoded number ("1.2K").
 */
function fieldPatterns(spec: FieldSpec): RegExp[] {
  const key = `${Q}${spec.field}${Q}\\s*:\\s*`;
  if (spec.nested) {
    return [new RegExp(`${key}\\{[^{}]{0,200}?${Q}${spec.nested}${Q}\\s*:\\s*(?:${Q})?(\\d+)`)];
  }
  return [new RegExp(`${key}(\\d+)`), new RegExp(`${key}${Q}(\\d[^"\\\\]{0,30})${Q}`)];
}

const COMPILED_FIELDS: Readonly<Record<Metric, readonly RegExp[]>> = {
  reactions: EMBEDDED_FIELDS.reactions.flatMap(fieldPatterns),
  comments: EMBEDDED_FIELDS.comments.flatMap(fieldPatterns),
  shares: EMBEDDED_FIELDS.shares.flatMap(fieldPatterns),
  views: EMBEDDED_FIELDS.views.flatMap(fieldPatterns),
};

function firstFieldValue(markup: string, patterns: readonly RegExp[]): string | null {
  for (const re of patterns) {
    const match = re.exec(markup);
    if (match?.[1]) return match[1].trim();
  }
  return null;
}

/**
 * Raw embedded-data signals, one per metric from the inline payloads plus
 * every JSON-LD interaction statistic.
 */
export function mineEmbeddedSignals(markup: string): RawSignal[] {
  if (!markup) return [];

  const signals: RawSignal[] = [];
  for (const metric of METRICS) {
    const raw = firstFieldValue(markup, COMPILED_FIELDS[metric]);
    if (raw) signals.push({ metric, raw, layer: 'embedded-data' });
  }
  for (const { metric, raw } of extractJsonLdCounts(markup)) {
    signals.push({ metric, raw, layer: 'embedded-data', context: 'json-ld' });
  }
  return signals;
}

/**
 * View counts from captured network responses, taken from the first snippet
 * that has one. Responses also describe related items, so the other metrics
 * are not read from them.
 */
export function mineNetworkSnippetSignals(snippets: readonly string[]): RawSignal[] {
  for (const snippet of snippets) {
    const views = mineEmbeddedSignals(snippet).filter((signal) => signal.metric === 'views');
    if (views.length > 0) return views;
  }
  return [];
}

/**
 * Normalized embedded counts. Only metrics with a value are present; when a
 * metric appears in several places the first one found wins.
 */
export function mineEmbeddedData(markup: string): Partial<EngagementRecord> {
  const result: Partial<EngagementRecord> = {};
  for (const signal of mineEmbeddedSignals(markup)) {
    if (result[signal.metric] !== undefined) continue;
    const value = normalizeCount(signal.raw);
    if (value !== null) result[signal.metric] = value;
  }
  return result;
}

export interface EmbeddedMetadata {
  videoId: string | null;
  postId: string | null;
  topLevelPostId: string | null;
  ownerName: string | null;
  /** ISO 8601, from a Unix `publish_time` / `creation_time`. */
  publishTime: string | null;
}

function idField(markup: string, field: string): string | null {
  const re = new RegExp(`${Q}${field}${Q}\\s*:\\s*(?:${Q})?(\\d{5,})`);
  return re.exec(markup)?.[1] ?? null;
}

/** JSON string body, allowing `\uXXXX` escapes but no raw quotes. */
const JSON_NAME = String.raw`((?:[^"\\]|\\u[0-9a-fA-F]{4}){1,100})`;

const OWNER_PATTERNS = [
  new RegExp(`${Q}owner${Q}\\s*:\\s*\\{[^{}]{0,300}?${Q}name${Q}\\s*:\\s*${Q}${JSON_NAME}${Q}`),
  new RegExp(`${Q}owning_profile${Q}\\s*:\\s*\\{[^{}]{0,300}?${Q}name${Q}\\s*:\\s*${Q}${JSON_NAME}${Q}`),
];

const PUBLISH_TIME = new RegExp(`${Q}(?:publish_time|creation_time)${Q}\\s*:\\s*(\\d{9,11})`);

function ownerName(markup: string): string | null {
  for (const re of OWNER_PATTERNS) {
    const name = re.exec(markup)?.[1];
    if (name) {
      const decoded = decodeJsonString(name).trim();
      if (decoded) return decoded;
    }
  }
  return null;
}

function publishTime(markup: string): string | null {
  const seconds = PUBLISH_TIME.exec(markup)?.[1];
  if (!seconds) return null;
  const date = new Date(parseInt(seconds, 10) * 1000);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Identifiers, owner and publication time from the same inline payloads.
 */
export function mineEmbeddedMetadata(markup: string): EmbeddedMetadata {
  return {
    videoId: idField(markup, 'video_id'),
    postId: idField(markup, 'post_id'),
    topLevelPostId: idField(markup, 'top_level_post_id'),
    ownerName: ownerName(markup),
    publishTime: publishTime(markup),
  };
}
