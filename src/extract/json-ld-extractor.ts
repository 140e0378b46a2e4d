/**
 * schema.org JSON-LD: interaction statistics and author/date metadata.
 */
import { parseHTML } from 'linkedom';
import type { Metric } from './types.js';
import { logger } from '../logger.js';

/** schema.org action types mapped to the metric they count. */
const ACTION_METRICS: Readonly<Record<string, Metric>> = {
  LikeAction: 'reactions',
  ReactAction: 'reactions',
  CommentAction: 'comments',
  ShareAction: 'shares',
  WatchAction: 'views',
  ViewAction: 'views',
};

export interface JsonLdCount {
  metric: Metric;
  raw: string;
}

export interface JsonLdMetadata {
  author: string | null;
  publishedTime: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asString(value: unknown): string | null {
  if (typeof value === 'string' && value.trim()) return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Flatten a parsed JSON-LD blob into a list of individual items.
 * Handles top-level arrays and @graph structures.
 */
function flattenJsonLdItems(data: unknown): Record<string, unknown>[] {
  if (Array.isArray(data)) return data.flatMap(flattenJsonLdItems);
  if (!isRecord(data)) return [];

  const graph = data['@graph'];
  if (Array.isArray(graph)) return graph.flatMap(flattenJsonLdItems);

  return [data];
}

/**
 * Parse all JSON-LD script tags and return flattened items.
 */
function parseJsonLdScripts(document: Document): Record<string, unknown>[] {
  const items: Record<string, unknown>[] = [];
  const scripts = document.querySelectorAll('script[type="application/ld+json"]');
  for (const script of scripts) {
    try {
      const data: unknown = JSON.parse(script.textContent ?? '');
      items.push(...flattenJsonLdItems(data));
    } catch (e) {
      logger.debug({ error: String(e) }, 'Skipping malformed JSON-LD block');
    }
  }
  return items;
}

/** "http://schema.org/LikeAction", "LikeAction" or { "@type": "LikeAction" }. */
function actionMetric(interactionType: unknown): Metric | null {
  const typeName = isRecord(interactionType) ? interactionType['@type'] : interactionType;
  if (typeof typeName !== 'string') return null;
  const shortName = typeName.slice(typeName.lastIndexOf('/') + 1);
  return ACTION_METRICS[shortName] ?? null;
}

function interactionCounts(item: Record<string, unknown>): JsonLdCount[] {
  const counts: JsonLdCount[] = [];
  const stats = item.interactionStatistic;
  const entries = Array.isArray(stats) ? stats : [stats];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const metric = actionMetric(entry.interactionType);
    const raw = asString(entry.userInteractionCount);
    if (metric && raw) counts.push({ metric, raw });
  }

  const commentCount = asString(item.commentCount);
  if (commentCount) counts.push({ metric: 'comments', raw: commentCount });

  return counts;
}

function authorName(author: unknown): string | null {
  if (typeof author === 'string') return author.trim() || null;
  const first: unknown = Array.isArray(author) ? author[0] : author;
  return isRecord(first) ? asString(first.name) : null;
}

/**
 * Interaction statistics and comment counts from every JSON-LD block in markup,
 * in document order.
 */
export function extractJsonLdCounts(markup: string): JsonLdCount[] {
  if (!markup.includes('application/ld+json')) return [];
  const { document } = parseHTML(markup);
  return parseJsonLdScripts(document).flatMap(interactionCounts);
}

/**
 * Author and publication date from the first JSON-LD item that carries either.
 */
export function extractJsonLdMetadata(markup: string): JsonLdMetadata | null {
  if (!markup.includes('application/ld+json')) return null;
  const { document } = parseHTML(markup);

  for (const item of parseJsonLdScripts(document)) {
    const author = authorName(item.author);
    const publishedTime =
      asString(item.datePublished) ?? asString(item.uploadDate) ?? asString(item.dateCreated);
    if (author || publishedTime) {
      return { author, publishedTime };
    }
  }
  return null;
}
