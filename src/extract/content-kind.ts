/**
 * Content kind strategy: reel vs post URL detection, og:title parsing and the
 * ordered caption/author sources per kind.
 */
import type { ContentType } from './types.js';
import { collapseWhitespace } from './utils.js';

const REEL_PATH_MARKERS = ['/reel/', '/reels/', '/share/v/', '/share/r/', '/watch'];

/**
 * Reel for short-video and watch URLs, post for everything else.
 */
export function detectContentType(url: string): ContentType {
  const lower = url.toLowerCase();
  if (lower.includes('fb.watch')) return 'reel';
  return REEL_PATH_MARKERS.some((marker) => lower.includes(marker)) ? 'reel' : 'post';
}

export interface OgTitleParts {
  caption: string | null;
  author: string | null;
}

/** Leading "250 reactions ·" / "10 shares ·" prefixes. */
const ENGAGEMENT_PREFIXES = [
  /^[\d.,]+\s?[KMkm]?\s*(?:reactions?|reacciones|réactions|reazioni|reações)\s*·?\s*/i,
  /^[\d.,]+\s?[KMkm]?\s*(?:shares?|compartidos?|veces compartido|partages|condivisioni|compartilhamentos)\s*·?\s*/i,
  /^[\d.,]+\s?[KMkm]?\s*(?:comments?|comentarios|commentaires|commenti|comentários)\s*·?\s*/i,
  /^[\d.,]+\s?[KMkm]?\s*(?:views?|visualizaciones|reproducciones|vues)\s*·?\s*/i,
];

function stripEngagementPrefix(text: string): string {
  let result = text;
  let changed = true;
  while (changed) {
    changed = false;
    for (const prefix of ENGAGEMENT_PREFIXES) {
      const next = result.replace(prefix, '');
      if (next !== result) {
        result = next;
        changed = true;
      }
    }
  }
  return result.trim();
}

/**
 * Split `"250 reactions · 10 shares | Caption | Author"`.
 *
 * The author is the last `|` part (2 to 99 characters). The caption is the
 * middle part with three or more parts, otherwise the first part without its
 * engagement prefix. Titles without `|` yield nothing.
 */
export function parseOgTitle(title: string | null | undefined): OgTitleParts {
  if (!title || !title.includes('|')) return { caption: null, author: null };

  const parts = title.split('|').map((part) => collapseWhitespace(part));
  const last = parts[parts.length - 1];
  const author = last.length > 1 && last.length < 100 ? last : null;

  const rawCaption = parts.length >= 3 ? parts[1] : stripEngagementPrefix(parts[0]);
  return { caption: rawCaption || null, author };
}

export type CaptionSource = 'og-title' | 'og-description' | 'meta-description' | 'dom-caption';

export type AuthorSource = 'og-title' | 'dom-author' | 'embedded-owner' | 'json-ld';

export interface ContentKindProfile {
  captionSources: readonly CaptionSource[];
  authorSources: readonly AuthorSource[];
}

/**
 * Ordered caption and author sources. Engagement layers are shared by every
 * kind; only presentation fields differ.
 */
export const CONTENT_KIND_PROFILES: Readonly<Record<ContentType, ContentKindProfile>> = {
  post: {
    captionSources: ['og-title', 'og-description', 'meta-description', 'dom-caption'],
    authorSources: ['og-title', 'dom-author', 'embedded-owner', 'json-ld'],
  },
  reel: {
    captionSources: ['og-description', 'og-title', 'dom-caption', 'meta-description'],
    authorSources: ['embedded-owner', 'og-title', 'dom-author', 'json-ld'],
  },
};

/** Link texts that are page chrome rather than an author name. */
const NON_AUTHOR_TEXTS = new Set(['facebook', 'log in', 'sign up', 'privacy', 'iniciar sesión', 'registrarte']);

export function isPlausibleAuthor(name: string | null | undefined): name is string {
  if (!name) return false;
  const trimmed = name.trim();
  return trimmed.length > 1 && trimmed.length < 100 && !NON_AUTHOR_TEXTS.has(trimmed.toLowerCase());
}

/**
 * First non-empty value following the profile's source order.
 */
export function pickBySource<S extends string>(
  order: readonly S[],
  values: Partial<Record<S, string | null | undefined>>,
  accept: (value: string) => boolean = (value) => value.trim().length > 0
): string | null {
  for (const source of order) {
    const value = values[source];
    if (value && accept(value)) return value.trim();
  }
  return null;
}
