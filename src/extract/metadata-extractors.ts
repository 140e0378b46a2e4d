/**
 * Metadata extraction helpers: og tags, page title, description, published time.
 */
import { parseHTML } from 'linkedom';
import { readMeta } from './utils.js';

// Selectors for finding published time
const PUBLISHED_TIME_SELECTORS = [
  'meta[property="article:published_time"]',
  'meta[property="og:published_time"]',
  'meta[itemprop="uploadDate"]',
  'meta[name="date"]',
  'time[datetime]',
];

export interface PageMetadata {
  ogTitle: string | null;
  ogDescription: string | null;
  ogImage: string | null;
  /** og:video / og:video:secure_url / og:video:url */
  ogVideo: string | null;
  ogUrl: string | null;
  pageTitle: string | null;
  metaDescription: string | null;
  publishedTime: string | null;
}

/**
 * Extract published time from meta tags
 */
export function extractPublishedTime(document: Document): string | null {
  for (const selector of PUBLISHED_TIME_SELECTORS) {
    const el = document.querySelector(selector);
    if (el) {
      const value = el.getAttribute('content') ?? el.getAttribute('datetime');
      if (value) return value;
    }
  }
  return null;
}

/**
 * Extract the `<title>` text
 */
export function extractPageTitle(document: Document): string | null {
  const title = document.querySelector('title')?.textContent?.trim();
  return title || null;
}

/**
 * Read every metadata field from page markup. linkedom decodes entities in
 * attribute values, so `&#xb7;` arrives as `·`.
 */
export function readPageMetadata(markup: string): PageMetadata {
  const html = /<html[\s>]/i.test(markup)
    ? markup
    : `<!DOCTYPE html><html><head>${markup}</head><body></body></html>`;
  const { document } = parseHTML(html);

  return {
    ogTitle: readMeta(document, 'og:title', 'twitter:title'),
    ogDescription: readMeta(document, 'og:description', 'twitter:description'),
    ogImage: readMeta(document, 'og:image', 'og:image:url', 'twitter:image'),
    ogVideo: readMeta(document, 'og:video:secure_url', 'og:video:url', 'og:video'),
    ogUrl: readMeta(document, 'og:url'),
    pageTitle: extractPageTitle(document),
    metaDescription: readMeta(document, 'description'),
    publishedTime: extractPublishedTime(document),
  };
}

/** True when the markup carries at least one og tag. */
export function hasOpenGraph(metadata: PageMetadata): boolean {
  return Boolean(metadata.ogTitle || metadata.ogDescription || metadata.ogImage || metadata.ogUrl);
}
