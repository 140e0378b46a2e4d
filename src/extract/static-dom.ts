/**
 * Snapshot reconstruction from static HTML, for lightweight surfaces that are
 * fetched without a browser.
 */
import { parseHTML } from 'linkedom';
import type { DomImage, DomSummary, PageSnapshot } from './snapshot.js';
import { MAX_FRAGMENT_LENGTH } from './types.js';
import { isPlausibleAuthor } from './content-kind.js';
import { collapseWhitespace } from './utils.js';

const FRAGMENT_SELECTORS = 'span, a, abbr, div, td, footer, h3, strong';
const BUTTON_SELECTORS = '[role="button"], button';
const CAPTION_SELECTORS = [
  '[data-ad-preview="message"]',
  '[data-ad-comet-preview="message"]',
  'div[data-ft] p',
];
const AUTHOR_SELECTORS = ['h3 a', 'h2 a', 'strong a', 'header a'];

/** Parse a page or a bare body fragment into a full document. */
function toDocument(html: string): Document {
  const page = /<html[\s>]/i.test(html)
    ? html
    : `<!DOCTYPE html><html><head></head><body>${html}</body></html>`;
  return parseHTML(page).document;
}

function textOf(el: Element): string {
  return collapseWhitespace(el.textContent ?? '');
}

function dimension(value: string | null): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

function collectImages(document: Document): DomImage[] {
  const images: DomImage[] = [];
  for (const img of document.querySelectorAll('img')) {
    const src = img.getAttribute('src');
    if (!src) continue;
    const width = dimension(img.getAttribute('width'));
    const height = dimension(img.getAttribute('height'));
    images.push({
      src,
      ...(width !== undefined ? { width } : {}),
      ...(height !== undefined ? { height } : {}),
    });
  }
  return images;
}

function findVideo(document: Document): DomSummary['video'] {
  const video = document.querySelector('video');
  const src =
    video?.getAttribute('src') ??
    video?.querySelector('source')?.getAttribute('src') ??
    document.querySelector('a[href*=".mp4"]')?.getAttribute('href') ??
    null;
  if (!src && !video) return null;
  return { src, poster: video?.getAttribute('poster') ?? null };
}

function firstText(
  document: Document,
  selectors: readonly string[],
  accept: (text: string) => boolean
): { el: Element; text: string } | null {
  for (const selector of selectors) {
    for (const el of document.querySelectorAll(selector)) {
      const text = textOf(el);
      if (accept(text)) return { el, text };
    }
  }
  return null;
}

/**
 * Derive the same DOM summary a rendering collaborator would report, from
 * static markup.
 */
export function buildDomSummaryFromHtml(html: string): DomSummary {
  const document = toDocument(html);

  const ariaLabels = [...document.querySelectorAll('[aria-label]')]
    .map((el) => el.getAttribute('aria-label')?.trim() ?? '')
    .filter(Boolean);

  const engagementTexts = new Set<string>();
  for (const el of document.querySelectorAll(FRAGMENT_SELECTORS)) {
    const text = textOf(el);
    if (text && text.length <= MAX_FRAGMENT_LENGTH && /\d/.test(text)) engagementTexts.add(text);
  }

  const buttonTexts = [...document.querySelectorAll(BUTTON_SELECTORS)].map(textOf).filter(Boolean);

  const author = firstText(document, AUTHOR_SELECTORS, isPlausibleAuthor);
  const caption = firstText(document, CAPTION_SELECTORS, (text) => text.length > 5);
  const dateEl = document.querySelector('abbr') ?? document.querySelector('time[datetime]');
  const postDate = dateEl ? (dateEl.getAttribute('datetime') ?? textOf(dateEl)) || null : null;

  return {
    ariaLabels,
    engagementTexts: [...engagementTexts],
    buttonTexts,
    video: findVideo(document),
    images: collectImages(document),
    gallery: false,
    postDate,
    author: author ? { name: author.text, link: author.el.getAttribute('href') } : null,
    caption: caption?.text ?? null,
  };
}

/**
 * Full snapshot for a fetched surface body.
 */
export function snapshotFromHtml(html: string, url: string): PageSnapshot {
  const document = toDocument(html);
  const headHtml = document.querySelector('head')?.innerHTML ?? '';
  const body = document.querySelector('body');
  const bodyHtml = body?.innerHTML ?? html;
  const visibleText = collapseWhitespace(body?.textContent ?? '');

  return {
    headHtml,
    bodyHtml,
    visibleText,
    domSummary: buildDomSummaryFromHtml(html),
    networkSnippets: [],
    finalUrl: url,
    requestedUrl: url,
  };
}
