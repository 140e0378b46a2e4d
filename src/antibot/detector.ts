/**
 * Hard-block detection
 *
 * Recognizes pages that cannot contain the requested content at all: login
 * and checkpoint redirects, "content isn't available" pages, bare login
 * prompts and the empty application shell. A detection aborts the item
 * before the engine runs.
 */
import type { PageSnapshot } from '../extract/snapshot.js';
import { readPageMetadata, hasOpenGraph } from '../extract/metadata-extractors.js';

/**
 * Why the page is blocked
 */
export type BlockReason =
  | 'login-redirect' // final URL is the login page
  | 'checkpoint' // account/security checkpoint
  | 'content-unavailable' // removed, private or region-restricted content
  | 'login-prompt' // short page that only asks to log in
  | 'generic-shell'; // "Facebook" title and no og tags

export interface HardBlockDetection {
  reason: BlockReason;
  /** Evidence that triggered detection */
  evidence: string[];
}

const LOGIN_URL_PATTERNS = [/\/login\.php/i, /\/login\/?(?:\?|$)/i];
const CHECKPOINT_URL_PATTERN = /\/checkpoint\//i;

const UNAVAILABLE_PHRASES = [
  "this content isn't available",
  'this content isn’t available',
  'this page isn’t available',
  "this page isn't available",
  'este contenido no está disponible',
  'esta página no está disponible',
  "ce contenu n'est pas disponible",
  'ce contenu n’est pas disponible',
  'questo contenuto non è disponibile',
  'este conteúdo não está disponível',
];

const LOGIN_PROMPT_PHRASES = [
  'log in to facebook',
  'log into facebook',
  'you must log in',
  'inicia sesión en facebook',
  'debes iniciar sesión',
  'connectez-vous à facebook',
  'accedi a facebook',
  'entre no facebook',
];

/** Pages shorter than this with a login prompt are treated as walls. */
const SHORT_PAGE_CHARS = 3000;

function findPhrase(text: string, phrases: readonly string[]): string | null {
  const lower = text.toLowerCase();
  return phrases.find((phrase) => lower.includes(phrase)) ?? null;
}

/**
 * Detect a hard block in a rendered snapshot. Returns null for normal pages.
 */
export function detectHardBlock(snapshot: PageSnapshot): HardBlockDetection | null {
  const url = snapshot.finalUrl ?? snapshot.requestedUrl;

  if (CHECKPOINT_URL_PATTERN.test(url)) {
    return { reason: 'checkpoint', evidence: [`url: ${url}`] };
  }
  if (LOGIN_URL_PATTERNS.some((p) => p.test(url))) {
    return { reason: 'login-redirect', evidence: [`url: ${url}`] };
  }

  const unavailable = findPhrase(snapshot.visibleText, UNAVAILABLE_PHRASES);
  if (unavailable) {
    return { reason: 'content-unavailable', evidence: [`text: ${unavailable}`] };
  }

  const metadata = readPageMetadata(snapshot.headHtml);
  const contentLength = snapshot.visibleText.length + snapshot.bodyHtml.length;
  if (contentLength < SHORT_PAGE_CHARS) {
    const prompt = findPhrase(snapshot.visibleText, LOGIN_PROMPT_PHRASES);
    if (prompt && !hasOpenGraph(metadata)) {
      return { reason: 'login-prompt', evidence: [`text: ${prompt}`, `length: ${contentLength}`] };
    }
  }

  if (metadata.pageTitle?.trim().toLowerCase() === 'facebook' && !hasOpenGraph(metadata)) {
    return { reason: 'generic-shell', evidence: ['title: Facebook', 'no og tags'] };
  }

  return null;
}
