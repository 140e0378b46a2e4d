/**
 * Utility functions for the extract module
 */
import { parseHTML } from 'linkedom';

/** Strip HTML tags, decode entities and return plain text content. */
export function htmlToText(html: string): string {
  const { document } = parseHTML(`<div>${html}</div>`);
  return document.querySelector('div')?.textContent?.trim() ?? '';
}

/**
 * Undo JSON string escaping found in inline script payloads:
 * `\/`, `\uXXXX` and escaped quotes.
 */
export function decodeJsonString(value: string): string {
  return value
    .replace(/\\u([0-9a-fA-F]{4})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/\\\//g, '/')
    .replace(/\\"/g, '"')
    .replace(/\\\\/g, '\\');
}

/** Collapse whitespace runs and trim. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Read `<meta property|name=... content=...>` values from a document.
 * Returns the first non-empty content among the given keys.
 */
export function readMeta(document: ParentNode, ...keys: string[]): string | null {
  for (const key of keys) {
    const el =
      document.querySelector(`meta[property="${key}"]`) ??
      document.querySelector(`meta[name="${key}"]`);
    const content = el?.getAttribute('content')?.trim();
    if (content) return content;
  }
  return null;
}
