/**
 * Surface constants
 * Hosts and request headers for the surface fetcher
 */

/** User-Agents for lightweight surface requests */
export const USER_AGENTS = {
  // Mobile UA: the lightweight surfaces serve static markup to it
  MOBILE_CHROME:
    'Mozilla/5.0 (Linux; Android 13; Pixel 7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Mobile Safari/537.36',
} as const;

/** Hosts whose paths are interchangeable with www.facebook.com */
export const FACEBOOK_HOSTS = [
  'facebook.com',
  'www.facebook.com',
  'web.facebook.com',
  'm.facebook.com',
  'mbasic.facebook.com',
] as const;

export const DEFAULT_ACCEPT_LANGUAGE = 'es-ES,es;q=0.9,en;q=0.8';
