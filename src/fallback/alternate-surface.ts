/**
 * Alternate surfaces: lightweight renderings of the same content (mbasic,
 * mobile, watch pages) that often expose counts the full page hides.
 */
import { FACEBOOK_HOSTS, USER_AGENTS, DEFAULT_ACCEPT_LANGUAGE } from '../sites/constants.js';
import type { SurfaceConfig } from '../sites/surface-config.js';
import { httpRequest } from '../fetch/http-client.js';
import { logger } from '../logger.js';

export interface SurfaceFetchResult {
  success: boolean;
  html?: string;
  /** Final URL after redirects, when known. */
  finalUrl?: string;
  statusCode?: number;
  error?: string;
}

/**
 * Fetches one lightweight surface. Implementations must honour `signal`.
 */
export interface SurfaceFetcher {
  fetch(url: string, signal: AbortSignal): Promise<SurfaceFetchResult>;
}

/** Content id patterns in page URLs, most specific first. */
const CONTENT_ID_PATTERNS = [
  /\/reels?\/(\d+)/,
  /\/videos\/(?:[^/?#]+\/)?(\d+)/,
  /[?&]story_fbid=(pfbid\w+|\d+)/,
  /[?&]fbid=(\d+)/,
  /\/posts\/(pfbid\w+|\d+)/,
  /\/watch\/?\?(?:[^#]*&)?v=(\d+)/,
  /\/permalink\/(\d+)/,
];

/**
 * Content id from a page URL, or null when the URL carries none
 * (share links, profile pages).
 */
export function extractContentId(url: string): string | null {
  for (const pattern of CONTENT_ID_PATTERNS) {
    const match = pattern.exec(url);
    if (match) return match[1];
  }
  return null;
}

/**
 * Validate URL protocol to prevent SSRF.
 */
export function isHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

function isFacebookHost(hostname: string): boolean {
  return FACEBOOK_HOSTS.some((host) => host === hostname);
}

function swapHost(url: string, host: string): string | null {
  try {
    const parsed = new URL(url);
    if (!isFacebookHost(parsed.hostname)) return null;
    parsed.hostname = host;
    parsed.protocol = 'https:';
    return parsed.href;
  } catch (e) {
    logger.debug({ url, error: String(e) }, 'Cannot swap host');
    return null;
  }
}

/**
 * Candidate URLs in the order they should be tried: the final URL on each
 * configured host, then the id templates. Duplicates and the original URL
 * itself are dropped; at most `maxCandidates` are returned.
 */
export function buildSurfaceCandidates(
  finalUrl: string,
  contentId: string | null,
  config: SurfaceConfig
): string[] {
  const candidates: string[] = [];
  const push = (candidate: string | null) => {
    if (candidate && candidate !== finalUrl && isHttpUrl(candidate) && !candidates.includes(candidate)) {
      candidates.push(candidate);
    }
  };

  for (const host of config.hosts) {
    push(swapHost(finalUrl, host));
  }
  if (contentId) {
    for (const template of config.idTemplates) {
      push(template.replaceAll('{id}', encodeURIComponent(contentId)));
    }
  }

  return candidates.slice(0, config.maxCandidates);
}

/** Login walls served instead of content. */
const LOGIN_WALL_PATTERNS = ['id="login_form"', 'name="login"', '/login/?next=', 'login.php?next='];

/**
 * A short page whose only purpose is a login form.
 */
function isLoginWall(html: string): boolean {
  if (html.length >= 3000) return false;
  return LOGIN_WALL_PATTERNS.some((p) => html.includes(p));
}

export interface HttpSurfaceFetcherOptions {
  userAgent?: string;
  acceptLanguage?: string;
}

/**
 * Default fetcher: GET through the shared httpcloak session with a mobile
 * user agent. Never throws; failures come back as `{ success: false, error }`.
 */
export function createHttpSurfaceFetcher(options: HttpSurfaceFetcherOptions = {}): SurfaceFetcher {
  const headers = {
    'User-Agent': options.userAgent ?? USER_AGENTS.MOBILE_CHROME,
    'Accept-Language': options.acceptLanguage ?? DEFAULT_ACCEPT_LANGUAGE,
    Accept: 'text/html,application/xhtml+xml',
  };

  return {
    async fetch(url, signal) {
      if (!isHttpUrl(url)) {
        return { success: false, error: 'invalid_url' };
      }

      logger.debug({ url }, 'Fetching alternate surface');
      try {
        const response = await httpRequest('GET', url, { headers, signal });
        const html = response.body;

        if (!response.ok || !html) {
          logger.debug({ url, statusCode: response.statusCode }, 'Alternate surface returned no content');
          return { success: false, statusCode: response.statusCode, error: `http_${response.statusCode}` };
        }
        if (isLoginWall(html)) {
          return { success: false, statusCode: response.statusCode, error: 'login_wall' };
        }

        return { success: true, html, finalUrl: url, statusCode: response.statusCode };
      } catch (error) {
        logger.debug({ url, error: String(error) }, 'Alternate surface fetch failed');
        return { success: false, error: signal.aborted ? 'timeout' : 'network_error' };
      }
    },
  };
}
