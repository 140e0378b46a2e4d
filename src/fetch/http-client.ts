/**
 * Shared httpcloak session with a mobile Chrome fingerprint, used by the
 * alternate-surface fetcher and the AI extractor.
 */
import httpcloak from 'httpcloak';

import { logger } from '../logger.js';

const SESSION_TIMEOUT_SEC = 30;

let session: httpcloak.Session | null = null;

export function getSession(): httpcloak.Session {
  if (!session) {
    logger.debug({ preset: 'ANDROID_CHROME_143' }, 'Creating httpcloak session');
    session = new httpcloak.Session({
      preset: httpcloak.Preset.ANDROID_CHROME_143,
      timeout: SESSION_TIMEOUT_SEC,
    });
  }
  return session;
}

/**
 * Close the shared session. The next request opens a fresh one.
 */
export async function closeHttpSession(): Promise<void> {
  if (!session) return;
  try {
    session.close();
  } catch (error) {
    logger.warn({ error: String(error) }, 'Error closing httpcloak session');
  } finally {
    session = null;
  }
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  /** Raw request body, POST only. */
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  statusCode: number;
  body: string;
}

/** Dispatch a request using the appropriate HTTP method. */
function dispatchRequest(
  sess: httpcloak.Session,
  method: 'GET' | 'POST',
  url: string,
  headers: Record<string, string>,
  body: string | undefined
): Promise<httpcloak.Response> {
  const opts = {
    headers,
    ...(method === 'POST' && body !== undefined ? { body } : {}),
  } as httpcloak.RequestOptions;

  return method === 'POST' ? sess.post(url, opts) : sess.get(url, opts);
}

/** A promise that rejects once `signal` aborts; `cancel` detaches the listener. */
function abortRejection(signal: AbortSignal): { promise: Promise<never>; cancel: () => void } {
  let onAbort: (() => void) | undefined;
  const promise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new Error('Request aborted'));
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return {
    promise,
    cancel: () => {
      if (onAbort) signal.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Send one request through the shared session. Rejects on transport errors
 * and when `signal` aborts; HTTP error statuses resolve with `ok: false`.
 */
export async function httpRequest(
  method: 'GET' | 'POST',
  url: string,
  options: HttpRequestOptions = {}
): Promise<HttpResponse> {
  const { headers = {}, body, signal } = options;
  if (signal?.aborted) {
    throw new Error('Request aborted');
  }

  logger.debug({ url, method }, 'Making httpcloak request');
  const request = dispatchRequest(getSession(), method, url, headers, body);

  let response: httpcloak.Response;
  if (signal) {
    const abort = abortRejection(signal);
    try {
      response = await Promise.race([request, abort.promise]);
    } finally {
      abort.cancel();
    }
  } else {
    response = await request;
  }

  // NOTE: httpcloak sometimes returns text as function, sometimes as property
  const textValue = response.text as string | (() => string);
  const text = typeof textValue === 'function' ? textValue() : textValue;

  logger.debug(
    { url, statusCode: response.statusCode, bodyLength: text?.length ?? 0 },
    'httpcloak request complete'
  );

  return { ok: response.ok, statusCode: response.statusCode, body: text ?? '' };
}
