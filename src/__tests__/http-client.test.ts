/**
 * Tests for the shared httpcloak session. httpcloak is mocked; no network calls.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockGet = vi.fn();
const mockPost = vi.fn();
const mockClose = vi.fn();
const mockSessionOptions: Record<string, unknown>[] = [];

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('httpcloak', () => ({
  default: {
    Session: class MockSession {
      get = mockGet;
      post = mockPost;
      close = mockClose;
      constructor(opts?: Record<string, unknown>) {
        mockSessionOptions.push(opts ?? {});
      }
    },
    Preset: {
      ANDROID_CHROME_143: 'android-chrome-143',
    },
  },
}));

import { closeHttpSession, getSession, httpRequest } from '../fetch/http-client.js';

function mockResponse(statusCode: number, text: string | (() => string)) {
  return { ok: statusCode >= 200 && statusCode < 300, statusCode, text, headers: {}, cookies: [] };
}

describe('http-client', () => {
  beforeEach(async () => {
    await closeHttpSession();
    vi.clearAllMocks();
    mockSessionOptions.length = 0;
  });

  describe('getSession', () => {
    it('creates one session with the Android Chrome preset and reuses it', () => {
      const first = getSession();
      const second = getSession();

      expect(second).toBe(first);
      expect(mockSessionOptions).toEqual([{ preset: 'android-chrome-143', timeout: 30 }]);
    });

    it('opens a fresh session after closing', async () => {
      getSession();
      await closeHttpSession();
      getSession();

      expect(mockClose).toHaveBeenCalledTimes(1);
      expect(mockSessionOptions).toHaveLength(2);
    });
  });

  describe('httpRequest', () => {
    it('sends GET with headers and returns the body', async () => {
      mockGet.mockResolvedValue(mockResponse(200, '<html>ok</html>'));

      const response = await httpRequest('GET', 'https://m.facebook.com/reel/1', {
        headers: { Accept: 'text/html' },
      });

      expect(response).toEqual({ ok: true, statusCode: 200, body: '<html>ok</html>' });
      expect(mockGet).toHaveBeenCalledWith('https://m.facebook.com/reel/1', {
        headers: { Accept: 'text/html' },
      });
    });

    it('sends POST with the raw body', async () => {
      mockPost.mockResolvedValue(mockResponse(200, '{}'));

      await httpRequest('POST', 'https://api.example.com/v1', {
        headers: { 'Content-Type': 'application/json' },
        body: '{"a":1}',
      });

      expect(mockPost).toHaveBeenCalledWith('https://api.example.com/v1', {
        headers: { 'Content-Type': 'application/json' },
        body: '{"a":1}',
      });
    });

    it('reads text given as a function', async () => {
      mockGet.mockResolvedValue(mockResponse(404, () => 'gone'));

      expect(await httpRequest('GET', 'https://m.facebook.com/x')).toEqual({
        ok: false,
        statusCode: 404,
        body: 'gone',
      });
    });

    it('rejects when the signal aborts first', async () => {
      mockGet.mockReturnValue(new Promise(() => undefined));
      const controller = new AbortController();

      const pending = httpRequest('GET', 'https://m.facebook.com/x', { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toThrow('Request aborted');
    });

    it('does not send when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        httpRequest('GET', 'https://m.facebook.com/x', { signal: controller.signal })
      ).rejects.toThrow('Request aborted');
      expect(mockGet).not.toHaveBeenCalled();
    });

    it('propagates transport errors', async () => {
      mockGet.mockRejectedValue(new Error('connection reset'));

      await expect(httpRequest('GET', 'https://m.facebook.com/x')).rejects.toThrow('connection reset');
    });
  });
});
