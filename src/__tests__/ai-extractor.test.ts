import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  buildAiExcerpt,
  createOpenRouterExtractor,
  parseAiContent,
} from '../fallback/ai-extractor.js';
import { DEFAULT_OPENROUTER_MODEL, DEFAULT_OPENROUTER_URL } from '../config/engine-options.js';

vi.mock('../logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('../fetch/http-client.js', () => ({
  httpRequest: vi.fn(),
}));

import { httpRequest } from '../fetch/http-client.js';

describe('buildAiExcerpt', () => {
  const html = [
    '<html><head><title>Jane Doe</title><meta property="og:title" content="Great day"></head>',
    '<body><div class="x1 y2" style="color:red">1,2 K vues</div><span>Share</span><p>12 views</p></body></html>',
  ].join('');

  it('keeps og tags and keyword tags without class or style', () => {
    expect(buildAiExcerpt(html)).toBe(
      '<meta property="og:title" content="Great day">\n<div>1,2 K vues</div>\n<span>Share</span>'
    );
  });

  it('truncates to the size bound', () => {
    expect(buildAiExcerpt(html, 10)).toBe('<meta prop');
  });

  it('is empty when nothing mentions engagement', () => {
    expect(buildAiExcerpt('<div>hello</div>')).toBe('');
  });
});

describe('parseAiContent', () => {
  it('reads a fenced answer and coerces counts', () => {
    const content = '```json\n{"views_count": "1200", "reactions_count": 5, "confidence": 0.9}\n```';
    expect(parseAiContent(content)).toEqual({
      views: 1200,
      reactions: 5,
      comments: 0,
      shares: 0,
      confidence: 0.9,
    });
  });

  it('turns unparseable counts into 0', () => {
    expect(parseAiContent('{"views_count": "lots", "confidence": 0.6}')?.views).toBe(0);
  });

  it('returns null for non-JSON or answers without confidence', () => {
    expect(parseAiContent('I could not find any counts.')).toBeNull();
    expect(parseAiContent('{"views_count": 1}')).toBeNull();
    expect(parseAiContent('{"views_count": 1, "confidence": 3}')).toBeNull();
  });
});

describe('createOpenRouterExtractor', () => {
  const signal = new AbortController().signal;

  function completion(content: string) {
    return {
      ok: true,
      statusCode: 200,
      body: JSON.stringify({ choices: [{ message: { content } }] }),
    };
  }

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('posts the excerpt and returns the parsed counts', async () => {
    vi.mocked(httpRequest).mockResolvedValue(
      completion(
        '{"views_count":3400,"reactions_count":0,"comments_count":0,"shares_count":0,"confidence":0.7}'
      )
    );

    const extractor = createOpenRouterExtractor({ apiKey: 'test-secret' });
    const result = await extractor.infer('<div>3,4 K vues</div>', 'https://www.facebook.com/reel/1', signal);

    expect(result).toEqual({ views: 3400, reactions: 0, comments: 0, shares: 0, confidence: 0.7 });

    const [method, endpoint, init] = vi.mocked(httpRequest).mock.calls[0];
    expect(method).toBe('POST');
    expect(endpoint).toBe(DEFAULT_OPENROUTER_URL);
    expect(init?.signal).toBe(signal);
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      model: DEFAULT_OPENROUTER_MODEL,
      response_format: { type: 'json_object' },
    });
  });

  it('rejects on HTTP errors', async () => {
    vi.mocked(httpRequest).mockResolvedValue({ ok: false, statusCode: 401, body: 'unauthorized' });
    await expect(
      createOpenRouterExtractor({ apiKey: 'test-secret' }).infer('x', 'u', signal)
    ).rejects.toThrow('AI backend returned HTTP 401');
  });

  it('rejects bodies that are not JSON', async () => {
    vi.mocked(httpRequest).mockResolvedValue({ ok: true, statusCode: 200, body: '<html>' });
    await expect(
      createOpenRouterExtractor({ apiKey: 'test-secret' }).infer('x', 'u', signal)
    ).rejects.toThrow('Malformed AI backend response: body is not JSON');
  });

  it('rejects malformed completions', async () => {
    vi.mocked(httpRequest).mockResolvedValue({ ok: true, statusCode: 200, body: '{}' });
    await expect(
      createOpenRouterExtractor({ apiKey: 'test-secret' }).infer('x', 'u', signal)
    ).rejects.toThrow('Malformed AI backend response');
  });

  it('rejects answers in the wrong format', async () => {
    vi.mocked(httpRequest).mockResolvedValue(completion('Sorry, I cannot help with that.'));
    await expect(
      createOpenRouterExtractor({ apiKey: 'test-secret', model: 'test/model' }).infer('x', 'u', signal)
    ).rejects.toThrow('AI answer does not match the expected format');
  });
});
