/**
 * Shared test helpers: snapshot builders and in-process collaborator fakes.
 */
import { vi } from 'vitest';
import { PageSnapshotSchema, type PageSnapshot, type PageSnapshotInput } from '../extract/snapshot.js';
import type { SurfaceFetcher, SurfaceFetchResult } from '../fallback/alternate-surface.js';
import type { AiExtractor, AiInferenceResult } from '../fallback/ai-extractor.js';
import { defaultEngineOptions, type EngineOptions } from '../config/engine-options.js';
import type { SurfaceConfig } from '../sites/surface-config.js';

export const POST_URL = 'https://www.facebook.com/janedoe/posts/1234567890';
export const REEL_URL = 'https://www.facebook.com/reel/987654321';

/** Build a validated snapshot with defaults for every omitted field. */
export function makeSnapshot(overrides: Partial<PageSnapshotInput> = {}): PageSnapshot {
  return PageSnapshotSchema.parse({ requestedUrl: POST_URL, ...overrides });
}

/** `<meta property=... content=...>` tags for a head. */
export function ogTags(tags: Record<string, string>): string {
  return Object.entries(tags)
    .map(([property, content]) => `<meta property="${property}" content="${content}">`)
    .join('\n');
}

/** Fake surface fetcher answering from a URL → result map; unknown URLs fail. */
export function makeSurfaceFetcher(
  responses: Record<string, SurfaceFetchResult | Error>
): SurfaceFetcher {
  return {
    fetch: vi.fn(async (url: string): Promise<SurfaceFetchResult> => {
      const response = responses[url];
      if (response instanceof Error) throw response;
      return response ?? { success: false, error: 'http_404' };
    }),
  };
}

export function makeAiExtractor(
  result: AiInferenceResult | Error
): AiExtractor {
  return {
    infer: vi.fn(async (): Promise<AiInferenceResult> => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

/** Short timeouts so timeout paths finish quickly. */
export function testOptions(overrides: Partial<EngineOptions> = {}): EngineOptions {
  return {
    ...defaultEngineOptions({ alternateSurfaceTimeoutMs: 200, aiTimeoutMs: 200 }),
    ...overrides,
  };
}

export const TEST_SURFACE_CONFIG: SurfaceConfig = {
  hosts: ['mbasic.facebook.com', 'm.facebook.com'],
  idTemplates: ['https://m.facebook.com/watch/?v={id}'],
  maxCandidates: 4,
};
