/**
 * engagement-lens - Resolve engagement metrics and primary media for a
 * rendered social post or reel snapshot.
 *
 * @module engagement-lens
 */
export {
  extractContentItem,
  extractContentItemFromInput,
} from './extract/content-item.js';
export { parseSnapshot, PageSnapshotSchema, DomSummarySchema } from './extract/snapshot.js';
export { normalizeCount } from './extract/count-normalizer.js';
export { extractMetricText, matchMetricText } from './extract/text-patterns.js';
export {
  mineEmbeddedData,
  mineEmbeddedSignals,
  mineEmbeddedMetadata,
  mineNetworkSnippetSignals,
} from './extract/embedded-data.js';
export { imageSignature, isNoiseImage, dedupeImages } from './extract/media-extractor.js';
export { rankVideoCandidates, videoQuality } from './extract/video-ranking.js';
export { classifyPostKind } from './extract/content-classifier.js';
export { detectContentType, parseOgTitle, CONTENT_KIND_PROFILES } from './extract/content-kind.js';
export {
  metaTagSignals,
  domSummarySignals,
  visibleTextSignals,
} from './extract/signal-layers.js';
export { buildDomSummaryFromHtml, snapshotFromHtml } from './extract/static-dom.js';
export { mergeSignal, EngagementResolver } from './resolve/resolver.js';
export { FallbackOrchestrator } from './fallback/orchestrator.js';
export {
  createHttpSurfaceFetcher,
  buildSurfaceCandidates,
  extractContentId,
} from './fallback/alternate-surface.js';
export {
  createOpenRouterExtractor,
  buildAiExcerpt,
  parseAiContent,
} from './fallback/ai-extractor.js';
export { detectHardBlock } from './antibot/detector.js';
export { httpRequest, closeHttpSession } from './fetch/http-client.js';
export {
  EngineOptionsSchema,
  loadEngineOptionsFromEnv,
  defaultEngineOptions,
} from './config/engine-options.js';
export { SurfaceConfigSchema, loadSurfaceConfig } from './sites/surface-config.js';
export type {
  ContentItem,
  ContentType,
  EngagementRecord,
  ExtractionDiagnostics,
  ExtractionIssue,
  LayerId,
  MediaAsset,
  Metric,
  PostKind,
  RawSignal,
} from './extract/types.js';
export type { PageSnapshot, PageSnapshotInput, DomSummary } from './extract/snapshot.js';
export type { ExtractionDependencies, ContentItemResult } from './extract/content-item.js';
export type { SurfaceFetcher, SurfaceFetchResult } from './fallback/alternate-surface.js';
export type { AiExtractor, AiInferenceResult } from './fallback/ai-extractor.js';
export type { OrchestratorState } from './fallback/orchestrator.js';
export type { HardBlockDetection, BlockReason } from './antibot/detector.js';
export type { EngineOptions } from './config/engine-options.js';
export type { SurfaceConfig } from './sites/surface-config.js';
