/**
 * Pipeline: one rendered snapshot in, one canonical content item out.
 *
 * Layers run in fixed order (meta tags, embedded data, DOM summary, visible
 * text) and feed the resolver; the fallback orchestrator then decides whether
 * alternate surfaces or AI inference are needed. The pipeline never throws.
 */
import { createHash } from 'crypto';
import {
  type ContentItem,
  type ContentType,
  type MediaAsset,
  type PostKind,
  emptyEngagement,
} from './types.js';
import { type PageSnapshot, parseSnapshot, snapshotMarkup, snapshotUrl } from './snapshot.js';
import { readPageMetadata } from './metadata-extractors.js';
import { mineEmbeddedMetadata, mineEmbeddedSignals, mineNetworkSnippetSignals } from './embedded-data.js';
import { extractJsonLdMetadata } from './json-ld-extractor.js';
import { domSummarySignals, metaTagSignals, visibleTextSignals } from './signal-layers.js';
import { collectImageAssets, dedupeImages } from './media-extractor.js';
import { extractVideoCandidates, rankVideoCandidates } from './video-ranking.js';
import { classifyPostKind, galleryWarning } from './content-classifier.js';
import {
  CONTENT_KIND_PROFILES,
  detectContentType,
  isPlausibleAuthor,
  parseOgTitle,
  pickBySource,
} from './content-kind.js';
import { EngagementResolver } from '../resolve/resolver.js';
import { FallbackOrchestrator } from '../fallback/orchestrator.js';
import { type SurfaceFetcher, extractContentId } from '../fallback/alternate-surface.js';
import type { AiExtractor } from '../fallback/ai-extractor.js';
import { type EngineOptions, defaultEngineOptions } from '../config/engine-options.js';
import { type SurfaceConfig, getSurfaceConfig } from '../sites/surface-config.js';
import { logger } from '../logger.js';

export interface ExtractionDependencies {
  surfaceFetcher?: SurfaceFetcher;
  aiExtractor?: AiExtractor;
  options?: EngineOptions;
  surfaceConfig?: SurfaceConfig;
  /** Attach the diagnostic block to the item. */
  diagnostics?: boolean;
}

function fallbackId(url: string): string {
  return createHash('sha256').update(url).digest('hex').slice(0, 16);
}

function usableVideoSrc(src: string | null | undefined): string | null {
  return src && !src.startsWith('blob:') ? src : null;
}

/**
 * Media set that recomputes the post kind on every mutation.
 */
class MediaCollector {
  private assets: MediaAsset[] = [];
  private kind: PostKind = 'text';

  constructor(private readonly hasVideo: boolean) {
    this.kind = classifyPostKind(this.assets, hasVideo);
  }

  add(assets: readonly MediaAsset[]): void {
    if (assets.length === 0) return;
    const videos = [...this.assets, ...assets].filter((a) => a.kind === 'video').slice(0, 1);
    const images = dedupeImages([...this.assets, ...assets].filter((a) => a.kind === 'image'));
    this.assets = [...videos, ...images];
    this.kind = classifyPostKind(this.assets, this.hasVideo);
  }

  get media(): MediaAsset[] {
    return [...this.assets];
  }

  get postKind(): PostKind {
    return this.kind;
  }
}

async function buildContentItem(
  snapshot: PageSnapshot,
  deps: ExtractionDependencies
): Promise<ContentItem> {
  const options = deps.options ?? defaultEngineOptions();
  const url = snapshotUrl(snapshot);
  const markup = snapshotMarkup(snapshot);
  const dom = snapshot.domSummary;
  const warnings: string[] = [];

  const metadata = readPageMetadata(snapshot.headHtml || markup);
  const embedded = mineEmbeddedMetadata(markup);
  const jsonLd = extractJsonLdMetadata(markup);
  const contentType: ContentType =
    detectContentType(url) === 'reel' || detectContentType(snapshot.requestedUrl) === 'reel'
      ? 'reel'
      : 'post';

  // Engagement layers 1-4
  const resolver = new EngagementResolver(url);
  resolver.offerAll(metaTagSignals(metadata));
  resolver.offerAll(mineEmbeddedSignals(markup));
  resolver.offerAll(mineNetworkSnippetSignals(snapshot.networkSnippets));
  resolver.offerAll(domSummarySignals(dom));
  resolver.offerAll(visibleTextSignals(snapshot.visibleText));

  const contentId =
    extractContentId(url) ??
    extractContentId(snapshot.requestedUrl) ??
    embedded.videoId ??
    embedded.topLevelPostId ??
    embedded.postId;

  // Media: meta pass, embedded pass, DOM pass
  const domVideoSrc = usableVideoSrc(dom.video?.src);
  const anchorUrl = usableVideoSrc(metadata.ogVideo) ?? domVideoSrc;
  const ranked = rankVideoCandidates(
    [
      ...(anchorUrl ? [anchorUrl] : []),
      ...extractVideoCandidates(markup),
      ...(domVideoSrc ? [domVideoSrc] : []),
    ],
    { anchorUrl, contentId: embedded.videoId ?? contentId }
  );
  const hasVideo = ranked.primary !== null || Boolean(dom.video) || Boolean(metadata.ogVideo);
  const media = new MediaCollector(hasVideo);

  media.add(collectImageAssets({ ogImage: metadata.ogImage }));
  if (ranked.primary) media.add([ranked.primary]);
  media.add(collectImageAssets({ markup }));
  media.add(collectImageAssets({ domImages: dom.images }));

  const gallery = galleryWarning(media.media, dom.gallery);
  if (gallery) warnings.push(gallery);

  const orchestrator = new FallbackOrchestrator({
    url,
    contentId,
    markup,
    resolver,
    options,
    surfaceConfig: deps.surfaceConfig ?? getSurfaceConfig(),
    surfaceFetcher: deps.surfaceFetcher,
    aiExtractor: deps.aiExtractor,
  });
  try {
    await orchestrator.run();
  } catch (error) {
    logger.error({ url, error: String(error) }, 'Fallback run failed, keeping the local record');
    resolver.recordIssue('collaborator_failure', `fallback: ${String(error)}`);
  }
  resolver.recordMisses();

  const profile = CONTENT_KIND_PROFILES[contentType];
  const titleParts = parseOgTitle(metadata.ogTitle);
  const caption = pickBySource(profile.captionSources, {
    'og-title': titleParts.caption,
    'og-description': metadata.ogDescription,
    'meta-description': metadata.metaDescription,
    'dom-caption': dom.caption,
  });
  const author = pickBySource(
    profile.authorSources,
    {
      'og-title': titleParts.author,
      'dom-author': dom.author?.name,
      'embedded-owner': embedded.ownerName,
      'json-ld': jsonLd?.author,
    },
    isPlausibleAuthor
  );

  const item: ContentItem = {
    id: contentId ?? fallbackId(url),
    url: metadata.ogUrl ?? url,
    contentType,
    caption,
    author,
    postDate: dom.postDate ?? embedded.publishTime ?? jsonLd?.publishedTime ?? metadata.publishedTime,
    engagement: resolver.engagement,
    media: media.media,
    postKind: media.postKind,
    videoAlternates: ranked.alternates,
  };

  if (deps.diagnostics) {
    item.diagnostics = resolver.diagnostics(orchestrator.transitions, warnings);
  }

  logger.info(
    { url, contentType, postKind: item.postKind, engagement: item.engagement, state: orchestrator.state },
    'Content item resolved'
  );
  return item;
}

/**
 * Resolve one snapshot into a content item. Unexpected errors are logged and
 * produce an item with zero metrics and no media.
 */
export async function extractContentItem(
  snapshot: PageSnapshot,
  deps: ExtractionDependencies = {}
): Promise<ContentItem> {
  try {
    return await buildContentItem(snapshot, deps);
  } catch (error) {
    const url = snapshotUrl(snapshot);
    logger.error({ url, error: String(error) }, 'Content item extraction failed');
    return {
      id: fallbackId(url),
      url,
      contentType: detectContentType(url),
      caption: null,
      author: null,
      postDate: null,
      engagement: emptyEngagement(),
      media: [],
      postKind: 'text',
      videoAlternates: [],
    };
  }
}

export type ContentItemResult =
  | { success: true; item: ContentItem }
  | { success: false; error: string };

/**
 * Library entry for untrusted input: validates the snapshot first.
 */
export async function extractContentItemFromInput(
  input: unknown,
  deps: ExtractionDependencies = {}
): Promise<ContentItemResult> {
  const parsed = parseSnapshot(input);
  if (!parsed.success) {
    return { success: false, error: `Invalid snapshot: ${parsed.error}` };
  }
  return { success: true, item: await extractContentItem(parsed.snapshot, deps) };
}
