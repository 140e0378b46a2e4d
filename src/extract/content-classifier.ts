/**
 * Post kind from the current media set.
 */
import type { MediaAsset, PostKind } from './types.js';

/**
 * Video asset or explicit video presence wins; otherwise the number of
 * distinct images decides. Call again whenever the media set changes.
 */
export function classifyPostKind(media: readonly MediaAsset[], hasVideo: boolean): PostKind {
  if (hasVideo || media.some((asset) => asset.kind === 'video')) return 'video';

  const signatures = new Set(media.filter((a) => a.kind === 'image').map((a) => a.signature));
  if (signatures.size > 1) return 'multi-image';
  if (signatures.size === 1) return 'single-image';
  return 'text';
}

/**
 * Warning for a gallery indicator that the extracted images do not back up.
 */
export function galleryWarning(media: readonly MediaAsset[], galleryIndicated: boolean): string | null {
  if (!galleryIndicated) return null;
  const images = media.filter((a) => a.kind === 'image').length;
  return images < 2
    ? `gallery indicator present but only ${images} image(s) extracted`
    : null;
}
