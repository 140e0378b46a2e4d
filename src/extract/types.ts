/**
 * Shared types, interfaces, and constants for the extract module
 */

export const METRICS = ['reactions', 'comments', 'shares', 'views'] as const;

export type Metric = (typeof METRICS)[number];

/**
 * Extraction layers in priority order. The resolver merges monotonically,
 * so the order ranks typical reliability rather than deciding the winner.
 */
export const LAYER_ORDER = [
  'meta-tags',
  'embedded-data',
  'dom-summary',
  'visible-text',
  'alternate-surface',
  'ai-inference',
] as const;

export type LayerId = (typeof LAYER_ORDER)[number];

/** A single raw observation of a metric from one layer. */
export interface RawSignal {
  metric: Metric;
  raw: string;
  layer: LayerId;
  /** Phrase the value was found in; drives the "you and N others" addend. */
  context?: string;
}

/** "Not found" and "confirmed zero" are both 0. */
export type EngagementRecord = Record<Metric, number>;

export type MediaKind = 'image' | 'video';

export interface MediaAsset {
  url: string;
  /** Content-derived dedup key, distinct from the URL. */
  signature: string;
  kind: MediaKind;
  qualityScore: number;
}

export type ContentType = 'post' | 'reel';

export type PostKind = 'video' | 'multi-image' | 'single-image' | 'text';

/**
 * Non-fatal and fatal issue categories. Only `hard_block` aborts an item, and
 * it is raised before the engine runs.
 */
export type ExtractionIssue =
  | 'extraction_miss'
  | 'normalization_failure'
  | 'collaborator_failure'
  | 'hard_block';

export interface SignalTrace {
  metric: Metric;
  layer: LayerId;
  raw: string;
  normalized: number | null;
  accepted: boolean;
}

export interface ExtractionDiagnostics {
  /** Winning raw string per metric, before normalization. */
  rawValues: Record<Metric, string | null>;
  /** Layer that produced the winning value per metric. */
  provenance: Record<Metric, LayerId | null>;
  signals: SignalTrace[];
  transitions: string[];
  issues: { issue: ExtractionIssue; detail: string }[];
  warnings: string[];
}

export interface ContentItem {
  id: string;
  url: string;
  contentType: ContentType;
  caption: string | null;
  author: string | null;
  postDate: string | null;
  engagement: EngagementRecord;
  media: MediaAsset[];
  postKind: PostKind;
  /** Lower-ranked renditions of the primary video, best first (max 4). */
  videoAlternates: string[];
  /** Operator debugging only; never replaces the canonical fields. */
  diagnostics?: ExtractionDiagnostics;
}

export const MAX_VIDEO_ALTERNATES = 4;

/** Images whose width and height are both below this are icon/profile noise. */
export const MIN_IMAGE_DIMENSION = 100;

/** Short DOM text fragments longer than this are ignored. */
export const MAX_FRAGMENT_LENGTH = 150;

export function emptyEngagement(): EngagementRecord {
  return { reactions: 0, comments: 0, shares: 0, views: 0 };
}
