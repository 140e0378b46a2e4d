/**
 * Text extraction layers: meta tags, DOM summary and visible text.
 *
 * Each layer is a pure function that turns one source into raw signals;
 * resolution happens in the resolver.
 */
import type { PageMetadata } from './metadata-extractors.js';
import type { DomSummary } from './snapshot.js';
import { matchMetricText } from './text-patterns.js';
import { normalizeCount } from './count-normalizer.js';
import { type LayerId, type RawSignal, METRICS, MAX_FRAGMENT_LENGTH } from './types.js';

/**
 * Per-reaction-type labels: "Me gusta: 263 personas", "Like: 263 people".
 */
const REACTION_TYPE_LABEL =
  /^(?:me gusta|me encanta|me importa|me divierte|me asombra|me entristece|me enoja|like|love|care|haha|wow|sad|angry|j[’']aime|j[’']adore|grrr|mi piace|abbraccio|ahah|curtir|amei|uau|triste|grr)\s*:\s*(\d[\d.,]*(?:\s?[KkMm])?)\s+(?:personas?|people|persons?|personnes?|persone|persona|pessoas?)/iu;

function textSignals(text: string | null | undefined, layer: LayerId): RawSignal[] {
  const signals: RawSignal[] = [];
  if (!text) return signals;
  for (const metric of METRICS) {
    const match = matchMetricText(metric, text);
    if (match) signals.push({ metric, raw: match.raw, layer, context: match.context });
  }
  return signals;
}

/**
 * Layer 1: page title, og:title and og/meta description, each matched
 * independently.
 */
export function metaTagSignals(metadata: PageMetadata): RawSignal[] {
  return [
    ...textSignals(metadata.ogTitle, 'meta-tags'),
    ...textSignals(metadata.pageTitle, 'meta-tags'),
    ...textSignals(metadata.ogDescription, 'meta-tags'),
    ...textSignals(metadata.metaDescription, 'meta-tags'),
  ];
}

/**
 * Sum of the per-reaction-type counts, or null when no such label exists.
 * Identical labels are counted once.
 */
export function sumReactionTypeLabels(labels: readonly string[]): number | null {
  let total = 0;
  let found = false;
  for (const label of new Set(labels.map((l) => l.trim()))) {
    const match = REACTION_TYPE_LABEL.exec(label);
    const count = match ? normalizeCount(match[1]) : null;
    if (count !== null) {
      total += count;
      found = true;
    }
  }
  return found ? total : null;
}

/** First matching string in a group, per metric. */
function firstHitPerMetric(texts: readonly string[], layer: LayerId): RawSignal[] {
  const signals: RawSignal[] = [];
  for (const metric of METRICS) {
    for (const text of texts) {
      const match = matchMetricText(metric, text);
      if (match) {
        signals.push({ metric, raw: match.raw, layer, context: match.context });
        break;
      }
    }
  }
  return signals;
}

/**
 * Layer 3: aria labels (including summed per-reaction-type labels), short
 * engagement texts and button texts.
 */
export function domSummarySignals(dom: DomSummary, layer: LayerId = 'dom-summary'): RawSignal[] {
  const signals: RawSignal[] = [];

  const reactionTotal = sumReactionTypeLabels(dom.ariaLabels);
  if (reactionTotal !== null) {
    signals.push({ metric: 'reactions', raw: String(reactionTotal), layer, context: 'reaction types' });
  }

  const shortTexts = dom.engagementTexts.filter((t) => t.length <= MAX_FRAGMENT_LENGTH);
  signals.push(
    ...firstHitPerMetric(dom.ariaLabels, layer),
    ...firstHitPerMetric(shortTexts, layer),
    ...firstHitPerMetric(dom.buttonTexts, layer)
  );
  return signals;
}

/**
 * Layer 4: first match per metric in the full visible text.
 */
export function visibleTextSignals(text: string, layer: LayerId = 'visible-text'): RawSignal[] {
  return textSignals(text, layer);
}
