/**
 * Fallback orchestrator: decides, after the local layers, whether alternate
 * surfaces and AI inference are needed, and runs them with bounded calls.
 *
 *   initial → local-extracted → sufficient → finalized
 *                             → insufficient → alternate-surface-requested
 *                                 → local-extracted-alternate → (sufficient | ai-requested)
 *                                 → ai-requested → finalized
 *
 * Collaborator failures never escape: they are logged, recorded as
 * `collaborator_failure` issues, and the run finalizes with what it has.
 */
import type { EngagementResolver } from '../resolve/resolver.js';
import type { EngineOptions } from '../config/engine-options.js';
import type { SurfaceConfig } from '../sites/surface-config.js';
import { type SurfaceFetcher, buildSurfaceCandidates } from './alternate-surface.js';
import { type AiExtractor, AiInferenceResultSchema, buildAiExcerpt } from './ai-extractor.js';
import { withTimeout } from './timeout.js';
import { snapshotFromHtml } from '../extract/static-dom.js';
import { domSummarySignals, visibleTextSignals } from '../extract/signal-layers.js';
import { type Metric, METRICS } from '../extract/types.js';
import { logger } from '../logger.js';

export type OrchestratorState =
  | 'initial'
  | 'local-extracted'
  | 'sufficient'
  | 'insufficient'
  | 'alternate-surface-requested'
  | 'local-extracted-alternate'
  | 'ai-requested'
  | 'finalized';

export interface FallbackContext {
  url: string;
  contentId: string | null;
  /** Markup of the original snapshot, source of the AI excerpt. */
  markup: string;
  resolver: EngagementResolver;
  options: EngineOptions;
  surfaceConfig: SurfaceConfig;
  surfaceFetcher?: SurfaceFetcher;
  aiExtractor?: AiExtractor;
}

type AlternateOutcome = 'resolved' | 'unresolved' | 'all-failed' | 'skipped';

export class FallbackOrchestrator {
  private current: OrchestratorState = 'initial';
  private readonly history: string[] = [];

  constructor(private readonly ctx: FallbackContext) {}

  get state(): OrchestratorState {
    return this.current;
  }

  /** "from → to" entries, with an optional note. */
  get transitions(): string[] {
    return [...this.history];
  }

  private transition(to: OrchestratorState, note?: string): void {
    const entry = `${this.current} → ${to}${note ? ` (${note})` : ''}`;
    this.history.push(entry);
    logger.debug({ url: this.ctx.url, from: this.current, to, note }, 'Fallback transition');
    this.current = to;
  }

  private isSufficient(): boolean {
    return this.ctx.resolver.value('views') > 0;
  }

  /**
   * Run every fallback the record needs. Call once, after the local layers
   * have been offered to the resolver.
   */
  async run(): Promise<OrchestratorState> {
    if (this.current !== 'initial') return this.current;

    this.transition('local-extracted');
    if (this.isSufficient()) {
      this.transition('sufficient');
      this.transition('finalized');
      return this.current;
    }
    this.transition('insufficient');

    const alternate = await this.tryAlternateSurfaces();
    if (alternate === 'resolved') {
      this.transition('sufficient');
      this.transition('finalized');
      return this.current;
    }
    if (alternate === 'all-failed') {
      this.transition('finalized', 'every alternate surface failed');
      return this.current;
    }

    await this.tryAiInference();
    this.transition('finalized');
    return this.current;
  }

  private async tryAlternateSurfaces(): Promise<AlternateOutcome> {
    const { surfaceFetcher, options, resolver, url } = this.ctx;
    if (!options.enableAlternateSurface || !surfaceFetcher) return 'skipped';

    const candidates = buildSurfaceCandidates(url, this.ctx.contentId, this.ctx.surfaceConfig);
    if (candidates.length === 0) return 'skipped';

    let anySucceeded = false;
    for (const candidate of candidates) {
      this.transition('alternate-surface-requested', candidate);

      let html: string | undefined;
      try {
        const result = await withTimeout(
          (signal) => surfaceFetcher.fetch(candidate, signal),
          options.alternateSurfaceTimeoutMs,
          'Alternate surface fetch'
        );
        if (!result.success || !result.html) {
          resolver.recordIssue('collaborator_failure', `${candidate}: ${result.error ?? 'no_content'}`);
          continue;
        }
        html = result.html;
      } catch (error) {
        logger.warn({ url, candidate, error: String(error) }, 'Alternate surface fetch failed');
        resolver.recordIssue('collaborator_failure', `${candidate}: ${String(error)}`);
        continue;
      }

      try {
        const snapshot = snapshotFromHtml(html, candidate);
        resolver.offerAll([
          ...domSummarySignals(snapshot.domSummary, 'alternate-surface'),
          ...visibleTextSignals(snapshot.visibleText, 'alternate-surface'),
        ]);
      } catch (error) {
        logger.warn({ url, candidate, error: String(error) }, 'Alternate surface body could not be read');
        resolver.recordIssue('collaborator_failure', `${candidate}: unreadable body (${String(error)})`);
        continue;
      }
      anySucceeded = true;
      this.transition('local-extracted-alternate', candidate);

      if (this.isSufficient()) return 'resolved';
    }

    return anySucceeded ? 'unresolved' : 'all-failed';
  }

  private async tryAiInference(): Promise<void> {
    const { aiExtractor, options, resolver, url } = this.ctx;
    if (!options.enableAi || !aiExtractor) return;

    const excerpt = buildAiExcerpt(this.ctx.markup, options.aiExcerptMaxChars);
    if (!excerpt) {
      resolver.recordIssue('extraction_miss', 'no markup left for AI inference');
      return;
    }

    this.transition('ai-requested');
    let answer: unknown;
    try {
      answer = await withTimeout(
        (signal) => aiExtractor.infer(excerpt, url, signal),
        options.aiTimeoutMs,
        'AI inference'
      );
    } catch (error) {
      logger.warn({ url, error: String(error) }, 'AI inference failed');
      resolver.recordIssue('collaborator_failure', `ai: ${String(error)}`);
      return;
    }

    const checked = AiInferenceResultSchema.safeParse(answer);
    if (!checked.success) {
      logger.warn({ url, error: checked.error.message }, 'AI inference returned a malformed result');
      resolver.recordIssue('collaborator_failure', 'ai: malformed result');
      return;
    }
    const result = checked.data;

    if (result.confidence < options.aiMinConfidence) {
      logger.info(
        { url, confidence: result.confidence, minimum: options.aiMinConfidence },
        'AI result below confidence threshold'
      );
      return;
    }

    for (const metric of METRICS) {
      this.acceptAiValue(metric, result[metric]);
    }
  }

  /** AI values only fill metrics still at zero. */
  private acceptAiValue(metric: Metric, value: number): void {
    if (this.ctx.resolver.value(metric) !== 0 || !(value > 0)) return;
    this.ctx.resolver.offer({ metric, raw: String(Math.trunc(value)), layer: 'ai-inference' });
  }
}
