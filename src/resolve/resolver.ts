/**
 * Signal resolver: monotonic best-value merge of raw signals into one
 * engagement record.
 *
 * A metric is replaced only by a strictly greater normalized value, so the
 * result is the maximum over every signal regardless of arrival order.
 */
import { normalizeCount } from '../extract/count-normalizer.js';
import {
  type EngagementRecord,
  type ExtractionDiagnostics,
  type ExtractionIssue,
  type LayerId,
  type Metric,
  type RawSignal,
  type SignalTrace,
  emptyEngagement,
} from '../extract/types.js';
import { logger } from '../logger.js';

/**
 * Merge one signal. Returns `current` unchanged when the signal does not
 * normalize or is not strictly greater.
 */
export function mergeSignal(current: EngagementRecord, signal: RawSignal): EngagementRecord {
  const value = normalizeCount(signal.raw, signal.context);
  if (value === null || value <= current[signal.metric]) return current;
  return { ...current, [signal.metric]: value };
}

function perMetric<T>(value: T): Record<Metric, T> {
  return { reactions: value, comments: value, shares: value, views: value };
}

export interface IssueRecord {
  issue: ExtractionIssue;
  detail: string;
}

/**
 * Stateful wrapper for one extraction run: the record plus provenance,
 * winning raw strings and a trace of every signal offered.
 */
export class EngagementResolver {
  private record: EngagementRecord = emptyEngagement();
  private readonly rawValues = perMetric<string | null>(null);
  private readonly provenance = perMetric<LayerId | null>(null);
  private readonly trace: SignalTrace[] = [];
  private readonly issues: IssueRecord[] = [];

  constructor(private readonly url: string) {}

  /** Offer a signal; true when it became the new value for its metric. */
  offer(signal: RawSignal): boolean {
    const normalized = normalizeCount(signal.raw, signal.context);
    const next = mergeSignal(this.record, signal);
    const accepted = next !== this.record;

    this.trace.push({
      metric: signal.metric,
      layer: signal.layer,
      raw: signal.raw,
      normalized,
      accepted,
    });

    if (normalized === null) {
      this.recordIssue('normalization_failure', `${signal.metric} from ${signal.layer}: "${signal.raw}"`);
      return false;
    }

    if (accepted) {
      this.record = next;
      this.rawValues[signal.metric] = signal.raw;
      this.provenance[signal.metric] = signal.layer;
      logger.debug(
        { url: this.url, layer: signal.layer, metric: signal.metric, raw: signal.raw, value: normalized },
        'Signal accepted'
      );
    }
    return accepted;
  }

  offerAll(signals: readonly RawSignal[]): number {
    let accepted = 0;
    for (const signal of signals) {
      if (this.offer(signal)) accepted++;
    }
    return accepted;
  }

  value(metric: Metric): number {
    return this.record[metric];
  }

  get engagement(): EngagementRecord {
    return { ...this.record };
  }

  recordIssue(issue: ExtractionIssue, detail: string): void {
    this.issues.push({ issue, detail });
    logger.debug({ url: this.url, issue, detail }, 'Extraction issue');
  }

  /** Metrics still at zero are reported as misses. */
  recordMisses(): void {
    for (const [metric, value] of Object.entries(this.record)) {
      if (value === 0) this.recordIssue('extraction_miss', `${metric} not found in any layer`);
    }
  }

  diagnostics(transitions: readonly string[], warnings: readonly string[]): ExtractionDiagnostics {
    return {
      rawValues: { ...this.rawValues },
      provenance: { ...this.provenance },
      signals: [...this.trace],
      transitions: [...transitions],
      issues: [...this.issues],
      warnings: [...warnings],
    };
  }
}
