/**
 * Ordered, locale-aware phrase patterns for engagement counts (en, es, fr, it, pt).
 *
 * Each metric has its patterns ranked from the most qualified phrase
 * ("view all 12 comments") to the bare keyword ("12 comments"). The first
 * pattern that matches wins. Every pattern exposes the count as the `n` group.
 */
import { MULTIPLIER_PATTERN } from './count-normalizer.js';
import type { Metric } from './types.js';

/** Count with separators, space-grouped thousands and an optional multiplier. */
const NUM = String.raw`(?<n>\d[\d.,]*(?:\s\d{3})*(?:\s?(?:${MULTIPLIER_PATTERN})(?!\p{L}))?)`;

/** Keyword alternatives must end on a word boundary (Unicode-aware). */
function kw(alternatives: string): string {
  return `(?:${alternatives})(?!\\p{L})`;
}

function pattern(source: string): RegExp {
  return new RegExp(source, 'iu');
}

const VIEWER = '(?<!\\p{L})(?:you|tú|usted|vous|tu|você)';
const AND = '(?:and|y|et|e)';
const OTHERS = kw(
  'others?|other people|personas más|persona más|más|autres personnes|autres|altre persone|altri|outras pessoas|outros|outras'
);

export const TEXT_PATTERNS: Readonly<Record<Metric, readonly RegExp[]>> = {
  reactions: [
    // "You and 12 others", "You, Ana and 12 others", "Tú y 2 personas más"
    pattern(`${VIEWER}(?:,\\s*[^,\\d]{1,40}?)?\\s+${AND}\\s+${NUM}\\s+${OTHERS}`),
    pattern(
      `${kw('all reactions|total reactions|todas las reacciones|toutes les réactions|tutte le reazioni|todas as reações')}\\s*:?\\s*${NUM}`
    ),
    pattern(
      `${NUM}\\s+${kw('people|personas|personnes|persone|pessoas')}\\s+${kw('reacted|reaccionaron|ont réagi|hanno reagito|reagiram')}`
    ),
    pattern(`${NUM}\\s+${kw('reactions?|reacciones|reacción|réactions?|reazioni|reazione|reações|reação')}`),
    pattern(`${NUM}\\s+${kw('likes?|me gusta|j[’\']aime|mi piace|curtidas?')}`),
  ],
  comments: [
    pattern(`${kw('view|see')}\\s+(?:all\\s+)?${NUM}\\s+(?:more\\s+)?${kw('comments?')}`),
    pattern(`${kw('ver')}\\s+(?:los\\s+)?${NUM}\\s+${kw('comentarios')}`),
    pattern(`${kw('voir')}\\s+(?:les\\s+)?${NUM}\\s+${kw('commentaires')}`),
    pattern(`${kw('visualizza|mostra')}\\s+(?:tutti\\s+)?(?:i\\s+)?${NUM}\\s+${kw('commenti')}`),
    pattern(`${kw('ver')}\\s+(?:todos\\s+)?(?:os\\s+)?${NUM}\\s+${kw('comentários')}`),
    pattern(
      `${NUM}\\s+${kw('comments?|comentarios?|comentários?|commentaires?|commenti|commento')}`
    ),
  ],
  shares: [
    pattern(`${NUM}\\s+${kw('veces compartido|vezes compartilhado|fois partagé|volte condiviso')}`),
    pattern(`${kw('compartido|compartilhado|partagé|condiviso')}\\s+${NUM}\\s+${kw('veces|vezes|fois|volte')}`),
    pattern(
      `${NUM}\\s+${kw('shares?|compartidos?|compartidas|partages?|condivisioni|condivisione|compartilhamentos?')}`
    ),
  ],
  views: [
    pattern(
      `${NUM}\\s+(?:de\\s+)?${kw(
        'views?|visualizaciones|visualización|reproducciones|reproducción|vistas|vues|visualizzazioni|visualizações|visualização|reproduções|plays?'
      )}`
    ),
  ],
};

export interface MetricTextMatch {
  /** Count as written, multiplier included. */
  raw: string;
  /** Whole matched phrase; carries the "you and" wording for the addend rule. */
  context: string;
}

/**
 * Match the first (most qualified) pattern for a metric against free text.
 */
export function matchMetricText(metric: Metric, text: string | null | undefined): MetricTextMatch | null {
  if (!text) return null;
  for (const re of TEXT_PATTERNS[metric]) {
    const match = re.exec(text);
    const raw = match?.groups?.n;
    if (match && raw) {
      return { raw: raw.trim(), context: match[0] };
    }
  }
  return null;
}

export function extractMetricText(metric: Metric, text: string | null | undefined): string | null {
  return matchMetricText(metric, text)?.raw ?? null;
}
