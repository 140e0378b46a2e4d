/**
 * Locale-aware count normalization: "1,5 K" → 1500, "3 millones" → 3000000.
 */
import { htmlToText } from './utils.js';

/** Locale whitespace variants (NBSP, narrow NBSP, thin/figure space) and the middle dot. */
const SPACE_VARIANTS = /[    ·]/g;

/**
 * Multiplier tokens, longest first so that "millones" wins over "mil".
 * Spelled thousand forms: es/pt "mil", fr "mille", it "mila".
 */
const MULTIPLIER_TOKENS: readonly (readonly [string, number])[] = [
  ['millones', 1_000_000],
  ['millions', 1_000_000],
  ['million', 1_000_000],
  ['millón', 1_000_000],
  ['millon', 1_000_000],
  ['milhões', 1_000_000],
  ['milhão', 1_000_000],
  ['milioni', 1_000_000],
  ['milione', 1_000_000],
  ['mln', 1_000_000],
  ['mill', 1_000_000],
  ['thousand', 1_000],
  ['mille', 1_000],
  ['mila', 1_000],
  ['mil', 1_000],
  ['k', 1_000],
  ['m', 1_000_000],
];

const MULTIPLIERS = new Map<string, number>(MULTIPLIER_TOKENS);

/** Source fragment matching any multiplier token, shared with the text patterns. */
export const MULTIPLIER_PATTERN = MULTIPLIER_TOKENS.map(([token]) => token).join('|');

/**
 * Number (digits with `.`/`,` separators, or spaces between digit groups)
 * followed by an optional multiplier that is not the start of a longer word.
 */
const NUMBER_WITH_MULTIPLIER = new RegExp(
  String.raw`(\d(?:[\d.,]|\s(?=\d))*)\s*(${MULTIPLIER_PATTERN})?(?![\p{L}\d])`,
  'iu'
);

/** "You and 12 others": the viewer is not included in the visible number. */
const YOU_AND_PATTERN = /(?:^|[^\p{L}])(?:you|tú|tu|usted|vous|você|voce)\s+(?:and|y|et|e)\s/iu;

/** "You, Ana and 12 others": the viewer and one named person are not included. */
const YOU_COMMA_PATTERN = /(?:^|[^\p{L}])(?:you|tú|tu|usted|vous|você|voce),\s/iu;

/**
 * Implicit people not counted in the visible number, from the surrounding phrase.
 */
export function contextAddend(context: string | undefined): number {
  if (!context) return 0;
  if (YOU_AND_PATTERN.test(context)) return 1;
  if (YOU_COMMA_PATTERN.test(context)) return 2;
  return 0;
}

function cleanRaw(raw: string): string {
  const decoded = raw.includes('&') ? htmlToText(raw) : raw;
  return decoded.replace(SPACE_VARIANTS, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Scale a decimal string by an integer multiplier without float rounding.
 * With several separators, only the last one is the decimal point.
 */
function scaleDecimal(numeric: string, multiplier: number): number {
  const folded = numeric.replace(/\s/g, '').replace(/,/g, '.');
  const lastDot = folded.lastIndexOf('.');
  const intPart = (lastDot === -1 ? folded : folded.slice(0, lastDot)).replace(/\./g, '');
  const fracPart = lastDot === -1 ? '' : folded.slice(lastDot + 1);

  const whole = intPart ? parseInt(intPart, 10) * multiplier : 0;
  if (!fracPart) return whole;

  const fraction = Math.trunc((parseInt(fracPart, 10) * multiplier) / 10 ** fracPart.length);
  return whole + fraction;
}

function parseCleaned(cleaned: string): number | null {
  const match = NUMBER_WITH_MULTIPLIER.exec(cleaned);
  if (!match) return null;

  const numeric = match[1];
  const token = match[2]?.toLowerCase();
  const multiplier = token ? (MULTIPLIERS.get(token) ?? 1) : 1;

  if (multiplier > 1) {
    const scaled = scaleDecimal(numeric, multiplier);
    return Number.isFinite(scaled) ? scaled : null;
  }

  // Plain counts are integers: every separator is digit grouping.
  const digits = numeric.replace(/\D/g, '');
  return digits ? parseInt(digits, 10) : null;
}

/**
 * Normalize a locale-formatted count string to an integer.
 *
 * Returns null when no digits are present. Never throws.
 */
export function normalizeCount(raw: string | null | undefined, context?: string): number | null {
  if (raw === null || raw === undefined) return null;

  const cleaned = cleanRaw(String(raw));
  if (!cleaned) return null;

  let value = parseCleaned(cleaned);
  if (value === null) {
    const digits = cleaned.replace(/\D/g, '');
    if (!digits) return null;
    value = parseInt(digits, 10);
  }

  return value + contextAddend(context);
}
