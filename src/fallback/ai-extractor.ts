/**
 * AI inference fallback: a keyword-filtered markup excerpt goes to a chat
 * completion model, which answers with the four counts and a confidence.
 */
import { z } from 'zod';
import {
  DEFAULT_OPENROUTER_MODEL,
  DEFAULT_OPENROUTER_URL,
} from '../config/engine-options.js';
import { httpRequest } from '../fetch/http-client.js';
import { logger } from '../logger.js';

export interface AiInferenceResult {
  views: number;
  reactions: number;
  comments: number;
  shares: number;
  /** 0..1 */
  confidence: number;
}

/** Checks what an extractor resolved with before any value is used. */
export const AiInferenceResultSchema = z.object({
  views: z.number().finite().nonnegative(),
  reactions: z.number().finite().nonnegative(),
  comments: z.number().finite().nonnegative(),
  shares: z.number().finite().nonnegative(),
  confidence: z.number().min(0).max(1),
});

/**
 * Infers counts from an excerpt. Rejects on transport or format errors;
 * implementations must honour `signal`.
 */
export interface AiExtractor {
  infer(excerpt: string, url: string, signal: AbortSignal): Promise<AiInferenceResult>;
}

export const DEFAULT_EXCERPT_MAX_CHARS = 4_000;

/** Title, meta, span and div elements, plus void meta tags. */
const CANDIDATE_TAGS = /<(title|meta|span|div)[^>]*>[\s\S]*?<\/\1>|<meta[^>]*>/gi;

const EXCERPT_KEYWORDS = [
  'reacci',
  'reaction',
  'réaction',
  'reazion',
  'comment',
  'comentario',
  'share',
  'compartid',
  'partage',
  'condivis',
  'view',
  'vues',
  'vista',
  'reproducc',
  'visualiza',
  'visualizza',
  'play',
];

/**
 * Size-bounded excerpt of the tags that mention engagement keywords, plus
 * every og tag, with class and style attributes removed.
 */
export function buildAiExcerpt(html: string, maxChars: number = DEFAULT_EXCERPT_MAX_CHARS): string {
  const kept: string[] = [];
  for (const match of html.matchAll(CANDIDATE_TAGS)) {
    const tag = match[0];
    const lower = tag.toLowerCase();
    if (!lower.includes('og:') && !EXCERPT_KEYWORDS.some((kw) => lower.includes(kw))) continue;
    kept.push(tag.replace(/\s(?:class|style)="[^"]*"/g, ''));
  }
  return kept.join('\n').slice(0, maxChars);
}

const count = z.coerce.number().int().nonnegative().catch(0);

/** Model answer format. Missing or unparseable counts become 0. */
export const AiResponseSchema = z.object({
  views_count: count.default(0),
  reactions_count: count.default(0),
  comments_count: count.default(0),
  shares_count: count.default(0),
  confidence: z.coerce.number().min(0).max(1),
  source_summary: z.string().optional(),
});

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1),
});

/**
 * Parse a model answer, tolerating a fenced ```json block. Returns null when
 * the answer is not valid JSON of the expected shape.
 */
export function parseAiContent(content: string): AiInferenceResult | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(content);
  const body = (fenced ? fenced[1] : content).trim();

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (e) {
    logger.debug({ error: String(e) }, 'AI answer is not JSON');
    return null;
  }

  const result = AiResponseSchema.safeParse(data);
  if (!result.success) return null;
  return {
    views: result.data.views_count,
    reactions: result.data.reactions_count,
    comments: result.data.comments_count,
    shares: result.data.shares_count,
    confidence: result.data.confidence,
  };
}

const SYSTEM_PROMPT =
  'You extract structured data from messy HTML fragments of a social media post. Always answer with JSON only.';

function buildPrompt(excerpt: string): string {
  return [
    'Find the engagement metrics of this post: views (views, vues, reproducciones, visualizaciones),',
    'reactions (reactions, réactions, reacciones, me gusta), comments (comments, commentaires, comentarios)',
    'and shares (shares, partages, veces compartido). Counts may be abbreviated, e.g. "1,2 K vues" or "1M".',
    'Answer only with this JSON object, using 0 for metrics you cannot find:',
    '{"views_count": int, "reactions_count": int, "comments_count": int, "shares_count": int, "confidence": 0-1, "source_summary": string}',
    '',
    'Content:',
    excerpt,
  ].join('\n');
}

export interface OpenRouterExtractorOptions {
  apiKey: string;
  model?: string;
  url?: string;
}

/**
 * OpenRouter chat-completions extractor. The request goes through the shared
 * httpcloak session.
 */
export function createOpenRouterExtractor(options: OpenRouterExtractorOptions): AiExtractor {
  const endpoint = options.url ?? DEFAULT_OPENROUTER_URL;
  const model = options.model ?? DEFAULT_OPENROUTER_MODEL;

  return {
    async infer(excerpt, url, signal) {
      const response = await httpRequest('POST', endpoint, {
        signal,
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildPrompt(excerpt) },
          ],
          response_format: { type: 'json_object' },
        }),
      });

      if (!response.ok) {
        throw new Error(`AI backend returned HTTP ${response.statusCode}`);
      }

      let payload: unknown;
      try {
        payload = JSON.parse(response.body);
      } catch {
        throw new Error('Malformed AI backend response: body is not JSON');
      }

      const completion = ChatCompletionSchema.safeParse(payload);
      if (!completion.success) {
        throw new Error(`Malformed AI backend response: ${completion.error.message}`);
      }

      const parsed = parseAiContent(completion.data.choices[0].message.content);
      if (!parsed) {
        throw new Error('AI answer does not match the expected format');
      }

      logger.debug({ url, model, confidence: parsed.confidence }, 'AI inference completed');
      return parsed;
    },
  };
}
