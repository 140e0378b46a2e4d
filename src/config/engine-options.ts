/**
 * Engine options from the environment, validated with zod.
 */
import { z } from 'zod';

export const DEFAULT_OPENROUTER_URL = 'https://openrouter.ai/api/v1/chat/completions';
export const DEFAULT_OPENROUTER_MODEL = 'google/gemini-2.0-flash-lite-001';

export const EngineOptionsSchema = z.object({
  /** Per-request bound for each alternate-surface fetch. */
  alternateSurfaceTimeoutMs: z.coerce.number().int().positive().default(15_000),
  /** Bound for the AI inference call. */
  aiTimeoutMs: z.coerce.number().int().positive().default(30_000),
  /** Excerpt size sent to the AI extractor. */
  aiExcerptMaxChars: z.coerce.number().int().positive().default(4_000),
  /** AI results below this confidence are discarded. */
  aiMinConfidence: z.coerce.number().min(0).max(1).default(0.5),
  enableAlternateSurface: z.boolean().default(true),
  enableAi: z.boolean().default(true),
  openRouterApiKey: z.string().min(1).optional(),
  openRouterModel: z.string().min(1).default(DEFAULT_OPENROUTER_MODEL),
  openRouterUrl: z.string().url().default(DEFAULT_OPENROUTER_URL),
});

export type EngineOptions = z.infer<typeof EngineOptionsSchema>;
export type EngineOptionsInput = z.input<typeof EngineOptionsSchema>;

/** Environment variable per option. Unset or empty variables keep the default. */
const ENV_KEYS = {
  alternateSurfaceTimeoutMs: 'ALT_SURFACE_TIMEOUT_MS',
  aiTimeoutMs: 'AI_TIMEOUT_MS',
  aiExcerptMaxChars: 'AI_EXCERPT_MAX_CHARS',
  aiMinConfidence: 'AI_MIN_CONFIDENCE',
  openRouterApiKey: 'OPENROUTER_API_KEY',
  openRouterModel: 'OPENROUTER_MODEL',
  openRouterUrl: 'OPENROUTER_URL',
} as const;

export type EngineOptionsResult =
  | { success: true; options: EngineOptions }
  | { success: false; error: string };

/**
 * Build options from an environment map plus explicit overrides (CLI flags win).
 */
export function loadEngineOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: EngineOptionsInput = {}
): EngineOptionsResult {
  const fromEnv: Record<string, string> = {};
  for (const [option, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable]?.trim();
    if (value) fromEnv[option] = value;
  }

  const result = EngineOptionsSchema.safeParse({ ...fromEnv, ...overrides });
  if (!result.success) {
    const error = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return { success: false, error };
  }
  return { success: true, options: result.data };
}

/** Defaults only, no environment. */
export function defaultEngineOptions(overrides: EngineOptionsInput = {}): EngineOptions {
  return EngineOptionsSchema.parse(overrides);
}
