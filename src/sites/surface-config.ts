/**
 * Lightweight surface configuration
 *
 * Hosts and id templates used to build alternate-surface candidate URLs.
 * Loaded from config/surfaces.json; built-in defaults apply when the file is
 * missing or invalid.
 */
import { z } from 'zod';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../logger.js';

export const DEFAULT_SURFACE_HOSTS = ['mbasic.facebook.com', 'm.facebook.com'];

export const DEFAULT_ID_TEMPLATES = [
  'https://m.facebook.com/watch/?v={id}',
  'https://mbasic.facebook.com/story.php?story_fbid={id}',
];

// --- Zod validation schema ---

export const SurfaceConfigSchema = z.object({
  /** Hosts swapped into the final URL, in order. */
  hosts: z.array(z.string().min(1)).default(DEFAULT_SURFACE_HOSTS),
  /** URL templates filled with the content id. */
  idTemplates: z
    .array(z.string().includes('{id}', { message: 'template must contain {id}' }))
    .default(DEFAULT_ID_TEMPLATES),
  /** Upper bound on candidates tried per item. */
  maxCandidates: z.number().int().positive().default(4),
});

export type SurfaceConfig = z.infer<typeof SurfaceConfigSchema>;

export function defaultSurfaceConfigPath(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  return join(__dirname, '..', '..', 'config', 'surfaces.json');
}

/**
 * Load and validate a surface config file. Falls back to defaults (and logs
 * why) when the file cannot be read or does not validate.
 */
export function loadSurfaceConfig(configPath: string = defaultSurfaceConfigPath()): SurfaceConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (e) {
    logger.warn({ configPath, error: String(e) }, 'Surface config unreadable, using defaults');
    return SurfaceConfigSchema.parse({});
  }

  const result = SurfaceConfigSchema.safeParse(raw);
  if (!result.success) {
    logger.warn({ configPath, error: result.error.message }, 'Surface config invalid, using defaults');
    return SurfaceConfigSchema.parse({});
  }
  return result.data;
}

// --- Module-level cache ---

let cachedConfig: SurfaceConfig | null = null;

/** Config from the default path, read once per process. */
export function getSurfaceConfig(): SurfaceConfig {
  cachedConfig ??= loadSurfaceConfig();
  return cachedConfig;
}
