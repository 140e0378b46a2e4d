#!/usr/bin/env node
/**
 * CLI entry point for engagement-lens
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync, existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { parseSnapshot } from './extract/snapshot.js';
import { extractContentItem } from './extract/content-item.js';
import type { ContentItem } from './extract/types.js';
import { detectHardBlock } from './antibot/detector.js';
import { createHttpSurfaceFetcher } from './fallback/alternate-surface.js';
import { closeHttpSession } from './fetch/http-client.js';
import { type AiExtractor, createOpenRouterExtractor } from './fallback/ai-extractor.js';
import { type EngineOptionsInput, loadEngineOptionsFromEnv } from './config/engine-options.js';
import { logger } from './logger.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    const version =
      pkg !== null && typeof pkg === 'object' && 'version' in pkg ? pkg.version : undefined;
    return typeof version === 'string' ? version : 'unknown';
  } catch (error) {
    logger.debug({ pkgPath, error: String(error) }, 'Failed to read version from package.json');
    return 'unknown';
  }
}

export interface CliOptions {
  snapshotPath: string;
  json: boolean;
  diagnostics: boolean;
  alternate: boolean;
  ai: boolean;
  timeout?: number;
}

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  let json = false;
  let diagnostics = false;
  let alternate = true;
  let ai = true;
  let timeout: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--json':
        json = true;
        break;
      case '--diagnostics':
        diagnostics = true;
        break;
      case '--no-alternate':
        alternate = false;
        break;
      case '--no-ai':
        ai = false;
        break;
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--timeout requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--timeout must be a positive integer (milliseconds)' };
        timeout = v;
        break;
      }
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <snapshot.json> argument' };
  }
  if (positional.length > 1) {
    warnings.push(`Ignoring extra arguments: ${positional.slice(1).join(' ')}`);
  }

  return {
    kind: 'ok',
    opts: { snapshotPath: positional[0], json, diagnostics, alternate, ai, timeout },
    warnings,
  };
}

/** Engine option overrides implied by the flags. */
export function optionOverrides(opts: CliOptions): EngineOptionsInput {
  return {
    enableAlternateSurface: opts.alternate,
    enableAi: opts.ai,
    ...(opts.timeout !== undefined
      ? { alternateSurfaceTimeoutMs: opts.timeout, aiTimeoutMs: opts.timeout }
      : {}),
  };
}

function printUsage(): void {
  console.log(`Usage: engagement-lens <snapshot.json> [options]

Resolves engagement metrics and media for one rendered post or reel snapshot.
The snapshot is the JSON produced by the rendering step:
{ headHtml, bodyHtml, visibleText, domSummary, finalUrl, requestedUrl }

Options:
  --json              Full JSON output (content item)
  --diagnostics       Include raw values, layer provenance and fallback transitions
  --no-alternate      Do not fetch lightweight alternate surfaces
  --no-ai             Do not call the AI extractor
  --timeout <ms>      Per-call collaborator timeout in milliseconds
  -v, --version       Show version number
  -h, --help          Show this help message

Environment:
  OPENROUTER_API_KEY  Enables AI inference when views cannot be found
  OPENROUTER_MODEL, OPENROUTER_URL, AI_MIN_CONFIDENCE, AI_TIMEOUT_MS,
  AI_EXCERPT_MAX_CHARS, ALT_SURFACE_TIMEOUT_MS, LOG_LEVEL`);
}

export function formatItem(item: ContentItem): string {
  const lines: string[] = [];
  lines.push(`ID: ${item.id}`);
  lines.push(`URL: ${item.url}`);
  lines.push(`Type: ${item.contentType} (${item.postKind})`);
  if (item.author) lines.push(`Author: ${item.author}`);
  if (item.postDate) lines.push(`Posted: ${item.postDate}`);
  const { reactions, comments, shares, views } = item.engagement;
  lines.push(`Reactions: ${reactions}  Comments: ${comments}  Shares: ${shares}  Views: ${views}`);
  for (const asset of item.media) {
    lines.push(`Media: ${asset.kind} ${asset.url}`);
  }
  if (item.caption) {
    lines.push('---');
    lines.push(item.caption);
  }
  return lines.join('\n');
}

export async function main(): Promise<void> {
  const result = parseArgs(process.argv.slice(2));

  switch (result.kind) {
    case 'version':
      console.log(`engagement-lens ${getVersion()}`);
      process.exit(0);
      break;
    case 'help':
      printUsage();
      process.exit(0);
      break;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      process.exit(1);
      break;
  }

  const { opts, warnings } = result;

  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  const filePath = resolve(opts.snapshotPath);
  if (!existsSync(filePath)) {
    console.error(`Error: File not found: ${filePath}`);
    process.exit(1);
  }

  let input: unknown;
  try {
    input = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    console.error(`Error: ${filePath} is not valid JSON: ${String(error)}`);
    process.exit(1);
  }

  const parsed = parseSnapshot(input);
  if (!parsed.success) {
    console.error(`Error: Invalid snapshot: ${parsed.error}`);
    process.exit(1);
  }

  const loaded = loadEngineOptionsFromEnv(process.env, optionOverrides(opts));
  if (!loaded.success) {
    console.error(`Error: Invalid configuration: ${loaded.error}`);
    process.exit(1);
  }
  const options = loaded.options;

  const block = detectHardBlock(parsed.snapshot);
  if (block) {
    if (opts.json) {
      console.log(JSON.stringify({ success: false, error: 'hard_block', ...block }, null, 2));
    } else {
      console.error(`Error: Content blocked (${block.reason}): ${block.evidence.join(', ')}`);
    }
    process.exit(1);
  }

  let aiExtractor: AiExtractor | undefined;
  if (options.enableAi && options.openRouterApiKey) {
    aiExtractor = createOpenRouterExtractor({
      apiKey: options.openRouterApiKey,
      model: options.openRouterModel,
      url: options.openRouterUrl,
    });
  } else if (options.enableAi) {
    logger.debug('OPENROUTER_API_KEY not set, AI inference disabled');
  }

  try {
    const item = await extractContentItem(parsed.snapshot, {
      options,
      surfaceFetcher: createHttpSurfaceFetcher(),
      aiExtractor,
      diagnostics: opts.diagnostics,
    });

    if (opts.json) {
      console.log(JSON.stringify(item, null, 2));
      return;
    }

    console.log(formatItem(item));
    if (item.diagnostics) {
      console.log('---');
      console.log(JSON.stringify(item.diagnostics, null, 2));
    }
  } finally {
    await closeHttpSession();
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then(() => {
      // httpcloak's native library keeps the event loop alive after the session closes.
      process.exit(0);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
