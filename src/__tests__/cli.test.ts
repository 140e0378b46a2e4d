import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('../fetch/http-client.js', () => ({
  httpRequest: vi.fn(),
  closeHttpSession: vi.fn(),
}));

import { parseArgs, optionOverrides, formatItem, main } from '../cli.js';
import type { ContentItem } from '../extract/types.js';
import { closeHttpSession } from '../fetch/http-client.js';
import { POST_URL, ogTags } from './test-helpers.js';

describe('cli', () => {
  describe('parseArgs', () => {
    it('parses the snapshot path with default flags', () => {
      expect(parseArgs(['snapshot.json'])).toEqual({
        kind: 'ok',
        opts: {
          snapshotPath: 'snapshot.json',
          json: false,
          diagnostics: false,
          alternate: true,
          ai: true,
          timeout: undefined,
        },
        warnings: [],
      });
    });

    it('sets output and fallback flags', () => {
      const result = parseArgs(['snapshot.json', '--json', '--diagnostics', '--no-alternate', '--no-ai']);
      expect(result.kind).toBe('ok');
      if (result.kind === 'ok') {
        expect(result.opts).toMatchObject({ json: true, diagnostics: true, alternate: false, ai: false });
      }
    });

    it('parses --timeout', () => {
      const result = parseArgs(['snapshot.json', '--timeout', '5000']);
      if (result.kind !== 'ok') throw new Error(`unexpected ${result.kind}`);
      expect(result.opts.timeout).toBe(5000);
    });

    it.each([
      [['snapshot.json', '--timeout'], '--timeout requires a value'],
      [['snapshot.json', '--timeout', 'soon'], '--timeout must be a positive integer (milliseconds)'],
      [['snapshot.json', '--timeout', '0'], '--timeout must be a positive integer (milliseconds)'],
      [['--json'], 'Missing required <snapshot.json> argument'],
    ])('rejects %j', (args, message) => {
      expect(parseArgs(args)).toEqual({ kind: 'error', message });
    });

    it('warns about unknown options and extra arguments', () => {
      const result = parseArgs(['a.json', '--verbose', 'b.json']);
      if (result.kind !== 'ok') throw new Error(`unexpected ${result.kind}`);
      expect(result.opts.snapshotPath).toBe('a.json');
      expect(result.warnings).toEqual(['Unknown option: --verbose', 'Ignoring extra arguments: b.json']);
    });

    it('handles help and version', () => {
      expect(parseArgs(['-h'])).toEqual({ kind: 'help' });
      expect(parseArgs(['--help', 'snapshot.json'])).toEqual({ kind: 'help' });
      expect(parseArgs(['-v'])).toEqual({ kind: 'version' });
    });
  });

  describe('optionOverrides', () => {
    it('maps flags to engine options', () => {
      expect(
        optionOverrides({
          snapshotPath: 'x.json',
          json: false,
          diagnostics: false,
          alternate: false,
          ai: true,
          timeout: 500,
        })
      ).toEqual({
        enableAlternateSurface: false,
        enableAi: true,
        alternateSurfaceTimeoutMs: 500,
        aiTimeoutMs: 500,
      });
    });

    it('leaves timeouts alone without --timeout', () => {
      expect(
        optionOverrides({ snapshotPath: 'x.json', json: false, diagnostics: false, alternate: true, ai: true })
      ).toEqual({ enableAlternateSurface: true, enableAi: true });
    });
  });

  describe('formatItem', () => {
    it('prints one field per line and the caption last', () => {
      const item: ContentItem = {
        id: '987654321',
        url: 'https://www.facebook.com/reel/987654321',
        contentType: 'reel',
        caption: 'Sunset reel',
        author: 'Ana Ruiz',
        postDate: '2024-05-01T10:00:00Z',
        engagement: { reactions: 12, comments: 3, shares: 1, views: 3400 },
        media: [{ url: 'https://video.xx.fbcdn.net/v/a.mp4', signature: 'a', kind: 'video', qualityScore: 720 }],
        postKind: 'video',
        videoAlternates: [],
      };

      expect(formatItem(item)).toBe(
        [
          'ID: 987654321',
          'URL: https://www.facebook.com/reel/987654321',
          'Type: reel (video)',
          'Author: Ana Ruiz',
          'Posted: 2024-05-01T10:00:00Z',
          'Reactions: 12  Comments: 3  Shares: 1  Views: 3400',
          'Media: video https://video.xx.fbcdn.net/v/a.mp4',
          '---',
          'Sunset reel',
        ].join('\n')
      );
    });
  });

  describe('main', () => {
    let consoleLogSpy: ReturnType<typeof vi.spyOn>;
    let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
    let originalArgv: string[];
    let dir: string;

    function writeSnapshot(data: unknown): string {
      const file = path.join(dir, 'snapshot.json');
      writeFileSync(file, JSON.stringify(data));
      return file;
    }

    beforeEach(() => {
      originalArgv = process.argv;
      vi.clearAllMocks();
      dir = mkdtempSync(path.join(tmpdir(), 'cli-'));
      consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`exit ${code}`);
      });
    });

    afterEach(() => {
      process.argv = originalArgv;
      rmSync(dir, { recursive: true, force: true });
      vi.restoreAllMocks();
    });

    const postSnapshot = {
      requestedUrl: POST_URL,
      headHtml: ogTags({ 'og:title': '250 reactions · 10 shares | Great day | Jane Doe' }),
    };

    it('prints the content item in text mode', async () => {
      process.argv = ['node', 'cli.js', writeSnapshot(postSnapshot), '--no-alternate'];

      await main();

      expect(consoleLogSpy).toHaveBeenCalledWith(
        [
          'ID: 1234567890',
          `URL: ${POST_URL}`,
          'Type: post (text)',
          'Author: Jane Doe',
          'Reactions: 250  Comments: 0  Shares: 10  Views: 0',
          '---',
          'Great day',
        ].join('\n')
      );
      expect(closeHttpSession).toHaveBeenCalledTimes(1);
    });

    it('prints JSON in --json mode', async () => {
      process.argv = ['node', 'cli.js', writeSnapshot(postSnapshot), '--json', '--no-alternate'];

      await main();

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output).toMatchObject({
        id: '1234567890',
        engagement: { reactions: 250, comments: 0, shares: 10, views: 0 },
      });
    });

    it('reports a hard block and exits', async () => {
      const loginUrl = 'https://www.facebook.com/login.php?next=x';
      process.argv = [
        'node',
        'cli.js',
        writeSnapshot({ requestedUrl: POST_URL, finalUrl: loginUrl }),
        '--json',
      ];

      await expect(main()).rejects.toThrow('exit 1');
      const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output).toEqual({
        success: false,
        error: 'hard_block',
        reason: 'login-redirect',
        evidence: [`url: ${loginUrl}`],
      });
    });

    it('exits when the file is missing', async () => {
      const missing = path.join(dir, 'absent.json');
      process.argv = ['node', 'cli.js', missing];

      await expect(main()).rejects.toThrow('exit 1');
      expect(consoleErrorSpy).toHaveBeenCalledWith(`Error: File not found: ${missing}`);
    });

    it('exits when the snapshot does not validate', async () => {
      process.argv = ['node', 'cli.js', writeSnapshot({ headHtml: '' })];

      await expect(main()).rejects.toThrow('exit 1');
      expect(consoleErrorSpy).toHaveBeenCalledWith('Error: Invalid snapshot: requestedUrl: Required');
    });

    it('prints the version', async () => {
      process.argv = ['node', 'cli.js', '--version'];

      await expect(main()).rejects.toThrow('exit 0');
      expect(String(consoleLogSpy.mock.calls[0][0])).toMatch(/^engagement-lens \d+\.\d+\.\d+$/);
    });
  });
});
