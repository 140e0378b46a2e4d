import { describe, it, expect } from 'vitest';
import { buildDomSummaryFromHtml, snapshotFromHtml } from '../extract/static-dom.js';
import { hasOpenGraph, readPageMetadata } from '../extract/metadata-extractors.js';

const PAGE = `<html><head><title>Jane Doe - Facebook</title></head><body>
<h3><a href="/janedoe">Jane Doe</a></h3>
<abbr>2 h</abbr>
<div data-ad-preview="message">Sunset over the bay tonight</div>
<span aria-label="Like: 10 people">10</span>
<div role="button">3 shares</div>
<span>7 comentarios</span>
<img src="https://scontent.xx.fbcdn.net/v/t39.30808-6/123456789_n.jpg" width="720" height="540">
<video src="https://video.xx.fbcdn.net/v/clip.mp4" poster="https://scontent.xx.fbcdn.net/p.jpg"></video>
</body></html>`;

describe('buildDomSummaryFromHtml', () => {
  const summary = buildDomSummaryFromHtml(PAGE);

  it('collects aria labels and button texts', () => {
    expect(summary.ariaLabels).toEqual(['Like: 10 people']);
    expect(summary.buttonTexts).toEqual(['3 shares']);
  });

  it('collects short fragments containing a digit', () => {
    expect(summary.engagementTexts).toHaveLength(4);
    expect(summary.engagementTexts).toEqual(
      expect.arrayContaining(['2 h', '10', '3 shares', '7 comentarios'])
    );
  });

  it('reads author, caption and date', () => {
    expect(summary.author).toEqual({ name: 'Jane Doe', link: '/janedoe' });
    expect(summary.caption).toBe('Sunset over the bay tonight');
    expect(summary.postDate).toBe('2 h');
  });

  it('reads media', () => {
    expect(summary.video).toEqual({
      src: 'https://video.xx.fbcdn.net/v/clip.mp4',
      poster: 'https://scontent.xx.fbcdn.net/p.jpg',
    });
    expect(summary.images).toEqual([
      { src: 'https://scontent.xx.fbcdn.net/v/t39.30808-6/123456789_n.jpg', width: 720, height: 540 },
    ]);
    expect(summary.gallery).toBe(false);
  });

  it('finds a linked mp4 when there is no video element', () => {
    const html = '<a href="https://video.xx.fbcdn.net/v/clip.mp4?x=1">Play</a>';
    expect(buildDomSummaryFromHtml(html).video).toEqual({
      src: 'https://video.xx.fbcdn.net/v/clip.mp4?x=1',
      poster: null,
    });
  });
});

describe('snapshotFromHtml', () => {
  it('wraps a bare fragment into a snapshot', () => {
    const url = 'https://mbasic.facebook.com/reel/123456';
    const snapshot = snapshotFromHtml('<div>1,2K vues</div>', url);

    expect(snapshot.visibleText).toBe('1,2K vues');
    expect(snapshot.bodyHtml).toBe('<div>1,2K vues</div>');
    expect(snapshot.domSummary.engagementTexts).toEqual(['1,2K vues']);
    expect(snapshot.finalUrl).toBe(url);
    expect(snapshot.requestedUrl).toBe(url);
  });
});

describe('readPageMetadata', () => {
  it('reads og tags, title and publication time from head markup', () => {
    const head = [
      '<title>Jane Doe | Facebook</title>',
      '<meta property="og:title" content="250 reactions · 10 shares | Great day | Jane Doe">',
      '<meta property="og:image" content="https://scontent.xx.fbcdn.net/v/t39.30808-6/1_2_n.jpg">',
      '<meta property="og:video:secure_url" content="https://video.xx.fbcdn.net/v/a.mp4">',
      '<meta property="og:url" content="https://www.facebook.com/janedoe/posts/1234567890">',
      '<meta name="description" content="Great day">',
      '<meta property="article:published_time" content="2024-05-01T10:00:00Z">',
    ].join('\n');

    expect(readPageMetadata(head)).toEqual({
      ogTitle: '250 reactions · 10 shares | Great day | Jane Doe',
      ogDescription: null,
      ogImage: 'https://scontent.xx.fbcdn.net/v/t39.30808-6/1_2_n.jpg',
      ogVideo: 'https://video.xx.fbcdn.net/v/a.mp4',
      ogUrl: 'https://www.facebook.com/janedoe/posts/1234567890',
      pageTitle: 'Jane Doe | Facebook',
      metaDescription: 'Great day',
      publishedTime: '2024-05-01T10:00:00Z',
    });
  });

  it('falls back to twitter tags', () => {
    const metadata = readPageMetadata('<meta name="twitter:title" content="Hello">');
    expect(metadata.ogTitle).toBe('Hello');
    expect(hasOpenGraph(metadata)).toBe(true);
  });

  it('reports pages without og tags', () => {
    expect(hasOpenGraph(readPageMetadata('<title>Facebook</title>'))).toBe(false);
  });
});
