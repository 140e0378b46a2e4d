/**
 * Page snapshot supplied by the rendering collaborator.
 */
import { z } from 'zod';

const DomImageSchema = z.object({
  src: z.string(),
  /** Natural dimensions as reported by the browser. */
  width: z.number().nonnegative().optional(),
  height: z.number().nonnegative().optional(),
});

const DomVideoSchema = z.object({
  /** Rendered `<video>` source; `blob:` URLs are never usable. */
  src: z.string().nullable().optional(),
  poster: z.string().nullable().optional(),
  duration: z.number().nonnegative().nullable().optional(),
});

export const DomSummarySchema = z.object({
  /** Every aria-label on the page. */
  ariaLabels: z.array(z.string()).default([]),
  /** Short span texts containing a digit. */
  engagementTexts: z.array(z.string()).default([]),
  /** Texts of role="button" elements. */
  buttonTexts: z.array(z.string()).default([]),
  video: DomVideoSchema.nullable().optional(),
  images: z.array(DomImageSchema).default([]),
  /** Gallery overlay ("+3") or carousel detected around the post media. */
  gallery: z.boolean().default(false),
  postDate: z.string().nullable().optional(),
  author: z
    .object({
      name: z.string(),
      link: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
  caption: z.string().nullable().optional(),
});

/** Captured network responses kept per snapshot, and the length each is cut to. */
export const MAX_NETWORK_SNIPPETS = 25;
export const MAX_NETWORK_SNIPPET_CHARS = 50_000;

export const PageSnapshotSchema = z.object({
  headHtml: z.string().default(''),
  bodyHtml: z.string().default(''),
  visibleText: z.string().default(''),
  domSummary: DomSummarySchema.default({}),
  /** Bodies of GraphQL/XHR responses captured while the page loaded. */
  networkSnippets: z
    .array(z.string())
    .default([])
    .transform((snippets) =>
      snippets.slice(0, MAX_NETWORK_SNIPPETS).map((snippet) => snippet.slice(0, MAX_NETWORK_SNIPPET_CHARS))
    ),
  finalUrl: z.string().url().optional(),
  requestedUrl: z.string().url(),
});

export type DomImage = z.infer<typeof DomImageSchema>;
export type DomSummary = z.infer<typeof DomSummarySchema>;
export type PageSnapshot = z.infer<typeof PageSnapshotSchema>;
export type PageSnapshotInput = z.input<typeof PageSnapshotSchema>;

export type SnapshotParseResult =
  | { success: true; snapshot: PageSnapshot }
  | { success: false; error: string };

/**
 * Validate an untrusted snapshot (CLI input, queue payload).
 */
export function parseSnapshot(input: unknown): SnapshotParseResult {
  const result = PageSnapshotSchema.safeParse(input);
  if (!result.success) {
    const error = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { success: false, error };
  }
  return { success: true, snapshot: result.data };
}

/** URL the content was finally served from. */
export function snapshotUrl(snapshot: PageSnapshot): string {
  return snapshot.finalUrl ?? snapshot.requestedUrl;
}

/** Full markup (head + body) for layers that search raw text. */
export function snapshotMarkup(snapshot: PageSnapshot): string {
  return `${snapshot.headHtml}\n${snapshot.bodyHtml}`;
}
