/**
 * Renderers Module
 *
 * Encodes a post set into one of the export formats:
 * - CSV: flattened rows, comments reduced to summary columns
 * - JSON: the posts array, pretty-printed, comments nested
 * - TXT: a human-readable report, one block per post
 *
 * Renderers are pure; writing the result is the storage module's job.
 */

import { stringify } from 'csv-stringify/sync';
import type { ModuleResult, OutputFormat, ScrapedPost } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export type CsvCell = string | number | boolean | null;

export type CsvRow = Record<string, CsvCell>;

export interface RenderedArtifact {
  format: OutputFormat;
  content: string;
  extension: string;
  contentType: string;
}

const CONTENT_TYPES: Record<OutputFormat, string> = {
  csv: 'text/csv',
  json: 'application/json',
  txt: 'text/plain',
};

const REPORT_RULE = '='.repeat(80);
const COMMENT_RULE = `  ${'-'.repeat(40)}`;

export function fileExtensionFor(format: OutputFormat): string {
  return format;
}

export function contentTypeFor(format: OutputFormat): string {
  return CONTENT_TYPES[format];
}

export function isOutputFormat(value: string): value is OutputFormat {
  return Object.hasOwn(CONTENT_TYPES, value);
}

// ============================================================================
// CSV
// ============================================================================

/**
 * Drop nested comments; posts that have comments gain
 * comment_count_actual, top_comment and top_comment_score
 */
export function flattenPostsForCsv(posts: readonly ScrapedPost[]): CsvRow[] {
  return posts.map(({ comments, ...post }) => {
    const row: CsvRow = { ...post };
    const top = comments?.[0];
    if (comments && top) {
      row.comment_count_actual = comments.length;
      row.top_comment = top.text;
      row.top_comment_score = top.score;
    }
    return row;
  });
}

/**
 * Union of row keys in first-appearance order
 */
export function collectColumns(rows: readonly CsvRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return [...columns];
}

export function renderAsCsv(posts: readonly ScrapedPost[]): string {
  const rows = flattenPostsForCsv(posts);
  return stringify(rows, {
    header: true,
    columns: collectColumns(rows),
    cast: {
      boolean: (value) => (value ? 'true' : 'false'),
    },
  });
}

// ============================================================================
// JSON
// ============================================================================

export function renderAsJSON(posts: readonly ScrapedPost[], pretty: boolean = true): string {
  return pretty ? JSON.stringify(posts, null, 2) : JSON.stringify(posts);
}

// ============================================================================
// Plain Text
// ============================================================================

function renderPostBlock(post: ScrapedPost): string[] {
  const lines = [
    `Title: ${post.title}`,
    `Author: ${post.author}`,
    `Score: ${post.score}`,
    `Comments: ${post.comments_count}`,
    `Post URL: ${post.post_url}`,
    `Timestamp: ${post.timestamp}`,
    `Flair: ${post.flair}`,
    `Is Self Post: ${post.is_self_post}`,
    `Is Stickied: ${post.is_stickied}`,
  ];

  if (post.content) {
    lines.push('', 'Content:', post.content);
  }

  if (post.comments) {
    lines.push('', 'Comments:');
    for (const comment of post.comments) {
      lines.push(
        `  Author: ${comment.author}`,
        `  Score: ${comment.score}`,
        `  Text: ${comment.text}`,
        `  Time: ${comment.timestamp}`,
        COMMENT_RULE
      );
    }
  }

  lines.push(REPORT_RULE, '');
  return lines;
}

export function renderAsPlainText(posts: readonly ScrapedPost[]): string {
  return posts.map((post) => renderPostBlock(post).join('\n') + '\n').join('');
}

// ============================================================================
// Dispatch
// ============================================================================

const RENDERERS: Record<OutputFormat, (posts: readonly ScrapedPost[]) => string> = {
  csv: renderAsCsv,
  json: (posts) => renderAsJSON(posts),
  txt: renderAsPlainText,
};

/**
 * Render posts in the requested format
 *
 * @param format - Export format; unknown values yield UNSUPPORTED_FORMAT
 */
export function renderPosts(posts: readonly ScrapedPost[], format: string): ModuleResult<RenderedArtifact> {
  const timestamp = new Date().toISOString();

  if (!isOutputFormat(format)) {
    return {
      success: false,
      error: {
        code: 'UNSUPPORTED_FORMAT',
        message: `Unsupported output format: ${format}`,
      },
      metadata: { module: 'renderers', timestamp },
    };
  }

  try {
    return {
      success: true,
      data: {
        format,
        content: RENDERERS[format](posts),
        extension: fileExtensionFor(format),
        contentType: contentTypeFor(format),
      },
      metadata: { module: 'renderers', timestamp },
    };
  } catch (error) {
    return {
      success: false,
      error: {
        code: 'RENDER_ERROR',
        message: error instanceof Error ? error.message : 'Unknown error',
      },
      metadata: { module: 'renderers', timestamp },
    };
  }
}
