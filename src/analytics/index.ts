/**
 * Analytics Module
 *
 * Summary statistics over a completed post set. Pure: no I/O, no clock.
 */

import type { AnalyticsSummary, AuthorCount, FlairCount, ScrapedPost } from '../types/index.js';

export const TOP_AUTHORS_LIMIT = 5;
export const TOP_FLAIRS_LIMIT = 10;

/**
 * Occurrence counts in descending order; ties keep first-appearance order
 */
export function rankByFrequency(values: readonly string[], limit: number): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, so Map insertion order breaks ties
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

export function median(sorted: readonly number[]): number | null {
  if (sorted.length === 0) {
    return null;
  }
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle];
  if (upper === undefined) {
    return null;
  }
  if (sorted.length % 2 === 1) {
    return upper;
  }
  const lower = sorted[middle - 1] ?? upper;
  return (lower + upper) / 2;
}

const percentage = (part: number, total: number): number => (total === 0 ? 0 : (part / total) * 100);

/**
 * Aggregate statistics for a post set
 *
 * Score statistics consider numeric scores only and are null when there are
 * none; percentages use the total post count.
 */
export function summarizePosts(posts: readonly ScrapedPost[]): AnalyticsSummary {
  const total = posts.length;

  const scores = posts
    .map((post) => post.score_numeric)
    .filter((score): score is number => score !== null)
    .sort((a, b) => a - b);

  const hasScores = scores.length > 0;
  const sum = scores.reduce((acc, score) => acc + score, 0);

  const topAuthors: AuthorCount[] = rankByFrequency(
    posts.map((post) => post.author),
    TOP_AUTHORS_LIMIT
  ).map(([name, count]) => ({ name, count }));

  const flairDistribution: FlairCount[] = rankByFrequency(
    posts.map((post) => post.flair),
    TOP_FLAIRS_LIMIT
  ).map(([flair, count]) => ({ flair, count }));

  return {
    total_posts: total,
    unique_authors: new Set(posts.map((post) => post.author)).size,
    average_score: hasScores ? sum / scores.length : null,
    median_score: median(scores),
    max_score: hasScores ? Math.max(...scores) : null,
    min_score: hasScores ? Math.min(...scores) : null,
    stickied_posts: posts.filter((post) => post.is_stickied).length,
    self_posts_percentage: percentage(posts.filter((post) => post.is_self_post).length, total),
    posts_with_media_percentage: percentage(posts.filter((post) => post.has_media).length, total),
    top_authors: topAuthors,
    flair_distribution: flairDistribution,
  };
}
