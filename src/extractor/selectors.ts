/**
 * Listing and discussion page CSS selectors
 *
 * The old-style site renders each listing entry as a `div.thing` whose
 * classes carry the post flags (self, stickied, expando).
 */

export const LISTING_SELECTORS = {
  post: 'div.thing',
  title: 'a.title',
  score: 'div.score.unvoted',
  author: 'a.author',
  flair: 'span.linkflairlabel',
  time: 'time',
  comments: 'a.comments',
  content: 'div.expando',
  media: 'a.thumbnail, div.media-preview',
  nextPage: 'span.next-button a',
} as const;

export const COMMENT_SELECTORS = {
  entry: 'div.entry',
  author: 'a.author',
  text: 'div.md',
  score: 'span.score',
  time: 'time',
} as const;

/** Container classes that mark post flags */
export const POST_CLASSES = {
  self: 'self',
  stickied: 'stickied',
  expando: 'expando',
} as const;

export const CONTAINER_ID_PREFIX = 'thing_';

/** Base for resolving root-relative post links */
export const POST_URL_BASE = 'https://www.reddit.com';
