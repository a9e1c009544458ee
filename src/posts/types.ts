/**
 * Post Types
 *
 * @module posts/types
 */

/**
 * The unit of content, stored under its slug
 */
export interface Post {
  /** URL-safe address; doubles as the storage key */
  slug: string
  /** Human-readable title, the input for slug generation */
  title: string
  /** Free-text author name */
  author: string
  /** Raw, untrusted markup */
  body: string
  /** Set by the server on every write */
  datePosted?: Date | undefined
}

/**
 * Caller-supplied fields for a create or update. Anything else in a request
 * body (including a date or slug) is ignored.
 */
export interface PostInput {
  title?: string | undefined
  author?: string | undefined
  body?: string | undefined
}

/**
 * One row of a listing, in ascending slug byte order
 */
export interface PostEntry {
  slug: string
  post: Post
}
