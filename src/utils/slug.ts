/**
 * Slug Utilities
 *
 * Derives the URL-safe address of a new post. A slug is assigned once at
 * creation and reused verbatim on every later update, so editing a title
 * never moves a post.
 *
 * Rules:
 * - Non-ASCII text is transliterated first (`é` -> `e`, `你好` -> `ni hao`)
 * - Output is lowercase
 * - Every run of non-alphanumeric characters collapses to one separator
 * - No leading or trailing separator
 *
 * @module utils/slug
 */

import slugify from 'slugify'
import { transliterate } from 'transliteration'
import { SLUG_SEPARATOR } from '../constants'

/**
 * Any run of characters that is neither a letter nor a digit
 */
const NON_ALPHANUMERIC_RUN = /[^\p{L}\p{N}]+/gu

/**
 * Normalize arbitrary text into one slug segment
 *
 * @example
 * ```ts
 * normalizeSlugPart('Hello, World!')             // 'hello-world'
 * normalizeSlugPart('Crème Brûlée')              // 'creme-brulee'
 * normalizeSlugPart('你好世界')                   // 'ni-hao-shi-jie'
 * normalizeSlugPart('2026-10-18T09:30:00.000Z')  // '2026-10-18t09-30-00-000z'
 * ```
 */
export function normalizeSlugPart(input: string): string {
  // Separators become spaces first so punctuation like ':' splits words
  // instead of being deleted between them.
  const spaced = transliterate(input).replace(NON_ALPHANUMERIC_RUN, ' ')
  return slugify(spaced, {
    replacement: SLUG_SEPARATOR,
    lower: true,
    strict: true,
    trim: true,
  })
}

/**
 * Build the slug for a post created at `createdAt`
 *
 * The creation timestamp (millisecond precision) prefixes the title, so
 * two posts with the same title only collide when created in the same
 * millisecond. Such a collision is not detected: the later write
 * overwrites the earlier one.
 *
 * A title with nothing left after normalization yields the timestamp part
 * alone.
 *
 * @example
 * ```ts
 * slugFor('Hello World', new Date('2026-10-18T09:30:00.000Z'))
 * // '2026-10-18t09-30-00-000z-hello-world'
 * ```
 */
export function slugFor(title: string, createdAt: Date): string {
  const stamp = normalizeSlugPart(createdAt.toISOString())
  const name = normalizeSlugPart(title)
  return name === '' ? stamp : `${stamp}${SLUG_SEPARATOR}${name}`
}
