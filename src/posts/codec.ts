/**
 * Post Codec
 *
 * Field-tagged JSON encoding of a post. Field names are `author`, `body`,
 * `datePosted`, `title` and `slug`; empty strings and a missing date are
 * omitted, and omitted fields decode back to empty values, so partially
 * populated records stay valid.
 *
 * @module posts/codec
 */

import { z } from 'zod'
import { DecodingError, EncodingError, toError } from '../errors'
import type { Post } from './types'

const storedPostSchema = z.object({
  author: z.string().optional(),
  body: z.string().optional(),
  datePosted: z.string().datetime({ offset: true }).optional(),
  title: z.string().optional(),
  slug: z.string().optional(),
})

type StoredPost = z.infer<typeof storedPostSchema>

const encoder = new TextEncoder()
const decoder = new TextDecoder('utf-8', { fatal: true })

function omitEmpty(value: string): string | undefined {
  return value === '' ? undefined : value
}

/**
 * Serialize a post into its stored bytes
 *
 * @throws EncodingError when a field cannot be represented (an invalid date,
 * or a year outside 0000-9999 that the stored date format cannot carry)
 */
export function encodePost(post: Post): Uint8Array {
  let datePosted: string | undefined
  if (post.datePosted !== undefined) {
    if (Number.isNaN(post.datePosted.getTime())) {
      throw new EncodingError('datePosted is not a valid date', post.slug)
    }
    const year = post.datePosted.getUTCFullYear()
    if (year < 0 || year > 9999) {
      throw new EncodingError('datePosted year must be between 0000 and 9999', post.slug)
    }
    datePosted = post.datePosted.toISOString()
  }

  const stored: StoredPost = {
    author: omitEmpty(post.author),
    body: omitEmpty(post.body),
    datePosted,
    title: omitEmpty(post.title),
    slug: omitEmpty(post.slug),
  }

  try {
    return encoder.encode(JSON.stringify(stored))
  } catch (error) {
    const cause = toError(error)
    throw new EncodingError(cause.message, post.slug, cause)
  }
}

/**
 * Parse stored bytes back into a post
 *
 * @param slug - key the bytes were read from, reported in errors
 * @throws DecodingError when the bytes are not a valid post record
 */
export function decodePost(bytes: Uint8Array, slug?: string): Post {
  let parsed: unknown
  try {
    parsed = JSON.parse(decoder.decode(bytes))
  } catch (error) {
    const cause = toError(error)
    throw new DecodingError(cause.message, slug, cause)
  }

  const result = storedPostSchema.safeParse(parsed)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw new DecodingError(`${where}${issue?.message ?? 'invalid record'}`, slug, result.error)
  }

  const stored = result.data
  return {
    slug: stored.slug ?? '',
    title: stored.title ?? '',
    author: stored.author ?? '',
    body: stored.body ?? '',
    datePosted: stored.datePosted === undefined ? undefined : new Date(stored.datePosted),
  }
}
