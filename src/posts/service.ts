/**
 * Post Service
 *
 * Write paths used by the request layer. Both create and update stamp
 * `datePosted` with the server clock; a date sent by the caller is never
 * stored.
 *
 * @module posts/service
 */

import { z } from 'zod'
import { ValidationError } from '../errors'
import { slugFor } from '../utils/slug'
import type { PostStore } from './PostStore'
import type { Post, PostInput } from './types'

/**
 * Accepted request body. Unknown keys (`datePosted`, `slug`, ...) are dropped.
 */
export const postInputSchema = z.object({
  title: z.string().optional(),
  author: z.string().optional(),
  body: z.string().optional(),
})

/**
 * Validate an untrusted request body
 *
 * @throws ValidationError naming the first offending field
 */
export function parsePostInput(value: unknown): PostInput {
  const result = postInputSchema.safeParse(value)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue?.path.join('.') ?? ''
    throw new ValidationError(
      field === '' ? `Invalid post: ${issue?.message ?? 'unknown error'}` : `Invalid post field "${field}": ${issue?.message ?? 'unknown error'}`,
      field === '' ? undefined : { field },
      result.error
    )
  }
  return result.data
}

function toPost(input: PostInput, slug: string, now: Date): Post {
  return {
    slug,
    title: input.title ?? '',
    author: input.author ?? '',
    body: input.body ?? '',
    datePosted: now,
  }
}

/**
 * Store a new post under a slug derived from its title and `now`
 *
 * Two creations with the same title in the same millisecond produce the
 * same slug, and the second silently replaces the first.
 */
export function createPost(store: PostStore, input: PostInput, now: Date = new Date()): Post {
  const post = toPost(input, slugFor(input.title ?? '', now), now)
  store.upsert(post, post.slug)
  return post
}

/**
 * Overwrite the post at `slug` with `input`. The slug is kept verbatim
 * even when the title changes, and the record need not exist beforehand.
 */
export function updatePost(store: PostStore, slug: string, input: PostInput, now: Date = new Date()): Post {
  const post = toPost(input, slug, now)
  store.upsert(post, slug)
  return post
}
