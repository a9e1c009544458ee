/**
 * Blog HTTP API
 *
 * Hono routes composing the post store and the markdown renderer:
 * - GET / - List all posts
 * - POST / - Create a post (slug derived from the title and server time)
 * - GET /:slug - Get a post with its rendered, sanitized HTML
 * - POST /:slug - Overwrite the post at slug (slug never changes)
 * - DELETE /:slug - Delete a post (idempotent)
 *
 * @example
 * ```typescript
 * const store = PostStore.open({ path: 'tinyblog.db' })
 * const app = createApp({ store })
 * const res = await app.request('/')
 * ```
 *
 * @module
 */

import { Hono } from 'hono'
import type { Context } from 'hono'
import { bodyLimit } from 'hono/body-limit'
import { HTTPException } from 'hono/http-exception'
import { DEFAULT_SITE, type SiteMetadata } from '../config'
import { DEFAULT_BODY_LIMIT_BYTES } from '../constants'
import {
  ErrorCode,
  ValidationError,
  isBlogError,
  isNotFoundError,
  isValidationError,
} from '../errors'
import type { PostStore } from '../posts/PostStore'
import { createPost, parsePostInput, updatePost } from '../posts/service'
import type { Post, PostEntry } from '../posts/types'
import { renderMarkdown } from '../render/markdown'
import { logger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export interface AppOptions {
  /** Initialized store; the caller owns its lifecycle */
  store: PostStore
  site?: SiteMetadata | undefined
  /** Largest accepted request body in bytes (default: 1 MiB) */
  bodyLimitBytes?: number | undefined
  /** Source of write timestamps (default: system clock) */
  now?: (() => Date) | undefined
}

/**
 * Response for the post listing
 */
export interface ListPostsResponse {
  site: SiteMetadata
  posts: PostEntry[]
}

/**
 * Response for a single post
 */
export interface GetPostResponse {
  site: SiteMetadata
  post: Post
  /** Sanitized HTML rendered from `post.body` */
  html: string
}

/**
 * Response for the delete endpoint
 */
export interface DeletePostResponse {
  deleted: boolean
}

export interface ErrorResponse {
  error: string
  code: string
}

// =============================================================================
// Helpers
// =============================================================================

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json()
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ValidationError(`Request body is not valid JSON: ${error.message}`, undefined, error)
    }
    throw error
  }
}

function errorBody(message: string, code: string): ErrorResponse {
  return { error: message, code }
}

// =============================================================================
// App
// =============================================================================

export function createApp(options: AppOptions) {
  const { store } = options
  const site = options.site ?? DEFAULT_SITE
  const now = options.now ?? (() => new Date())
  const app = new Hono()

  app.use('*', async (c, next) => {
    const started = Date.now()
    await next()
    logger.info(`${c.req.method} ${c.req.path} ${c.res.status} ${Date.now() - started}ms`)
  })

  app.use(
    '*',
    bodyLimit({
      maxSize: options.bodyLimitBytes ?? DEFAULT_BODY_LIMIT_BYTES,
      onError: (c) => c.json(errorBody('Request body too large', 'PAYLOAD_TOO_LARGE'), 413),
    })
  )

  app.get('/', (c) => {
    const posts = store.list()
    logger.debug(`Listed ${posts.length} posts`)
    return c.json({ site, posts } satisfies ListPostsResponse)
  })

  app.post('/', async (c) => {
    const input = parsePostInput(await readJson(c))
    const post = createPost(store, input, now())
    logger.info(`Created post ${post.slug}`)
    return c.json(post, 201)
  })

  app.get('/:slug', (c) => {
    const post = store.get(c.req.param('slug'))
    logger.debug(`Requested: ${post.title} by ${post.author}`)
    return c.json({ site, post, html: renderMarkdown(post.body) } satisfies GetPostResponse)
  })

  app.post('/:slug', async (c) => {
    const input = parsePostInput(await readJson(c))
    const post = updatePost(store, c.req.param('slug'), input, now())
    logger.info(`Updated post ${post.slug}`)
    return c.json(post)
  })

  app.delete('/:slug', (c) => {
    const slug = c.req.param('slug')
    store.delete(slug)
    logger.info(`Deleted post ${slug}`)
    return c.json({ deleted: true } satisfies DeletePostResponse)
  })

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return error.getResponse()
    }
    if (isNotFoundError(error)) {
      return c.json(errorBody(error.message, error.code), 404)
    }
    if (isValidationError(error)) {
      return c.json(errorBody(error.message, error.code), 422)
    }
    logger.error(`${c.req.method} ${c.req.path} failed`, error)
    const code = isBlogError(error) ? error.code : ErrorCode.INTERNAL
    return c.json(errorBody(error.message, code), 500)
  })

  return app
}

export type BlogApp = ReturnType<typeof createApp>
