/**
 * PostStore - durable storage of posts keyed by slug
 *
 * Posts live in the `BLOG` -> `POSTS` bucket of a KvEngine file. Every read
 * and write goes through an engine transaction; the store keeps no cache
 * and adds no locking of its own.
 *
 * Policies:
 * - `upsert` is a full overwrite of whatever the slug held (last write wins)
 * - `delete` of an absent slug succeeds
 * - `list` fails as a whole with DecodingError if any record is unreadable
 *
 * @example
 * ```typescript
 * const store = new PostStore({ path: 'tinyblog.db' })
 * store.init()
 * store.upsert(post, post.slug)
 * const again = store.get(post.slug)
 * await store.close()
 * ```
 */

import {
  InvalidSlugError,
  PostNotFoundError,
  StorageUnavailableError,
  toError,
} from '../errors'
import { DEFAULT_DB_PATH, MAX_KEY_BYTES, POSTS_BUCKET, ROOT_BUCKET } from '../constants'
import { KvEngine, type Bucket, type KvEngineOptions, type Transaction } from '../storage/KvEngine'
import { logger } from '../utils/logger'
import { decodePost, encodePost } from './codec'
import type { Post, PostEntry } from './types'

// =============================================================================
// Types
// =============================================================================

/**
 * Options for constructing a PostStore
 */
export interface PostStoreOptions extends KvEngineOptions {
  /** Backing file (default: tinyblog.db) */
  path?: string
}

/**
 * Reads available inside `snapshot`, all served from one committed state
 */
export interface PostReader {
  get(slug: string): Post
  list(): PostEntry[]
}

// =============================================================================
// Helpers
// =============================================================================

const keyEncoder = new TextEncoder()

function assertSlug(slug: string): void {
  if (slug.length === 0) {
    throw new InvalidSlugError(slug, 'must not be empty')
  }
  if (keyEncoder.encode(slug).length > MAX_KEY_BYTES) {
    throw new InvalidSlugError(slug, `must be at most ${MAX_KEY_BYTES} bytes`)
  }
}

function readPost(posts: Bucket, slug: string): Post {
  assertSlug(slug)
  const value = posts.get(slug)
  if (value === undefined) {
    throw new PostNotFoundError(slug)
  }
  return decodePost(value, slug)
}

function readAll(posts: Bucket): PostEntry[] {
  return posts.entries().map(({ key, value }) => {
    const slug = key.toString('utf8')
    return { slug, post: decodePost(value, slug) }
  })
}

// =============================================================================
// PostStore
// =============================================================================

export class PostStore {
  readonly path: string
  private readonly engineOptions: KvEngineOptions
  private engine: KvEngine | undefined

  constructor(options: PostStoreOptions = {}) {
    const { path, ...engineOptions } = options
    this.path = path ?? DEFAULT_DB_PATH
    this.engineOptions = engineOptions
  }

  /**
   * Open a store and initialize its namespace in one step
   */
  static open(options: PostStoreOptions = {}): PostStore {
    const store = new PostStore(options)
    store.init()
    return store
  }

  /**
   * Open the backing file if needed and ensure both namespace levels exist.
   * Safe to call on every start and more than once.
   *
   * @throws StorageUnavailableError when the file or namespace cannot be set up
   */
  init(): void {
    this.engine ??= KvEngine.open(this.path, this.engineOptions)
    try {
      this.engine.update((tx) => {
        tx.createBucketIfNotExists(ROOT_BUCKET).createBucketIfNotExists(POSTS_BUCKET)
      })
    } catch (error) {
      const cause = toError(error)
      throw new StorageUnavailableError(this.path, `cannot create namespace: ${cause.message}`, cause)
    }
    logger.info(`Post store ready at ${this.path}`)
  }

  /**
   * Write `post` under `slug` in one atomic transaction, replacing any
   * existing record. The stored record is exactly `post`; `post.slug` is
   * not rewritten.
   *
   * @throws InvalidSlugError for an empty or oversized slug
   * @throws EncodingError when the post cannot be serialized
   * @throws StorageWriteError when the transaction cannot commit
   */
  upsert(post: Post, slug: string): void {
    assertSlug(slug)
    const bytes = encodePost(post)
    this.engineOrThrow().update((tx) => {
      this.posts(tx).put(slug, bytes)
    })
    logger.debug(`Upserted post ${slug}`)
  }

  /**
   * Read the post stored under `slug`
   *
   * @throws PostNotFoundError when nothing is stored under `slug`
   * @throws DecodingError when the stored bytes are not a valid post
   */
  get(slug: string): Post {
    return this.engineOrThrow().view((tx) => readPost(this.posts(tx), slug))
  }

  /**
   * Every post in ascending byte order of its slug
   *
   * @throws DecodingError naming the first unreadable record
   */
  list(): PostEntry[] {
    return this.engineOrThrow().view((tx) => readAll(this.posts(tx)))
  }

  /**
   * Remove the post stored under `slug`. Removing an absent slug succeeds.
   *
   * @returns whether a record was removed
   * @throws StorageWriteError when the transaction cannot commit
   */
  delete(slug: string): boolean {
    assertSlug(slug)
    const removed = this.engineOrThrow().update((tx) => this.posts(tx).delete(slug))
    logger.debug(`Deleted post ${slug} (existed: ${removed})`)
    return removed
  }

  /**
   * Number of stored posts
   */
  count(): number {
    return this.engineOrThrow().view((tx) => this.posts(tx).count())
  }

  /**
   * Run several reads against one point-in-time snapshot. Writes committed
   * while `fn` runs are not visible to it.
   */
  snapshot<T>(fn: (reader: PostReader) => T): T {
    return this.engineOrThrow().view((tx) => {
      const posts = this.posts(tx)
      return fn({
        get: (slug) => readPost(posts, slug),
        list: () => readAll(posts),
      })
    })
  }

  /**
   * Flush and release the backing file. Later operations raise
   * StorageUnavailableError until `init` is called again.
   */
  async close(): Promise<void> {
    const engine = this.engine
    this.engine = undefined
    await engine?.close()
  }

  private engineOrThrow(): KvEngine {
    if (!this.engine) {
      throw new StorageUnavailableError(this.path, 'store is not initialized')
    }
    return this.engine
  }

  private posts(tx: Transaction): Bucket {
    const bucket = tx.bucket(ROOT_BUCKET, POSTS_BUCKET)
    if (!bucket) {
      throw new StorageUnavailableError(this.path, `namespace ${ROOT_BUCKET}/${POSTS_BUCKET} is missing`)
    }
    return bucket
  }
}
