/**
 * PostStore Tests
 *
 * Round trips, overwrite and delete policies, ordering, snapshot reads and
 * the distinction between absent and unreadable records.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { join } from 'node:path'
import { PostStore } from '../../src/posts/PostStore'
import { POSTS_BUCKET, ROOT_BUCKET } from '../../src/constants'
import {
  DecodingError,
  EncodingError,
  ErrorCode,
  InvalidSlugError,
  PostNotFoundError,
  StorageUnavailableError,
  isNotFoundError,
} from '../../src/errors'
import { createTestContext, type TestContext } from '../helpers/temp-dir'
import { FIXED_NOW, createTestPost } from '../factories'

describe('PostStore', () => {
  let ctx: TestContext
  let store: PostStore

  beforeEach(async () => {
    ctx = await createTestContext('post-store-test-')
    store = ctx.openStore()
  })

  afterEach(async () => {
    await ctx.cleanup()
  })

  /** Put raw bytes under a slug, bypassing the codec */
  function writeRaw(slug: string, bytes: string): void {
    ctx.openEngine().update((tx) => {
      tx.createBucketIfNotExists(ROOT_BUCKET, POSTS_BUCKET).put(slug, Buffer.from(bytes, 'utf8'))
    })
  }

  // ===========================================================================
  // init
  // ===========================================================================

  describe('init', () => {
    it('is idempotent and keeps existing posts', () => {
      store.upsert(createTestPost({ slug: 'kept' }), 'kept')

      store.init()
      store.init()

      expect(store.count()).toBe(1)
    })

    it('keeps posts across close and reopen', async () => {
      const post = createTestPost({ slug: 'durable' })
      store.upsert(post, 'durable')
      await store.close()

      const reopened = ctx.openStore()
      expect(reopened.get('durable')).toEqual(post)
    })

    it('rejects operations before init and after close', async () => {
      const fresh = new PostStore({ path: join(ctx.tempDir, 'other.db') })
      expect(() => fresh.list()).toThrow('store is not initialized')

      await store.close()
      expect(() => store.get('anything')).toThrow(StorageUnavailableError)
      expect(() => store.upsert(createTestPost(), 'x')).toThrow(StorageUnavailableError)
    })

    it('raises StorageUnavailableError when the file cannot be opened', () => {
      const broken = new PostStore({ path: join(ctx.tempDir, 'missing', 'blog.db') })
      expect(() => broken.init()).toThrow(StorageUnavailableError)
    })

    it('reports a missing namespace as unavailable storage', () => {
      ctx.openEngine().update((tx) => tx.deleteBucket(ROOT_BUCKET))

      expect(() => store.list()).toThrow(`namespace ${ROOT_BUCKET}/${POSTS_BUCKET} is missing`)
    })
  })

  // ===========================================================================
  // upsert / get
  // ===========================================================================

  describe('upsert and get', () => {
    it('round-trips every field', () => {
      const post = {
        slug: 'hello-world',
        title: 'Hello World',
        author: 'Ada',
        body: '# Hi',
        datePosted: FIXED_NOW,
      }
      store.upsert(post, 'hello-world')

      expect(store.get('hello-world')).toEqual(post)
    })

    it('round-trips a post with empty fields and no date', () => {
      const post = { slug: '', title: '', author: '', body: '', datePosted: undefined }
      store.upsert(post, 'blank')

      expect(store.get('blank')).toEqual(post)
    })

    it('stores the record under the given key without rewriting post.slug', () => {
      store.upsert(createTestPost({ slug: 'inner' }), 'outer')

      expect(store.get('outer').slug).toBe('inner')
      expect(() => store.get('inner')).toThrow(PostNotFoundError)
    })

    it('overwrites the whole record on a second upsert', () => {
      store.upsert(createTestPost({ slug: 'same', title: 'First', author: 'A' }), 'same')
      store.upsert(createTestPost({ slug: 'same', title: 'Second', author: '' }), 'same')

      expect(store.count()).toBe(1)
      const post = store.get('same')
      expect(post.title).toBe('Second')
      expect(post.author).toBe('')
    })

    it('raises PostNotFoundError for an absent slug', () => {
      let caught: unknown
      try {
        store.get('2026-01-01t00-00-00-000z-nope')
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(PostNotFoundError)
      expect(isNotFoundError(caught)).toBe(true)
      expect(caught).toMatchObject({
        code: ErrorCode.POST_NOT_FOUND,
        message: 'Post not found: 2026-01-01t00-00-00-000z-nope',
      })
    })

    it('stores nothing when the post cannot be encoded', () => {
      const post = createTestPost({ datePosted: new Date('+010000-01-01T00:00:00.000Z') })

      expect(() => store.upsert(post, 'far-future')).toThrow(EncodingError)
      expect(store.count()).toBe(0)
    })

    it('rejects an empty slug', () => {
      expect(() => store.upsert(createTestPost(), '')).toThrow(InvalidSlugError)
      expect(() => store.get('')).toThrow(InvalidSlugError)
      expect(() => store.delete('')).toThrow(InvalidSlugError)
    })
  })

  // ===========================================================================
  // Corrupt records
  // ===========================================================================

  describe('corrupt records', () => {
    it('raises DecodingError, not NotFound, for unparseable bytes', () => {
      writeRaw('broken', '{"title": ')

      expect(() => store.get('broken')).toThrow(DecodingError)
      expect(() => store.get('broken')).toThrow(/^Cannot decode post "broken": /)
    })

    it('raises DecodingError for a field of the wrong type', () => {
      writeRaw('wrong-type', '{"title": 42}')

      expect(() => store.get('wrong-type')).toThrow('Cannot decode post "wrong-type": title: ')
    })

    it('fails a listing as a whole, naming the unreadable record', () => {
      store.upsert(createTestPost({ slug: 'a-good' }), 'a-good')
      writeRaw('b-bad', 'not json')
      store.upsert(createTestPost({ slug: 'c-good' }), 'c-good')

      expect(() => store.list()).toThrow(/^Cannot decode post "b-bad": /)
      expect(store.get('a-good').slug).toBe('a-good')
    })
  })

  // ===========================================================================
  // delete
  // ===========================================================================

  describe('delete', () => {
    it('removes the record', () => {
      store.upsert(createTestPost({ slug: 'gone' }), 'gone')

      expect(store.delete('gone')).toBe(true)
      expect(() => store.get('gone')).toThrow(PostNotFoundError)
    })

    it('succeeds for an absent slug', () => {
      expect(store.delete('never-existed')).toBe(false)
      expect(store.delete('never-existed')).toBe(false)
    })
  })

  // ===========================================================================
  // list
  // ===========================================================================

  describe('list', () => {
    it('returns an empty list for an empty store', () => {
      expect(store.list()).toEqual([])
    })

    it('returns every post in ascending byte order of the slug', () => {
      for (const slug of ['b', 'a', 'C', '2026-01-01t00-00-00-000z-x']) {
        store.upsert(createTestPost({ slug }), slug)
      }

      expect(store.list().map((entry) => entry.slug)).toEqual([
        '2026-01-01t00-00-00-000z-x',
        'C',
        'a',
        'b',
      ])
    })

    it('pairs each slug with its decoded post', () => {
      const post = createTestPost({ slug: 'only' })
      store.upsert(post, 'only')

      expect(store.list()).toEqual([{ slug: 'only', post }])
    })
  })

  // ===========================================================================
  // snapshot
  // ===========================================================================

  describe('snapshot', () => {
    it('serves every read from the state at its start', () => {
      store.upsert(createTestPost({ slug: 'first' }), 'first')
      const writer = ctx.openStore()

      const seen = store.snapshot((reader) => {
        const before = reader.list().map((entry) => entry.slug)
        writer.upsert(createTestPost({ slug: 'second' }), 'second')
        writer.delete('first')
        const after = reader.list().map((entry) => entry.slug)
        return { before, after, first: reader.get('first').slug }
      })

      expect(seen).toEqual({ before: ['first'], after: ['first'], first: 'first' })
      expect(store.list().map((entry) => entry.slug)).toEqual(['second'])
    })
  })
})
