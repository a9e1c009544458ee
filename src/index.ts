/**
 * Tiny Blog - posts addressed by slug in a single-file key-value store,
 * rendered from markdown to sanitized HTML
 *
 * @packageDocumentation
 */

// Post store
export { PostStore, type PostStoreOptions, type PostReader } from './posts/PostStore'
export { createPost, updatePost, parsePostInput, postInputSchema } from './posts/service'
export { encodePost, decodePost } from './posts/codec'
export type { Post, PostInput, PostEntry } from './posts/types'

// Storage engine
export {
  KvEngine,
  Bucket,
  Transaction,
  type KvEngineOptions,
  type KvEntry,
  type KeyInput,
} from './storage/KvEngine'

// Rendering
export { renderMarkdown, sanitizeHtml, escapeHtml } from './render/markdown'

// Slugs
export { slugFor, normalizeSlugPart } from './utils/slug'

// HTTP
export { createApp, type AppOptions, type BlogApp } from './http/app'

// Configuration
export { loadConfig, parseConfig, DEFAULT_SITE, type BlogConfig, type SiteMetadata } from './config'

// Logging
export {
  logger,
  setLogger,
  noopLogger,
  createConsoleLogger,
  type Logger,
  type LogLevel,
} from './utils/logger'

// Errors
export * from './errors'
