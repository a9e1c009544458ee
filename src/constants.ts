/**
 * Tiny Blog Constants
 *
 * Centralized constants used throughout the codebase.
 */

// =============================================================================
// Storage Layout
// =============================================================================

/**
 * Outer container bucket. Sibling collections (users, drafts) live here too.
 */
export const ROOT_BUCKET = 'BLOG'

/**
 * Inner bucket holding post records keyed by slug
 */
export const POSTS_BUCKET = 'POSTS'

/**
 * Default backing file for the engine
 */
export const DEFAULT_DB_PATH = 'tinyblog.db'

/**
 * Mode applied when the backing file is created (owner read/write only)
 */
export const DB_FILE_MODE = 0o600

/**
 * Largest key the engine accepts, in bytes: LMDB's 1978-byte key limit
 * less the 5-byte bucket prefix
 */
export const MAX_KEY_BYTES = 1973

// =============================================================================
// HTTP
// =============================================================================

/**
 * Maximum accepted request body (1 MiB)
 */
export const DEFAULT_BODY_LIMIT_BYTES = 1024 * 1024

/**
 * Grace period for in-flight requests on shutdown (ms)
 */
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 15_000

export const DEFAULT_HOST = '127.0.0.1'

export const DEFAULT_PORT = 8000

// =============================================================================
// Slugs
// =============================================================================

/**
 * Separator used between slug words and between the timestamp and title parts
 */
export const SLUG_SEPARATOR = '-'
