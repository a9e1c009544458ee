/**
 * KvEngine - embedded, single-file key-value engine
 *
 * Stores raw byte keys and values in nested buckets inside one LMDB file
 * (a copy-on-write B+tree, via the `lmdb` package):
 * - Every read runs in a `view` transaction that sees one committed snapshot
 * - Every write runs in an `update` transaction; writers are serialized and
 *   commits are atomic across crashes
 * - Readers never wait for the writer, and a reader that started before a
 *   commit keeps its pre-commit snapshot until it finishes
 * - Keys inside a bucket iterate in ascending byte order
 *
 * Buckets are laid out as key prefixes in the single LMDB key space:
 *
 *   0x00 | parent id (u32 BE) | name  -> bucket id (u32 BE)
 *   0x01 | bucket id (u32 BE) | key   -> value
 *   0x02 | 'next-bucket-id'           -> u32 BE counter
 *
 * Operations are synchronous except `close`. A transaction callback must
 * not return a promise; all of its work happens before `view`/`update`
 * returns.
 */

import { open, type RootDatabase } from 'lmdb'
import { writeFileSync } from 'node:fs'
import {
  BlogError,
  StorageError,
  StorageReadError,
  StorageUnavailableError,
  StorageWriteError,
  ValidationError,
  toError,
} from '../errors'
import { DB_FILE_MODE, MAX_KEY_BYTES } from '../constants'
import { logger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

/**
 * Keys may be given as text (UTF-8 encoded) or raw bytes
 */
export type KeyInput = string | Uint8Array

/**
 * One key/value pair read from a bucket
 */
export interface KvEntry {
  key: Buffer
  value: Buffer
}

/**
 * Options for opening an engine
 */
export interface KvEngineOptions {
  /** Mode used when the backing file is created (default: 0o600) */
  fileMode?: number
}

type Root = RootDatabase<Buffer, Buffer>
type ReadTxn = ReturnType<Root['useReadTransaction']>

/** Parent id of top-level buckets */
const ROOT_ID = 0

const BUCKET_TAG = 0x00
const ENTRY_TAG = 0x01
const NEXT_ID_KEY = Buffer.concat([Buffer.from([0x02]), Buffer.from('next-bucket-id', 'utf8')])

// =============================================================================
// Key layout
// =============================================================================

function prefix(tag: number, id: number): Buffer {
  const out = Buffer.alloc(5)
  out[0] = tag
  out.writeUInt32BE(id, 1)
  return out
}

function bucketKey(parentId: number, name: string): Buffer {
  return Buffer.concat([prefix(BUCKET_TAG, parentId), Buffer.from(name, 'utf8')])
}

function entryKey(bucketId: number, key: Buffer): Buffer {
  return Buffer.concat([prefix(ENTRY_TAG, bucketId), key])
}

function decodeId(value: Buffer): number {
  return value.readUInt32BE(0)
}

function encodeId(id: number): Buffer {
  const out = Buffer.alloc(4)
  out.writeUInt32BE(id, 0)
  return out
}

// =============================================================================
// Helpers
// =============================================================================

function toKey(input: KeyInput): Buffer {
  const key = typeof input === 'string' ? Buffer.from(input, 'utf8') : Buffer.from(input)
  if (key.length === 0) {
    throw new ValidationError('Key required', { field: 'key' })
  }
  if (key.length > MAX_KEY_BYTES) {
    throw new ValidationError(`Key too large: ${key.length} bytes (max ${MAX_KEY_BYTES})`, {
      field: 'key',
    })
  }
  return key
}

function assertBucketName(name: string): void {
  if (name.length === 0) {
    throw new ValidationError('Bucket name required', { field: 'bucket' })
  }
  if (Buffer.byteLength(name, 'utf8') > MAX_KEY_BYTES) {
    throw new ValidationError(`Bucket name too large (max ${MAX_KEY_BYTES} bytes)`, {
      field: 'bucket',
    })
  }
}

function assertPath(path: string[]): [string, ...string[]] {
  const [first, ...rest] = path
  if (first === undefined) {
    throw new ValidationError('Bucket path required', { field: 'bucket' })
  }
  return [first, ...rest]
}

/**
 * Create the backing file with `mode` unless it already exists.
 * LMDB initializes an empty file as a new environment.
 */
function ensureFile(path: string, mode: number): void {
  try {
    writeFileSync(path, new Uint8Array(0), { mode, flag: 'wx' })
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return
    }
    throw error
  }
}

// =============================================================================
// Access
// =============================================================================

/**
 * Raw key space operations, bound to either a read snapshot or the
 * current write transaction
 */
interface Access {
  get(key: Buffer): Buffer | undefined
  range(start: Buffer, end: Buffer): KvEntry[]
  put(key: Buffer, value: Buffer): void
  remove(key: Buffer): boolean
}

function readError(error: unknown): never {
  if (error instanceof BlogError) throw error
  const cause = toError(error)
  throw new StorageReadError(cause.message, cause)
}

function writeError(operation: string, error: unknown): never {
  if (error instanceof BlogError) throw error
  const cause = toError(error)
  throw new StorageWriteError(operation, cause.message, cause)
}

function snapshotAccess(root: Root, txn: ReadTxn): Access {
  return {
    get(key) {
      try {
        return root.get(key, { transaction: txn })
      } catch (error) {
        return readError(error)
      }
    },
    range(start, end) {
      try {
        return Array.from(root.getRange({ start, end, transaction: txn }), ({ key, value }) => ({
          key: Buffer.from(key),
          value: Buffer.from(value),
        }))
      } catch (error) {
        return readError(error)
      }
    },
    put() {
      throw new StorageError('Cannot write inside a read-only transaction')
    },
    remove() {
      throw new StorageError('Cannot write inside a read-only transaction')
    },
  }
}

// Inside `transactionSync`, plain reads see the transaction's own writes.
function writeAccess(root: Root): Access {
  return {
    get(key) {
      try {
        return root.get(key)
      } catch (error) {
        return readError(error)
      }
    },
    range(start, end) {
      try {
        return Array.from(root.getRange({ start, end }), ({ key, value }) => ({
          key: Buffer.from(key),
          value: Buffer.from(value),
        }))
      } catch (error) {
        return readError(error)
      }
    },
    put(key, value) {
      try {
        root.putSync(key, value)
      } catch (error) {
        writeError('put', error)
      }
    },
    remove(key) {
      try {
        return root.removeSync(key)
      } catch (error) {
        return writeError('delete', error)
      }
    },
  }
}

// =============================================================================
// Bucket
// =============================================================================

/**
 * A bucket handle, valid only inside the transaction that produced it
 */
export class Bucket {
  constructor(
    private readonly tx: Transaction,
    /** @internal */
    readonly id: number,
    /** @internal */
    readonly parentId: number,
    readonly name: string,
    readonly path: readonly string[]
  ) {}

  /**
   * Value stored under `key`, or undefined when absent
   */
  get(key: KeyInput): Buffer | undefined {
    const value = this.tx.active().get(entryKey(this.id, toKey(key)))
    return value === undefined ? undefined : Buffer.from(value)
  }

  /**
   * Store `value` under `key`, replacing any existing value
   */
  put(key: KeyInput, value: Uint8Array): void {
    this.tx.writable().put(entryKey(this.id, toKey(key)), Buffer.from(value))
  }

  /**
   * Remove `key`. Removing an absent key is not an error.
   *
   * @returns whether a value was removed
   */
  delete(key: KeyInput): boolean {
    return this.tx.writable().remove(entryKey(this.id, toKey(key)))
  }

  /**
   * Every entry in ascending byte order of the key
   */
  entries(): KvEntry[] {
    const start = prefix(ENTRY_TAG, this.id)
    return this.tx
      .active()
      .range(start, prefix(ENTRY_TAG, this.id + 1))
      .map(({ key, value }) => ({ key: key.subarray(start.length), value }))
  }

  /**
   * Number of keys stored directly in this bucket
   */
  count(): number {
    return this.tx.active().range(prefix(ENTRY_TAG, this.id), prefix(ENTRY_TAG, this.id + 1)).length
  }

  /**
   * Nested bucket, or undefined when it does not exist
   */
  bucket(name: string): Bucket | undefined {
    return this.tx.childBucket(this, name)
  }

  /**
   * Nested bucket, created when missing
   */
  createBucketIfNotExists(name: string): Bucket {
    return this.tx.createChildBucket(this, name)
  }
}

// =============================================================================
// Transaction
// =============================================================================

/**
 * Read-only (`view`) or read-write (`update`) transaction
 */
export class Transaction {
  private closed = false

  constructor(
    private readonly access: Access,
    readonly isWritable: boolean
  ) {}

  /**
   * Bucket at `path` (outermost first), or undefined when any level is missing
   */
  bucket(...path: string[]): Bucket | undefined {
    assertPath(path)
    let current: Bucket | undefined
    for (const name of path) {
      current = this.childBucket(current, name)
      if (!current) return undefined
    }
    return current
  }

  /**
   * Bucket at `path`, creating every missing level
   */
  createBucketIfNotExists(...path: string[]): Bucket {
    const [first, ...rest] = assertPath(path)
    let current = this.createChildBucket(undefined, first)
    for (const name of rest) {
      current = this.createChildBucket(current, name)
    }
    return current
  }

  /**
   * Remove the bucket at `path` with everything nested in it
   *
   * @returns whether the bucket existed
   */
  deleteBucket(...path: string[]): boolean {
    const access = this.writable()
    const target = this.bucket(...path)
    if (!target) return false

    access.remove(bucketKey(target.parentId, target.name))
    const pending = [target.id]
    let id = pending.pop()
    while (id !== undefined) {
      for (const child of access.range(prefix(BUCKET_TAG, id), prefix(BUCKET_TAG, id + 1))) {
        pending.push(decodeId(child.value))
        access.remove(child.key)
      }
      for (const entry of access.range(prefix(ENTRY_TAG, id), prefix(ENTRY_TAG, id + 1))) {
        access.remove(entry.key)
      }
      id = pending.pop()
    }
    return true
  }

  /** @internal */
  active(): Access {
    if (this.closed) {
      throw new StorageError('Transaction has already finished')
    }
    return this.access
  }

  /** @internal */
  writable(): Access {
    const access = this.active()
    if (!this.isWritable) {
      throw new StorageError('Cannot write inside a read-only transaction')
    }
    return access
  }

  /** @internal */
  childBucket(parent: Bucket | undefined, name: string): Bucket | undefined {
    assertBucketName(name)
    const parentId = parent?.id ?? ROOT_ID
    const value = this.active().get(bucketKey(parentId, name))
    return value === undefined
      ? undefined
      : new Bucket(this, decodeId(value), parentId, name, [...(parent?.path ?? []), name])
  }

  /** @internal */
  createChildBucket(parent: Bucket | undefined, name: string): Bucket {
    const existing = this.childBucket(parent, name)
    if (existing) return existing
    const access = this.writable()
    const last = access.get(NEXT_ID_KEY)
    const id = (last === undefined ? ROOT_ID : decodeId(last)) + 1
    access.put(NEXT_ID_KEY, encodeId(id))
    const parentId = parent?.id ?? ROOT_ID
    access.put(bucketKey(parentId, name), encodeId(id))
    return new Bucket(this, id, parentId, name, [...(parent?.path ?? []), name])
  }

  /** @internal */
  close(): void {
    this.closed = true
  }
}

// =============================================================================
// Engine
// =============================================================================

/**
 * Carries an error thrown by an `update` callback through the abort, so it
 * reaches the caller unchanged instead of as a StorageWriteError
 */
class CallbackFailure {
  constructor(readonly error: unknown) {}
}

/**
 * Embedded key-value engine bound to one backing file
 *
 * @example
 * ```typescript
 * const engine = KvEngine.open('blog.db')
 * engine.update((tx) => {
 *   tx.createBucketIfNotExists('BLOG', 'POSTS').put('hello', Buffer.from('{}'))
 * })
 * const value = engine.view((tx) => tx.bucket('BLOG', 'POSTS')?.get('hello'))
 * await engine.close()
 * ```
 */
export class KvEngine {
  private root: Root | undefined

  private constructor(
    readonly path: string,
    root: Root
  ) {
    this.root = root
  }

  /**
   * Open (or create) the engine file at `path`
   *
   * @throws StorageUnavailableError when the file cannot be opened or initialized
   */
  static open(path: string, options: KvEngineOptions = {}): KvEngine {
    try {
      ensureFile(path, options.fileMode ?? DB_FILE_MODE)
      const root = open<Buffer, Buffer>({
        path,
        noSubdir: true,
        encoding: 'binary',
        keyEncoding: 'binary',
      })
      logger.debug(`Opened KV engine at ${path}`)
      return new KvEngine(path, root)
    } catch (error) {
      const cause = toError(error)
      throw new StorageUnavailableError(path, cause.message, cause)
    }
  }

  /**
   * Whether the engine still holds its file
   */
  get isOpen(): boolean {
    return this.root !== undefined
  }

  /**
   * Run `fn` inside a read-only snapshot transaction
   *
   * @throws StorageReadError when the engine fails to read
   */
  view<T>(fn: (tx: Transaction) => T): T {
    const root = this.current()
    let txn: ReadTxn
    try {
      txn = root.useReadTransaction()
    } catch (error) {
      return readError(error)
    }
    const tx = new Transaction(snapshotAccess(root, txn), false)
    try {
      return fn(tx)
    } finally {
      tx.close()
      txn.done()
    }
  }

  /**
   * Run `fn` inside a write transaction. Everything `fn` writes commits
   * together, or nothing does when `fn` throws.
   *
   * @throws StorageWriteError when the transaction cannot commit
   */
  update<T>(fn: (tx: Transaction) => T): T {
    const root = this.current()
    try {
      return root.transactionSync(() => {
        const tx = new Transaction(writeAccess(root), true)
        try {
          return fn(tx)
        } catch (error) {
          throw new CallbackFailure(error)
        } finally {
          tx.close()
        }
      })
    } catch (error) {
      if (error instanceof CallbackFailure) throw error.error
      return writeError('update', error)
    }
  }

  /**
   * Flush and release the backing file. Safe to call more than once.
   */
  async close(): Promise<void> {
    const root = this.root
    if (!root) return
    this.root = undefined
    await root.close()
    logger.debug(`Closed KV engine at ${this.path}`)
  }

  private current(): Root {
    if (!this.root) {
      throw new StorageUnavailableError(this.path, 'engine is closed')
    }
    return this.root
  }
}
