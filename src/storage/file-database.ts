// src/storage/file-database.ts — KeyValueDatabase persisted to one JSON document
//
// Every commit rewrites the document through AtomicJsonStore and bumps its
// generation. A handle notices commits from other writers (other processes
// sharing the file) when it reads a generation written by a different
// writerId, either on its own transactions or while polling.
//
// Generations seen by a handle never go backwards. A document that vanished
// or came back at an older generation (wiped, restored, re-created by a fresh
// handle) is read as a reset one past the newest generation seen, and the
// next commit continues from there.
//
// Writes are serialized per handle only. Cross-process writers must not
// commit concurrently; the main process owns writes.

import { EventEmitter } from "node:events"
import { Type, type Static } from "@sinclair/typebox"
import { ulid } from "ulid"
import { AsyncMutex } from "../shared/async-mutex.js"
import { AtomicJsonStore } from "./atomic-json-store.js"
import { StorageError } from "./errors.js"
import {
  type Collections,
  type CompletionErrorHandler,
  type ExternalChangeListener,
  type KeyValueDatabase,
  type ReadTransaction,
  type StoredValue,
  type WriteTransaction,
  StoredValueSchema,
  defaultCompletionErrorHandler,
} from "./kv-database.js"
import { SnapshotReadTransaction, StagedWriteTransaction, executeWrite } from "./transaction.js"

const EXTERNAL_CHANGE = "external-change"

export const DATABASE_DOCUMENT_VERSION = 1

export const DatabaseDocumentSchema = Type.Object({
  _schemaVersion: Type.Literal(DATABASE_DOCUMENT_VERSION),
  generation: Type.Integer({ minimum: 0 }),
  writerId: Type.String(),
  collections: Type.Record(Type.String(), Type.Record(Type.String(), StoredValueSchema)),
})

export type DatabaseDocument = Static<typeof DatabaseDocumentSchema>

export interface FileDatabaseOptions {
  filePath: string
  maxSizeBytes?: number
  onCompletionError?: CompletionErrorHandler
}

export class FileKeyValueDatabase implements KeyValueDatabase {
  readonly id = ulid()
  private readonly store: AtomicJsonStore<typeof DatabaseDocumentSchema>
  private readonly writeLock = new AsyncMutex()
  private readonly emitter = new EventEmitter()
  private readonly onCompletionError: CompletionErrorHandler
  private lastSeenGeneration: number | null = null
  private lastSeenModifiedAt: number | null = null
  private reset: { generation: number; writerId: string; continuesAt: number } | null = null
  private pollTimer: ReturnType<typeof setInterval> | null = null
  private closed = false

  constructor(options: FileDatabaseOptions) {
    this.store = new AtomicJsonStore(options.filePath, DatabaseDocumentSchema, {
      maxSizeBytes: options.maxSizeBytes,
    })
    this.onCompletionError = options.onCompletionError ?? defaultCompletionErrorHandler
  }

  get filePath(): string {
    return this.store.filePath
  }

  async read<T>(fn: (tx: ReadTransaction) => T | Promise<T>): Promise<T> {
    this.assertOpen()
    const doc = await this.load()
    return fn(new SnapshotReadTransaction(toCollections(doc), doc.generation))
  }

  async write<T>(fn: (tx: WriteTransaction) => T | Promise<T>): Promise<T> {
    this.assertOpen()
    return this.writeLock.runExclusive(async () => {
      const doc = await this.load()
      const tx = new StagedWriteTransaction(toCollections(doc), doc.generation + 1)
      return executeWrite(tx, fn, async (data) => {
        await this.store.replace({
          _schemaVersion: DATABASE_DOCUMENT_VERSION,
          generation: tx.version,
          writerId: this.id,
          collections: fromCollections(data),
        })
        this.lastSeenGeneration = tx.version
        this.lastSeenModifiedAt = await this.store.modifiedAt()
      }, this.onCompletionError)
    })
  }

  onExternalChange(listener: ExternalChangeListener): () => void {
    this.emitter.on(EXTERNAL_CHANGE, listener)
    return () => {
      this.emitter.off(EXTERNAL_CHANGE, listener)
    }
  }

  /**
   * Re-read the document if the file changed on disk. Returns true when a
   * generation from another writer was observed.
   */
  async checkForExternalChanges(): Promise<boolean> {
    this.assertOpen()
    const modifiedAt = await this.store.modifiedAt()
    if (modifiedAt !== null && modifiedAt === this.lastSeenModifiedAt) return false
    this.lastSeenModifiedAt = modifiedAt
    return this.observe(await this.readDocument())
  }

  /** Poll the file for commits by other writers. The timer does not hold the process open. */
  startPolling(intervalMs: number, onError: (err: unknown) => void): void {
    this.stopPolling()
    this.pollTimer = setInterval(() => {
      this.checkForExternalChanges().catch(onError)
    }, intervalMs)
    this.pollTimer.unref()
  }

  stopPolling(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer)
      this.pollTimer = null
    }
  }

  async close(): Promise<void> {
    this.stopPolling()
    this.closed = true
    this.emitter.removeAllListeners()
  }

  private async load(): Promise<DatabaseDocument> {
    const doc = await this.readDocument()
    this.observe(doc)
    return doc
  }

  /** The stored document, renumbered past the newest generation seen when it went backwards. */
  private async readDocument(): Promise<DatabaseDocument> {
    const stored = (await this.store.read()) ?? emptyDocument()
    const reset = this.reset
    if (reset && reset.generation === stored.generation && reset.writerId === stored.writerId) {
      return { ...stored, generation: reset.continuesAt }
    }
    this.reset = null
    const newest = this.lastSeenGeneration
    if (newest === null || stored.generation >= newest) return stored

    const continuesAt = newest + 1
    this.reset = { generation: stored.generation, writerId: stored.writerId, continuesAt }
    return { ...stored, generation: continuesAt }
  }

  /**
   * Track the newest generation seen; announce ones written by other handles.
   * The first document a handle reads sets the baseline without an announcement.
   */
  private observe(doc: DatabaseDocument): boolean {
    const previous = this.lastSeenGeneration
    if (previous !== null && doc.generation <= previous) return false
    this.lastSeenGeneration = doc.generation
    if (previous === null || doc.writerId === this.id) return false
    const generation = doc.generation
    setImmediate(() => this.emitter.emit(EXTERNAL_CHANGE, generation))
    return true
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError("CLOSED", "database handle is closed", { id: this.id, filePath: this.filePath })
    }
  }
}

function emptyDocument(): DatabaseDocument {
  return { _schemaVersion: DATABASE_DOCUMENT_VERSION, generation: 0, writerId: "", collections: {} }
}

function toCollections(doc: DatabaseDocument): Collections {
  const collections = new Map<string, ReadonlyMap<string, StoredValue>>()
  for (const [name, entries] of Object.entries(doc.collections)) {
    collections.set(name, new Map(Object.entries(entries)))
  }
  return collections
}

function fromCollections(data: Collections): Record<string, Record<string, StoredValue>> {
  const out: Record<string, Record<string, StoredValue>> = {}
  for (const [name, entries] of data) {
    out[name] = Object.fromEntries(entries)
  }
  return out
}
