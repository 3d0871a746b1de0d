// src/storage/memory-database.ts — In-process KeyValueDatabase
//
// Several handles may share one MemoryBacking to stand in for several
// processes attached to the same store: a commit through one handle is an
// external change for every other handle.

import { EventEmitter } from "node:events"
import { ulid } from "ulid"
import { AsyncMutex } from "../shared/async-mutex.js"
import { StorageError } from "./errors.js"
import {
  type Collections,
  type CompletionErrorHandler,
  type ExternalChangeListener,
  type KeyValueDatabase,
  type ReadTransaction,
  type WriteTransaction,
  defaultCompletionErrorHandler,
} from "./kv-database.js"
import { SnapshotReadTransaction, StagedWriteTransaction, executeWrite } from "./transaction.js"

const EXTERNAL_CHANGE = "external-change"

export class MemoryBacking {
  data: Collections = new Map()
  version = 0
  readonly writeLock = new AsyncMutex()
  readonly handles = new Set<InMemoryKeyValueDatabase>()
}

export interface InMemoryDatabaseOptions {
  backing?: MemoryBacking
  onCompletionError?: CompletionErrorHandler
}

export class InMemoryKeyValueDatabase implements KeyValueDatabase {
  readonly id = ulid()
  private readonly backing: MemoryBacking
  private readonly onCompletionError: CompletionErrorHandler
  private readonly emitter = new EventEmitter()
  private closed = false

  constructor(options: InMemoryDatabaseOptions = {}) {
    this.backing = options.backing ?? new MemoryBacking()
    this.onCompletionError = options.onCompletionError ?? defaultCompletionErrorHandler
    this.backing.handles.add(this)
  }

  /** Open another handle on the same backing data. */
  attachPeer(options: Omit<InMemoryDatabaseOptions, "backing"> = {}): InMemoryKeyValueDatabase {
    return new InMemoryKeyValueDatabase({ ...options, backing: this.backing })
  }

  get version(): number {
    return this.backing.version
  }

  async read<T>(fn: (tx: ReadTransaction) => T | Promise<T>): Promise<T> {
    this.assertOpen()
    return fn(new SnapshotReadTransaction(this.backing.data, this.backing.version))
  }

  async write<T>(fn: (tx: WriteTransaction) => T | Promise<T>): Promise<T> {
    this.assertOpen()
    return this.backing.writeLock.runExclusive(() => {
      const tx = new StagedWriteTransaction(this.backing.data, this.backing.version + 1)
      return executeWrite(tx, fn, (data) => {
        this.backing.data = data
        this.backing.version = tx.version
        this.notifyPeers(tx.version)
      }, this.onCompletionError)
    })
  }

  onExternalChange(listener: ExternalChangeListener): () => void {
    this.emitter.on(EXTERNAL_CHANGE, listener)
    return () => {
      this.emitter.off(EXTERNAL_CHANGE, listener)
    }
  }

  async close(): Promise<void> {
    this.closed = true
    this.backing.handles.delete(this)
    this.emitter.removeAllListeners()
  }

  private notifyPeers(version: number): void {
    for (const handle of this.backing.handles) {
      if (handle === this) continue
      setImmediate(() => handle.emitter.emit(EXTERNAL_CHANGE, version))
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError("CLOSED", "database handle is closed", { id: this.id })
    }
  }
}
