// src/storage/transaction.ts — Snapshot read / staged write transactions shared by the backends

import { StorageError } from "./errors.js"
import type {
  Collections,
  CompletionErrorHandler,
  ReadTransaction,
  StoredValue,
  WriteTransaction,
} from "./kv-database.js"

export class SnapshotReadTransaction implements ReadTransaction {
  readonly mode = "read" as const

  constructor(
    private readonly data: Collections,
    readonly version: number,
  ) {}

  get(collection: string, key: string): StoredValue | undefined {
    return this.data.get(collection)?.get(key)
  }

  keys(collection: string): string[] {
    return [...(this.data.get(collection)?.keys() ?? [])]
  }
}

/**
 * Write transaction over a committed base. Collections are copied on first
 * modification; commit() merges the staged copies over the base into a new
 * Collections value, leaving the base untouched for concurrent readers.
 */
export class StagedWriteTransaction implements WriteTransaction {
  readonly mode = "write" as const
  private readonly staged = new Map<string, Map<string, StoredValue>>()
  private readonly completions: Array<() => void> = []
  private readonly rollbackHandlers: Array<() => void | Promise<void>> = []
  private open = true

  constructor(
    private readonly base: Collections,
    readonly version: number,
  ) {}

  get(collection: string, key: string): StoredValue | undefined {
    const staged = this.staged.get(collection)
    if (staged) return staged.get(key)
    return this.base.get(collection)?.get(key)
  }

  keys(collection: string): string[] {
    const source = this.staged.get(collection) ?? this.base.get(collection)
    return [...(source?.keys() ?? [])]
  }

  put(collection: string, key: string, value: StoredValue): void {
    this.mutable(collection).set(key, value)
  }

  delete(collection: string, key: string): void {
    this.mutable(collection).delete(key)
  }

  deleteCollection(collection: string): void {
    this.assertOpen()
    this.staged.set(collection, new Map())
  }

  addCompletion(fn: () => void): void {
    this.assertOpen()
    this.completions.push(fn)
  }

  addRollbackHandler(fn: () => void | Promise<void>): void {
    this.assertOpen()
    this.rollbackHandlers.push(fn)
  }

  get hasChanges(): boolean {
    return this.staged.size > 0
  }

  /** Close the transaction and return the merged data to persist. */
  seal(): Collections {
    this.assertOpen()
    this.open = false
    const merged = new Map(this.base)
    for (const [collection, entries] of this.staged) {
      if (entries.size === 0) merged.delete(collection)
      else merged.set(collection, entries)
    }
    return merged
  }

  /** Close the transaction and run rollback handlers in registration order. */
  async rollback(): Promise<void> {
    this.open = false
    for (const handler of this.rollbackHandlers) {
      await handler()
    }
  }

  /** Dispatch completions, each on its own macrotask. */
  scheduleCompletions(onError: CompletionErrorHandler): void {
    for (const fn of this.completions) {
      setImmediate(() => {
        try {
          fn()
        } catch (err) {
          onError(err)
        }
      })
    }
  }

  private mutable(collection: string): Map<string, StoredValue> {
    this.assertOpen()
    let entries = this.staged.get(collection)
    if (!entries) {
      entries = new Map(this.base.get(collection) ?? [])
      this.staged.set(collection, entries)
    }
    return entries
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new StorageError("CLOSED", "transaction already committed or rolled back", { version: this.version })
    }
  }
}

/**
 * Run fn inside tx, persist through commit, then schedule completions.
 * Any failure rolls the transaction back and rethrows the original error.
 */
export async function executeWrite<T>(
  tx: StagedWriteTransaction,
  fn: (tx: WriteTransaction) => T | Promise<T>,
  commit: (data: Collections) => void | Promise<void>,
  onCompletionError: CompletionErrorHandler,
): Promise<T> {
  let result: T
  try {
    result = await fn(tx)
    const changed = tx.hasChanges
    const data = tx.seal()
    if (changed) await commit(data)
  } catch (err) {
    await tx.rollback()
    throw err
  }
  tx.scheduleCompletions(onCompletionError)
  return result
}
