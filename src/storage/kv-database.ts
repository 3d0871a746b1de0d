// src/storage/kv-database.ts — Transactional key-value database contract
//
// Data is grouped into named collections of key → StoredValue. Readers see the
// last committed version; writers are serialized and see their own staged
// changes. Backends: memory-database.ts, file-database.ts.

import { Type, type Static } from "@sinclair/typebox"

// ---------------------------------------------------------------------------
// Stored values
// ---------------------------------------------------------------------------

export const StoredValueSchema = Type.Union([
  Type.Object({ kind: Type.Literal("string"), value: Type.String() }),
  Type.Object({ kind: Type.Literal("bool"), value: Type.Boolean() }),
  /** Milliseconds since the epoch */
  Type.Object({ kind: Type.Literal("date"), value: Type.Number() }),
  Type.Object({ kind: Type.Literal("uint32"), value: Type.Integer({ minimum: 0, maximum: 0xffff_ffff }) }),
  Type.Object({ kind: Type.Literal("object"), value: Type.Unknown() }),
])

export type StoredValue = Static<typeof StoredValueSchema>
export type StoredValueKind = StoredValue["kind"]

/** Committed data as seen by one transaction. Never mutated after commit. */
export type Collections = ReadonlyMap<string, ReadonlyMap<string, StoredValue>>

// ---------------------------------------------------------------------------
// Transactions
// ---------------------------------------------------------------------------

export interface ReadTransaction {
  readonly mode: "read" | "write"
  /**
   * Store version this transaction observes. A write transaction reports the
   * version it will produce when it commits.
   */
  readonly version: number
  get(collection: string, key: string): StoredValue | undefined
  keys(collection: string): string[]
}

export interface WriteTransaction extends ReadTransaction {
  readonly mode: "write"
  put(collection: string, key: string, value: StoredValue): void
  delete(collection: string, key: string): void
  deleteCollection(collection: string): void
  /** Run fn asynchronously after a successful commit. Never awaited by the writer. */
  addCompletion(fn: () => void): void
  /** Run fn if the transaction rolls back. Awaited before write() rejects. */
  addRollbackHandler(fn: () => void | Promise<void>): void
}

export function isWriteTransaction(tx: ReadTransaction): tx is WriteTransaction {
  return tx.mode === "write"
}

// ---------------------------------------------------------------------------
// Database
// ---------------------------------------------------------------------------

/** Called with the new store version after another writer committed. */
export type ExternalChangeListener = (version: number) => void

export interface KeyValueDatabase {
  /** Unique handle id; identifies this writer to other handles. */
  readonly id: string
  read<T>(fn: (tx: ReadTransaction) => T | Promise<T>): Promise<T>
  write<T>(fn: (tx: WriteTransaction) => T | Promise<T>): Promise<T>
  /** Subscribe to commits made through any other handle. Returns unsubscribe. */
  onExternalChange(listener: ExternalChangeListener): () => void
  close(): Promise<void>
}

/** Reports an error thrown by a post-commit completion. */
export type CompletionErrorHandler = (err: unknown) => void

export const defaultCompletionErrorHandler: CompletionErrorHandler = (err) => {
  console.error(JSON.stringify({
    metric: "storage.completion.failed",
    error: err instanceof Error ? err.message : String(err),
  }))
}
