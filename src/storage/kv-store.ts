// src/storage/kv-store.ts — Namespaced, typed accessors over one collection
//
// Absent keys read as undefined (or the supplied default). Reading a key with
// the wrong accessor is a TYPE_MISMATCH rather than a silent coercion.

import { Value } from "@sinclair/typebox/value"
import type { Static, TSchema } from "@sinclair/typebox"
import { StorageError } from "./errors.js"
import type { ReadTransaction, StoredValue, StoredValueKind, WriteTransaction } from "./kv-database.js"

export class KeyValueStore {
  constructor(readonly collection: string) {}

  // === STRING ===

  getString(key: string, tx: ReadTransaction): string | undefined {
    const stored = tx.get(this.collection, key)
    if (stored === undefined) return undefined
    if (stored.kind === "string") return stored.value
    throw this.mismatch(key, "string", stored)
  }

  /** Writing undefined removes the key. */
  setString(key: string, value: string | undefined, tx: WriteTransaction): void {
    if (value === undefined) {
      tx.delete(this.collection, key)
      return
    }
    tx.put(this.collection, key, { kind: "string", value })
  }

  // === BOOL ===

  getBool(key: string, defaultValue: boolean, tx: ReadTransaction): boolean {
    const stored = tx.get(this.collection, key)
    if (stored === undefined) return defaultValue
    if (stored.kind === "bool") return stored.value
    throw this.mismatch(key, "bool", stored)
  }

  /** Like getBool, but distinguishes "never set" from false. */
  getOptionalBool(key: string, tx: ReadTransaction): boolean | undefined {
    if (!this.hasValue(key, tx)) return undefined
    return this.getBool(key, false, tx)
  }

  setBool(key: string, value: boolean, tx: WriteTransaction): void {
    tx.put(this.collection, key, { kind: "bool", value })
  }

  // === DATE ===

  getDate(key: string, tx: ReadTransaction): Date | undefined {
    const stored = tx.get(this.collection, key)
    if (stored === undefined) return undefined
    if (stored.kind === "date") return new Date(stored.value)
    throw this.mismatch(key, "date", stored)
  }

  /** Writing undefined removes the key. */
  setDate(key: string, value: Date | undefined, tx: WriteTransaction): void {
    if (value === undefined) {
      tx.delete(this.collection, key)
      return
    }
    const ms = value.getTime()
    if (Number.isNaN(ms)) {
      throw new StorageError("INVALID_VALUE", `invalid date for key ${key}`, { collection: this.collection, key })
    }
    tx.put(this.collection, key, { kind: "date", value: ms })
  }

  // === UINT32 ===

  getUInt32(key: string, defaultValue: number, tx: ReadTransaction): number {
    const stored = tx.get(this.collection, key)
    if (stored === undefined) return defaultValue
    if (stored.kind === "uint32") return stored.value
    throw this.mismatch(key, "uint32", stored)
  }

  setUInt32(key: string, value: number, tx: WriteTransaction): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) {
      throw new StorageError("INVALID_VALUE", `${value} is not a uint32 (key ${key})`, {
        collection: this.collection,
        key,
      })
    }
    tx.put(this.collection, key, { kind: "uint32", value })
  }

  // === OBJECT ===

  /** Read a JSON value and validate it against schema. Returns a copy. */
  getObject<S extends TSchema>(key: string, schema: S, tx: ReadTransaction): Static<S> | undefined {
    const stored = tx.get(this.collection, key)
    if (stored === undefined) return undefined
    if (stored.kind !== "object") throw this.mismatch(key, "object", stored)
    const value: unknown = structuredClone(stored.value)
    if (Value.Check(schema, value)) return value
    throw new StorageError("TYPE_MISMATCH", `stored object for key ${key} does not match schema`, {
      collection: this.collection,
      key,
    })
  }

  /** Store a JSON-serializable value. The value is copied. */
  setObject(key: string, value: unknown, tx: WriteTransaction): void {
    tx.put(this.collection, key, { kind: "object", value: structuredClone(value) })
  }

  // === KEYS ===

  hasValue(key: string, tx: ReadTransaction): boolean {
    return tx.get(this.collection, key) !== undefined
  }

  allKeys(tx: ReadTransaction): string[] {
    return tx.keys(this.collection)
  }

  removeValue(key: string, tx: WriteTransaction): void {
    tx.delete(this.collection, key)
  }

  removeAll(tx: WriteTransaction): void {
    tx.deleteCollection(this.collection)
  }

  private mismatch(key: string, expected: StoredValueKind, stored: StoredValue): StorageError {
    return new StorageError("TYPE_MISMATCH", `key ${key} holds ${stored.kind}, expected ${expected}`, {
      collection: this.collection,
      key,
    })
  }
}
