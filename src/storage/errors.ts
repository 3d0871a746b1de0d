// src/storage/errors.ts — Typed storage errors

/** Error codes raised by the key-value layer */
export type StorageErrorCode =
  | "TYPE_MISMATCH"
  | "INVALID_VALUE"
  | "CLOSED"
  | "CORRUPT"
  | "TOO_LARGE"

/** Typed error for key-value storage operations */
export class StorageError extends Error {
  readonly name = "StorageError"
  readonly code: StorageErrorCode
  readonly context: Record<string, unknown>

  constructor(code: StorageErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(`[storage] ${code}: ${message}`)
    this.code = code
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}
