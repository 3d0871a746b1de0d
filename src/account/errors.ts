// src/account/errors.ts — Account-state typed errors
//
// Raised for precondition violations only. No-op transitions are logged,
// never thrown.

export type AccountStateErrorCode =
  | "MISSING_ACI"
  | "MISSING_PHONE_NUMBER"
  | "INVALID_PHONE_NUMBER"
  | "INVALID_SERVICE_ID"
  | "ACI_MISMATCH"
  | "ACI_ALREADY_SET"
  | "LOCK_ORDER_VIOLATION"

export class AccountStateError extends Error {
  readonly name = "AccountStateError"
  readonly code: AccountStateErrorCode
  readonly context: Record<string, unknown>

  constructor(code: AccountStateErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(`[account] ${code}: ${message}`)
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
