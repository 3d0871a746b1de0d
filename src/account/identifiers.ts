// src/account/identifiers.ts — Branded phone number and service id types

import { AccountStateError } from "./errors.js"

declare const _e164Brand: unique symbol
declare const _serviceIdBrand: unique symbol

/** Phone number in E.164 form, e.g. "+15550001111". */
export type E164 = string & { readonly [_e164Brand]: true }

/** Lower-case textual UUID used for ACIs and PNIs. */
export type ServiceId = string & { readonly [_serviceIdBrand]: true }

const E164_PATTERN = /^\+[1-9]\d{6,14}$/
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/

export function isE164(value: string): value is E164 {
  return E164_PATTERN.test(value)
}

export function isServiceId(value: string): value is ServiceId {
  return UUID_PATTERN.test(value)
}

export function parseE164(value: string): E164 {
  if (!isE164(value)) {
    throw new AccountStateError("INVALID_PHONE_NUMBER", "not an E.164 phone number", {
      phoneNumber: redactPhoneNumber(value),
    })
  }
  return value
}

/** Accepts any letter case; returns the canonical lower-case form. */
export function parseServiceId(value: string): ServiceId {
  const normalized = value.toLowerCase()
  if (!isServiceId(normalized)) {
    throw new AccountStateError("INVALID_SERVICE_ID", `not a UUID: ${value}`)
  }
  return normalized
}

/** Keep the last two digits only, for logs. */
export function redactPhoneNumber(value: string | undefined): string | undefined {
  if (value === undefined) return undefined
  if (value.length <= 2) return "*".repeat(value.length)
  return "*".repeat(value.length - 2) + value.slice(-2)
}
