// src/account/types.ts — Account-state types and persisted key layout

import type { E164, ServiceId } from "./identifiers.js"

// ---------------------------------------------------------------------------
// Persisted layout
// ---------------------------------------------------------------------------

/** Collection holding every account-state key. */
export const ACCOUNT_COLLECTION = "TSStorageUserAccountCollection"

/**
 * Persisted key names. These strings are an on-disk format: renaming one
 * orphans existing data.
 */
export const AccountKeys = {
  localNumber: "TSStorageRegisteredNumberKey",
  localAci: "TSStorageRegisteredUUIDKey",
  localPni: "TSAccountManager_RegisteredPNIKey",
  registrationDate: "TSAccountManager_RegistrationDateKey",
  isOnboarded: "TSAccountManager_IsOnboardedKey",
  isDeregistered: "TSAccountManager_IsDeregisteredKey",
  isTransferInProgress: "TSAccountManager_IsTransferInProgressKey",
  wasTransferred: "TSAccountManager_WasTransferredKey",
  reregistrationPhoneNumber: "TSAccountManager_ReregisteringPhoneNumberKey",
  reregistrationAci: "TSAccountManager_ReregisteringUUIDKey",
  serverAuthToken: "TSStorageServerAuthToken",
  deviceId: "TSAccountManager_DeviceId",
  deviceName: "TSAccountManager_DeviceName",
  manualMessageFetchEnabled: "TSAccountManager_ManualMessageFetchKey",
  isDiscoverableByPhoneNumber: "TSAccountManager_IsDiscoverableByPhoneNumber",
  lastSetIsDiscoverableByPhoneNumber: "TSAccountManager_LastSetIsDiscoverableByPhoneNumberKey",
} as const

export const PRIMARY_DEVICE_ID = 1

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

/** Immutable view of every persisted account field at one store version. */
export interface AccountState {
  readonly localNumber: E164 | undefined
  readonly localAci: ServiceId | undefined
  /** May lag behind the ACI for accounts registered before PNIs existed */
  readonly localPni: ServiceId | undefined
  readonly registrationDate: Date | undefined
  readonly isOnboarded: boolean
  readonly isDeregistered: boolean
  readonly isTransferInProgress: boolean
  readonly wasTransferred: boolean
  readonly reregistrationPhoneNumber: E164 | undefined
  readonly reregistrationAci: ServiceId | undefined
  readonly serverAuthToken: string | undefined
  readonly deviceId: number
  readonly deviceName: string | undefined
  readonly manualMessageFetchEnabled: boolean
  /** undefined until the user has made a choice */
  readonly isDiscoverableByPhoneNumber: boolean | undefined
  readonly lastSetIsDiscoverableByPhoneNumber: Date | undefined
}

export type RegistrationState =
  | "unregistered"
  | "registered"
  | "deregistered"
  | "reregistering"

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/** In-memory identity of an in-flight verification. Overrides confirmed values while set. */
export interface PendingVerificationIdentity {
  readonly phoneNumber: E164 | undefined
  readonly aci: ServiceId | undefined
  readonly pni: ServiceId | undefined
}

export const NO_PENDING_IDENTITY: PendingVerificationIdentity = Object.freeze({
  phoneNumber: undefined,
  aci: undefined,
  pni: undefined,
})

/** Local identifiers as callers should see them: pending values win. */
export interface LocalIdentifiers {
  readonly phoneNumber: E164 | undefined
  readonly aci: ServiceId | undefined
  readonly pni: ServiceId | undefined
}

/** Input to the confirm step of a registration or number change. */
export interface LocalIdentityInput {
  phoneNumber: E164
  aci: ServiceId | undefined
  pni?: ServiceId
}

export interface LocalAddress {
  readonly aci: ServiceId | undefined
  readonly phoneNumber: E164 | undefined
}

export type ReregistrationResult =
  | { ok: true; wasPrimaryDevice: boolean }
  | { ok: false; reason: "missing_local_number" | "missing_local_aci" }
