// src/account/account-state.ts — Snapshot loading and registration-state derivation
//
// Every derivation here is a pure function of one AccountState so callers
// never mix fields from two different store versions.

import type { ReadTransaction } from "../storage/kv-database.js"
import type { KeyValueStore } from "../storage/kv-store.js"
import { type E164, type ServiceId, parseE164, parseServiceId } from "./identifiers.js"
import {
  type AccountState,
  type RegistrationState,
  AccountKeys,
  PRIMARY_DEVICE_ID,
} from "./types.js"

export const EMPTY_ACCOUNT_STATE: AccountState = Object.freeze({
  localNumber: undefined,
  localAci: undefined,
  localPni: undefined,
  registrationDate: undefined,
  isOnboarded: false,
  isDeregistered: false,
  isTransferInProgress: false,
  wasTransferred: false,
  reregistrationPhoneNumber: undefined,
  reregistrationAci: undefined,
  serverAuthToken: undefined,
  deviceId: PRIMARY_DEVICE_ID,
  deviceName: undefined,
  manualMessageFetchEnabled: false,
  isDiscoverableByPhoneNumber: undefined,
  lastSetIsDiscoverableByPhoneNumber: undefined,
})

/**
 * Build a frozen snapshot from the store. An empty collection yields a
 * snapshot equal to EMPTY_ACCOUNT_STATE.
 */
export function loadAccountState(store: KeyValueStore, tx: ReadTransaction): AccountState {
  return Object.freeze({
    localNumber: readE164(store, AccountKeys.localNumber, tx),
    localAci: readServiceId(store, AccountKeys.localAci, tx),
    localPni: readServiceId(store, AccountKeys.localPni, tx),
    registrationDate: store.getDate(AccountKeys.registrationDate, tx),
    isOnboarded: store.getBool(AccountKeys.isOnboarded, false, tx),
    isDeregistered: store.getBool(AccountKeys.isDeregistered, false, tx),
    isTransferInProgress: store.getBool(AccountKeys.isTransferInProgress, false, tx),
    wasTransferred: store.getBool(AccountKeys.wasTransferred, false, tx),
    reregistrationPhoneNumber: readE164(store, AccountKeys.reregistrationPhoneNumber, tx),
    reregistrationAci: readServiceId(store, AccountKeys.reregistrationAci, tx),
    serverAuthToken: store.getString(AccountKeys.serverAuthToken, tx),
    deviceId: store.getUInt32(AccountKeys.deviceId, PRIMARY_DEVICE_ID, tx),
    deviceName: store.getString(AccountKeys.deviceName, tx),
    manualMessageFetchEnabled: store.getBool(AccountKeys.manualMessageFetchEnabled, false, tx),
    isDiscoverableByPhoneNumber: store.getOptionalBool(AccountKeys.isDiscoverableByPhoneNumber, tx),
    lastSetIsDiscoverableByPhoneNumber: store.getDate(AccountKeys.lastSetIsDiscoverableByPhoneNumber, tx),
  })
}

function readE164(store: KeyValueStore, key: string, tx: ReadTransaction): E164 | undefined {
  const raw = store.getString(key, tx)
  return raw === undefined ? undefined : parseE164(raw)
}

function readServiceId(store: KeyValueStore, key: string, tx: ReadTransaction): ServiceId | undefined {
  const raw = store.getString(key, tx)
  return raw === undefined ? undefined : parseServiceId(raw)
}

// ---------------------------------------------------------------------------
// Derivations
// ---------------------------------------------------------------------------

export function isRegistered(state: AccountState): boolean {
  return state.localNumber !== undefined
}

/** An in-progress or completed transfer counts as deregistered. */
export function isLogicallyDeregistered(state: AccountState): boolean {
  return state.isTransferInProgress || state.wasTransferred || state.isDeregistered
}

export function isReregistering(state: AccountState): boolean {
  return state.reregistrationPhoneNumber !== undefined
}

export function isPrimaryDevice(state: AccountState): boolean {
  return state.deviceId === PRIMARY_DEVICE_ID
}

export function deriveRegistrationState(state: AccountState): RegistrationState {
  if (!isRegistered(state)) return "unregistered"
  if (state.isDeregistered && isReregistering(state)) return "reregistering"
  if (isLogicallyDeregistered(state)) return "deregistered"
  return "registered"
}

export function isRegisteredAndReady(state: AccountState): boolean {
  return deriveRegistrationState(state) === "registered"
}

/** Single-line summary for logs; phone numbers are not included. */
export function describeAccountState(state: AccountState): Record<string, unknown> {
  return {
    registration_state: deriveRegistrationState(state),
    has_local_number: state.localNumber !== undefined,
    local_aci: state.localAci,
    local_pni: state.localPni,
    device_id: state.deviceId,
    is_onboarded: state.isOnboarded,
    is_deregistered: state.isDeregistered,
    is_transfer_in_progress: state.isTransferInProgress,
    was_transferred: state.wasTransferred,
    is_reregistering: isReregistering(state),
  }
}
