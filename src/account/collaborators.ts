// src/account/collaborators.ts — Subsystems cleaned up during account transitions
//
// Each capability runs inside the caller's write transaction and returns
// nothing; a throw aborts the transaction.

import type { WriteTransaction } from "../storage/kv-database.js"
import type { E164, ServiceId } from "./identifiers.js"

export type IdentityKind = "aci" | "pni"

export interface SenderCertificateStore {
  removeSenderCertificates(tx: WriteTransaction): void
}

export interface ProfileCredentialStore {
  clearProfileKeyCredentials(tx: WriteTransaction): void
}

export interface GroupCredentialStore {
  clearTemporalCredentials(tx: WriteTransaction): void
}

export interface PhoneNumberSharingSettings {
  clearShouldSharePhoneNumberForEveryone(tx: WriteTransaction): void
}

export interface SessionStores {
  resetSessionStore(identity: IdentityKind, tx: WriteTransaction): void
  resetSenderKeyStore(tx: WriteTransaction): void
}

export interface PaymentsState {
  clearState(tx: WriteTransaction): void
}

export interface AddressCache {
  updateMapping(aci: ServiceId, phoneNumber: E164, tx: WriteTransaction): void
}

export interface RecipientStore {
  markLocalRecipientRegistered(aci: ServiceId, phoneNumber: E164, tx: WriteTransaction): void
}

export interface DeregistrationNotifier {
  notifyUserOfDeregistration(tx: WriteTransaction): void
}

export interface AccountCollaborators {
  senderCertificates: SenderCertificateStore
  profileCredentials: ProfileCredentialStore
  groupCredentials: GroupCredentialStore
  phoneNumberSharing: PhoneNumberSharingSettings
  sessions: SessionStores
  payments: PaymentsState
  addressCache: AddressCache
  recipients: RecipientStore
  deregistrationNotifier: DeregistrationNotifier
}

// ---------------------------------------------------------------------------
// Recording implementation
// ---------------------------------------------------------------------------

export type CollaboratorCall =
  | { op: "removeSenderCertificates" }
  | { op: "clearProfileKeyCredentials" }
  | { op: "clearTemporalCredentials" }
  | { op: "clearShouldSharePhoneNumberForEveryone" }
  | { op: "resetSessionStore"; identity: IdentityKind }
  | { op: "resetSenderKeyStore" }
  | { op: "clearPaymentsState" }
  | { op: "updateAddressMapping"; aci: ServiceId; phoneNumber: E164 }
  | { op: "markLocalRecipientRegistered"; aci: ServiceId; phoneNumber: E164 }
  | { op: "notifyUserOfDeregistration" }

/**
 * Collaborators that only record what they were asked to do, with the store
 * version of the transaction each call ran in. Used where the real
 * subsystems are not attached (tests, tooling).
 */
export class RecordingCollaborators implements AccountCollaborators {
  readonly calls: Array<CollaboratorCall & { version: number }> = []

  readonly senderCertificates: SenderCertificateStore = {
    removeSenderCertificates: (tx) => this.record({ op: "removeSenderCertificates" }, tx),
  }

  readonly profileCredentials: ProfileCredentialStore = {
    clearProfileKeyCredentials: (tx) => this.record({ op: "clearProfileKeyCredentials" }, tx),
  }

  readonly groupCredentials: GroupCredentialStore = {
    clearTemporalCredentials: (tx) => this.record({ op: "clearTemporalCredentials" }, tx),
  }

  readonly phoneNumberSharing: PhoneNumberSharingSettings = {
    clearShouldSharePhoneNumberForEveryone: (tx) => this.record({ op: "clearShouldSharePhoneNumberForEveryone" }, tx),
  }

  readonly sessions: SessionStores = {
    resetSessionStore: (identity, tx) => this.record({ op: "resetSessionStore", identity }, tx),
    resetSenderKeyStore: (tx) => this.record({ op: "resetSenderKeyStore" }, tx),
  }

  readonly payments: PaymentsState = {
    clearState: (tx) => this.record({ op: "clearPaymentsState" }, tx),
  }

  readonly addressCache: AddressCache = {
    updateMapping: (aci, phoneNumber, tx) => this.record({ op: "updateAddressMapping", aci, phoneNumber }, tx),
  }

  readonly recipients: RecipientStore = {
    markLocalRecipientRegistered: (aci, phoneNumber, tx) =>
      this.record({ op: "markLocalRecipientRegistered", aci, phoneNumber }, tx),
  }

  readonly deregistrationNotifier: DeregistrationNotifier = {
    notifyUserOfDeregistration: (tx) => this.record({ op: "notifyUserOfDeregistration" }, tx),
  }

  ops(): string[] {
    return this.calls.map((call) => call.op)
  }

  count(op: CollaboratorCall["op"]): number {
    return this.calls.filter((call) => call.op === op).length
  }

  reset(): void {
    this.calls.length = 0
  }

  private record(call: CollaboratorCall, tx: WriteTransaction): void {
    this.calls.push({ ...call, version: tx.version })
  }
}
