// src/account/state-machine.ts — Registration state machine
//
// Transition model:
//   1. Mutate account keys + clean up dependent subsystems (one write transaction)
//   2. Refresh the cache inside that transaction
//   3. Publish events after commit (never inside the transaction)
//
// Operations that take a WriteTransaction join the caller's transaction;
// the others open their own.

import type { KeyValueDatabase, ReadTransaction, WriteTransaction } from "../storage/kv-database.js"
import type { KeyValueStore } from "../storage/kv-store.js"
import {
  deriveRegistrationState,
  isLogicallyDeregistered,
  isPrimaryDevice,
  isRegistered,
  isRegisteredAndReady,
  isReregistering,
  loadAccountState,
} from "./account-state.js"
import type { AccountCollaborators } from "./collaborators.js"
import { AccountStateError } from "./errors.js"
import type { AccountEventBus } from "./events.js"
import { type E164, type ServiceId, redactPhoneNumber } from "./identifiers.js"
import type { AccountLogger } from "./logger.js"
import type { AccountStateCache } from "./state-cache.js"
import {
  type AccountState,
  type LocalAddress,
  type LocalIdentifiers,
  type LocalIdentityInput,
  type RegistrationState,
  type ReregistrationResult,
  AccountKeys,
  PRIMARY_DEVICE_ID,
} from "./types.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RegistrationStateMachineDeps {
  database: KeyValueDatabase
  store: KeyValueStore
  cache: AccountStateCache
  events: AccountEventBus
  collaborators: AccountCollaborators
  logger: AccountLogger
  now?: () => Date
}

export interface VerificationAttempt {
  phoneNumber: E164
  aci?: ServiceId
  pni?: ServiceId
}

export interface PrimaryRegistration {
  e164: E164
  aci: ServiceId
  pni?: ServiceId
  authToken: string
}

type Notification = "registration" | "onboarding" | "identifiers"

interface ScheduledNotifications {
  kinds: Set<Notification>
  state: AccountState
}

// ---------------------------------------------------------------------------
// State Machine
// ---------------------------------------------------------------------------

export class RegistrationStateMachine {
  private readonly database: KeyValueDatabase
  private readonly store: KeyValueStore
  private readonly cache: AccountStateCache
  private readonly events: AccountEventBus
  private readonly collaborators: AccountCollaborators
  private readonly logger: AccountLogger
  private readonly now: () => Date
  private readonly scheduled = new WeakMap<WriteTransaction, ScheduledNotifications>()

  constructor(deps: RegistrationStateMachineDeps) {
    this.database = deps.database
    this.store = deps.store
    this.cache = deps.cache
    this.events = deps.events
    this.collaborators = deps.collaborators
    this.logger = deps.logger
    this.now = deps.now ?? (() => new Date())
  }

  // === QUERIES ===

  async currentState(tx?: ReadTransaction): Promise<AccountState> {
    return this.cache.getOrLoad(tx)
  }

  async registrationState(tx?: ReadTransaction): Promise<RegistrationState> {
    return deriveRegistrationState(await this.cache.getOrLoad(tx))
  }

  async isRegistered(tx?: ReadTransaction): Promise<boolean> {
    return isRegistered(await this.cache.getOrLoad(tx))
  }

  async isRegisteredAndReady(tx?: ReadTransaction): Promise<boolean> {
    return isRegisteredAndReady(await this.cache.getOrLoad(tx))
  }

  /** True while deregistered, transferring, or transferred away. */
  async isDeregistered(tx?: ReadTransaction): Promise<boolean> {
    return isLogicallyDeregistered(await this.cache.getOrLoad(tx))
  }

  async isReregistering(tx?: ReadTransaction): Promise<boolean> {
    return isReregistering(await this.cache.getOrLoad(tx))
  }

  async isOnboarded(tx?: ReadTransaction): Promise<boolean> {
    return (await this.cache.getOrLoad(tx)).isOnboarded
  }

  async isTransferInProgress(tx?: ReadTransaction): Promise<boolean> {
    return (await this.cache.getOrLoad(tx)).isTransferInProgress
  }

  async wasTransferred(tx?: ReadTransaction): Promise<boolean> {
    return (await this.cache.getOrLoad(tx)).wasTransferred
  }

  async isPrimaryDevice(tx?: ReadTransaction): Promise<boolean> {
    return isPrimaryDevice(await this.cache.getOrLoad(tx))
  }

  async isManualMessageFetchEnabled(tx?: ReadTransaction): Promise<boolean> {
    return (await this.cache.getOrLoad(tx)).manualMessageFetchEnabled
  }

  /** Pending verification values take precedence over confirmed ones. */
  async localIdentifiers(tx?: ReadTransaction): Promise<LocalIdentifiers> {
    return this.cache.localIdentifiers(tx)
  }

  async localNumber(tx?: ReadTransaction): Promise<E164 | undefined> {
    return (await this.cache.localIdentifiers(tx)).phoneNumber
  }

  async localAci(tx?: ReadTransaction): Promise<ServiceId | undefined> {
    return (await this.cache.localIdentifiers(tx)).aci
  }

  async localPni(tx?: ReadTransaction): Promise<ServiceId | undefined> {
    return (await this.cache.localIdentifiers(tx)).pni
  }

  /** Null when neither an ACI nor a phone number is known. */
  async localAddress(tx?: ReadTransaction): Promise<LocalAddress | null> {
    const { aci, phoneNumber } = await this.cache.localIdentifiers(tx)
    if (aci === undefined && phoneNumber === undefined) return null
    return { aci, phoneNumber }
  }

  /** Identity retained by resetForReregistration, or null when not reregistering. */
  async reregistrationIdentity(tx?: ReadTransaction): Promise<{ phoneNumber: E164; aci: ServiceId | undefined } | null> {
    const state = await this.cache.getOrLoad(tx)
    if (state.reregistrationPhoneNumber === undefined) return null
    return { phoneNumber: state.reregistrationPhoneNumber, aci: state.reregistrationAci }
  }

  // === TRANSACTIONS ===

  /** Open a write transaction for operations that join a caller's transaction. */
  async writeTransaction<T>(operation: string, fn: (tx: WriteTransaction) => T | Promise<T>): Promise<T> {
    this.cache.assertUnlocked(operation)
    try {
      return await this.database.write(fn)
    } catch (err) {
      this.logger.error("account_write_failed", err, { operation })
      throw err
    }
  }

  // === VERIFICATION ===

  /**
   * Record the identity being verified. In memory only; overrides the
   * confirmed identifiers until storeLocalIdentity or a reset clears it.
   */
  async beginVerification(attempt: VerificationAttempt): Promise<void> {
    await this.cache.setPendingIdentity({
      phoneNumber: attempt.phoneNumber,
      aci: attempt.aci,
      pni: attempt.pni,
    })
    this.logger.info("verification_started", {
      phone_number: redactPhoneNumber(attempt.phoneNumber),
      aci: attempt.aci,
      pni: attempt.pni,
    })
    this.events.publish({ type: "local_identifiers_may_have_changed" })
  }

  /**
   * Confirm the local identity. Writes number/ACI/PNI, drops deregistration
   * and reregistration markers, discards credentials bound to the old
   * identity, then clears the pending identity.
   */
  async storeLocalIdentity(input: LocalIdentityInput, tx: WriteTransaction): Promise<AccountState> {
    const { phoneNumber, aci, pni } = input
    if (aci === undefined) {
      throw new AccountStateError("MISSING_ACI", "cannot store a local identity without an ACI", {
        phone_number: redactPhoneNumber(phoneNumber),
      })
    }

    const previousNumber = this.store.getString(AccountKeys.localNumber, tx)
    const previousAci = this.store.getString(AccountKeys.localAci, tx)?.toLowerCase()
    const identityChanged = previousNumber !== phoneNumber || previousAci !== aci
    if (previousNumber !== phoneNumber) {
      this.logger.info("local_number_changed", {
        from: redactPhoneNumber(previousNumber),
        to: redactPhoneNumber(phoneNumber),
      })
    }
    if (previousAci !== aci) {
      this.logger.info("local_aci_changed", { from: previousAci, to: aci })
    }

    this.store.setString(AccountKeys.localNumber, phoneNumber, tx)
    if (identityChanged || !this.store.hasValue(AccountKeys.registrationDate, tx)) {
      this.store.setDate(AccountKeys.registrationDate, this.now(), tx)
    }
    this.store.setString(AccountKeys.localAci, aci, tx)

    if (pni !== undefined) {
      const previousPni = this.store.getString(AccountKeys.localPni, tx)?.toLowerCase()
      if (previousPni !== pni) {
        this.logger.info("local_pni_changed", { from: previousPni, to: pni })
      }
      this.store.setString(AccountKeys.localPni, pni, tx)
    }

    const c = this.collaborators
    c.addressCache.updateMapping(aci, phoneNumber, tx)

    this.store.removeValue(AccountKeys.isDeregistered, tx)
    this.store.removeValue(AccountKeys.reregistrationPhoneNumber, tx)
    this.store.removeValue(AccountKeys.reregistrationAci, tx)

    // Certificates and credentials are bound to the old number/identity
    c.senderCertificates.removeSenderCertificates(tx)
    c.phoneNumberSharing.clearShouldSharePhoneNumberForEveryone(tx)
    c.profileCredentials.clearProfileKeyCredentials(tx)
    c.groupCredentials.clearTemporalCredentials(tx)

    c.recipients.markLocalRecipientRegistered(aci, phoneNumber, tx)

    const state = await this.cache.invalidateAndClearPending(tx)
    this.notifyAfterCommit(tx, ["registration", "identifiers"], state)
    return state
  }

  /** Confirm the identity recorded by beginVerification in a new transaction. */
  async markDidRegister(): Promise<AccountState> {
    const pending = await this.cache.pendingIdentity()
    const { phoneNumber, aci, pni } = pending
    if (phoneNumber === undefined) {
      throw new AccountStateError("MISSING_PHONE_NUMBER", "no phone number awaiting verification")
    }
    if (aci === undefined) {
      throw new AccountStateError("MISSING_ACI", "no ACI awaiting verification", {
        phone_number: redactPhoneNumber(phoneNumber),
      })
    }
    this.logger.info("did_register", { aci })
    return this.writeTransaction("mark_did_register", (tx) =>
      this.storeLocalIdentity({ phoneNumber, aci, pni }, tx),
    )
  }

  /** Primary-device registration: identity, auth token and device id 1. */
  async didRegisterPrimary(registration: PrimaryRegistration, tx: WriteTransaction): Promise<AccountState> {
    await this.storeLocalIdentity({
      phoneNumber: registration.e164,
      aci: registration.aci,
      pni: registration.pni,
    }, tx)
    return this.setStoredServerAuthToken(registration.authToken, PRIMARY_DEVICE_ID, tx)
  }

  /** Change-number confirmation. The ACI must not change. */
  async updateLocalPhoneNumber(input: LocalIdentityInput, tx: WriteTransaction): Promise<AccountState> {
    const current = loadAccountState(this.store, tx)
    if (current.localAci !== undefined && input.aci !== current.localAci) {
      throw new AccountStateError("ACI_MISMATCH", "a number change cannot change the ACI", {
        current_aci: current.localAci,
        new_aci: input.aci,
      })
    }
    return this.storeLocalIdentity(input, tx)
  }

  /** Backfill the ACI of an account registered before ACIs were stored. */
  async recordAciForLegacyUser(aci: ServiceId): Promise<AccountState> {
    const current = await this.cache.getOrLoad()
    if (current.localAci !== undefined) {
      throw new AccountStateError("ACI_ALREADY_SET", "local ACI is already recorded", { aci: current.localAci })
    }
    return this.writeTransaction("record_aci_for_legacy_user", async (tx) => {
      this.store.setString(AccountKeys.localAci, aci, tx)
      const state = await this.cache.invalidate(tx)
      this.notifyAfterCommit(tx, ["identifiers"], state)
      return state
    })
  }

  // === ONBOARDING ===

  async setIsOnboarded(value: boolean, tx: WriteTransaction): Promise<AccountState> {
    this.store.setBool(AccountKeys.isOnboarded, value, tx)
    const state = await this.cache.invalidate(tx)
    this.notifyAfterCommit(tx, ["onboarding"], state)
    return state
  }

  // === DEREGISTRATION ===

  /**
   * Set the server-driven deregistration flag. Returns false when nothing
   * changed: setting true while not registered-and-ready, or an unchanged value.
   */
  async setIsDeregistered(value: boolean): Promise<boolean> {
    const state = await this.cache.getOrLoad()
    if (value && !isRegisteredAndReady(state)) {
      this.logger.info("deregistration_ignored", {
        reason: "not_registered_and_ready",
        registration_state: deriveRegistrationState(state),
      })
      return false
    }
    if (state.isDeregistered === value) {
      this.logger.info("deregistration_unchanged", { is_deregistered: value })
      return false
    }

    this.logger.warn("is_deregistered_updated", { is_deregistered: value })

    return this.writeTransaction("set_is_deregistered", async (tx) => {
      // Re-check: another writer may have committed since the unlocked read
      const current = loadAccountState(this.store, tx)
      if (value && !isRegisteredAndReady(current)) {
        this.logger.info("deregistration_ignored", {
          reason: "not_registered_and_ready",
          registration_state: deriveRegistrationState(current),
        })
        return false
      }
      if (current.isDeregistered === value) return false

      this.store.setBool(AccountKeys.isDeregistered, value, tx)
      const next = await this.cache.invalidate(tx)
      if (value) {
        this.collaborators.deregistrationNotifier.notifyUserOfDeregistration(tx)
      }
      this.notifyAfterCommit(tx, ["registration"], next)
      return true
    })
  }

  // === REREGISTRATION ===

  /**
   * Wipe account state while keeping the confirmed number and ACI in the
   * reregistration slots. Payments state survives on the primary device only.
   */
  async resetForReregistration(): Promise<ReregistrationResult> {
    const previous = await this.cache.getOrLoad()
    const localNumber = previous.localNumber
    if (localNumber === undefined) {
      this.logger.warn("reregistration_rejected", { reason: "missing_local_number" })
      return { ok: false, reason: "missing_local_number" }
    }
    const localAci = previous.localAci
    if (localAci === undefined) {
      this.logger.warn("reregistration_rejected", { reason: "missing_local_aci" })
      return { ok: false, reason: "missing_local_aci" }
    }
    const wasPrimaryDevice = isPrimaryDevice(previous)

    await this.writeTransaction("reset_for_reregistration", async (tx) => {
      this.store.removeAll(tx)

      const c = this.collaborators
      c.sessions.resetSessionStore("aci", tx)
      c.sessions.resetSessionStore("pni", tx)
      c.sessions.resetSenderKeyStore(tx)
      c.senderCertificates.removeSenderCertificates(tx)
      c.profileCredentials.clearProfileKeyCredentials(tx)
      c.groupCredentials.clearTemporalCredentials(tx)

      this.store.setString(AccountKeys.reregistrationPhoneNumber, localNumber, tx)
      this.store.setString(AccountKeys.reregistrationAci, localAci, tx)
      this.store.setBool(AccountKeys.isOnboarded, false, tx)

      if (!wasPrimaryDevice) {
        c.payments.clearState(tx)
      }

      const state = await this.cache.invalidateAndClearPending(tx)
      this.notifyAfterCommit(tx, ["registration", "onboarding"], state)
    })

    this.logger.info("reset_for_reregistration", { aci: localAci, was_primary_device: wasPrimaryDevice })
    return { ok: true, wasPrimaryDevice }
  }

  // === TRANSFER ===

  /** Returns false when the value is unchanged. */
  async setIsTransferInProgress(value: boolean): Promise<boolean> {
    if ((await this.cache.getOrLoad()).isTransferInProgress === value) return false

    await this.writeTransaction("set_is_transfer_in_progress", async (tx) => {
      this.store.setBool(AccountKeys.isTransferInProgress, value, tx)
      const state = await this.cache.invalidate(tx)
      this.notifyAfterCommit(tx, ["registration"], state)
    })
    return true
  }

  async setWasTransferred(value: boolean): Promise<void> {
    await this.writeTransaction("set_was_transferred", async (tx) => {
      this.store.setBool(AccountKeys.wasTransferred, value, tx)
      const state = await this.cache.invalidate(tx)
      this.notifyAfterCommit(tx, ["registration"], state)
    })
  }

  // === DEVICE & SETTINGS ===

  async setManualMessageFetchEnabled(value: boolean, tx: WriteTransaction): Promise<AccountState> {
    this.store.setBool(AccountKeys.manualMessageFetchEnabled, value, tx)
    return this.cache.invalidate(tx)
  }

  async setStoredServerAuthToken(authToken: string, deviceId: number, tx: WriteTransaction): Promise<AccountState> {
    this.store.setString(AccountKeys.serverAuthToken, authToken, tx)
    this.store.setUInt32(AccountKeys.deviceId, deviceId, tx)
    return this.cache.invalidate(tx)
  }

  async setStoredDeviceName(deviceName: string, tx: WriteTransaction): Promise<AccountState> {
    this.store.setString(AccountKeys.deviceName, deviceName, tx)
    return this.cache.invalidate(tx)
  }

  async setIsDiscoverableByPhoneNumber(value: boolean, tx: WriteTransaction): Promise<AccountState> {
    this.store.setBool(AccountKeys.isDiscoverableByPhoneNumber, value, tx)
    this.store.setDate(AccountKeys.lastSetIsDiscoverableByPhoneNumber, this.now(), tx)
    return this.cache.invalidate(tx)
  }

  // === NOTIFICATIONS ===

  /**
   * Queue events for after tx commits. Several operations sharing one
   * transaction produce each event once, carrying the last state.
   */
  private notifyAfterCommit(tx: WriteTransaction, kinds: Notification[], state: AccountState): void {
    let scheduled = this.scheduled.get(tx)
    if (!scheduled) {
      const fresh: ScheduledNotifications = { kinds: new Set(), state }
      this.scheduled.set(tx, fresh)
      tx.addCompletion(() => this.dispatch(fresh))
      scheduled = fresh
    }
    for (const kind of kinds) scheduled.kinds.add(kind)
    scheduled.state = state
  }

  private dispatch(scheduled: ScheduledNotifications): void {
    const { kinds, state } = scheduled
    if (kinds.has("registration")) {
      this.events.publish({ type: "registration_state_changed", state: deriveRegistrationState(state) })
    }
    if (kinds.has("onboarding")) {
      this.events.publish({ type: "onboarding_state_changed", isOnboarded: state.isOnboarded })
    }
    if (kinds.has("identifiers")) {
      this.events.publish({ type: "local_identifiers_may_have_changed" })
    }
  }
}
