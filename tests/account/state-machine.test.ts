// tests/account/state-machine.test.ts — Registration transitions, cleanup and notifications

import { describe, it, expect, beforeEach } from "vitest"
import * as fc from "fast-check"
import { EMPTY_ACCOUNT_STATE } from "../../src/account/account-state.js"
import { AccountKeys, NO_PENDING_IDENTITY } from "../../src/account/types.js"
import type { RegistrationStateMachine } from "../../src/account/state-machine.js"
import {
  ACI_A,
  ACI_B,
  BASE_TIME_MS,
  NUMBER_A,
  NUMBER_B,
  PNI_A,
  PNI_B,
  type AccountHarness,
  createHarness,
  registerAccount,
} from "../helpers/account-harness.js"
import { InMemoryKeyValueDatabase } from "../../src/storage/memory-database.js"

const STORE_IDENTITY_OPS = [
  "updateAddressMapping",
  "removeSenderCertificates",
  "clearShouldSharePhoneNumberForEveryone",
  "clearProfileKeyCredentials",
  "clearTemporalCredentials",
  "markLocalRecipientRegistered",
]

describe("RegistrationStateMachine", () => {
  let h: AccountHarness
  let machine: RegistrationStateMachine
  let db: InMemoryKeyValueDatabase

  beforeEach(() => {
    db = new InMemoryKeyValueDatabase()
    h = createHarness({ database: db })
    machine = h.context.stateMachine
  })

  // =========================================================================
  // Verification → confirm
  // =========================================================================

  describe("verification and confirmation", () => {
    it("pending identity overrides reads until confirmed, then clears", async () => {
      await machine.beginVerification({ phoneNumber: NUMBER_A, aci: ACI_A, pni: PNI_A })

      expect(await machine.localIdentifiers()).toEqual({ phoneNumber: NUMBER_A, aci: ACI_A, pni: PNI_A })
      expect(await machine.isRegistered()).toBe(false)
      expect(await machine.registrationState()).toBe("unregistered")

      const state = await machine.markDidRegister()

      expect(state.localNumber).toBe(NUMBER_A)
      expect(state.localAci).toBe(ACI_A)
      expect(state.localPni).toBe(PNI_A)
      expect(await machine.registrationState()).toBe("registered")
      expect(await machine.localIdentifiers()).toEqual({ phoneNumber: NUMBER_A, aci: ACI_A, pni: PNI_A })
      expect(await h.context.cache.pendingIdentity()).toBe(NO_PENDING_IDENTITY)
    })

    it("runs identity cleanup inside the confirming transaction", async () => {
      await machine.beginVerification({ phoneNumber: NUMBER_A, aci: ACI_A })
      await machine.markDidRegister()

      expect(h.collaborators.ops()).toEqual(STORE_IDENTITY_OPS)
      expect(h.collaborators.calls.every((call) => call.version === 1)).toBe(true)
      expect(h.collaborators.calls[0]).toEqual({
        op: "updateAddressMapping",
        aci: ACI_A,
        phoneNumber: NUMBER_A,
        version: 1,
      })
    })

    it("publishes after commit", async () => {
      await machine.beginVerification({ phoneNumber: NUMBER_A, aci: ACI_A })
      await machine.markDidRegister()
      await h.context.events.idle()

      expect(h.received).toEqual([
        { type: "local_identifiers_may_have_changed" },
        { type: "registration_state_changed", state: "registered" },
        { type: "local_identifiers_may_have_changed" },
      ])
    })

    it("requires a pending phone number and ACI", async () => {
      await expect(machine.markDidRegister()).rejects.toMatchObject({ code: "MISSING_PHONE_NUMBER" })

      await machine.beginVerification({ phoneNumber: NUMBER_A })
      await expect(machine.markDidRegister()).rejects.toMatchObject({ code: "MISSING_ACI" })
      expect(db.version).toBe(0)
    })

    it("rejects storing an identity without an ACI and leaves the store untouched", async () => {
      await expect(machine.writeTransaction("test", (tx) =>
        machine.storeLocalIdentity({ phoneNumber: NUMBER_A, aci: undefined }, tx),
      )).rejects.toMatchObject({ code: "MISSING_ACI" })
      expect(db.version).toBe(0)
      expect(h.collaborators.calls).toEqual([])
    })

    it("drops deregistration and reregistration markers", async () => {
      await registerAccount(h)
      expect(await machine.setIsDeregistered(true)).toBe(true)

      await machine.writeTransaction("test", (tx) =>
        machine.storeLocalIdentity({ phoneNumber: NUMBER_A, aci: ACI_A }, tx),
      )

      const state = await machine.currentState()
      expect(state.isDeregistered).toBe(false)
      expect(state.reregistrationPhoneNumber).toBeUndefined()
      expect(await machine.registrationState()).toBe("registered")
    })

    it("logs number changes redacted", async () => {
      await registerAccount(h)
      const line = h.logs.entries.find((entry) => entry.event === "local_number_changed")
      expect(line).toMatchObject({ to: "**********11", component: "registration", level: "info" })
      expect(line).not.toHaveProperty("from")
    })
  })

  // =========================================================================
  // Idempotence
  // =========================================================================

  describe("storeLocalIdentity idempotence", () => {
    it("storing the same identity twice yields the same state", async () => {
      await registerAccount(h)
      const first = await machine.currentState()

      await machine.writeTransaction("test", (tx) =>
        machine.storeLocalIdentity({ phoneNumber: NUMBER_A, aci: ACI_A, pni: PNI_A }, tx),
      )
      const second = await machine.currentState()

      expect(second).toEqual(first)
      expect(second.registrationDate).toEqual(new Date(BASE_TIME_MS))
    })

    it("a new number refreshes the registration date", async () => {
      await registerAccount(h)
      await machine.writeTransaction("test", (tx) =>
        machine.updateLocalPhoneNumber({ phoneNumber: NUMBER_B, aci: ACI_A, pni: PNI_B }, tx),
      )
      const state = await machine.currentState()
      expect(state.localNumber).toBe(NUMBER_B)
      expect(state.localPni).toBe(PNI_B)
      expect(state.registrationDate).toEqual(new Date(BASE_TIME_MS + 1000))
    })
  })

  // =========================================================================
  // Number change / legacy ACI
  // =========================================================================

  describe("updateLocalPhoneNumber", () => {
    it("refuses to change the ACI", async () => {
      await registerAccount(h)
      h.collaborators.reset()

      await expect(machine.writeTransaction("test", (tx) =>
        machine.updateLocalPhoneNumber({ phoneNumber: NUMBER_B, aci: ACI_B }, tx),
      )).rejects.toMatchObject({ code: "ACI_MISMATCH" })

      expect(await machine.localNumber()).toBe(NUMBER_A)
      expect(h.collaborators.calls).toEqual([])
    })
  })

  describe("recordAciForLegacyUser", () => {
    it("backfills a missing ACI once", async () => {
      await machine.writeTransaction("test", (tx) => {
        h.context.store.setString(AccountKeys.localNumber, NUMBER_A, tx)
      })

      const state = await machine.recordAciForLegacyUser(ACI_A)
      expect(state.localAci).toBe(ACI_A)
      await expect(machine.recordAciForLegacyUser(ACI_B)).rejects.toMatchObject({ code: "ACI_ALREADY_SET" })
      expect(await machine.localAci()).toBe(ACI_A)
    })
  })

  // =========================================================================
  // Deregistration
  // =========================================================================

  describe("setIsDeregistered", () => {
    it("is a no-op on an unregistered account", async () => {
      expect(await machine.setIsDeregistered(true)).toBe(false)

      expect(db.version).toBe(0)
      expect(await machine.currentState()).toEqual(EMPTY_ACCOUNT_STATE)
      expect(h.collaborators.count("notifyUserOfDeregistration")).toBe(0)
      expect(h.logs.entries.find((e) => e.event === "deregistration_ignored")).toMatchObject({
        level: "info",
        reason: "not_registered_and_ready",
        registration_state: "unregistered",
      })
    })

    it("is a no-op whenever the account is not registered and ready", async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.record({
            hasNumber: fc.boolean(),
            isDeregistered: fc.boolean(),
            isTransferInProgress: fc.boolean(),
            wasTransferred: fc.boolean(),
          }).filter((f) => !f.hasNumber || f.isDeregistered || f.isTransferInProgress || f.wasTransferred),
          async (flags) => {
            const fresh = createHarness()
            const m = fresh.context.stateMachine
            const s = fresh.context.store
            await m.writeTransaction("seed", (tx) => {
              if (flags.hasNumber) s.setString(AccountKeys.localNumber, NUMBER_A, tx)
              s.setBool(AccountKeys.isDeregistered, flags.isDeregistered, tx)
              s.setBool(AccountKeys.isTransferInProgress, flags.isTransferInProgress, tx)
              s.setBool(AccountKeys.wasTransferred, flags.wasTransferred, tx)
            })
            const before = await m.currentState()

            expect(await m.setIsDeregistered(true)).toBe(false)
            expect(await m.currentState()).toBe(before)
            expect(fresh.collaborators.count("notifyUserOfDeregistration")).toBe(0)
          },
        ),
        { numRuns: 25 },
      )
    })

    it("deregisters a ready account once and notifies the user inside the write", async () => {
      await registerAccount(h)
      h.collaborators.reset()

      expect(await machine.setIsDeregistered(true)).toBe(true)
      expect(await machine.registrationState()).toBe("deregistered")
      expect(h.collaborators.calls).toEqual([{ op: "notifyUserOfDeregistration", version: 2 }])

      expect(await machine.setIsDeregistered(true)).toBe(false)
      expect(h.collaborators.count("notifyUserOfDeregistration")).toBe(1)

      expect(await machine.setIsDeregistered(false)).toBe(true)
      expect(await machine.registrationState()).toBe("registered")
      expect(h.collaborators.count("notifyUserOfDeregistration")).toBe(1)
    })

    it("announces the new registration state", async () => {
      await registerAccount(h)
      await h.context.events.idle()
      h.received.length = 0

      await machine.setIsDeregistered(true)
      await h.context.events.idle()
      expect(h.received).toEqual([{ type: "registration_state_changed", state: "deregistered" }])
    })

    it("does not deregister an account another writer wiped after the cached check", async () => {
      await registerAccount(h)
      h.collaborators.reset()
      const peer = db.attachPeer()
      await peer.write((tx) => h.context.store.removeAll(tx))

      // The cache still holds the registered snapshot
      expect(await machine.isRegisteredAndReady()).toBe(true)
      expect(await machine.setIsDeregistered(true)).toBe(false)

      expect(db.version).toBe(2)
      expect(await db.read((tx) => h.context.store.getOptionalBool(AccountKeys.isDeregistered, tx)))
        .toBeUndefined()
      expect(h.collaborators.count("notifyUserOfDeregistration")).toBe(0)
      expect(h.logs.entries.find((e) => e.event === "deregistration_ignored")).toMatchObject({
        level: "info",
        reason: "not_registered_and_ready",
        registration_state: "unregistered",
      })
    })
  })

  // =========================================================================
  // Reregistration
  // =========================================================================

  describe("resetForReregistration", () => {
    it("refuses without a local number and changes nothing", async () => {
      await machine.beginVerification({ phoneNumber: NUMBER_B, aci: ACI_B })
      const before = await machine.currentState()

      expect(await machine.resetForReregistration()).toEqual({ ok: false, reason: "missing_local_number" })

      expect(await machine.currentState()).toBe(before)
      expect(await h.context.cache.pendingIdentity()).toEqual({ phoneNumber: NUMBER_B, aci: ACI_B, pni: undefined })
      expect(db.version).toBe(0)
      expect(h.collaborators.calls).toEqual([])
    })

    it("refuses without a local ACI and changes nothing", async () => {
      await machine.writeTransaction("seed", (tx) => {
        h.context.store.setString(AccountKeys.localNumber, NUMBER_A, tx)
      })

      expect(await machine.resetForReregistration()).toEqual({ ok: false, reason: "missing_local_aci" })
      expect(db.version).toBe(1)
      expect(await machine.localNumber()).toBe(NUMBER_A)
    })

    it("keeps the identity for reregistration and wipes the rest on a primary device", async () => {
      await registerAccount(h)
      await machine.writeTransaction("onboard", (tx) => machine.setIsOnboarded(true, tx))
      await machine.beginVerification({ phoneNumber: NUMBER_B })
      await h.context.events.idle()
      h.collaborators.reset()
      h.received.length = 0

      expect(await machine.resetForReregistration()).toEqual({ ok: true, wasPrimaryDevice: true })

      const state = await machine.currentState()
      expect(state).toEqual({
        ...EMPTY_ACCOUNT_STATE,
        isOnboarded: false,
        reregistrationPhoneNumber: NUMBER_A,
        reregistrationAci: ACI_A,
      })
      expect(await machine.isReregistering()).toBe(true)
      expect(await machine.reregistrationIdentity()).toEqual({ phoneNumber: NUMBER_A, aci: ACI_A })
      expect(await h.context.cache.pendingIdentity()).toBe(NO_PENDING_IDENTITY)

      expect(h.collaborators.calls).toEqual([
        { op: "resetSessionStore", identity: "aci", version: 3 },
        { op: "resetSessionStore", identity: "pni", version: 3 },
        { op: "resetSenderKeyStore", version: 3 },
        { op: "removeSenderCertificates", version: 3 },
        { op: "clearProfileKeyCredentials", version: 3 },
        { op: "clearTemporalCredentials", version: 3 },
      ])

      await h.context.events.idle()
      expect(h.received).toEqual([
        { type: "registration_state_changed", state: "unregistered" },
        { type: "onboarding_state_changed", isOnboarded: false },
      ])
    })

    it("clears payments state on a linked device", async () => {
      await registerAccount(h, { deviceId: 2 })
      h.collaborators.reset()

      expect(await machine.resetForReregistration()).toEqual({ ok: true, wasPrimaryDevice: false })
      expect(h.collaborators.count("clearPaymentsState")).toBe(1)
      expect(h.collaborators.ops().at(-1)).toBe("clearPaymentsState")
    })

    it("re-registering the retained identity leaves the reregistering state", async () => {
      await registerAccount(h)
      await machine.resetForReregistration()

      await machine.beginVerification({ phoneNumber: NUMBER_A, aci: ACI_A })
      await machine.markDidRegister()

      expect(await machine.registrationState()).toBe("registered")
      expect(await machine.reregistrationIdentity()).toBeNull()
    })
  })

  // =========================================================================
  // Transfer, onboarding, settings
  // =========================================================================

  describe("transfer", () => {
    it("in-progress transfer reads as deregistered and unchanged values are skipped", async () => {
      await registerAccount(h)
      const version = db.version

      expect(await machine.setIsTransferInProgress(false)).toBe(false)
      expect(db.version).toBe(version)

      expect(await machine.setIsTransferInProgress(true)).toBe(true)
      expect(await machine.isDeregistered()).toBe(true)
      expect(await machine.registrationState()).toBe("deregistered")

      await machine.setIsTransferInProgress(false)
      await machine.setWasTransferred(true)
      expect(await machine.wasTransferred()).toBe(true)
      expect(await machine.isRegisteredAndReady()).toBe(false)
    })
  })

  describe("onboarding", () => {
    it("publishes the onboarding flag after commit", async () => {
      await machine.writeTransaction("onboard", (tx) => machine.setIsOnboarded(true, tx))
      expect(await machine.isOnboarded()).toBe(true)

      await h.context.events.idle()
      expect(h.received).toEqual([{ type: "onboarding_state_changed", isOnboarded: true }])
    })
  })

  describe("device and settings", () => {
    it("didRegisterPrimary stores the identity, auth token and primary device id", async () => {
      await machine.writeTransaction("primary", (tx) =>
        machine.didRegisterPrimary({ e164: NUMBER_A, aci: ACI_A, pni: PNI_A, authToken: "test-auth-token" }, tx),
      )
      const state = await machine.currentState()
      expect(state.serverAuthToken).toBe("test-auth-token")
      expect(state.deviceId).toBe(1)
      expect(await machine.isPrimaryDevice()).toBe(true)

      await h.context.events.idle()
      expect(h.received).toEqual([
        { type: "registration_state_changed", state: "registered" },
        { type: "local_identifiers_may_have_changed" },
      ])
    })

    it("stores device name, manual fetch and discoverability", async () => {
      await machine.writeTransaction("settings", async (tx) => {
        await machine.setStoredDeviceName("test-device", tx)
        await machine.setManualMessageFetchEnabled(true, tx)
        await machine.setIsDiscoverableByPhoneNumber(false, tx)
      })
      const state = await machine.currentState()
      expect(state.deviceName).toBe("test-device")
      expect(await machine.isManualMessageFetchEnabled()).toBe(true)
      expect(state.isDiscoverableByPhoneNumber).toBe(false)
      expect(state.lastSetIsDiscoverableByPhoneNumber).toEqual(new Date(BASE_TIME_MS))
    })

    it("localAddress is null until an identifier is known", async () => {
      expect(await machine.localAddress()).toBeNull()
      await registerAccount(h)
      expect(await machine.localAddress()).toEqual({ aci: ACI_A, phoneNumber: NUMBER_A })
    })
  })

  // =========================================================================
  // Concurrency
  // =========================================================================

  describe("concurrent readers", () => {
    it("never observe a number from one identity with the ACI of another", async () => {
      await registerAccount(h)
      const valid = new Set([`${NUMBER_A}|${ACI_A}`, `${NUMBER_B}|${ACI_B}`])
      const observed: string[] = []

      const writer = (async () => {
        for (let i = 0; i < 20; i++) {
          const [phoneNumber, aci] = i % 2 === 0 ? [NUMBER_B, ACI_B] : [NUMBER_A, ACI_A]
          await machine.writeTransaction("flip", (tx) => machine.storeLocalIdentity({ phoneNumber, aci }, tx))
        }
      })()

      const readers = Array.from({ length: 4 }, async () => {
        for (let i = 0; i < 50; i++) {
          const ids = await machine.localIdentifiers()
          observed.push(`${ids.phoneNumber}|${ids.aci}`)
          const state = await machine.currentState()
          observed.push(`${state.localNumber}|${state.localAci}`)
        }
      })

      await Promise.all([writer, ...readers])
      expect(observed).toHaveLength(400)
      expect(observed.filter((pair) => !valid.has(pair))).toEqual([])
    })
  })
})
