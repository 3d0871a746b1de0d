// src/account/events.ts — Typed account event bus
//
// Dispatch is always deferred to a later macrotask so a publisher holding a
// transaction or the cache lock never runs listener code. A listener that
// throws is logged; other listeners still run.

import type { AccountLogger } from "./logger.js"
import type { RegistrationState } from "./types.js"

export type AccountEvent =
  | { type: "registration_state_changed"; state: RegistrationState }
  | { type: "onboarding_state_changed"; isOnboarded: boolean }
  | { type: "local_identifiers_may_have_changed" }

export type AccountEventType = AccountEvent["type"]
export type AccountEventOf<K extends AccountEventType> = Extract<AccountEvent, { type: K }>
export type AccountEventListener = (event: AccountEvent) => void

export class AccountEventBus {
  private readonly listeners = new Set<AccountEventListener>()
  private inFlight = 0
  private readonly idleWaiters: Array<() => void> = []

  constructor(private readonly logger: AccountLogger) {}

  publish(event: AccountEvent): void {
    this.inFlight++
    setImmediate(() => {
      try {
        for (const listener of [...this.listeners]) {
          this.deliver(listener, event)
        }
      } finally {
        this.inFlight--
        if (this.inFlight === 0) this.releaseIdleWaiters()
      }
    })
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: AccountEventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Resolve with the next event of the given type. */
  next<K extends AccountEventType>(type: K): Promise<AccountEventOf<K>> {
    return new Promise((resolve) => {
      const unsubscribe = this.subscribe((event) => {
        if (isEventOf(event, type)) {
          unsubscribe()
          resolve(event)
        }
      })
    })
  }

  /** Resolve once every published event has been delivered. */
  async idle(): Promise<void> {
    // Completions scheduled by a just-committed transaction run on the next macrotask
    await new Promise<void>((resolve) => setImmediate(resolve))
    if (this.inFlight === 0) return
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve))
  }

  listenerCount(): number {
    return this.listeners.size
  }

  private deliver(listener: AccountEventListener, event: AccountEvent): void {
    try {
      listener(event)
    } catch (err) {
      this.logger.error("event_listener_failed", err, { event_type: event.type })
    }
  }

  private releaseIdleWaiters(): void {
    for (const resolve of this.idleWaiters.splice(0)) resolve()
  }
}

export function isEventOf<K extends AccountEventType>(event: AccountEvent, type: K): event is AccountEventOf<K> {
  return event.type === type
}
