// tests/account/events.test.ts — Asynchronous typed dispatch and structured logging

import { describe, it, expect, vi } from "vitest"
import { AccountEventBus, type AccountEvent } from "../../src/account/events.js"
import { createAccountLogger } from "../../src/account/logger.js"
import { BASE_TIME_MS, captureLogger } from "../helpers/account-harness.js"

describe("AccountEventBus", () => {
  it("never delivers synchronously", async () => {
    const { logger } = captureLogger()
    const bus = new AccountEventBus(logger)
    const listener = vi.fn()
    bus.subscribe(listener)

    bus.publish({ type: "onboarding_state_changed", isOnboarded: true })
    expect(listener).not.toHaveBeenCalled()

    await bus.idle()
    expect(listener).toHaveBeenCalledWith({ type: "onboarding_state_changed", isOnboarded: true })
  })

  it("delivers in publish order", async () => {
    const { logger } = captureLogger()
    const bus = new AccountEventBus(logger)
    const received: AccountEvent[] = []
    bus.subscribe((event) => received.push(event))

    bus.publish({ type: "registration_state_changed", state: "registered" })
    bus.publish({ type: "local_identifiers_may_have_changed" })
    await bus.idle()

    expect(received).toEqual([
      { type: "registration_state_changed", state: "registered" },
      { type: "local_identifiers_may_have_changed" },
    ])
  })

  it("logs a throwing listener and keeps delivering to the others", async () => {
    const { logger, logs } = captureLogger()
    const bus = new AccountEventBus(logger)
    const healthy = vi.fn()
    bus.subscribe(() => {
      throw new Error("listener failed")
    })
    bus.subscribe(healthy)

    bus.publish({ type: "local_identifiers_may_have_changed" })
    await bus.idle()

    expect(healthy).toHaveBeenCalledTimes(1)
    expect(logs.entries).toEqual([
      {
        timestamp: new Date(BASE_TIME_MS).toISOString(),
        level: "error",
        component: "account",
        event: "event_listener_failed",
        event_type: "local_identifiers_may_have_changed",
        error: "listener failed",
        error_name: "Error",
      },
    ])
  })

  it("next() resolves with the first matching event and unsubscribes", async () => {
    const { logger } = captureLogger()
    const bus = new AccountEventBus(logger)
    const next = bus.next("registration_state_changed")
    expect(bus.listenerCount()).toBe(1)

    bus.publish({ type: "local_identifiers_may_have_changed" })
    bus.publish({ type: "registration_state_changed", state: "deregistered" })

    expect(await next).toEqual({ type: "registration_state_changed", state: "deregistered" })
    expect(bus.listenerCount()).toBe(0)
  })

  it("unsubscribe stops delivery", async () => {
    const { logger } = captureLogger()
    const bus = new AccountEventBus(logger)
    const listener = vi.fn()
    const unsubscribe = bus.subscribe(listener)
    unsubscribe()

    bus.publish({ type: "local_identifiers_may_have_changed" })
    await bus.idle()
    expect(listener).not.toHaveBeenCalled()
  })
})

describe("createAccountLogger", () => {
  it("filters below the configured level and passes the level to the sink", () => {
    const lines: Array<{ line: string; level: string }> = []
    const logger = createAccountLogger({
      level: "warn",
      component: "test",
      sink: (line, level) => lines.push({ line, level }),
      now: () => new Date(BASE_TIME_MS),
    })

    logger.debug("hidden")
    logger.info("hidden")
    logger.warn("shown", { attempt: 2 })

    expect(lines).toEqual([
      {
        line: JSON.stringify({
          attempt: 2,
          timestamp: "2023-11-14T22:13:20.000Z",
          level: "warn",
          component: "test",
          event: "shown",
        }),
        level: "warn",
      },
    ])
  })

  it("child loggers stamp their own component", () => {
    const { logger, logs } = captureLogger()
    logger.child("registration").info("hello")
    expect(logs.entries[0]).toMatchObject({ component: "registration", event: "hello", level: "info" })
  })

  it("does not let fields overwrite the entry envelope", () => {
    const { logger, logs } = captureLogger()
    logger.info("real_event", { event: "spoofed", level: "error" })
    expect(logs.entries[0]).toMatchObject({ event: "real_event", level: "info" })
  })

  it("records non-Error failures by their string form", () => {
    const { logger, logs } = captureLogger()
    logger.error("failed", "plain reason")
    expect(logs.entries[0]).toMatchObject({ error: "plain reason" })
    expect(logs.entries[0]).not.toHaveProperty("error_name")
  })
})
