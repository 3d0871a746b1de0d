// src/main.ts — Standalone entry point
// Boot sequence: config → store → context → warm cache → observe (secondary) → wait for signal
//
// The main process reports the account state and exits. A secondary process
// keeps running, logging registration changes other processes commit.

import { describeAccountState } from "./account/account-state.js"
import { createAccountLogger } from "./account/logger.js"
import { bootAccountState } from "./boot/account-boot.js"
import { loadConfig } from "./config.js"

async function main(): Promise<void> {
  const config = loadConfig()
  const logger = createAccountLogger({ level: config.logLevel, component: "main" })

  const result = await bootAccountState(config, { logger })
  for (const warning of result.warnings) {
    logger.warn("boot_warning", { warning })
  }
  if (!result.success || !result.context) {
    logger.error("boot_failed", new Error(result.error ?? "unknown boot failure"))
    process.exitCode = 1
    return
  }
  const context = result.context

  const state = await context.stateMachine.currentState()
  logger.info("account_state_ready", describeAccountState(state))

  if (context.processRole === "main") {
    await context.shutdown()
    return
  }

  context.events.subscribe((event) => {
    logger.info("account_event", { type: event.type })
  })
  // Polling timers are unref'd; this one holds the process open until a signal
  const keepAlive = setInterval(() => undefined, 60_000)

  let shuttingDown = false
  const shutdown = (signal: string): void => {
    if (shuttingDown) return
    shuttingDown = true
    clearInterval(keepAlive)
    logger.info("shutdown_requested", { signal })
    context.shutdown().then(
      () => logger.info("shutdown_complete"),
      (err: unknown) => {
        logger.error("shutdown_failed", err)
        process.exitCode = 1
      },
    )
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"))
  process.on("SIGINT", () => shutdown("SIGINT"))
}

main().catch((err: unknown) => {
  console.error(JSON.stringify({ event: "fatal", error: err instanceof Error ? err.message : String(err) }))
  process.exit(1)
})
