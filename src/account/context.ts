// src/account/context.ts — Explicit wiring of the account-state subsystem
//
// One context per process. Nothing here is a module-level singleton; callers
// hold the context and pass it where it is needed.

import type { KeyValueDatabase } from "../storage/kv-database.js"
import { KeyValueStore } from "../storage/kv-store.js"
import { type AccountCollaborators, RecordingCollaborators } from "./collaborators.js"
import { AccountEventBus } from "./events.js"
import { ExternalChangeObserver, type ProcessRole } from "./external-change.js"
import { type AccountLogger, createAccountLogger } from "./logger.js"
import { AccountStateCache } from "./state-cache.js"
import { RegistrationStateMachine } from "./state-machine.js"
import { ACCOUNT_COLLECTION } from "./types.js"

export interface AccountContextOptions {
  database: KeyValueDatabase
  /** Defaults to RecordingCollaborators, which only record calls */
  collaborators?: AccountCollaborators
  logger?: AccountLogger
  processRole?: ProcessRole
  now?: () => Date
}

export interface AccountContext {
  readonly database: KeyValueDatabase
  readonly store: KeyValueStore
  readonly cache: AccountStateCache
  readonly events: AccountEventBus
  readonly stateMachine: RegistrationStateMachine
  readonly observer: ExternalChangeObserver
  readonly processRole: ProcessRole
  /** Stop observing, drain pending events, close the database. */
  shutdown(): Promise<void>
}

export function createAccountContext(options: AccountContextOptions): AccountContext {
  const logger = options.logger ?? createAccountLogger()
  const processRole = options.processRole ?? "main"
  const database = options.database
  const store = new KeyValueStore(ACCOUNT_COLLECTION)
  const cache = new AccountStateCache({ database, store, logger: logger.child("account-cache") })
  const events = new AccountEventBus(logger.child("account-events"))
  const stateMachine = new RegistrationStateMachine({
    database,
    store,
    cache,
    events,
    collaborators: options.collaborators ?? new RecordingCollaborators(),
    logger: logger.child("registration"),
    now: options.now,
  })
  const observer = new ExternalChangeObserver({
    database,
    cache,
    logger: logger.child("external-change"),
    processRole,
  })

  let shutdownPromise: Promise<void> | null = null

  return {
    database,
    store,
    cache,
    events,
    stateMachine,
    observer,
    processRole,
    shutdown() {
      shutdownPromise ??= (async () => {
        observer.stop()
        await events.idle()
        await database.close()
        logger.info("account_context_shutdown", { database_id: database.id })
      })()
      return shutdownPromise
    },
  }
}
