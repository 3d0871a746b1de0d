// src/account/external-change.ts — Reload the cache when another process commits
//
// Only secondary processes (extensions) observe; the main process is the
// writer of record and never has its cache changed underneath it.

import type { KeyValueDatabase } from "../storage/kv-database.js"
import type { AccountLogger } from "./logger.js"
import type { AccountStateCache } from "./state-cache.js"
import type { AccountState } from "./types.js"

export type ProcessRole = "main" | "extension"

type ReloadOutcome = { ok: true; state: AccountState } | { ok: false; error: unknown }

export interface ExternalChangeObserverDeps {
  database: KeyValueDatabase
  cache: AccountStateCache
  logger: AccountLogger
  processRole: ProcessRole
}

export class ExternalChangeObserver {
  private unsubscribe: (() => void) | null = null

  constructor(private readonly deps: ExternalChangeObserverDeps) {}

  get isObserving(): boolean {
    return this.unsubscribe !== null
  }

  /** Subscribe to external commits. Returns false in the main process. */
  start(): boolean {
    if (this.deps.processRole === "main") return false
    if (this.unsubscribe) return true

    this.unsubscribe = this.deps.database.onExternalChange((version) => {
      void this.reload(version)
    })
    this.deps.logger.info("external_change_observer_started", { role: this.deps.processRole })
    return true
  }

  /** Reload the cached snapshot. Failures are logged and rethrown. */
  async handleExternalChange(version?: number): Promise<AccountState> {
    const outcome = await this.reload(version)
    if (!outcome.ok) throw outcome.error
    return outcome.state
  }

  /** Never rejects; a failure is logged once here. */
  private async reload(version?: number): Promise<ReloadOutcome> {
    try {
      const state = await this.deps.cache.reload()
      this.deps.logger.info("account_state_reloaded_after_external_change", { version })
      return { ok: true, state }
    } catch (err: unknown) {
      this.deps.logger.error("external_change_reload_failed", err, { version })
      return { ok: false, error: err }
    }
  }

  stop(): void {
    if (!this.unsubscribe) return
    this.unsubscribe()
    this.unsubscribe = null
    this.deps.logger.info("external_change_observer_stopped")
  }
}
