// src/boot/account-boot.ts — Account-state subsystem boot orchestrator
//
// Self-contained boot sequence. Provides graceful degradation: if any step
// fails, the error is captured, whatever was opened is closed, and the caller
// gets { success: false, error } instead of a throw.

import { mkdir } from "node:fs/promises"
import { dirname } from "node:path"
import type { AccountCollaborators } from "../account/collaborators.js"
import { type AccountContext, createAccountContext } from "../account/context.js"
import { type AccountLogger, createAccountLogger } from "../account/logger.js"
import type { AccountConfig } from "../config.js"
import { FileKeyValueDatabase } from "../storage/file-database.js"
import type { KeyValueDatabase } from "../storage/kv-database.js"

// ── Result types ───────────────────────────────────────────

export interface AccountBootResult {
  success: boolean
  context?: AccountContext
  warnings: string[]
  error?: string
}

// ── Dependency injection interface ─────────────────────────

export interface AccountBootDeps {
  /** Defaults to a FileKeyValueDatabase at config.storePath */
  openDatabase?: (config: AccountConfig) => Promise<KeyValueDatabase>
  collaborators?: AccountCollaborators
  logger?: AccountLogger
  now?: () => Date
}

// ── Boot sequence ──────────────────────────────────────────

async function openFileDatabase(config: AccountConfig): Promise<KeyValueDatabase> {
  await mkdir(dirname(config.storePath), { recursive: true })
  return new FileKeyValueDatabase({ filePath: config.storePath, maxSizeBytes: config.storeMaxBytes })
}

/**
 * Boot the account-state subsystem.
 *
 * Opens the store, builds the context, warms the cache and, in a secondary
 * process, starts observing external commits. Does NOT throw.
 */
export async function bootAccountState(
  config: AccountConfig,
  deps: AccountBootDeps = {},
): Promise<AccountBootResult> {
  const warnings: string[] = []
  const logger = deps.logger ?? createAccountLogger({ level: config.logLevel })
  let database: KeyValueDatabase | undefined

  try {
    // ── Step 1: Open the store ─────────────────────────────
    database = await (deps.openDatabase ?? openFileDatabase)(config)

    // ── Step 2: Build the context ──────────────────────────
    const context = createAccountContext({
      database,
      collaborators: deps.collaborators,
      logger,
      processRole: config.processRole,
      now: deps.now,
    })
    if (!deps.collaborators) {
      warnings.push("No collaborators attached; cleanup calls are only recorded")
    }

    // ── Step 3: Warm the cache ─────────────────────────────
    await context.cache.warm()

    // ── Step 4: Observe external commits (secondary only) ──
    if (context.observer.start()) {
      if (database instanceof FileKeyValueDatabase) {
        database.startPolling(config.externalPollMs, (err) => {
          logger.error("external_change_poll_failed", err, { store_path: config.storePath })
        })
      } else {
        warnings.push("Store does not poll for external changes; relying on its own notifications")
      }
    }

    logger.info("account_state_booted", {
      process_role: config.processRole,
      database_id: database.id,
      warnings: warnings.length,
    })
    return { success: true, context, warnings }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error("account_state_boot_failed", err)
    if (database) {
      try {
        await database.close()
      } catch (closeErr: unknown) {
        warnings.push(`Closing the store after a failed boot also failed: ${
          closeErr instanceof Error ? closeErr.message : String(closeErr)
        }`)
      }
    }
    return {
      success: false,
      warnings,
      error: `Boot failed unexpectedly: ${message}`,
    }
  }
}
