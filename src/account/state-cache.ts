// src/account/state-cache.ts — Lock-guarded AccountState cache
//
// One AsyncMutex guards the cached snapshot and the pending verification
// identity together, so a reader never combines a pending value with a
// snapshot it was not current with.
//
// Lock ordering: a transaction is always opened (or received) BEFORE the
// lock is taken, and nothing inside the lock opens a transaction or awaits.
// Opening a transaction, or re-taking the lock, from inside the lock fails
// with LOCK_ORDER_VIOLATION instead of deadlocking.

import { AsyncLocalStorage } from "node:async_hooks"
import { AsyncMutex } from "../shared/async-mutex.js"
import {
  type KeyValueDatabase,
  type ReadTransaction,
  type WriteTransaction,
  isWriteTransaction,
} from "../storage/kv-database.js"
import type { KeyValueStore } from "../storage/kv-store.js"
import { describeAccountState, loadAccountState } from "./account-state.js"
import { AccountStateError } from "./errors.js"
import type { AccountLogger } from "./logger.js"
import {
  type AccountState,
  type LocalIdentifiers,
  type PendingVerificationIdentity,
  NO_PENDING_IDENTITY,
} from "./types.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Everything the lock guards, as seen by one critical section. */
export interface CacheView {
  readonly snapshot: AccountState | null
  /** Store version the snapshot was loaded at; -1 when nothing is cached */
  readonly version: number
  readonly pending: PendingVerificationIdentity
}

interface GuardedState {
  snapshot: AccountState | null
  version: number
  /** Transaction that produced the snapshot; used to evict it on rollback */
  installedBy: ReadTransaction | null
  pending: PendingVerificationIdentity
  /** Pending identity cleared by a write that has not committed yet */
  clearedPending: { tx: WriteTransaction; pending: PendingVerificationIdentity } | null
}

export interface AccountStateCacheDeps {
  database: KeyValueDatabase
  store: KeyValueStore
  logger: AccountLogger
}

type LoadMode = "fill" | "refresh"

// ---------------------------------------------------------------------------
// AccountStateCache
// ---------------------------------------------------------------------------

export class AccountStateCache {
  private readonly database: KeyValueDatabase
  private readonly store: KeyValueStore
  private readonly logger: AccountLogger
  private readonly mutex = new AsyncMutex()
  private readonly lockContext = new AsyncLocalStorage<true>()
  private readonly trackedWrites = new WeakSet<WriteTransaction>()
  private readonly guarded: GuardedState = {
    snapshot: null,
    version: -1,
    installedBy: null,
    pending: NO_PENDING_IDENTITY,
    clearedPending: null,
  }

  constructor(deps: AccountStateCacheDeps) {
    this.database = deps.database
    this.store = deps.store
    this.logger = deps.logger
  }

  // === SNAPSHOT ===

  /**
   * Cached snapshot, or load one. With tx, loads from that (already open)
   * transaction; without, opens a read transaction before taking the lock.
   */
  async getOrLoad(tx?: ReadTransaction): Promise<AccountState> {
    const cached = await this.read((view) => view.snapshot)
    if (cached) return cached
    if (tx) return this.install(tx, "fill")
    return this.openReadTransaction((readTx) => this.install(readTx, "fill"))
  }

  /** Reload from tx and replace the cached snapshot. */
  async invalidate(tx: ReadTransaction): Promise<AccountState> {
    return this.install(tx, "refresh")
  }

  /** Reload through a freshly opened read transaction. */
  async reload(): Promise<AccountState> {
    return this.openReadTransaction((tx) => this.install(tx, "refresh"))
  }

  /** Load the snapshot at startup and log a summary. */
  async warm(): Promise<AccountState> {
    const state = await this.reload()
    this.logger.info("account_state_warmed", describeAccountState(state))
    return state
  }

  /**
   * Reload from a write transaction and clear the pending identity in the
   * same critical section. The cleared identity comes back if tx rolls back.
   */
  async invalidateAndClearPending(tx: WriteTransaction): Promise<AccountState> {
    this.trackRollback(tx)
    return this.withLock((g) => {
      const state = this.loadInto(g, tx, "refresh")
      if (g.pending !== NO_PENDING_IDENTITY) {
        g.clearedPending = { tx, pending: g.pending }
        g.pending = NO_PENDING_IDENTITY
      }
      return state
    })
  }

  // === PENDING IDENTITY ===

  async setPendingIdentity(identity: PendingVerificationIdentity): Promise<void> {
    await this.withLock((g) => {
      g.pending = Object.freeze({ ...identity })
      g.clearedPending = null
    })
  }

  async clearPendingIdentity(): Promise<void> {
    await this.withLock((g) => {
      g.pending = NO_PENDING_IDENTITY
      g.clearedPending = null
    })
  }

  async pendingIdentity(): Promise<PendingVerificationIdentity> {
    return this.read((view) => view.pending)
  }

  /** Local identifiers with pending values taking precedence, read under one lock. */
  async localIdentifiers(tx?: ReadTransaction): Promise<LocalIdentifiers> {
    const loaded = await this.getOrLoad(tx)
    return this.read((view) => {
      const state = view.snapshot ?? loaded
      return {
        phoneNumber: view.pending.phoneNumber ?? state.localNumber,
        aci: view.pending.aci ?? state.localAci,
        pni: view.pending.pni ?? state.localPni,
      }
    })
  }

  // === LOCKING ===

  /** Run a synchronous read of the guarded state under the lock. */
  async read<T>(fn: (view: CacheView) => T): Promise<T> {
    return this.withLock((g) => fn({ snapshot: g.snapshot, version: g.version, pending: g.pending }))
  }

  /** Fail fast if called from inside a critical section of this cache. */
  assertUnlocked(operation: string): void {
    if (this.lockContext.getStore()) {
      throw new AccountStateError(
        "LOCK_ORDER_VIOLATION",
        `${operation} attempted while holding the account state lock`,
        { operation },
      )
    }
  }

  private async withLock<T>(fn: (g: GuardedState) => T): Promise<T> {
    this.assertUnlocked("lock acquisition")
    return this.mutex.runExclusive(() => this.lockContext.run(true, () => fn(this.guarded)))
  }

  private async openReadTransaction<T>(fn: (tx: ReadTransaction) => Promise<T>): Promise<T> {
    this.assertUnlocked("opening a read transaction")
    return this.database.read(fn)
  }

  // === LOADING ===

  private async install(tx: ReadTransaction, mode: LoadMode): Promise<AccountState> {
    if (isWriteTransaction(tx)) this.trackRollback(tx)
    return this.withLock((g) => this.loadInto(g, tx, mode))
  }

  /** Must run under the lock. */
  private loadInto(g: GuardedState, tx: ReadTransaction, mode: LoadMode): AccountState {
    if (g.snapshot && mode === "fill") return g.snapshot
    if (g.snapshot && tx.version < g.version) {
      this.logger.debug("stale_load_discarded", { load_version: tx.version, cached_version: g.version })
      return g.snapshot
    }
    const state = loadAccountState(this.store, tx)
    g.snapshot = state
    g.version = tx.version
    g.installedBy = tx
    this.logger.debug("account_state_loaded", { version: tx.version, mode })
    return state
  }

  private trackRollback(tx: WriteTransaction): void {
    if (this.trackedWrites.has(tx)) return
    this.trackedWrites.add(tx)
    tx.addRollbackHandler(() => this.rollback(tx))
  }

  /** Evict whatever tx installed and restore the pending identity it cleared. */
  private async rollback(tx: WriteTransaction): Promise<void> {
    await this.withLock((g) => {
      if (g.installedBy === tx) {
        g.snapshot = null
        g.version = -1
        g.installedBy = null
      }
      if (g.clearedPending?.tx === tx) {
        if (g.pending === NO_PENDING_IDENTITY) g.pending = g.clearedPending.pending
        g.clearedPending = null
      }
    })
    this.logger.warn("account_state_rolled_back", { version: tx.version })
  }
}
