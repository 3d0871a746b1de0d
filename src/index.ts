// src/index.ts — Public surface of the account-state package

// Storage
export { StorageError, type StorageErrorCode } from "./storage/errors.js"
export {
  type Collections,
  type CompletionErrorHandler,
  type ExternalChangeListener,
  type KeyValueDatabase,
  type ReadTransaction,
  type StoredValue,
  type StoredValueKind,
  type WriteTransaction,
  StoredValueSchema,
  isWriteTransaction,
} from "./storage/kv-database.js"
export { KeyValueStore } from "./storage/kv-store.js"
export { InMemoryKeyValueDatabase, MemoryBacking, type InMemoryDatabaseOptions } from "./storage/memory-database.js"
export {
  DATABASE_DOCUMENT_VERSION,
  DatabaseDocumentSchema,
  FileKeyValueDatabase,
  type DatabaseDocument,
  type FileDatabaseOptions,
} from "./storage/file-database.js"
export { AtomicJsonStore, type AtomicJsonStoreOptions } from "./storage/atomic-json-store.js"

// Account state
export * from "./account/types.js"
export {
  EMPTY_ACCOUNT_STATE,
  deriveRegistrationState,
  describeAccountState,
  isLogicallyDeregistered,
  isPrimaryDevice,
  isRegistered,
  isRegisteredAndReady,
  isReregistering,
  loadAccountState,
} from "./account/account-state.js"
export { AccountStateError, type AccountStateErrorCode } from "./account/errors.js"
export {
  type E164,
  type ServiceId,
  isE164,
  isServiceId,
  parseE164,
  parseServiceId,
  redactPhoneNumber,
} from "./account/identifiers.js"
export { AccountStateCache, type CacheView } from "./account/state-cache.js"
export {
  RegistrationStateMachine,
  type PrimaryRegistration,
  type RegistrationStateMachineDeps,
  type VerificationAttempt,
} from "./account/state-machine.js"
export { ExternalChangeObserver, type ProcessRole } from "./account/external-change.js"
export {
  AccountEventBus,
  isEventOf,
  type AccountEvent,
  type AccountEventListener,
  type AccountEventOf,
  type AccountEventType,
} from "./account/events.js"
export * from "./account/collaborators.js"
export { createAccountContext, type AccountContext, type AccountContextOptions } from "./account/context.js"
export {
  LOG_LEVELS,
  createAccountLogger,
  type AccountLogger,
  type AccountLoggerOptions,
  type LogLevel,
  type LogSink,
} from "./account/logger.js"

// Config & boot
export { loadConfig, type AccountConfig } from "./config.js"
export { bootAccountState, type AccountBootDeps, type AccountBootResult } from "./boot/account-boot.js"
