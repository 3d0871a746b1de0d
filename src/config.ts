// src/config.ts — Configuration loader from environment variables

import { join } from "node:path"
import type { ProcessRole } from "./account/external-change.js"
import { LOG_LEVELS, type LogLevel } from "./account/logger.js"

export interface AccountConfig {
  // Storage
  dataDir: string
  storePath: string
  /** Upper bound for the serialized store document */
  storeMaxBytes: number

  // Process
  processRole: ProcessRole
  /** How often a secondary process polls the store file for external commits */
  externalPollMs: number

  // Logging
  logLevel: LogLevel
}

type Env = Record<string, string | undefined>

const VALID_PROCESS_ROLES: readonly ProcessRole[] = ["main", "extension"]

function parseProcessRole(value: string | undefined): ProcessRole {
  if (value === undefined || value === "") return "main"
  const role = VALID_PROCESS_ROLES.find((r) => r === value)
  if (role) return role
  throw new Error(`ACCOUNT_PROCESS_ROLE must be one of ${VALID_PROCESS_ROLES.join(", ")} (got "${value}")`)
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value === "") return "info"
  const level = LOG_LEVELS.find((l) => l === value)
  if (level) return level
  throw new Error(`ACCOUNT_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (got "${value}")`)
}

/** Parse a positive integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: Env, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  if (value <= 0) {
    throw new Error(`${envKey} must be positive (got "${raw}")`)
  }
  return value
}

export function loadConfig(env: Env = process.env): AccountConfig {
  const dataDir = env.ACCOUNT_DATA_DIR || "./data"

  return {
    dataDir,
    storePath: env.ACCOUNT_STORE_PATH || join(dataDir, "account-store.json"),
    storeMaxBytes: parseIntEnv(env, "ACCOUNT_STORE_MAX_BYTES", String(1024 * 1024)),
    processRole: parseProcessRole(env.ACCOUNT_PROCESS_ROLE),
    externalPollMs: parseIntEnv(env, "ACCOUNT_EXTERNAL_POLL_MS", "2000"),
    logLevel: parseLogLevel(env.ACCOUNT_LOG_LEVEL),
  }
}
