// src/storage/atomic-json-store.ts — Crash-safe JSON document file

import { open, readFile, rename, stat, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import { Value } from "@sinclair/typebox/value"
import type { Static, TSchema } from "@sinclair/typebox"
import { AsyncMutex } from "../shared/async-mutex.js"
import { StorageError } from "./errors.js"

export interface AtomicJsonStoreOptions {
  /** Largest document accepted by replace(), in bytes. Default 1 MiB. */
  maxSizeBytes?: number
}

const DEFAULT_MAX_SIZE = 1024 * 1024

type Generation = "primary" | "backup" | "staged"

/**
 * One schema-checked JSON document on disk.
 *
 * A replacement is staged beside the document, synced, and renamed over it;
 * the previous document is kept as a backup. Loading falls back from the
 * document to the backup and then to a staged file left by an interrupted
 * replacement. If none of them is a valid document they are moved aside and
 * the load fails with CORRUPT.
 */
export class AtomicJsonStore<S extends TSchema> {
  private readonly paths: Record<Generation, string>
  private readonly maxSizeBytes: number
  private readonly writes = new AsyncMutex()

  constructor(
    readonly filePath: string,
    private readonly schema: S,
    options: AtomicJsonStoreOptions = {},
  ) {
    this.paths = { primary: filePath, backup: `${filePath}.bak`, staged: `${filePath}.tmp` }
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE
  }

  /** The stored document, or null when nothing has been written yet. */
  async read(): Promise<Static<S> | null> {
    const present: string[] = []
    for (const generation of ["primary", "backup", "staged"] as const) {
      const path = this.paths[generation]
      const loaded = await this.load(path)
      if (loaded.kind === "valid") return loaded.document
      if (loaded.kind === "invalid") present.push(path)
    }
    if (present.length === 0) return null

    const stamp = Date.now()
    for (const path of present) await moveAside(path, `${path}.corrupt.${stamp}`)
    throw new StorageError("CORRUPT", "no readable copy of the store document", {
      file_path: this.filePath,
      quarantined: present.length,
    })
  }

  /** Replace the document. Replacements through one instance never interleave. */
  async replace(document: Static<S>): Promise<void> {
    const text = `${JSON.stringify(document, withSortedKeys, 2)}\n`
    const size = Buffer.byteLength(text, "utf-8")
    if (size > this.maxSizeBytes) {
      throw new StorageError("TOO_LARGE", `document of ${size} bytes exceeds ${this.maxSizeBytes}`, {
        size_bytes: size,
        max_size_bytes: this.maxSizeBytes,
      })
    }

    await this.writes.runExclusive(async () => {
      await writeFile(this.paths.staged, text, "utf-8")
      await syncPath(this.paths.staged)
      if ((await this.modifiedAt()) !== null) await rename(this.paths.primary, this.paths.backup)
      await rename(this.paths.staged, this.paths.primary)
      await syncDirectory(dirname(this.paths.primary))
    })
  }

  /** mtime of the document in milliseconds, or null when it does not exist. */
  async modifiedAt(): Promise<number | null> {
    try {
      return (await stat(this.paths.primary)).mtimeMs
    } catch (err: unknown) {
      if (errnoCode(err) === "ENOENT") return null
      throw err
    }
  }

  private async load(
    path: string,
  ): Promise<{ kind: "missing" } | { kind: "invalid" } | { kind: "valid"; document: Static<S> }> {
    let text: string
    try {
      text = await readFile(path, "utf-8")
    } catch (err: unknown) {
      if (errnoCode(err) === "ENOENT") return { kind: "missing" }
      throw err
    }
    const parsed = parseJson(text)
    if (parsed !== undefined && Value.Check(this.schema, parsed)) return { kind: "valid", document: parsed }
    return { kind: "invalid" }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return undefined
    throw err
  }
}

function withSortedKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return value
  return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
}

async function moveAside(from: string, to: string): Promise<void> {
  try {
    await rename(from, to)
  } catch (err: unknown) {
    // A concurrent reader got there first
    if (errnoCode(err) !== "ENOENT") throw err
  }
}

async function syncPath(path: string): Promise<void> {
  const handle = await open(path, "r")
  try {
    await handle.sync()
  } finally {
    await handle.close()
  }
}

/** Directory fsync is refused on some filesystems; those errors are ignored. */
async function syncDirectory(path: string): Promise<void> {
  try {
    await syncPath(path)
  } catch (err: unknown) {
    const code = errnoCode(err)
    if (code !== "EISDIR" && code !== "EINVAL" && code !== "EPERM" && code !== "EBADF") throw err
  }
}

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined
}
