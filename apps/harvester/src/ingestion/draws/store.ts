/**
 * Persistence Gateway
 *
 * JSON file holding the store as an ascending-period list of
 * { period, date, balls, super }.
 *
 * load(): any read or parse failure yields an empty store, never an error.
 * Of duplicate periods a complete entry beats an incomplete one, otherwise
 * the first wins.
 * save(): written to a sibling temp file then renamed over the target;
 * any failure throws PersistenceWriteError. Entries the last load could not
 * keep (unrepairable, or a differing duplicate) are appended to
 * `<path>.rejected.json` first, so the rewrite never loses them.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { ILogger } from '@drawledger/logger'
import { PersistenceWriteError } from '../../config/errors.js'
import { loggers } from '../../config/logger.js'
import { recoverStoredRecord, serializeStore } from './codec.js'
import { safeJsonParse } from './kit/json.js'
import { sameContent, supersedes } from './reconcile.js'
import type { DrawStore } from './types.js'

export interface DrawStoreGateway {
  load(): Promise<DrawStore>
  save(store: DrawStore): Promise<void>
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class JsonFileDrawStore implements DrawStoreGateway {
  readonly path: string
  private readonly log: ILogger
  private rejected: unknown[] = []

  constructor(path: string, logger: ILogger = loggers.store) {
    this.path = path
    this.log = logger
  }

  get rejectedPath(): string {
    return `${this.path}.rejected.json`
  }

  async load(): Promise<DrawStore> {
    const store: DrawStore = new Map()
    this.rejected = []

    let text: string
    try {
      text = await readFile(this.path, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        this.log.info('No draw store yet, starting empty', { path: this.path })
      } else {
        this.log.warn('Draw store unreadable, starting empty', { path: this.path }, error)
      }
      return store
    }

    const parsed = safeJsonParse(text)
    if (!parsed.ok || !Array.isArray(parsed.value)) {
      this.log.warn('Draw store is not a JSON list, starting empty', {
        path: this.path,
        error: parsed.ok ? 'not an array' : parsed.error,
      })
      return store
    }

    for (const entry of parsed.value) {
      const record = recoverStoredRecord(entry)
      if (!record) {
        this.rejected.push(entry)
        continue
      }
      const current = store.get(record.period)
      if (!current || supersedes(current, record)) {
        store.set(record.period, record)
      } else if (!sameContent(current, record)) {
        this.rejected.push(entry)
      }
    }

    if (this.rejected.length > 0) {
      this.log.warn('Stored entries set aside', {
        path: this.path,
        rejected: this.rejected.length,
        rejectedPath: this.rejectedPath,
      })
    }
    this.log.debug('Draw store loaded', { path: this.path, records: store.size })
    return store
  }

  async save(store: DrawStore): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.tmp`
    try {
      await mkdir(dirname(this.path), { recursive: true })
      await this.keepRejected()
      await writeFile(tempPath, serializeStore(store), 'utf8')
      await rename(tempPath, this.path)
    } catch (error) {
      await rm(tempPath, { force: true }).catch(cleanupError => {
        this.log.warn('Temp store file left behind', { path: tempPath }, cleanupError)
      })
      throw new PersistenceWriteError(this.path, error)
    }
    this.log.info('Draw store written', { path: this.path, records: store.size })
  }

  private async keepRejected(): Promise<void> {
    if (this.rejected.length === 0) return

    let previous: unknown[] = []
    try {
      const parsed = safeJsonParse(await readFile(this.rejectedPath, 'utf8'))
      if (!parsed.ok || !Array.isArray(parsed.value)) {
        throw new Error(`Not a JSON list: ${this.rejectedPath}`)
      }
      previous = parsed.value
    } catch (error) {
      if (!isMissingFile(error)) throw error
    }

    const known = new Set(previous.map(entry => JSON.stringify(entry)))
    const added = this.rejected.filter(entry => !known.has(JSON.stringify(entry)))
    await writeFile(this.rejectedPath, `${JSON.stringify([...previous, ...added], null, 2)}\n`, 'utf8')
    this.rejected = []
  }
}
