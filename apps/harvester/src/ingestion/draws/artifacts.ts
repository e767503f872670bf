/**
 * Raw payload dumps for diagnosing upstream drift.
 *
 * Best effort: a failed write is logged and never affects the run.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ILogger } from '@drawledger/logger'
import { loggers } from '../../config/logger.js'

export class ArtifactWriter {
  private readonly dir?: string
  private readonly log: ILogger
  private prepared = false

  constructor(dir?: string, logger: ILogger = loggers.store) {
    this.dir = dir
    this.log = logger
  }

  async write(name: string, content: string): Promise<void> {
    if (this.dir === undefined) return

    const path = join(this.dir, name.replace(/[^\w.-]+/g, '_'))
    try {
      if (!this.prepared) {
        await mkdir(this.dir, { recursive: true })
        this.prepared = true
      }
      await writeFile(path, content, 'utf8')
    } catch (error) {
      this.log.warn('Artifact write failed', { path }, error)
    }
  }
}

export function apiArtifactName(date: string, shapeIndex: number, page: number): string {
  return `api_${date}_${shapeIndex}_p${page}.json`
}

export function htmlArtifactName(urlIndex: number, attempt: number): string {
  return `html_${urlIndex}_a${attempt}.html`
}
